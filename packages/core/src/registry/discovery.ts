import { REGISTRY_BASE_PATHS, REGISTRY_ENDPOINTS } from "../constants";
import { getErrorMessage, InvalidServiceRegistryError } from "../errors";
import { silentLogger } from "../logger";
import { isPlainObject } from "../utils/hash";
import { type HttpOptions, JSON_HEADERS, toRootUrl } from "./client";

const HTTP_SCHEME = /^https?:\/\//;

export function hasHttpScheme(value: string) {
  return HTTP_SCHEME.test(value);
}

/** `host[:port]` of a bare hostname or URL */
export function getHostname(hostOrUrl: string) {
  return new URL(hasHttpScheme(hostOrUrl) ? hostOrUrl : `https://${hostOrUrl}`)
    .host;
}

/**
 * Returns the root URL (with a trailing slash) when `url` serves a
 * registry listing: a 2xx JSON response holding an array of objects with
 * string ids. Connection failures count as no match.
 */
export async function checkRegistryRoot(
  url: string,
  options: HttpOptions = {}
): Promise<string | null> {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const logger = options.logger ?? silentLogger;
  const root = toRootUrl(url);
  const listingUrl = new URL(REGISTRY_ENDPOINTS.services, root);

  let response: Response;
  try {
    response = await fetchImpl(listingUrl, { headers: JSON_HEADERS });
  } catch (error) {
    logger.debug(`check ${listingUrl}: ${getErrorMessage(error)}`);
    return null;
  }

  if (!response.ok) {
    logger.debug(`check ${listingUrl}: HTTP ${response.status}`);
    return null;
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    logger.debug(`check ${listingUrl}: ${getErrorMessage(error)}`);
    return null;
  }

  const isListing =
    Array.isArray(body) &&
    body.every((entry) => isPlainObject(entry) && typeof entry.id === "string");
  if (!isListing) {
    logger.debug(`check ${listingUrl}: not a service listing`);
    return null;
  }

  const contentType = response.headers.get("content-type") ?? "";
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase();
  return mediaType === "application/json" ? root : null;
}

/**
 * Tries the known registry base paths under `https://<host>/`.
 * The first path serving a listing wins.
 * @throws InvalidServiceRegistryError when no path matches
 */
export async function discoverRegistry(
  hostOrUrl: string,
  options: HttpOptions = {}
): Promise<string> {
  const base = `https://${getHostname(hostOrUrl)}/`;

  for (const path of REGISTRY_BASE_PATHS) {
    const root = await checkRegistryRoot(new URL(path, base).toString(), options);
    if (root) {
      return root;
    }
  }

  throw new InvalidServiceRegistryError(
    `The given hostname (${hostOrUrl}) is not a hostname of the service registry service.`
  );
}
