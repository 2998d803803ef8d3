import type { ZodError } from "zod";
import { REGISTRY_ENDPOINTS } from "../constants";
import { getErrorMessage, ServiceListingError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { type Service, serviceListSchema } from "./schema";

export type HttpOptions = {
  fetch?: typeof fetch;
  logger?: Logger;
};

export const JSON_HEADERS = { Accept: "application/json" } as const;

/** Registry URLs are resolved against, so they must end with a slash. */
export function toRootUrl(url: string) {
  return url.endsWith("/") ? url : `${url}/`;
}

export function formatZodIssues(error: ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Fetches the services published by a registry.
 * @throws ServiceListingError on connection failures, non-2xx responses
 * and malformed listings
 */
export async function listServices(
  registryUrl: string,
  options: HttpOptions = {}
): Promise<Service[]> {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const logger = options.logger ?? silentLogger;
  const url = new URL(REGISTRY_ENDPOINTS.services, toRootUrl(registryUrl));

  let response: Response;
  try {
    logger.debug(`GET ${url}`);
    response = await fetchImpl(url, { headers: JSON_HEADERS });
  } catch (error) {
    throw new ServiceListingError(
      `Failed to connect to service registry: ${getErrorMessage(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    throw new ServiceListingError(
      `Service registry returned ${response.status} ${response.statusText} (${url})`,
      response.status
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ServiceListingError(
      `Unable to parse the service listing (${url}): ${getErrorMessage(error)}`,
      response.status,
      { cause: error }
    );
  }

  const parsed = serviceListSchema.safeParse(body);
  if (!parsed.success) {
    throw new ServiceListingError(
      `Invalid service listing (${url}): ${formatZodIssues(parsed.error)}`,
      response.status
    );
  }

  logger.debug(`listed ${parsed.data.length} service(s) from ${url}`);
  return parsed.data;
}
