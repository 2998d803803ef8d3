/**
 * CLI Endpoint Commands
 *
 * Manual endpoints carry no ownership tag, so registry syncs never
 * touch them.
 */

import {
  type Endpoint,
  EndpointAlreadyExistsError,
  EndpointNotFoundError,
  endpointSchema,
  formatServiceType,
  formatZodIssues,
  parseDotProperties,
  parseServiceType,
} from "@svcsync/core";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";

export type EndpointListItem = {
  id: string;
  url: string;
  /** `group:artifact:version`, empty when untyped */
  type: string;
  /** Registry that imported the endpoint; null for manual ones */
  source: string | null;
  isDefault: boolean;
};

export type ListEndpointsOptions = {
  context?: string;
};

export async function listEndpoints(
  options: ListEndpointsOptions = {}
): Promise<EndpointListItem[]> {
  const app = useAppContext();
  const context = await app.contexts.get(options.context ?? app.contextName);
  const defaults = new Set(Object.values(context.defaults));

  return context.endpoints.map((endpoint) => ({
    id: endpoint.id,
    url: endpoint.url,
    type: endpoint.type ? formatServiceType(endpoint.type) : "",
    source: endpoint.source?.sourceId ?? null,
    isDefault: defaults.has(endpoint.id),
  }));
}

export type AddEndpointOptions = {
  url: string;
  /** `group:artifact:version` */
  type?: string;
  /** `key=value` lines of the authentication config (dotted keys nest) */
  auth?: string[];
  context?: string;
};

export async function addEndpoint(
  id: string,
  options: AddEndpointOptions
): Promise<Endpoint> {
  const candidate: Endpoint = { id, url: options.url };

  if (options.type) {
    const type = parseServiceType(options.type);
    if (!type) {
      throw new Error(
        `Invalid service type "${options.type}". Use group:artifact:version.`
      );
    }
    candidate.type = type;
  }

  if (options.auth && options.auth.length > 0) {
    candidate.authentication = parseDotProperties(options.auth.join("\n"));
  }

  const parsed = endpointSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(`Invalid endpoint: ${formatZodIssues(parsed.error)}`);
  }
  const endpoint = parsed.data;

  const app = useAppContext();
  await app.contexts.update((context, name) => {
    if (context.endpoints.some((existing) => existing.id === endpoint.id)) {
      throw new EndpointAlreadyExistsError(
        `Endpoint "${endpoint.id}" already exists in context "${name}".`
      );
    }
    context.endpoints.push(endpoint);
    log.debug(`Added endpoint "${endpoint.id}" to context "${name}"`);
  }, options.context ?? app.contextName);

  return endpoint;
}

export type RemoveEndpointOptions = {
  context?: string;
};

/**
 * Removes an endpoint and any default pointing at it.
 */
export async function removeEndpoint(
  id: string,
  options: RemoveEndpointOptions = {}
): Promise<Endpoint> {
  const app = useAppContext();

  return app.contexts.update((context, name) => {
    const endpoint = context.endpoints.find((existing) => existing.id === id);
    if (!endpoint) {
      throw new EndpointNotFoundError(id);
    }

    context.endpoints = context.endpoints.filter(
      (existing) => existing.id !== id
    );
    for (const [kind, defaultId] of Object.entries(context.defaults)) {
      if (defaultId === id) {
        delete context.defaults[kind];
      }
    }
    if (endpoint.source) {
      log.warn(
        `"${id}" was imported from ${endpoint.source.sourceId}; the next sync adds it back.`
      );
    }
    log.debug(`Removed endpoint "${id}" from context "${name}"`);
    return endpoint;
  }, options.context ?? app.contextName);
}
