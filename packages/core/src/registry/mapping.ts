import { DEFAULT_AUTH_TYPE } from "../constants";
import type { AuthenticationConfig, Endpoint } from "../endpoint/types";
import { type Logger, silentLogger } from "../logger";
import { canonicalJson, stripNullish } from "../utils/hash";
import type { Service, ServiceAuthentication } from "./schema";

/** Registry auth key to endpoint config key */
const AUTHENTICATION_KEYS = {
  authorizationUrl: "authorization_endpoint",
  clientId: "client_id",
  clientSecret: "client_secret",
  deviceCodeUrl: "device_code_endpoint",
  grantType: "grant_type",
  redirectUrl: "redirect_url",
  resource: "resource_url",
  scope: "scope",
  accessTokenUrl: "token_endpoint",
} as const;

// Marks a resource granted with every scope (no scope requested).
const ALL_SCOPES = "<all>";

export function toAuthenticationConfig(
  entry: ServiceAuthentication
): AuthenticationConfig {
  const config: AuthenticationConfig = { type: DEFAULT_AUTH_TYPE };
  for (const [from, to] of Object.entries(AUTHENTICATION_KEYS)) {
    config[to] = entry[from] ?? null;
  }
  return stripNullish(config);
}

/**
 * Maps a listed service to an endpoint with the given local id.
 * The first authentication entry is the primary config; the rest are
 * fallbacks.
 */
export function toEndpoint(
  service: Service,
  id: string,
  registryId: string
): Endpoint {
  const endpoint: Endpoint = {
    id,
    url: service.url,
    type: { ...service.type },
    source: { sourceId: registryId, externalId: service.id },
  };

  const [primary, ...fallbacks] = (service.authentication ?? []).map(
    toAuthenticationConfig
  );
  if (primary) {
    endpoint.authentication = primary;
  }
  if (fallbacks.length > 0) {
    endpoint.fallbackAuthentications = fallbacks;
  }
  return endpoint;
}

/**
 * Lets services behind one authorization server share one session.
 *
 * OAuth2 entries equal apart from `resource` and `scope` form a group.
 * Every entry of a group gets the union of the group's resources and
 * scopes, each sorted and space-separated. A resource listed without a
 * scope grants every scope, in which case no scope is kept at all.
 */
export function mergeAuthentications(
  services: readonly Service[],
  logger: Logger = silentLogger
): Service[] {
  const merged = services.map((service) => ({
    ...service,
    authentication: service.authentication?.map((entry) => ({ ...entry })),
  }));
  const groups = new Map<string, ServiceAuthentication[]>();

  for (const service of merged) {
    for (const entry of service.authentication ?? []) {
      const type = entry.type ?? DEFAULT_AUTH_TYPE;
      if (type !== DEFAULT_AUTH_TYPE) {
        logger.warn(`${service.id}: skipped from merging as it is not OAuth2`);
        continue;
      }
      if (!("resource" in entry)) {
        logger.warn(
          `${service.id}: skipped from merging as the resource URL is not specified`
        );
        continue;
      }

      const { resource: _resource, scope: _scope, ...rest } = entry;
      const key = canonicalJson(rest);
      const group = groups.get(key) ?? [];
      group.push(entry);
      groups.set(key, group);
    }
  }

  for (const group of groups.values()) {
    const { resource, scope } = mergeGroup(group);
    for (const entry of group) {
      entry.resource = resource;
      entry.scope = scope;
    }
  }

  return merged;
}

function mergeGroup(group: readonly ServiceAuthentication[]) {
  const scopesByResource = new Map<string, Set<string>>();

  for (const entry of group) {
    const resource = String(entry.resource);
    const scopes = scopesByResource.get(resource) ?? new Set<string>();
    scopesByResource.set(resource, scopes);

    const scope = typeof entry.scope === "string" ? entry.scope.trim() : "";
    if (!scope) {
      scopes.add(ALL_SCOPES);
      continue;
    }
    for (const name of scope.split(/\s+/)) {
      scopes.add(name);
    }
  }

  const allScopes = [...scopesByResource.values()].some((scopes) =>
    scopes.has(ALL_SCOPES)
  );
  const scopes = new Set(
    [...scopesByResource.values()].flatMap((names) => [...names])
  );

  return {
    resource: [...scopesByResource.keys()].sort().join(" "),
    scope: allScopes ? null : [...scopes].sort().join(" "),
  };
}
