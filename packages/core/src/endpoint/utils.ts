import { DEFAULT_AUTH_TYPE, SERVICE_KINDS, type ServiceKind } from "../constants";
import { contentHash, type JsonObject, stripNullish } from "../utils/hash";
import type { AuthenticationConfig, Endpoint, ServiceType } from "./types";

// =============================================================================
// Service types
// =============================================================================

export function formatServiceType(type: ServiceType) {
  return `${type.group}:${type.artifact}:${type.version}`;
}

/** Parses `group:artifact:version`; returns null on any other shape. */
export function parseServiceType(value: string): ServiceType | null {
  const parts = value.split(":").map((part) => part.trim());
  if (parts.length !== 3 || parts.some((part) => !part)) {
    return null;
  }
  const [group = "", artifact = "", version = ""] = parts;
  return { group, artifact, version };
}

export function isSameServiceType(a: ServiceType, b: ServiceType) {
  return (
    a.group === b.group && a.artifact === b.artifact && a.version === b.version
  );
}

export function isOfKind(type: ServiceType | undefined, kind: ServiceKind) {
  return (
    type !== undefined &&
    SERVICE_KINDS[kind].some((accepted) => isSameServiceType(accepted, type))
  );
}

// =============================================================================
// Authentication configs
// =============================================================================

/** Primary config first, then fallbacks. */
export function getAuthentications(endpoint: Endpoint): AuthenticationConfig[] {
  const configs: AuthenticationConfig[] = [];
  if (endpoint.authentication) {
    configs.push(endpoint.authentication);
  }
  configs.push(...(endpoint.fallbackAuthentications ?? []));
  return configs;
}

/**
 * Drops null fields and fills in the default `type`.
 * Two configs with the same normalized form share a session.
 */
export function normalizeAuthentication(
  config: AuthenticationConfig
): JsonObject {
  const normalized = stripNullish(config);
  if (!normalized.type) {
    normalized.type = DEFAULT_AUTH_TYPE;
  }
  return normalized;
}

/** Credential fingerprint: the session deduplication key. */
export function fingerprint(config: AuthenticationConfig): Promise<string> {
  return contentHash(normalizeAuthentication(config));
}

/**
 * Hash of everything the synchronizer compares between a local endpoint
 * and its remote counterpart (the id excluded).
 */
export function endpointContentHash(endpoint: Endpoint): Promise<string> {
  return contentHash(
    stripNullish({
      url: endpoint.url,
      type: endpoint.type,
      authentication: endpoint.authentication,
      fallbackAuthentications: endpoint.fallbackAuthentications,
      source: endpoint.source,
    })
  );
}
