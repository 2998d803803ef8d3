/**
 * Shared constants for svcsync.
 */

import type { ServiceType } from "./endpoint/types";

/** Authentication type assumed when an endpoint config omits `type`. */
export const DEFAULT_AUTH_TYPE = "oauth2";

/** Session model version written by the OAuth2 authenticator. */
export const SESSION_MODEL_VERSION = 4;

/** Oldest session model version that carries enough data to refresh. */
export const MIN_REFRESHABLE_SESSION_MODEL_VERSION = 3;

/** Catalog file format version. */
export const CATALOG_VERSION = 1;

/** Context created when the catalog is empty. */
export const DEFAULT_CONTEXT_NAME = "default";

/**
 * Candidate registry base paths, tried in order during discovery.
 * - "" for a registry served at the root
 * - "service-registry/" for a collection service
 * - "api/service-registry/" for an explorer-style portal
 */
export const REGISTRY_BASE_PATHS = [
  "",
  "service-registry/",
  "api/service-registry/",
] as const;

/** Registry API paths (relative to the registry base URL). */
export const REGISTRY_ENDPOINTS = {
  services: "services",
} as const;

export const SERVICE_REGISTRY_TYPE: ServiceType = {
  group: "org.ga4gh",
  artifact: "service-registry",
  version: "1.0.0",
};

/** Service kinds; per-kind defaults in a context are keyed by these names. */
export const SERVICE_KIND_IDS = [
  "registry",
  "data-connect",
  "drs",
  "collections",
  "workflow",
] as const;

export type ServiceKind = (typeof SERVICE_KIND_IDS)[number];

/** Service types accepted by each kind. */
export const SERVICE_KINDS: Record<ServiceKind, readonly ServiceType[]> = {
  registry: [SERVICE_REGISTRY_TYPE],
  "data-connect": [
    { group: "org.ga4gh", artifact: "data-connect", version: "1.0.0" },
  ],
  drs: [{ group: "org.ga4gh", artifact: "drs", version: "1.1.0" }],
  collections: [
    { group: "org.ga4gh", artifact: "collection-service", version: "1.0.0" },
  ],
  workflow: [
    { group: "org.ga4gh", artifact: "wes", version: "1.0" },
    { group: "org.ga4gh", artifact: "wes", version: "1.1" },
  ],
};

/** Kinds that hold data (every kind except the registry itself). */
export const DATA_SERVICE_KINDS = SERVICE_KIND_IDS.filter(
  (kind) => kind !== "registry"
);
