/** `group:artifact:version` coordinate of a service type */
export type ServiceType = {
  group: string;
  artifact: string;
  version: string;
};

/**
 * Authentication configuration of an endpoint.
 * Opaque to everything but the authenticator built for its `type`
 * (`oauth2` when omitted). Values may be `null`; nulls are ignored when
 * comparing configs.
 */
export type AuthenticationConfig = Record<string, unknown>;

/** Ownership tag written by the registry synchronizer */
export type EndpointSource = {
  /** Id of the registry endpoint that imported this endpoint */
  sourceId: string;
  /** Id of the service in the registry listing */
  externalId: string;
};

export type Endpoint = {
  /** Unique within a context */
  id: string;
  url: string;
  type?: ServiceType;
  authentication?: AuthenticationConfig;
  fallbackAuthentications?: AuthenticationConfig[];
  /** Absent on manually added endpoints */
  source?: EndpointSource;
};
