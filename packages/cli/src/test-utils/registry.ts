export const REGISTRY_HOST = "hub.example.test";
export const REGISTRY_URL = `https://${REGISTRY_HOST}/`;

export const DRS_TYPE = { group: "org.ga4gh", artifact: "drs", version: "1.1.0" };

export const DATA_CONNECT_TYPE = {
  group: "org.ga4gh",
  artifact: "data-connect",
  version: "1.0.0",
};

export const AUTH_SERVER = {
  accessTokenUrl: "https://auth.example.test/oauth/token",
  clientId: "test-client",
  clientSecret: "test-secret",
  grantType: "client_credentials",
};

/** Listed service sharing `AUTH_SERVER` */
export function listedService(
  id: string,
  type: { group: string; artifact: string; version: string } = DRS_TYPE,
  scope = "read"
) {
  return {
    id,
    name: id,
    type,
    url: `https://${id}.example.test/`,
    authentication: [
      { ...AUTH_SERVER, resource: `https://${id}.example.test/`, scope },
    ],
  };
}
