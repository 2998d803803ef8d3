import type { AuthenticationConfig, Endpoint } from "../endpoint/types";
import {
  fingerprint,
  getAuthentications,
  normalizeAuthentication,
} from "../endpoint/utils";
import { UnsupportedAuthenticationError } from "../errors";
import type { Authenticator } from "./authenticator";
import {
  OAuth2Authenticator,
  type OAuth2AuthenticatorOptions,
} from "./oauth2/authenticator";

export type AuthenticatorDeps = OAuth2AuthenticatorOptions;

/** One distinct credential config and the endpoints that use it. */
export type CredentialGroup = {
  sessionId: string;
  config: AuthenticationConfig;
  /** Catalog order, no repeats */
  endpointIds: string[];
};

/**
 * Groups the authentication configs of `endpoints` by fingerprint.
 * Groups come in first-encountered order: endpoints in catalog order,
 * each endpoint's primary config before its fallbacks.
 */
export async function groupCredentials(
  endpoints: readonly Endpoint[]
): Promise<CredentialGroup[]> {
  const groups = new Map<string, CredentialGroup>();

  for (const endpoint of endpoints) {
    for (const config of getAuthentications(endpoint)) {
      const sessionId = await fingerprint(config);
      const group = groups.get(sessionId);

      if (!group) {
        groups.set(sessionId, {
          sessionId,
          config,
          endpointIds: [endpoint.id],
        });
      } else if (!group.endpointIds.includes(endpoint.id)) {
        group.endpointIds.push(endpoint.id);
      }
    }
  }

  return [...groups.values()];
}

export async function createAuthenticator(
  config: AuthenticationConfig,
  deps: AuthenticatorDeps
): Promise<Authenticator> {
  const type = normalizeAuthentication(config).type;
  if (type === "oauth2") {
    return OAuth2Authenticator.create(config, deps);
  }
  throw new UnsupportedAuthenticationError(String(type));
}

/** One authenticator per distinct credential fingerprint. */
export async function createAuthenticators(
  endpoints: readonly Endpoint[],
  deps: AuthenticatorDeps
): Promise<Authenticator[]> {
  const authenticators: Authenticator[] = [];
  for (const group of await groupCredentials(endpoints)) {
    authenticators.push(await createAuthenticator(group.config, deps));
  }
  return authenticators;
}
