import type {
  OAuth2Adapter,
  OAuth2AdapterFactory,
} from "../auth/oauth2/adapter";
import { createAdapterEvents } from "../auth/oauth2/adapter";
import type { OAuth2Config, TokenResponse } from "../auth/oauth2/config";
import { SESSION_MODEL_VERSION } from "../constants";
import type { SessionInfo } from "../auth/types";

export type FakeGrant = OAuth2AdapterFactory & {
  /** Configs passed to `create`, in call order */
  exchanges: OAuth2Config[];
};

export type FakeGrantOptions = {
  name?: string;
  requiredFields?: OAuth2AdapterFactory["requiredFields"];
  response?: Partial<TokenResponse>;
  /** Runs inside `exchangeTokens` before tokens are returned */
  onExchange?: (adapter: OAuth2Adapter, config: OAuth2Config) => void | Promise<void>;
};

/**
 * Grant flow that returns fixed tokens, counting exchanges.
 */
export function fakeGrant(options: FakeGrantOptions = {}): FakeGrant {
  const exchanges: OAuth2Config[] = [];

  return {
    name: options.name ?? "fake",
    requiredFields: options.requiredFields ?? ["client_id"],
    exchanges,
    create(config) {
      const adapter: OAuth2Adapter = {
        events: createAdapterEvents(),
        async exchangeTokens() {
          exchanges.push(config);
          await options.onExchange?.(adapter, config);
          return {
            access_token: `access-${exchanges.length}`,
            token_type: "Bearer",
            expires_in: 3600,
            refresh_token: `refresh-${exchanges.length}`,
            ...options.response,
          };
        },
      };
      return adapter;
    },
  };
}

export function makeSession(overrides: Partial<SessionInfo> = {}): SessionInfo {
  return {
    modelVersion: SESSION_MODEL_VERSION,
    accessToken: "stored-access",
    refreshToken: "stored-refresh",
    tokenType: "Bearer",
    issuedAt: 1_000,
    validUntil: 4_600,
    ...overrides,
  };
}
