import {
  createAdapterEvents,
  type OAuth2Adapter,
  type OAuth2AdapterFactory,
} from "@svcsync/core";

export type StaticGrant = OAuth2AdapterFactory & {
  /** Client ids passed to `exchangeTokens`, in call order */
  exchanges: string[];
};

export type StaticGrantOptions = {
  /** Asks the user to verify this code before issuing tokens */
  userCode?: string;
  /** Throws from `exchangeTokens` for these client ids */
  failFor?: string[];
};

/**
 * Grant flow issuing fixed tokens, optionally going through a user
 * verification step first.
 */
export function staticGrant(options: StaticGrantOptions = {}): StaticGrant {
  const exchanges: string[] = [];

  return {
    name: "static",
    requiredFields: ["client_id"],
    exchanges,
    create(config) {
      const adapter: OAuth2Adapter = {
        events: createAdapterEvents(),
        async exchangeTokens(signal) {
          const clientId = config.client_id ?? "";
          if (options.userCode) {
            adapter.events.dispatch("blocking-response-required", {
              kind: "user_verification",
              url: "https://auth.example.test/device",
              userCode: options.userCode,
            });
          }
          signal?.throwIfAborted();
          if (options.failFor?.includes(clientId)) {
            throw new Error(`Access denied for ${clientId}`);
          }
          exchanges.push(clientId);
          return {
            access_token: `access-${exchanges.length}`,
            token_type: "Bearer",
            expires_in: 3600,
            refresh_token: `refresh-${exchanges.length}`,
            scope: config.scope ?? undefined,
          };
        },
      };
      return adapter;
    },
  };
}
