import * as client from "openid-client";
import {
  MIN_REFRESHABLE_SESSION_MODEL_VERSION,
  SESSION_MODEL_VERSION,
} from "../../constants";
import type { AuthenticationConfig } from "../../endpoint/types";
import { fingerprint } from "../../endpoint/utils";
import {
  AuthenticationInterruptedError,
  FeatureNotAvailableError,
  getErrorMessage,
  InvalidStateError,
  NoRefreshTokenError,
  OAuth2MisconfigurationError,
  ReauthenticationRequiredError,
} from "../../errors";
import { canonicalJson, stripNullish } from "../../utils/hash";
import { Authenticator, type AuthenticatorOptions } from "../authenticator";
import type { SessionStore } from "../session-store";
import {
  epochSeconds,
  hasRefreshToken,
  isSessionValid,
  type RestoreOptions,
  type RestoreResult,
  type SessionInfo,
} from "../types";
import { BLOCKING_RESPONSE_EVENTS, OAuth2AdapterRegistry } from "./adapter";
import {
  type OAuth2Config,
  oauth2ConfigSchema,
  type TokenResponse,
  tokenResponseSchema,
} from "./config";

export type OAuth2AuthenticatorOptions = AuthenticatorOptions & {
  sessionStore: SessionStore;
  adapters?: OAuth2AdapterRegistry;
  /** Used for token endpoint requests */
  fetch?: typeof fetch;
  /** Epoch seconds */
  now?: () => number;
};

// Matches e.g. "JWT expired at 2024-01-01T00:00:00Z"
const EXPIRED_REFRESH_TOKEN = /\bexpired\b/i;

export class OAuth2Authenticator extends Authenticator {
  private readonly id: string;
  private readonly rawConfig: AuthenticationConfig;
  private readonly config: OAuth2Config;
  private readonly sessionStore: SessionStore;
  private readonly adapters: OAuth2AdapterRegistry;
  private readonly fetchImpl?: typeof fetch;
  private readonly now: () => number;
  private cachedSession: SessionInfo | null = null;

  private constructor(
    id: string,
    rawConfig: AuthenticationConfig,
    config: OAuth2Config,
    options: OAuth2AuthenticatorOptions
  ) {
    super("oauth2", options);
    this.id = id;
    this.rawConfig = rawConfig;
    this.config = config;
    this.sessionStore = options.sessionStore;
    this.adapters = options.adapters ?? new OAuth2AdapterRegistry();
    this.fetchImpl = options.fetch;
    this.now = options.now ?? epochSeconds;
  }

  /**
   * Validates the config and derives the session id from it.
   * @throws OAuth2MisconfigurationError when the config is not a valid OAuth2 config
   */
  static async create(
    config: AuthenticationConfig,
    options: OAuth2AuthenticatorOptions
  ): Promise<OAuth2Authenticator> {
    const parsed = oauth2ConfigSchema.safeParse(stripNullish(config));
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ");
      throw new OAuth2MisconfigurationError(
        `Invalid OAuth2 configuration (${issues})`
      );
    }

    const id = await fingerprint(config);
    return new OAuth2Authenticator(id, { ...config }, parsed.data, options);
  }

  get sessionId() {
    return this.id;
  }

  get authInfo() {
    return this.rawConfig;
  }

  async restoreSession(options: RestoreOptions = {}): Promise<RestoreResult> {
    const cached = this.cachedSession !== null;
    const session = this.cachedSession ?? (await this.sessionStore.restore(this.id));
    const details = { cached, sessionId: this.id };
    const notRestored = (reason: string) => {
      this.logger.debug(`session not restored: ${reason}`);
      if (!options.silent) {
        this.events.dispatch("session-not-restored", { ...details, reason });
      }
    };

    if (!session) {
      notRestored("No session available");
      return { kind: "authentication-required", reason: "No session available" };
    }

    if (isSessionValid(session, this.now())) {
      if (session.configHash === this.id) {
        return { kind: "restored", session };
      }

      const reason =
        "The session is invalidated as the endpoint configuration has changed.";
      notRestored(reason);
      return { kind: "reauthentication-required", reason, configChanged: true };
    }

    if (hasRefreshToken(session)) {
      notRestored("The session is invalid but it can be refreshed.");
      return { kind: "refresh-required", session };
    }

    const reason = "The session is invalid and refreshing tokens is not possible.";
    notRestored(reason);
    return { kind: "reauthentication-required", reason, configChanged: false };
  }

  async authenticate(signal?: AbortSignal): Promise<SessionInfo> {
    const details = { sessionId: this.id, authInfo: this.rawConfig };
    this.events.dispatch("authentication-before", details);

    const adapter = this.adapters.resolve(this.config);
    if (!adapter) {
      this.events.dispatch("authentication-failure", {
        ...details,
        reason: "No compatible OAuth2 adapter",
      });
      throw new OAuth2MisconfigurationError(
        `Cannot determine the type of authentication (${canonicalJson(stripNullish(this.config))})`
      );
    }

    for (const type of BLOCKING_RESPONSE_EVENTS) {
      adapter.events.relay(this.events, type);
    }

    let response: TokenResponse;
    try {
      if (signal?.aborted) {
        throw new AuthenticationInterruptedError();
      }
      response = tokenResponseSchema.parse(await adapter.exchangeTokens(signal));
    } catch (error) {
      this.events.dispatch("authentication-failure", {
        ...details,
        reason: getErrorMessage(error),
      });
      throw error;
    } finally {
      adapter.events.clear();
    }

    const session = this.toSession(response);
    await this.store(session);

    this.events.dispatch("authentication-ok", { ...details, sessionInfo: session });
    return session;
  }

  async refresh(): Promise<SessionInfo> {
    const details: Record<string, unknown> = {
      cached: this.cachedSession !== null,
      sessionId: this.id,
    };
    this.events.dispatch("refresh-before", details);

    const session = this.cachedSession ?? (await this.sessionStore.restore(this.id));
    if (!session) {
      throw new ReauthenticationRequiredError(
        "No existing session information available"
      );
    }

    if (session.modelVersion < MIN_REFRESHABLE_SESSION_MODEL_VERSION) {
      this.events.dispatch("refresh-failure", {
        ...details,
        reason: "Not enough information for token refresh",
      });
      throw new ReauthenticationRequiredError(
        "The stored session information does not provide enough information to refresh tokens."
      );
    }

    if (!hasRefreshToken(session)) {
      this.events.dispatch("refresh-failure", {
        ...details,
        reason: "No refresh token",
      });
      throw new NoRefreshTokenError();
    }
    const refreshToken = session.refreshToken;

    const tokenEndpoint = this.config.token_endpoint;
    if (!tokenEndpoint) {
      throw new FeatureNotAvailableError("token refresh without a token endpoint");
    }
    // The refresh grant authenticates the client by its id.
    if (!this.config.client_id) {
      throw new FeatureNotAvailableError("token refresh without a client id");
    }

    const response = await this.requestRefresh(
      tokenEndpoint,
      refreshToken,
      session.scope,
      details
    );

    const refreshed = this.toSession(response, refreshToken);
    await this.store(refreshed);

    this.events.dispatch("refresh-ok", { ...details, sessionInfo: refreshed });
    return refreshed;
  }

  async revoke(): Promise<void> {
    this.cachedSession = null;
    await this.sessionStore.delete(this.id);
    this.events.dispatch("session-revoked", { sessionId: this.id });
  }

  protected updateHeaders(session: SessionInfo, headers: Headers) {
    if (!session.accessToken) {
      throw new InvalidStateError("The session has no access token", {
        sessionId: this.id,
      });
    }
    headers.set("Authorization", `Bearer ${session.accessToken}`);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async store(session: SessionInfo) {
    this.cachedSession = session;
    await this.sessionStore.save(this.id, session);
  }

  private async requestRefresh(
    tokenEndpoint: string,
    refreshToken: string,
    scope: string | undefined,
    details: Record<string, unknown>
  ): Promise<TokenResponse> {
    const parameters: Record<string, string> = {};
    if (scope) {
      parameters.scope = scope;
    }

    try {
      this.logger.debug(`refreshing tokens at ${tokenEndpoint}`);
      const configuration = this.clientConfiguration(tokenEndpoint);
      const response = await client.refreshTokenGrant(
        configuration,
        refreshToken,
        parameters
      );
      return tokenResponseSchema.parse({
        access_token: response.access_token,
        token_type: response.token_type,
        expires_in: response.expires_in,
        refresh_token: response.refresh_token,
        scope: response.scope,
      });
    } catch (error) {
      const failure = describeRefreshFailure(error);

      if (failure.status === 400 && EXPIRED_REFRESH_TOKEN.test(failure.reason)) {
        throw new ReauthenticationRequiredError("Refresh token expired");
      }

      this.events.dispatch("refresh-failure", {
        ...details,
        reason: "Invalid state while refreshing tokens",
      });
      throw new InvalidStateError("Unable to refresh the access token", {
        request: { url: tokenEndpoint },
        response: { status: failure.status, traceId: failure.traceId },
        reason: `Unable to refresh tokens: ${failure.reason}`,
      });
    }
  }

  private clientConfiguration(tokenEndpoint: string) {
    const endpoint = new URL(tokenEndpoint);
    const serverMetadata: client.ServerMetadata = {
      issuer: endpoint.origin,
      token_endpoint: tokenEndpoint,
    };

    const clientSecret = this.config.client_secret;
    const configuration = new client.Configuration(
      serverMetadata,
      this.config.client_id ?? "",
      undefined,
      clientSecret ? client.ClientSecretBasic(clientSecret) : client.None()
    );

    if (endpoint.protocol === "http:") {
      client.allowInsecureRequests(configuration);
    }

    const fetchImpl = this.fetchImpl;
    if (fetchImpl) {
      configuration[client.customFetch] = (url, options) =>
        fetchImpl(url, options);
    }

    return configuration;
  }

  private toSession(
    response: TokenResponse,
    priorRefreshToken?: string
  ): SessionInfo {
    const issuedAt = this.now();
    return {
      modelVersion: SESSION_MODEL_VERSION,
      configHash: this.id,
      accessToken: response.access_token,
      refreshToken: response.refresh_token ?? priorRefreshToken,
      scope: response.scope ?? undefined,
      tokenType: response.token_type,
      issuedAt,
      validUntil: issuedAt + response.expires_in,
      authInfo: { ...this.rawConfig },
    };
  }
}

type RefreshFailure = {
  status?: number;
  traceId?: string;
  reason: string;
};

function describeRefreshFailure(error: unknown): RefreshFailure {
  if (error instanceof client.ResponseBodyError) {
    return {
      status: error.status,
      traceId: error.response.headers.get("X-B3-Traceid") ?? undefined,
      reason: error.error_description || error.error,
    };
  }

  const response = findResponse(error);
  if (response) {
    return {
      status: response.status,
      traceId: response.headers.get("X-B3-Traceid") ?? undefined,
      reason: getErrorMessage(error),
    };
  }

  return { reason: getErrorMessage(error) };
}

// openid-client nests the HTTP response in the cause chain.
function findResponse(error: unknown): Response | null {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if (current.cause instanceof Response) {
      return current.cause;
    }
    current = current.cause;
  }
  return null;
}
