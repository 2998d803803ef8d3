import { beforeEach, describe, expect, it, vi } from "vitest";
import { fingerprint } from "../../endpoint/utils";
import {
  FeatureNotAvailableError,
  InvalidStateError,
  NoRefreshTokenError,
  OAuth2MisconfigurationError,
  ReauthenticationRequiredError,
} from "../../errors";
import { fakeGrant, makeSession } from "../../test-utils/auth";
import { createFetchStub, jsonResponse } from "../../test-utils/fetch";
import { InMemorySessionStore } from "../session-store";
import { OAuth2AdapterRegistry } from "./adapter";
import { OAuth2Authenticator } from "./authenticator";

const NOW = 2_000;
const TOKEN_URL = "https://auth.example.test/oauth/token";

const config = {
  type: "oauth2",
  grant_type: "client_credentials",
  client_id: "test-client",
  client_secret: "test-secret",
  resource_url: "https://data.example.test/",
  token_endpoint: TOKEN_URL,
};

const personalAccessConfig = {
  type: "oauth2",
  grant_type: "personal_access",
  personal_access_token: "test-token",
  resource_url: "https://data.example.test/",
  token_endpoint: TOKEN_URL,
};

describe("OAuth2Authenticator", () => {
  let store: InMemorySessionStore;

  beforeEach(() => {
    store = new InMemorySessionStore();
  });

  function create(
    overrides: Partial<Parameters<typeof OAuth2Authenticator.create>[1]> = {},
    authConfig: Record<string, unknown> = config
  ) {
    return OAuth2Authenticator.create(authConfig, {
      sessionStore: store,
      now: () => NOW,
      ...overrides,
    });
  }

  describe("create", () => {
    it("uses the credential fingerprint as session id", async () => {
      const authenticator = await create();
      expect(authenticator.sessionId).toBe(await fingerprint(config));
      expect(authenticator.kind).toBe("oauth2");
    });

    it("rejects a config without grant_type", async () => {
      const { grant_type: _grant, ...incomplete } = config;
      await expect(create({}, incomplete)).rejects.toThrow(
        OAuth2MisconfigurationError
      );
    });

    it("ignores null fields", async () => {
      const authenticator = await create({}, { ...config, scope: null });
      expect(authenticator.sessionId).toBe(await fingerprint(config));
    });
  });

  describe("restoreSession", () => {
    it("requires authentication when nothing is stored", async () => {
      const authenticator = await create();
      const handler = vi.fn();
      authenticator.events.on("session-not-restored", handler);

      const result = await authenticator.restoreSession();

      expect(result).toEqual({
        kind: "authentication-required",
        reason: "No session available",
      });
      expect(handler.mock.calls[0]?.[0].details).toEqual({
        cached: false,
        sessionId: authenticator.sessionId,
        reason: "No session available",
      });
    });

    it("restores a valid session issued for the same config", async () => {
      const authenticator = await create();
      const session = makeSession({ configHash: authenticator.sessionId });
      await store.save(authenticator.sessionId, session);

      expect(await authenticator.restoreSession()).toEqual({
        kind: "restored",
        session,
      });
    });

    it("requires re-authentication when the config changed", async () => {
      const authenticator = await create();
      await store.save(
        authenticator.sessionId,
        makeSession({ configHash: "stale" })
      );

      const result = await authenticator.restoreSession();
      expect(result.kind).toBe("reauthentication-required");
      expect(result).toMatchObject({ configChanged: true });
    });

    it("requires a refresh when expired with a refresh token", async () => {
      const authenticator = await create();
      const session = makeSession({
        configHash: authenticator.sessionId,
        validUntil: NOW - 1,
      });
      await store.save(authenticator.sessionId, session);

      expect(await authenticator.restoreSession()).toEqual({
        kind: "refresh-required",
        session,
      });
    });

    it("requires re-authentication when expired without a refresh token", async () => {
      const authenticator = await create();
      await store.save(
        authenticator.sessionId,
        makeSession({
          configHash: authenticator.sessionId,
          validUntil: NOW - 1,
          refreshToken: undefined,
        })
      );

      expect(await authenticator.restoreSession()).toMatchObject({
        kind: "reauthentication-required",
        configChanged: false,
      });
    });

    it("treats a blank refresh token as missing", async () => {
      const authenticator = await create();
      await store.save(
        authenticator.sessionId,
        makeSession({
          configHash: authenticator.sessionId,
          validUntil: NOW - 1,
          refreshToken: "   ",
        })
      );

      expect(await authenticator.restoreSession()).toMatchObject({
        kind: "reauthentication-required",
        configChanged: false,
      });
    });
  });

  describe("getState", () => {
    it("maps restore results to statuses", async () => {
      const authenticator = await create();
      expect((await authenticator.getState()).status).toBe("uninitialized");

      await store.save(
        authenticator.sessionId,
        makeSession({ configHash: authenticator.sessionId, validUntil: NOW - 1 })
      );
      const state = await authenticator.getState();
      expect(state.status).toBe("refresh-required");
      expect(state.sessionInfo?.refreshToken).toBe("stored-refresh");
      expect(state.authInfo).toEqual(config);
      expect(state.authenticator).toBe("oauth2");
    });

    it("does not notify about sessions that are not restored", async () => {
      const authenticator = await create();
      const handler = vi.fn();
      authenticator.events.on("session-not-restored", handler);

      expect((await authenticator.getState()).status).toBe("uninitialized");
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe("authenticate", () => {
    it("fails without a compatible grant flow", async () => {
      const authenticator = await create();
      const failure = vi.fn();
      authenticator.events.on("authentication-failure", failure);

      await expect(authenticator.authenticate()).rejects.toThrow(
        OAuth2MisconfigurationError
      );
      expect(failure.mock.calls[0]?.[0].details.reason).toBe(
        "No compatible OAuth2 adapter"
      );
    });

    it("picks the first compatible grant flow and stores the session", async () => {
      const deviceCode = fakeGrant({
        name: "device-code",
        requiredFields: ["device_code_endpoint"],
      });
      const clientCredentials = fakeGrant({
        name: "client-credentials",
        requiredFields: ["client_id", "client_secret", "token_endpoint"],
      });
      const authenticator = await create({
        adapters: new OAuth2AdapterRegistry()
          .register(deviceCode)
          .register(clientCredentials),
      });

      const session = await authenticator.authenticate();

      expect(deviceCode.exchanges).toHaveLength(0);
      expect(clientCredentials.exchanges).toHaveLength(1);
      expect(session).toEqual({
        modelVersion: 4,
        configHash: authenticator.sessionId,
        accessToken: "access-1",
        refreshToken: "refresh-1",
        scope: undefined,
        tokenType: "Bearer",
        issuedAt: NOW,
        validUntil: NOW + 3600,
        authInfo: config,
      });
      expect(await store.restore(authenticator.sessionId)).toEqual(session);
    });

    it("relays blocking responses from the grant flow", async () => {
      const grant = fakeGrant({
        onExchange(adapter) {
          adapter.events.dispatch("blocking-response-required", {
            kind: "user_verification",
            url: "https://auth.example.test/activate",
          });
        },
      });
      const authenticator = await create({
        adapters: new OAuth2AdapterRegistry([grant]),
      });
      const blocking = vi.fn();
      authenticator.events.on("blocking-response-required", blocking);

      await authenticator.authenticate();

      expect(blocking.mock.calls[0]?.[0].details).toEqual({
        kind: "user_verification",
        url: "https://auth.example.test/activate",
      });
    });
  });

  describe("refresh", () => {
    async function withStoredSession(
      overrides: Parameters<typeof makeSession>[0] = {},
      fetchImpl?: typeof fetch,
      authConfig: Record<string, unknown> = config
    ) {
      const authenticator = await create({ fetch: fetchImpl }, authConfig);
      await store.save(
        authenticator.sessionId,
        makeSession({
          configHash: authenticator.sessionId,
          validUntil: NOW - 1,
          ...overrides,
        })
      );
      return authenticator;
    }

    it("requires re-authentication when nothing is stored", async () => {
      const authenticator = await create();
      await expect(authenticator.refresh()).rejects.toThrow(
        ReauthenticationRequiredError
      );
    });

    it("requires re-authentication for an old session model", async () => {
      const authenticator = await withStoredSession({ modelVersion: 2 });
      await expect(authenticator.refresh()).rejects.toThrow(
        ReauthenticationRequiredError
      );
    });

    it("fails without a refresh token", async () => {
      const authenticator = await withStoredSession({ refreshToken: undefined });
      await expect(authenticator.refresh()).rejects.toThrow(NoRefreshTokenError);
    });

    it("fails with a blank refresh token", async () => {
      const authenticator = await withStoredSession({ refreshToken: "   " });
      const failure = vi.fn();
      authenticator.events.on("refresh-failure", failure);

      await expect(authenticator.refresh()).rejects.toThrow(NoRefreshTokenError);
      expect(failure.mock.calls[0]?.[0].details.reason).toBe("No refresh token");
    });

    it("is not available without a token endpoint", async () => {
      const { token_endpoint: _endpoint, ...withoutEndpoint } = config;
      const authenticator = await withStoredSession({}, undefined, withoutEndpoint);
      await expect(authenticator.refresh()).rejects.toThrow(
        FeatureNotAvailableError
      );
    });

    it("is not available without a client id", async () => {
      const stub = createFetchStub({});
      const authenticator = await withStoredSession(
        {},
        stub.fetch,
        personalAccessConfig
      );

      await expect(authenticator.refresh()).rejects.toThrow(
        "token refresh without a client id"
      );
      expect(stub.requests).toHaveLength(0);
    });

    it("exchanges the refresh token and keeps it when none is returned", async () => {
      const stub = createFetchStub({
        [`POST ${TOKEN_URL}`]: () =>
          jsonResponse({
            access_token: "refreshed-access",
            token_type: "Bearer",
            expires_in: 600,
          }),
      });
      const authenticator = await withStoredSession({}, stub.fetch);
      const ok = vi.fn();
      authenticator.events.on("refresh-ok", ok);

      const session = await authenticator.refresh();

      expect(session.accessToken).toBe("refreshed-access");
      expect(session.refreshToken).toBe("stored-refresh");
      expect(session.validUntil).toBe(NOW + 600);
      expect(ok).toHaveBeenCalledTimes(1);

      const request = stub.requests[0];
      expect(request?.headers.get("authorization")).toMatch(/^Basic /);
      const body = new URLSearchParams(request?.body ?? "");
      expect(body.get("grant_type")).toBe("refresh_token");
      expect(body.get("refresh_token")).toBe("stored-refresh");
    });

    it("requires re-authentication when the refresh token expired", async () => {
      const stub = createFetchStub({
        [`POST ${TOKEN_URL}`]: () =>
          jsonResponse(
            {
              error: "invalid_grant",
              error_description: "JWT expired at 2024-01-01T00:00:00Z",
            },
            { status: 400 }
          ),
      });
      const authenticator = await withStoredSession({}, stub.fetch);

      await expect(authenticator.refresh()).rejects.toThrow(
        "Refresh token expired"
      );
    });

    it("raises an invalid state for other failures", async () => {
      const stub = createFetchStub({
        [`POST ${TOKEN_URL}`]: () =>
          jsonResponse(
            { error: "invalid_client", error_description: "Unknown client" },
            { status: 401, headers: { "X-B3-Traceid": "trace-1" } }
          ),
      });
      const authenticator = await withStoredSession({}, stub.fetch);
      const failure = vi.fn();
      authenticator.events.on("refresh-failure", failure);

      const error = await authenticator.refresh().catch((caught) => caught);

      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error.summary).toBe("Unable to refresh the access token");
      expect(error.details.request).toEqual({ url: TOKEN_URL });
      expect(failure).toHaveBeenCalledTimes(1);
    });
  });

  describe("initialize", () => {
    it("falls back to authentication when the refresh is rejected", async () => {
      const grant = fakeGrant();
      const stub = createFetchStub({
        [`POST ${TOKEN_URL}`]: () =>
          jsonResponse(
            { error: "invalid_grant", error_description: "JWT expired" },
            { status: 400 }
          ),
      });
      const authenticator = await create({
        adapters: new OAuth2AdapterRegistry([grant]),
        fetch: stub.fetch,
      });
      await store.save(
        authenticator.sessionId,
        makeSession({ configHash: authenticator.sessionId, validUntil: NOW - 1 })
      );

      const session = await authenticator.initialize();

      expect(session.accessToken).toBe("access-1");
      expect(grant.exchanges).toHaveLength(1);
      expect((await authenticator.getState()).status).toBe("ready");
    });

    it("falls back to authentication when the config has no client id", async () => {
      const grant = fakeGrant({ requiredFields: ["personal_access_token"] });
      const authenticator = await create(
        { adapters: new OAuth2AdapterRegistry([grant]) },
        personalAccessConfig
      );
      await store.save(
        authenticator.sessionId,
        makeSession({ configHash: authenticator.sessionId, validUntil: NOW - 1 })
      );

      const session = await authenticator.initialize();

      expect(session.accessToken).toBe("access-1");
      expect(grant.exchanges).toHaveLength(1);
    });

    it("returns the restored session without any exchange", async () => {
      const grant = fakeGrant();
      const authenticator = await create({
        adapters: new OAuth2AdapterRegistry([grant]),
      });
      await store.save(
        authenticator.sessionId,
        makeSession({ configHash: authenticator.sessionId })
      );
      const restored = vi.fn();
      authenticator.events.on("session-restored", restored);

      const session = await authenticator.initialize();

      expect(session.accessToken).toBe("stored-access");
      expect(grant.exchanges).toHaveLength(0);
      expect(restored).toHaveBeenCalledTimes(1);
    });
  });

  describe("revoke", () => {
    it("clears the stored session", async () => {
      const authenticator = await create({
        adapters: new OAuth2AdapterRegistry([fakeGrant()]),
      });
      await authenticator.authenticate();
      const revoked = vi.fn();
      authenticator.events.on("session-revoked", revoked);

      await authenticator.revoke();

      expect(await store.restore(authenticator.sessionId)).toBeNull();
      expect((await authenticator.getState()).status).toBe("uninitialized");
      expect(revoked.mock.calls[0]?.[0].details).toEqual({
        sessionId: authenticator.sessionId,
      });
    });
  });

  describe("applyTo", () => {
    it("sets a bearer authorization header", async () => {
      const authenticator = await create({
        adapters: new OAuth2AdapterRegistry([fakeGrant()]),
      });

      const headers = await authenticator.applyTo(new Headers());

      expect(headers.get("Authorization")).toBe("Bearer access-1");
    });
  });
});
