import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Endpoint } from "../endpoint/types";
import { fingerprint } from "../endpoint/utils";
import { AuthenticationInterruptedError } from "../errors";
import type { BusEvent } from "../events/event-bus";
import { fakeGrant, makeSession } from "../test-utils/auth";
import { createFetchStub, jsonResponse } from "../test-utils/fetch";
import { OAuth2AdapterRegistry } from "./oauth2/adapter";
import { InMemorySessionStore } from "./session-store";
import { type RevokeRequest, SessionManager } from "./session-manager";
import type { ExtendedAuthState } from "./types";

const NOW = 2_000;
const TOKEN_URL = "https://auth.example.test/oauth/token";

const shared = {
  type: "oauth2",
  client_id: "test-client",
  client_secret: "test-secret",
  grant_type: "client_credentials",
};

const other = { ...shared, client_id: "other-client" };

function endpoint(
  id: string,
  authentication?: Record<string, unknown>,
  fallbackAuthentications?: Record<string, unknown>[]
): Endpoint {
  return {
    id,
    url: `https://${id.toLowerCase()}.example.test/`,
    authentication,
    fallbackAuthentications,
  };
}

async function collect(states: AsyncIterable<ExtendedAuthState>) {
  const result: ExtendedAuthState[] = [];
  for await (const state of states) {
    result.push(state);
  }
  return result;
}

function record(manager: SessionManager, types: string[]) {
  const seen: { type: string; event: BusEvent }[] = [];
  for (const type of types) {
    manager.events.on(type, (event) => seen.push({ type, event }));
  }
  return seen;
}

describe("SessionManager", () => {
  let store: InMemorySessionStore;

  beforeEach(() => {
    store = new InMemorySessionStore();
  });

  function createManager(
    endpoints: Endpoint[],
    grant = fakeGrant(),
    fetchImpl?: typeof fetch
  ) {
    return new SessionManager({
      context: { endpoints },
      sessionStore: store,
      adapters: new OAuth2AdapterRegistry([grant]),
      fetch: fetchImpl,
      now: () => NOW,
    });
  }

  describe("getStates", () => {
    it("yields one state per shared credential config", async () => {
      const manager = createManager([
        endpoint("E1", shared),
        endpoint("E2", shared),
      ]);

      const states = await collect(manager.getStates());

      expect(states).toHaveLength(1);
      expect(states[0]?.endpoints).toEqual(["E1", "E2"]);
      expect(states[0]?.status).toBe("uninitialized");
      expect(states[0]?.id).toBe(await fingerprint(shared));
    });

    it("orders states by first-encountered config", async () => {
      const manager = createManager([
        endpoint("E1", other),
        endpoint("E2", shared),
        endpoint("E3", other),
      ]);

      const states = await collect(manager.getStates());

      expect(states.map((state) => state.endpoints)).toEqual([
        ["E1", "E3"],
        ["E2"],
      ]);
    });

    it("includes fallback configs after the primary", async () => {
      const manager = createManager([
        endpoint("E1", other, [shared]),
        endpoint("E2", shared),
      ]);

      const states = await collect(manager.getStates());

      expect(states.map((state) => [state.authInfo.client_id, state.endpoints])).toEqual([
        ["other-client", ["E1"]],
        ["test-client", ["E1", "E2"]],
      ]);
    });

    it("treats a missing type and null fields as the same config", async () => {
      const { type: _type, ...untyped } = shared;
      const manager = createManager([
        endpoint("E1", shared),
        endpoint("E2", { ...untyped, scope: null }),
      ]);

      const states = await collect(manager.getStates());

      expect(states).toHaveLength(1);
      expect(states[0]?.endpoints).toEqual(["E1", "E2"]);
    });

    it("selects the sessions serving the requested endpoints", async () => {
      const manager = createManager([
        endpoint("E1", shared),
        endpoint("E2", shared),
        endpoint("E3", other),
      ]);

      const states = await collect(manager.getStates(["E2"]));

      expect(states).toHaveLength(1);
      expect(states[0]?.endpoints).toEqual(["E1", "E2"]);
    });

    it("skips endpoints without authentication", async () => {
      const manager = createManager([endpoint("public"), endpoint("E1", shared)]);
      const states = await collect(manager.getStates());
      expect(states.map((state) => state.endpoints)).toEqual([["E1"]]);
    });

    it("recomputes on every iteration", async () => {
      const manager = createManager([endpoint("E1", shared)]);
      const states = manager.getStates();

      expect((await collect(states))[0]?.status).toBe("uninitialized");
      await manager.initiateAuthentications();
      expect((await collect(states))[0]?.status).toBe("ready");
    });
  });

  describe("initiateAuthentications", () => {
    it("logs in once for endpoints sharing a config", async () => {
      const grant = fakeGrant();
      const manager = createManager(
        [endpoint("E1", shared), endpoint("E2", shared)],
        grant
      );
      const seen = record(manager, ["auth-begin", "auth-end"]);

      const outcomes = await manager.initiateAuthentications();

      expect(grant.exchanges).toHaveLength(1);
      expect(outcomes).toEqual([
        {
          sessionId: await fingerprint(shared),
          endpoints: ["E1", "E2"],
          outcome: "authenticated",
        },
      ]);
      expect(seen.map(({ type }) => type)).toEqual(["auth-begin", "auth-end"]);
      expect(seen[0]?.event.details).toMatchObject({
        index: 0,
        total: 1,
        endpoints: ["E1", "E2"],
      });
      expect(seen[1]?.event.details).toMatchObject({
        outcome: "authenticated",
        state: { status: "ready" },
      });
    });

    it("is idempotent once sessions are ready", async () => {
      const grant = fakeGrant();
      const manager = createManager([endpoint("E1", shared)], grant);
      await manager.initiateAuthentications();
      const save = vi.spyOn(store, "save");
      const seen = record(manager, ["auth-begin", "auth-end"]);

      const outcomes = await manager.initiateAuthentications();

      expect(seen.map(({ type }) => type)).toEqual(["auth-begin", "auth-end"]);
      expect(outcomes[0]?.outcome).toBe("already-authenticated");
      expect(grant.exchanges).toHaveLength(1);
      expect(save).not.toHaveBeenCalled();
    });

    it("reports sessions without a refresh token", async () => {
      const grant = fakeGrant({ response: { refresh_token: null } });
      const manager = createManager([endpoint("E1", shared)], grant);
      const seen = record(manager, ["no-refresh-token"]);

      await manager.initiateAuthentications();

      expect(seen).toHaveLength(1);
    });

    it("skips forced refreshes of sessions that never logged in", async () => {
      const grant = fakeGrant();
      const manager = createManager([endpoint("E1", shared)], grant);
      const seen = record(manager, ["auth-begin", "refresh-skipped", "auth-end"]);

      const outcomes = await manager.initiateAuthentications({
        forceRefresh: true,
      });

      expect(seen.map(({ type }) => type)).toEqual([
        "auth-begin",
        "refresh-skipped",
      ]);
      expect(outcomes[0]?.outcome).toBe("refresh-skipped");
      expect(grant.exchanges).toHaveLength(0);
    });

    it("refreshes ready sessions when forced", async () => {
      const config = { ...shared, token_endpoint: TOKEN_URL };
      const stub = createFetchStub({
        [`POST ${TOKEN_URL}`]: () =>
          jsonResponse({
            access_token: "refreshed-access",
            token_type: "Bearer",
            expires_in: 600,
          }),
      });
      const manager = createManager([endpoint("E1", config)], fakeGrant(), stub.fetch);
      await manager.initiateAuthentications();

      const outcomes = await manager.initiateAuthentications({
        forceRefresh: true,
      });

      expect(outcomes[0]?.outcome).toBe("refreshed");
      expect(stub.requests).toHaveLength(1);
      const stored = await store.restore(await fingerprint(config));
      expect(stored?.accessToken).toBe("refreshed-access");
    });

    it("revokes a broken session before logging in again", async () => {
      const grant = fakeGrant();
      const manager = createManager([endpoint("E1", shared)], grant);
      const sessionId = await fingerprint(shared);
      await store.save(sessionId, makeSession({ configHash: "stale" }));
      const remove = vi.spyOn(store, "delete");

      const outcomes = await manager.initiateAuthentications({
        revokeExisting: true,
      });

      expect(remove).toHaveBeenCalledWith(sessionId);
      expect(outcomes[0]?.outcome).toBe("authenticated");
      expect((await store.restore(sessionId))?.accessToken).toBe("access-1");
    });

    it("stops at an interrupted login and records it as skipped", async () => {
      const grant = fakeGrant({
        onExchange(_adapter, config) {
          if (config.client_id === "other-client") {
            throw new AuthenticationInterruptedError();
          }
        },
      });
      const third = { ...shared, client_id: "third-client" };
      const manager = createManager(
        [endpoint("E1", shared), endpoint("E2", other), endpoint("E3", third)],
        grant
      );
      const seen = record(manager, ["auth-begin", "auth-end"]);

      const outcomes = await manager.initiateAuthentications();

      expect(outcomes.map((outcome) => outcome.outcome)).toEqual([
        "authenticated",
        "skipped",
      ]);
      expect(grant.exchanges.map((config) => config.client_id)).toEqual([
        "test-client",
        "other-client",
      ]);
      expect(seen.map(({ type, event }) => [type, event.details.outcome])).toEqual([
        ["auth-begin", undefined],
        ["auth-end", "authenticated"],
        ["auth-begin", undefined],
        ["auth-end", "skipped"],
      ]);

      const states = await collect(manager.getStates());
      expect(states.map((state) => state.status)).toEqual([
        "ready",
        "uninitialized",
        "uninitialized",
      ]);
    });

    it("skips everything once the signal is aborted", async () => {
      const grant = fakeGrant();
      const manager = createManager([endpoint("E1", shared)], grant);
      const controller = new AbortController();
      controller.abort();

      const outcomes = await manager.initiateAuthentications({
        signal: controller.signal,
      });

      expect(outcomes.map((outcome) => outcome.outcome)).toEqual(["skipped"]);
      expect(grant.exchanges).toHaveLength(0);
    });

    it("propagates other errors and stops the loop", async () => {
      const grant = fakeGrant({
        onExchange() {
          throw new Error("token endpoint unreachable");
        },
      });
      const manager = createManager(
        [endpoint("E1", shared), endpoint("E2", other)],
        grant
      );

      await expect(manager.initiateAuthentications()).rejects.toThrow(
        "token endpoint unreachable"
      );
      expect(grant.exchanges).toHaveLength(1);
    });
  });

  describe("revoke", () => {
    it("revokes a shared session for every endpoint using it", async () => {
      const manager = createManager([
        endpoint("E1", shared),
        endpoint("E2", shared),
      ]);
      await manager.initiateAuthentications();
      const seen = record(manager, ["revoke-begin", "revoke-end"]);

      const affected = await manager.revoke({ endpointIds: ["E1"] });

      expect(affected).toEqual(["E1", "E2"]);
      expect(seen[0]?.event.details.endpointIds).toEqual(["E1 (requested)", "E2"]);
      expect(seen[1]?.event.details.result).toBe("removed");
      expect(store.size).toBe(0);
    });

    it("passes sorted scopes to the confirmation", async () => {
      const grant = fakeGrant({ response: { scope: "write  read" } });
      const manager = createManager([endpoint("E1", shared)], grant);
      await manager.initiateAuthentications();
      const confirm = vi.fn((_request: RevokeRequest) => true);

      await manager.revoke({ confirm });

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(confirm.mock.calls[0]?.[0]).toMatchObject({
        scopes: ["read", "write"],
        endpointIds: ["E1"],
      });
    });

    it("keeps the session when the confirmation declines", async () => {
      const manager = createManager([endpoint("E1", shared)]);
      await manager.initiateAuthentications();
      const seen = record(manager, ["revoke-end"]);

      const affected = await manager.revoke({ confirm: async () => false });

      expect(affected).toEqual([]);
      expect(seen[0]?.event.details.result).toBe("aborted");
      expect((await collect(manager.getStates()))[0]?.status).toBe("ready");
    });

    it("reports sessions that were never established", async () => {
      const manager = createManager([endpoint("E1", shared)]);
      const remove = vi.spyOn(store, "delete");
      const seen = record(manager, ["revoke-begin", "revoke-end"]);
      const confirm = vi.fn(() => true);

      const affected = await manager.revoke({ confirm });

      expect(affected).toEqual([]);
      expect(seen.map(({ type }) => type)).toEqual(["revoke-begin", "revoke-end"]);
      expect(seen[1]?.event.details.result).toBe("already removed");
      expect(remove).not.toHaveBeenCalled();
      expect(confirm).not.toHaveBeenCalled();
    });

    it("revokes broken sessions without asking", async () => {
      const manager = createManager([endpoint("E1", shared)]);
      await store.save(await fingerprint(shared), makeSession({ configHash: "stale" }));
      const confirm = vi.fn(() => false);

      const affected = await manager.revoke({ confirm });

      expect(affected).toEqual(["E1"]);
      expect(confirm).not.toHaveBeenCalled();
      expect(store.size).toBe(0);
    });
  });

  describe("blocking responses", () => {
    it("re-emits user verification prompts", async () => {
      const grant = fakeGrant({
        onExchange(adapter) {
          adapter.events.dispatch("blocking-response-required", {
            kind: "user_verification",
            url: "https://auth.example.test/activate",
            userCode: "ABCD-EFGH",
          });
          adapter.events.dispatch("blocking-response-ok", {
            kind: "user_verification",
          });
        },
      });
      const manager = createManager([endpoint("E1", shared)], grant);
      const seen = record(manager, [
        "user-verification-required",
        "user-verification-ok",
      ]);

      await manager.initiateAuthentications();

      expect(seen.map(({ type, event }) => [type, event.details])).toEqual([
        [
          "user-verification-required",
          { url: "https://auth.example.test/activate", userCode: "ABCD-EFGH" },
        ],
        ["user-verification-ok", { kind: "user_verification" }],
      ]);
    });

    it("logs and drops other kinds", async () => {
      const grant = fakeGrant({
        onExchange(adapter) {
          adapter.events.dispatch("blocking-response-required", {
            kind: "captcha",
          });
        },
      });
      const error = vi.fn();
      const manager = new SessionManager({
        context: { endpoints: [endpoint("E1", shared)] },
        sessionStore: store,
        adapters: new OAuth2AdapterRegistry([grant]),
        logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error },
      });
      const seen = record(manager, ["user-verification-required"]);

      await manager.initiateAuthentications();

      expect(seen).toHaveLength(0);
      expect(error).toHaveBeenCalledWith(
        '[session-manager] unhandled blocking response ({"kind":"captcha"})'
      );
    });
  });
});
