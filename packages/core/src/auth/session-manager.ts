import type { Context } from "../context/types";
import type { AuthenticationConfig } from "../endpoint/types";
import {
  AuthenticationInterruptedError,
  FeatureNotAvailableError,
} from "../errors";
import { type BusEvent, EventBus } from "../events/event-bus";
import { type Logger, scopedLogger, silentLogger } from "../logger";
import type { Authenticator } from "./authenticator";
import {
  type AuthenticatorDeps,
  createAuthenticator,
  groupCredentials,
} from "./factory";
import type { OAuth2AdapterRegistry } from "./oauth2/adapter";
import type { SessionStore } from "./session-store";
import {
  type AuthState,
  type ExtendedAuthState,
  hasRefreshToken,
} from "./types";

export const SESSION_MANAGER_EVENTS = [
  "auth-begin",
  "auth-end",
  "no-refresh-token",
  "refresh-skipped",
  "revoke-begin",
  "revoke-end",
  "user-verification-required",
  "user-verification-ok",
  "user-verification-failed",
] as const;

const USER_VERIFICATION = "user_verification";

export type SessionManagerOptions = {
  /** Endpoints are read on every call, so catalog edits are picked up */
  context: Pick<Context, "endpoints">;
  sessionStore: SessionStore;
  adapters?: OAuth2AdapterRegistry;
  fetch?: typeof fetch;
  logger?: Logger;
  /** Epoch seconds */
  now?: () => number;
};

export type InitiateAuthenticationsOptions = {
  /** All endpoints when omitted or empty */
  endpointIds?: readonly string[];
  forceRefresh?: boolean;
  revokeExisting?: boolean;
  /** Aborting interrupts the current item and ends the loop */
  signal?: AbortSignal;
};

export type AuthenticationOutcome = {
  sessionId: string;
  endpoints: string[];
  outcome:
    | "authenticated"
    | "already-authenticated"
    | "refreshed"
    | "refresh-skipped"
    | "skipped";
};

export type RevokeRequest = {
  sessionId: string;
  index: number;
  total: number;
  state: AuthState;
  /** Ids served by the session; requested ones end with ` (requested)` */
  endpointIds: string[];
  /** Granted scopes, sorted */
  scopes: string[];
};

export type RevokeOptions = {
  endpointIds?: readonly string[];
  /** Asked before each revocation; omitted means no confirmation */
  confirm?: (request: RevokeRequest) => boolean | Promise<boolean>;
};

type Entry = {
  authenticator: Authenticator;
  /** Ids of the endpoints served by this authenticator, in catalog order */
  endpoints: string[];
};

/**
 * Drives bulk session operations over the endpoints of one context, with
 * one authenticator per distinct credential fingerprint.
 */
export class SessionManager {
  readonly events: EventBus;

  private readonly context: Pick<Context, "endpoints">;
  private readonly deps: AuthenticatorDeps;
  private readonly logger: Logger;
  private readonly authenticators = new Map<string, Authenticator>();

  constructor(options: SessionManagerOptions) {
    this.context = options.context;
    this.logger = scopedLogger(options.logger ?? silentLogger, "session-manager");
    this.events = new EventBus(SESSION_MANAGER_EVENTS, {
      name: "session-manager",
      logger: this.logger,
    });
    this.deps = {
      sessionStore: options.sessionStore,
      adapters: options.adapters,
      fetch: options.fetch,
      logger: options.logger,
      now: options.now,
    };
  }

  /**
   * One state per distinct session serving the (filtered) endpoints,
   * recomputed on every iteration.
   */
  getStates(endpointIds?: readonly string[]): AsyncIterable<ExtendedAuthState> {
    return {
      [Symbol.asyncIterator]: () => this.iterateStates(endpointIds),
    };
  }

  /**
   * Brings every session serving the (filtered) endpoints to `ready`, one
   * at a time. Sessions that are already ready are left alone.
   */
  async initiateAuthentications(
    options: InitiateAuthenticationsOptions = {}
  ): Promise<AuthenticationOutcome[]> {
    const { forceRefresh = false, revokeExisting = false, signal } = options;
    const entries = await this.resolve(options.endpointIds);
    const outcomes: AuthenticationOutcome[] = [];
    const total = entries.length;

    for (const [index, { authenticator, endpoints }] of entries.entries()) {
      const sessionId = authenticator.sessionId;
      const state = await authenticator.getState();
      const details = { sessionId, state, index, total, endpoints };

      if (signal?.aborted) {
        this.skip(outcomes, details);
        break;
      }

      this.events.dispatch("auth-begin", details);

      try {
        const outcome = await this.authenticateOne(authenticator, state, {
          forceRefresh,
          revokeExisting,
          signal,
        });

        if (outcome === "refresh-skipped") {
          this.events.dispatch("refresh-skipped", details);
        } else {
          const current =
            outcome === "already-authenticated"
              ? state
              : await authenticator.getState();
          this.events.dispatch("auth-end", { ...details, state: current, outcome });
        }
        outcomes.push({ sessionId, endpoints: [...endpoints], outcome });
      } catch (error) {
        if (error instanceof AuthenticationInterruptedError || signal?.aborted) {
          this.logger.warn(`authentication of ${sessionId} was interrupted`);
          this.skip(outcomes, details);
          break;
        }
        throw error;
      }
    }

    return outcomes;
  }

  /**
   * Revokes every session serving the (filtered) endpoints.
   * Returns the ids of the endpoints whose session was revoked.
   */
  async revoke(options: RevokeOptions = {}): Promise<string[]> {
    const requested = options.endpointIds ?? [];
    const entries = await this.resolve(options.endpointIds);
    const affected: string[] = [];
    const total = entries.length;

    for (const [index, { authenticator, endpoints }] of entries.entries()) {
      const state = await authenticator.getState();
      const request: RevokeRequest = {
        sessionId: authenticator.sessionId,
        index,
        total,
        state,
        endpointIds: endpoints.map((id) =>
          requested.includes(id) ? `${id} (requested)` : id
        ),
        scopes: parseScopes(state.sessionInfo?.scope),
      };

      this.events.dispatch("revoke-begin", request);

      if (state.status === "uninitialized") {
        this.events.dispatch("revoke-end", { ...request, result: "already removed" });
        continue;
      }

      const confirmed =
        state.status === "reauth-required" ||
        !options.confirm ||
        (await options.confirm(request));

      if (!confirmed) {
        this.events.dispatch("revoke-end", { ...request, result: "aborted" });
        continue;
      }

      try {
        await authenticator.revoke();
      } catch (error) {
        if (!(error instanceof FeatureNotAvailableError)) {
          throw error;
        }
        this.logger.debug(`${authenticator.sessionId}: revoke not available`);
      }

      this.events.dispatch("revoke-end", { ...request, result: "removed" });
      affected.push(...endpoints);
    }

    return affected;
  }

  /** Drops every handler and cached authenticator. */
  dispose() {
    for (const authenticator of this.authenticators.values()) {
      authenticator.dispose();
    }
    this.authenticators.clear();
    this.events.clear();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async *iterateStates(
    endpointIds?: readonly string[]
  ): AsyncGenerator<ExtendedAuthState> {
    for (const { authenticator, endpoints } of await this.resolve(endpointIds)) {
      const state = await authenticator.getState();
      yield { ...state, endpoints: [...endpoints] };
    }
  }

  private async authenticateOne(
    authenticator: Authenticator,
    state: AuthState,
    options: {
      forceRefresh: boolean;
      revokeExisting: boolean;
      signal?: AbortSignal;
    }
  ): Promise<AuthenticationOutcome["outcome"]> {
    if (options.forceRefresh) {
      if (state.status !== "ready" && state.status !== "refresh-required") {
        return "refresh-skipped";
      }
      try {
        await authenticator.refresh();
        return "refreshed";
      } catch (error) {
        if (error instanceof FeatureNotAvailableError) {
          this.logger.debug(`${authenticator.sessionId}: refresh not available`);
          return "already-authenticated";
        }
        throw error;
      }
    }

    if (state.status === "ready") {
      return "already-authenticated";
    }

    if (options.revokeExisting) {
      try {
        await authenticator.revoke();
      } catch (error) {
        if (!(error instanceof FeatureNotAvailableError)) {
          throw error;
        }
      }
    }

    const session = await authenticator.initialize(options.signal);
    if (!hasRefreshToken(session)) {
      this.events.dispatch("no-refresh-token", {
        sessionId: authenticator.sessionId,
        state,
      });
    }
    return "authenticated";
  }

  private skip(
    outcomes: AuthenticationOutcome[],
    details: { sessionId: string; endpoints: string[] }
  ) {
    this.events.dispatch("auth-end", { ...details, outcome: "skipped" });
    outcomes.push({
      sessionId: details.sessionId,
      endpoints: [...details.endpoints],
      outcome: "skipped",
    });
  }

  /**
   * Sessions serving any of the requested endpoints. Each entry lists every
   * endpoint of the context using the session, requested or not.
   */
  private async resolve(endpointIds?: readonly string[]): Promise<Entry[]> {
    const filter = endpointIds && endpointIds.length > 0 ? endpointIds : null;
    const endpoints = this.context.endpoints;

    if (filter) {
      const missing = filter.filter(
        (id) => !endpoints.some((endpoint) => endpoint.id === id)
      );
      if (missing.length > 0) {
        this.logger.warn(`unknown endpoints: ${missing.join(", ")}`);
      }
    }

    const entries: Entry[] = [];
    for (const group of await groupCredentials(endpoints)) {
      if (filter && !group.endpointIds.some((id) => filter.includes(id))) {
        continue;
      }
      entries.push({
        authenticator: await this.authenticatorFor(group.sessionId, group.config),
        endpoints: group.endpointIds,
      });
    }
    return entries;
  }

  private async authenticatorFor(
    sessionId: string,
    config: AuthenticationConfig
  ): Promise<Authenticator> {
    const cached = this.authenticators.get(sessionId);
    if (cached) {
      return cached;
    }

    const authenticator = await createAuthenticator(config, this.deps);
    authenticator.events.on("blocking-response-required", (event) =>
      this.handleBlockingResponseRequired(event)
    );
    authenticator.events.on("blocking-response-ok", (event) =>
      this.handleBlockingResponseOutcome(event, "user-verification-ok")
    );
    authenticator.events.on("blocking-response-failed", (event) =>
      this.handleBlockingResponseOutcome(event, "user-verification-failed")
    );
    this.authenticators.set(sessionId, authenticator);
    return authenticator;
  }

  /**
   * Re-emits user verification prompts upward. Other kinds of blocking
   * responses have no handler yet and are only logged.
   */
  private handleBlockingResponseRequired(event: BusEvent) {
    const { kind, url, userCode } = event.details;

    if (kind !== USER_VERIFICATION) {
      this.logger.error(
        `unhandled blocking response (${JSON.stringify(event.details)})`
      );
      return;
    }

    this.logger.debug(`user verification required at ${String(url)}`);
    this.events.dispatch(
      "user-verification-required",
      userCode === undefined ? { url } : { url, userCode }
    );
  }

  private handleBlockingResponseOutcome(
    event: BusEvent,
    type: "user-verification-ok" | "user-verification-failed"
  ) {
    if (event.details.kind === USER_VERIFICATION) {
      this.events.dispatch(type, event.details);
    }
  }
}

function parseScopes(scope: string | undefined): string[] {
  if (!scope) {
    return [];
  }
  return scope.split(/\s+/).filter(Boolean).sort();
}
