import type { AuthenticationConfig } from "../endpoint/types";
import {
  FeatureNotAvailableError,
  NoRefreshTokenError,
  ReauthenticationRequiredError,
} from "../errors";
import { EventBus } from "../events/event-bus";
import { type Logger, scopedLogger, silentLogger } from "../logger";
import type { AuthState, RestoreOptions, RestoreResult, SessionInfo } from "./types";

export const AUTHENTICATOR_EVENTS = [
  "authentication-before",
  "authentication-ok",
  "authentication-failure",
  "blocking-response-required",
  "blocking-response-ok",
  "blocking-response-failed",
  "initialization-before",
  "refresh-before",
  "refresh-ok",
  "refresh-failure",
  "session-restored",
  "session-not-restored",
  "session-revoked",
] as const;

export type AuthenticatorOptions = {
  logger?: Logger;
};

/**
 * One credential-scheme state machine, identified by its session id.
 *
 * Subclasses implement the four primitives; `initialize()` composes them
 * and is what a transport calls before every outbound request.
 */
export abstract class Authenticator {
  /** Authentication type this authenticator serves */
  readonly kind: string;
  readonly events: EventBus;
  protected readonly logger: Logger;

  constructor(kind: string, options: AuthenticatorOptions = {}) {
    this.kind = kind;
    this.logger = scopedLogger(options.logger ?? silentLogger, kind);
    this.events = new EventBus(AUTHENTICATOR_EVENTS, {
      name: kind,
      logger: this.logger,
    });
  }

  abstract get sessionId(): string;

  abstract get authInfo(): AuthenticationConfig;

  /** Loads the stored session without network or user interaction. */
  abstract restoreSession(options?: RestoreOptions): Promise<RestoreResult>;

  /**
   * Runs a full login and stores the new session.
   * An aborted `signal` surfaces as `AuthenticationInterruptedError`.
   */
  abstract authenticate(signal?: AbortSignal): Promise<SessionInfo>;

  /**
   * Exchanges the stored refresh credential for a new session.
   * @throws NoRefreshTokenError when nothing refreshable is stored
   * @throws ReauthenticationRequiredError when the server rejects the refresh
   * @throws FeatureNotAvailableError when the scheme cannot refresh
   */
  abstract refresh(): Promise<SessionInfo>;

  /**
   * Clears the stored session.
   * @throws FeatureNotAvailableError when the scheme cannot revoke
   */
  abstract revoke(): Promise<void>;

  /** Writes the credentials of `session` into outgoing request headers. */
  protected abstract updateHeaders(session: SessionInfo, headers: Headers): void;

  /** Current status, without side effects on the stored session. */
  async getState(): Promise<AuthState> {
    const result = await this.restoreSession({ silent: true });
    const base = {
      authenticator: this.kind,
      id: this.sessionId,
      authInfo: structuredClone(this.authInfo),
    };

    switch (result.kind) {
      case "restored":
        return { ...base, sessionInfo: result.session, status: "ready" };
      case "refresh-required":
        return {
          ...base,
          sessionInfo: result.session,
          status: "refresh-required",
        };
      case "authentication-required":
        return { ...base, sessionInfo: null, status: "uninitialized" };
      case "reauthentication-required":
        return { ...base, sessionInfo: null, status: "reauth-required" };
    }
  }

  /**
   * Returns a usable session, restoring, refreshing or logging in as
   * needed. Ends with a session or an error, never a transient status.
   */
  async initialize(signal?: AbortSignal): Promise<SessionInfo> {
    this.events.dispatch("initialization-before", { origin: this.kind });

    this.logger.debug("initialize: restoring...");
    const result = await this.restoreSession();

    switch (result.kind) {
      case "restored":
        this.events.dispatch("session-restored");
        this.logger.debug("initialize: restored");
        return result.session;
      case "authentication-required":
      case "reauthentication-required":
        this.logger.debug(`initialize: authenticating (${result.reason})`);
        return this.authenticate(signal);
      case "refresh-required":
        this.logger.debug("initialize: refreshing...");
        try {
          return await this.refresh();
        } catch (error) {
          if (
            error instanceof ReauthenticationRequiredError ||
            error instanceof NoRefreshTokenError ||
            error instanceof FeatureNotAvailableError
          ) {
            this.logger.debug(
              `initialize: refresh failed (${error.message}), authenticating`
            );
            return this.authenticate(signal);
          }
          throw error;
        }
    }
  }

  /** Initializes and writes the credentials into `headers`. */
  async applyTo(headers: Headers): Promise<Headers> {
    const session = await this.initialize();
    this.updateHeaders(session, headers);
    return headers;
  }

  dispose() {
    this.events.clear();
  }
}
