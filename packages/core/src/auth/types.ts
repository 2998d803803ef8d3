import type { AuthenticationConfig } from "../endpoint/types";

export type AuthStatus =
  | "uninitialized"
  | "ready"
  | "refresh-required"
  | "reauth-required";

/**
 * Token material of one session.
 * Timestamps are epoch seconds (UTC).
 */
export type SessionInfo = {
  modelVersion: number;
  /** Fingerprint of the config the session was issued for */
  configHash?: string;
  accessToken?: string;
  refreshToken?: string;
  /** Space-separated granted scopes */
  scope?: string;
  tokenType: string;
  issuedAt: number;
  validUntil: number;
  /** Config used to obtain the session (model version 4+) */
  authInfo?: AuthenticationConfig;
};

export type AuthState = {
  /** Authenticator kind, e.g. `oauth2` */
  authenticator: string;
  /** Session id (credential fingerprint) */
  id: string;
  authInfo: AuthenticationConfig;
  sessionInfo: SessionInfo | null;
  status: AuthStatus;
};

export type ExtendedAuthState = AuthState & {
  /** Endpoint ids served by this session, in catalog order */
  endpoints: string[];
};

/**
 * Outcome of restoring a stored session without network or user
 * interaction.
 */
export type RestoreResult =
  | { kind: "restored"; session: SessionInfo }
  | { kind: "authentication-required"; reason: string }
  | { kind: "reauthentication-required"; reason: string; configChanged: boolean }
  | { kind: "refresh-required"; session: SessionInfo };

export function isSessionValid(session: SessionInfo, now: number) {
  return now <= session.validUntil;
}

export type RestoreOptions = {
  /** Skip `session-not-restored` notifications */
  silent?: boolean;
};

export function hasRefreshToken(
  session: SessionInfo | null
): session is SessionInfo & { refreshToken: string } {
  return typeof session?.refreshToken === "string" && !!session.refreshToken.trim();
}

export function epochSeconds() {
  return Math.floor(Date.now() / 1000);
}
