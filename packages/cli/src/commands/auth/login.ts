/**
 * CLI Auth Login Command
 *
 * Signs in to every distinct session of the selected endpoints. Grant
 * flows that need the user (device code) report a verification URL
 * through `onUserVerification`; aborting `signal` (Ctrl-C) marks the
 * current session as skipped and stops.
 */

import { useAppContext } from "@/lib/context";
import {
  collectOutcomes,
  type SessionOutcome,
  sessionEventSchema,
  subscribe,
  type UserVerification,
  userVerificationSchema,
} from "@/lib/events";
import { log } from "@/lib/log";

export type LoginOptions = {
  /** All endpoints of the context when omitted */
  endpoints?: string[];
  context?: string;
  forceRefresh?: boolean;
  revokeExisting?: boolean;
  signal?: AbortSignal;
  onUserVerification?: (verification: UserVerification) => void;
};

export type LoginResult = {
  sessions: SessionOutcome[];
  /** Sessions whose forced refresh was skipped (nothing to refresh) */
  refreshSkipped: string[];
  /** Sessions that were signed in without a refresh token */
  withoutRefreshToken: string[];
  /** Whether the pass stopped on an interrupt */
  interrupted: boolean;
};

export async function login(options: LoginOptions = {}): Promise<LoginResult> {
  const app = useAppContext();
  const sessions = await app.contexts.createSessionManager(
    options.context ?? app.contextName
  );

  const { outcomes } = collectOutcomes(sessions.events);
  const refreshSkipped: string[] = [];
  const withoutRefreshToken: string[] = [];

  subscribe(sessions.events, "refresh-skipped", sessionEventSchema, (details) => {
    refreshSkipped.push(details.sessionId);
  });
  subscribe(
    sessions.events,
    "no-refresh-token",
    sessionEventSchema.pick({ sessionId: true }),
    (details) => {
      withoutRefreshToken.push(details.sessionId);
    }
  );
  subscribe(
    sessions.events,
    "user-verification-required",
    userVerificationSchema,
    (details) => options.onUserVerification?.(details)
  );

  try {
    const results = await sessions.initiateAuthentications({
      endpointIds: options.endpoints,
      forceRefresh: options.forceRefresh,
      revokeExisting: options.revokeExisting,
      signal: options.signal,
    });
    log.debug(`Processed ${results.length} session(s)`);

    return {
      sessions: outcomes,
      refreshSkipped,
      withoutRefreshToken,
      interrupted: outcomes.some(({ outcome }) => outcome === "skipped"),
    };
  } finally {
    sessions.dispose();
  }
}
