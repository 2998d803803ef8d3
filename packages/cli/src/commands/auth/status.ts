/**
 * CLI Auth Status Command
 *
 * One entry per distinct session serving the selected endpoints.
 */

import type { AuthStatus } from "@svcsync/core";
import { useAppContext } from "@/lib/context";

export type SessionStatusItem = {
  sessionId: string;
  /** Authenticator kind, e.g. `oauth2` */
  kind: string;
  status: AuthStatus;
  endpoints: string[];
  /** Epoch seconds; null without a session */
  validUntil: number | null;
  scopes: string[];
};

export type AuthStatusOptions = {
  /** All endpoints of the context when omitted */
  endpoints?: string[];
  context?: string;
};

export async function authStatus(
  options: AuthStatusOptions = {}
): Promise<SessionStatusItem[]> {
  const app = useAppContext();
  const sessions = await app.contexts.createSessionManager(
    options.context ?? app.contextName
  );

  try {
    const items: SessionStatusItem[] = [];
    for await (const state of sessions.getStates(options.endpoints)) {
      items.push({
        sessionId: state.id,
        kind: state.authenticator,
        status: state.status,
        endpoints: state.endpoints,
        validUntil: state.sessionInfo?.validUntil ?? null,
        scopes: (state.sessionInfo?.scope ?? "").split(/\s+/).filter(Boolean),
      });
    }
    return items;
  } finally {
    sessions.dispose();
  }
}
