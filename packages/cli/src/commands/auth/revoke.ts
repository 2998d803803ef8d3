/**
 * CLI Auth Revoke Command
 *
 * Revoking a session signs out every endpoint that shares it, not only
 * the requested ones.
 */

import type { RevokeRequest } from "@svcsync/core";
import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";

export type RevokeCommandOptions = {
  /** All endpoints of the context when omitted */
  endpoints?: string[];
  context?: string;
  /** Skip confirmation */
  force?: boolean;
  /** Asked per session unless `force` is set */
  confirm?: (request: RevokeRequest) => boolean | Promise<boolean>;
};

export type RevokeResult = {
  /** Endpoint ids whose session was removed */
  affected: string[];
};

export async function revoke(
  options: RevokeCommandOptions = {}
): Promise<RevokeResult> {
  const app = useAppContext();
  const sessions = await app.contexts.createSessionManager(
    options.context ?? app.contextName
  );

  try {
    const affected = await sessions.revoke({
      endpointIds: options.endpoints,
      confirm: options.force ? undefined : options.confirm,
    });
    log.debug(`Revoked sessions of ${affected.length} endpoint(s)`);
    return { affected };
  } finally {
    sessions.dispose();
  }
}
