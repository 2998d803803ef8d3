/**
 * CLI Context Commands
 *
 * Named endpoint catalogs. `useContext` imports a service registry into a
 * context, selects it and signs in to its endpoints.
 */

import { type Endpoint, getHostname } from "@svcsync/core";
import { useAppContext } from "@/lib/context";
import {
  collectChanges,
  collectOutcomes,
  type SessionOutcome,
  type SyncChange,
  subscribe,
  type UserVerification,
  userVerificationSchema,
} from "@/lib/events";
import { log } from "@/lib/log";

export type ContextListItem = {
  name: string;
  selected: boolean;
  endpoints: number;
};

export async function listContexts(): Promise<ContextListItem[]> {
  const { contexts } = useAppContext();
  const items: ContextListItem[] = [];
  for (const { name, selected } of await contexts.list()) {
    const context = await contexts.get(name);
    items.push({ name, selected, endpoints: context.endpoints.length });
  }
  log.debug(`Loaded ${items.length} context(s)`);
  return items;
}

export async function addContext(name: string) {
  await useAppContext().contexts.add(normalizeContextName(name));
}

export async function removeContext(name: string) {
  await useAppContext().contexts.remove(name);
}

export async function renameContext(oldName: string, newName: string) {
  await useAppContext().contexts.rename(oldName, normalizeContextName(newName));
}

export async function selectContext(name: string) {
  await useAppContext().contexts.select(name);
}

export type UseContextOptions = {
  /** Context name; defaults to the registry host */
  name?: string;
  noAuth?: boolean;
  signal?: AbortSignal;
  /** Called when a grant flow waits for the user to verify a code */
  onUserVerification?: (verification: UserVerification) => void;
};

export type UseContextResult = {
  context: string;
  endpoints: Endpoint[];
  changes: SyncChange[];
  /** Empty when authentication is disabled */
  sessions: SessionOutcome[];
  /** Sign-in was requested but no grant flow is registered */
  authSkipped: boolean;
};

export async function useContext(
  registry: string,
  options: UseContextOptions = {}
): Promise<UseContextResult> {
  const { contexts, grantFlows } = useAppContext();
  const authSkipped = !options.noAuth && grantFlows.length === 0;
  if (authSkipped) {
    log.debug("No OAuth2 grant flow registered, skipping sign-in");
  }
  const { changes, stop: stopChanges } = collectChanges(contexts.events);
  const { outcomes, stop: stopOutcomes } = collectOutcomes(contexts.events);
  const stopVerification = subscribe(
    contexts.events,
    "user-verification-required",
    userVerificationSchema,
    (details) => options.onUserVerification?.(details)
  );

  const context = options.name
    ? normalizeContextName(options.name)
    : getHostname(registry);

  try {
    const repository = await contexts.use(registry, {
      contextName: context,
      noAuth: options.noAuth || authSkipped,
      signal: options.signal,
    });

    return {
      context,
      endpoints: repository.all(),
      changes,
      sessions: outcomes,
      authSkipped,
    };
  } finally {
    stopChanges();
    stopOutcomes();
    stopVerification();
  }
}

export function normalizeContextName(name: string) {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new Error("Context name is required.");
  }
  return trimmed;
}
