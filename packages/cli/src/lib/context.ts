/**
 * Application Context
 *
 * Built once at startup and shared by the commands: the catalog store,
 * the session store and the context manager wired to the CLI logger.
 */

import {
  type CatalogStore,
  ContextManager,
  InMemorySessionStore,
  type OAuth2AdapterFactory,
  OAuth2AdapterRegistry,
  type SessionStore,
} from "@svcsync/core";
import { FileCatalogStore } from "./config";
import { log, logger } from "./log";

export type AppContext = {
  store: CatalogStore;
  sessions: SessionStore;
  contexts: ContextManager;
  /** Names of the registered OAuth2 grant flows */
  grantFlows: string[];
  /** Overrides the selected context (the --context option) */
  contextName?: string;
  fetch?: typeof fetch;
};

export type CreateAppContextOptions = {
  contextName?: string;
  /** Defaults to the file catalog under SVCSYNC_HOME */
  store?: CatalogStore;
  sessions?: SessionStore;
  /** OAuth2 grant flows; none are built in */
  grants?: OAuth2AdapterFactory[];
  fetch?: typeof fetch;
  /** Epoch seconds */
  now?: () => number;
};

export function createAppContext(
  options: CreateAppContextOptions = {}
): AppContext {
  const store = options.store ?? new FileCatalogStore();
  const sessions = options.sessions ?? new InMemorySessionStore();
  const grants = options.grants ?? [];
  log.debug(`Loaded app context (${grants.length} grant flow(s))`);

  return {
    store,
    sessions,
    grantFlows: grants.map((grant) => grant.name),
    contextName: options.contextName,
    fetch: options.fetch,
    contexts: new ContextManager({
      store,
      sessionStore: sessions,
      adapters: new OAuth2AdapterRegistry(grants),
      fetch: options.fetch,
      logger,
      now: options.now,
    }),
  };
}

// =============================================================================
// Global context singleton
// =============================================================================

let globalContext: AppContext | null = null;

/**
 * The global app context.
 * @throws when `initAppContext` has not run
 */
export function useAppContext(): AppContext {
  if (!globalContext) {
    throw new Error("App context not initialized");
  }
  return globalContext;
}

export function initAppContext(options: CreateAppContextOptions = {}): AppContext {
  globalContext = createAppContext(options);
  return globalContext;
}
