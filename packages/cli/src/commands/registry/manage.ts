/**
 * CLI Registry Commands
 *
 * Service registries of one context and the endpoints they import.
 */

import {
  type Context,
  RegistrySynchronizer,
  type SyncReport,
} from "@svcsync/core";
import { useAppContext } from "@/lib/context";
import { collectChanges, type SyncChange } from "@/lib/events";
import { log, logger } from "@/lib/log";

const REGISTRY_ID_PATTERN = /^[a-z0-9][a-z0-9._-]{0,63}$/i;

export type RegistryListItem = {
  id: string;
  url: string;
  /** Endpoints imported from this registry */
  endpoints: number;
};

export type RegistryCommandOptions = {
  context?: string;
};

export type RegistryChangeResult = {
  changes: SyncChange[];
  reports: SyncReport[];
};

export async function listRegistries(
  options: RegistryCommandOptions = {}
): Promise<RegistryListItem[]> {
  const app = useAppContext();
  const context = await app.contexts.get(options.context ?? app.contextName);
  const synchronizer = createSynchronizer(context);

  return synchronizer.listRegistries().map((registry) => ({
    id: registry.id,
    url: registry.url,
    endpoints: synchronizer.listOwnedEndpoints(registry.id).length,
  }));
}

/**
 * Adds a registry to a context and imports its services.
 */
export async function addRegistry(
  id: string,
  url: string,
  options: RegistryCommandOptions = {}
): Promise<RegistryChangeResult> {
  const registryId = normalizeRegistryId(id);
  const app = useAppContext();

  return app.contexts.update(async (context) => {
    const synchronizer = createSynchronizer(context);
    const { changes, stop } = collectChanges(
      synchronizer.events,
      "endpoint-sync"
    );
    try {
      // Imports of a second registry are namespaced.
      synchronizer.setIsolation(synchronizer.listRegistries().length === 0);
      const report = await synchronizer.addRegistry(registryId, url);
      log.debug(`Added registry "${registryId}" -> ${url}`);
      return { changes, reports: [report] };
    } finally {
      stop();
    }
  }, options.context ?? app.contextName);
}

/**
 * Removes a registry with every endpoint it imported.
 */
export async function removeRegistry(
  id: string,
  options: RegistryCommandOptions = {}
): Promise<string[]> {
  const app = useAppContext();

  return app.contexts.update((context) => {
    const removed = createSynchronizer(context).removeRegistry(id);
    log.debug(`Removed registry "${id}" (${removed.length} endpoint(s))`);
    return removed.map((endpoint) => endpoint.id);
  }, options.context ?? app.contextName);
}

/**
 * Re-synchronizes every registry of a context, without signing in.
 */
export async function syncRegistries(
  options: RegistryCommandOptions = {}
): Promise<RegistryChangeResult> {
  const app = useAppContext();
  const { changes, stop } = collectChanges(app.contexts.events);
  try {
    const reports = await app.contexts.synchronize(
      options.context ?? app.contextName
    );
    return { changes, reports };
  } finally {
    stop();
  }
}

export function normalizeRegistryId(id: string) {
  const trimmed = id.trim();
  if (!trimmed) {
    throw new Error("Registry id is required.");
  }
  if (!REGISTRY_ID_PATTERN.test(trimmed)) {
    throw new Error(
      "Registry ids may only contain letters, numbers, dots, dashes, and underscores."
    );
  }
  return trimmed;
}

function createSynchronizer(context: Context) {
  return new RegistrySynchronizer({
    context,
    fetch: useAppContext().fetch,
    logger,
  });
}
