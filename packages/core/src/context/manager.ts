import type { OAuth2AdapterRegistry } from "../auth/oauth2/adapter";
import { SessionManager } from "../auth/session-manager";
import type { SessionStore } from "../auth/session-store";
import { SERVICE_REGISTRY_TYPE } from "../constants";
import { isOfKind } from "../endpoint/utils";
import {
  ContextAlreadyExistsError,
  ContextNotFoundError,
  InvalidServiceRegistryError,
} from "../errors";
import { EventBus } from "../events/event-bus";
import { type Logger, scopedLogger, silentLogger } from "../logger";
import {
  checkRegistryRoot,
  discoverRegistry,
  getHostname,
  hasHttpScheme,
} from "../registry/discovery";
import {
  RegistrySynchronizer,
  type SyncReport,
} from "../registry/synchronizer";
import { EndpointRepository } from "./repository";
import { type CatalogStore, emptyContext } from "./store";
import type { Catalog, Context, ContextMetadata } from "./types";

/** Session manager events re-emitted on the context bus */
export const RELAYED_AUTH_EVENTS = [
  "auth-begin",
  "auth-end",
  "no-refresh-token",
  "refresh-skipped",
  "user-verification-required",
  "user-verification-ok",
  "user-verification-failed",
] as const;

export const CONTEXT_MANAGER_EVENTS = [
  "context-sync",
  "auth-disabled",
  ...RELAYED_AUTH_EVENTS,
] as const;

export type ContextManagerOptions = {
  store: CatalogStore;
  sessionStore: SessionStore;
  adapters?: OAuth2AdapterRegistry;
  fetch?: typeof fetch;
  logger?: Logger;
  /** Epoch seconds */
  now?: () => number;
};

export type UseOptions = {
  /** Defaults to the registry host */
  contextName?: string;
  noAuth?: boolean;
  /** Aborting interrupts the authentication pass */
  signal?: AbortSignal;
};

/**
 * Named endpoint catalogs, kept in a `CatalogStore`, and the `use`
 * workflow that imports a registry into one and signs in.
 */
export class ContextManager {
  readonly events: EventBus;

  private readonly store: CatalogStore;
  private readonly options: ContextManagerOptions;
  private readonly logger: Logger;

  constructor(options: ContextManagerOptions) {
    this.store = options.store;
    this.options = options;
    this.logger = scopedLogger(options.logger ?? silentLogger, "context");
    this.events = new EventBus(CONTEXT_MANAGER_EVENTS, {
      name: "context",
      logger: this.logger,
    });
  }

  async list(): Promise<ContextMetadata[]> {
    const catalog = await this.store.load();
    return Object.keys(catalog.contexts).map((name) => ({
      name,
      selected: name === catalog.currentContext,
    }));
  }

  /**
   * @throws ContextAlreadyExistsError
   */
  async add(name: string) {
    const catalog = await this.store.load();
    if (catalog.contexts[name]) {
      throw new ContextAlreadyExistsError(name);
    }
    catalog.contexts[name] = emptyContext();
    await this.store.save(catalog);
  }

  /**
   * Removing the current context leaves no context selected.
   * @throws ContextNotFoundError
   */
  async remove(name: string) {
    const catalog = await this.store.load();
    requireContext(catalog, name);

    delete catalog.contexts[name];
    if (catalog.currentContext === name) {
      catalog.currentContext = null;
    }
    await this.store.save(catalog);
  }

  async rename(oldName: string, newName: string) {
    const catalog = await this.store.load();
    requireContext(catalog, oldName);
    if (catalog.contexts[newName]) {
      throw new ContextAlreadyExistsError(newName);
    }

    // Rebuilt to keep the listing order.
    catalog.contexts = Object.fromEntries(
      Object.entries(catalog.contexts).map(([name, context]) => [
        name === oldName ? newName : name,
        context,
      ])
    );
    if (catalog.currentContext === oldName) {
      catalog.currentContext = newName;
    }
    await this.store.save(catalog);
  }

  async select(name: string) {
    const catalog = await this.store.load();
    requireContext(catalog, name);
    catalog.currentContext = name;
    await this.store.save(catalog);
  }

  /**
   * The named context, or the current one.
   * @throws ContextNotFoundError
   */
  async get(name?: string): Promise<Context> {
    const catalog = await this.store.load();
    return requireContext(catalog, resolveName(catalog, name));
  }

  async currentName(): Promise<string | null> {
    return (await this.store.load()).currentContext;
  }

  async repository(name?: string): Promise<EndpointRepository> {
    return new EndpointRepository(await this.get(name));
  }

  /**
   * Saves `edit`'s changes to the named (or current) context.
   */
  async update<T>(
    edit: (context: Context, name: string) => T | Promise<T>,
    name?: string
  ): Promise<T> {
    const catalog = await this.store.load();
    const contextName = resolveName(catalog, name);
    const result = await edit(requireContext(catalog, contextName), contextName);
    await this.store.save(catalog);
    return result;
  }

  /**
   * Session manager over the endpoints of a context, sharing this
   * manager's session store, adapters and transport.
   */
  async createSessionManager(name?: string): Promise<SessionManager> {
    const context = await this.get(name);
    return new SessionManager({
      context,
      sessionStore: this.options.sessionStore,
      adapters: this.options.adapters,
      fetch: this.options.fetch,
      logger: this.options.logger,
      now: this.options.now,
    });
  }

  /**
   * Re-synchronizes every registry of a context and saves the result.
   * `endpoint-sync` events are re-emitted as `context-sync`.
   */
  async synchronize(name?: string): Promise<SyncReport[]> {
    return this.update((context) => this.syncRegistries(context), name);
  }

  /**
   * Imports a registry into a context, selects that context and signs in
   * to every endpoint.
   *
   * An unknown context is created from `hostOrUrl`: an http(s) URL must be
   * a registry root; a bare hostname is searched for one.
   * @throws InvalidServiceRegistryError when no registry is found
   */
  async use(
    hostOrUrl: string,
    options: UseOptions = {}
  ): Promise<EndpointRepository> {
    const contextName = options.contextName ?? getHostname(hostOrUrl);
    this.logger.debug(`${contextName}: sync (given: ${hostOrUrl})`);

    const catalog = await this.store.load();
    let context = catalog.contexts[contextName];

    if (!context) {
      const registryUrl = await this.resolveRegistry(hostOrUrl);
      context = emptyContext();
      context.endpoints.push({
        id: contextName,
        url: registryUrl,
        type: { ...SERVICE_REGISTRY_TYPE },
      });
      catalog.contexts[contextName] = context;
    }

    await this.syncRegistries(context);

    catalog.currentContext = contextName;
    await this.store.save(catalog);

    if (options.noAuth) {
      this.logger.debug("authentication disabled");
      this.events.dispatch("auth-disabled", { context: contextName });
    } else {
      const sessions = await this.createSessionManager(contextName);
      for (const type of RELAYED_AUTH_EVENTS) {
        sessions.events.relay(this.events, type);
      }
      try {
        await sessions.initiateAuthentications({ signal: options.signal });
      } finally {
        sessions.dispose();
      }
    }

    return new EndpointRepository(context);
  }

  private async resolveRegistry(hostOrUrl: string) {
    const requestOptions = { fetch: this.options.fetch, logger: this.logger };

    if (!hasHttpScheme(hostOrUrl)) {
      return discoverRegistry(hostOrUrl, requestOptions);
    }

    const root = await checkRegistryRoot(hostOrUrl, requestOptions);
    if (!root) {
      throw new InvalidServiceRegistryError(
        `The given URL (${hostOrUrl}) is not the root URL of the service registry.`
      );
    }
    return root;
  }

  private async syncRegistries(context: Context): Promise<SyncReport[]> {
    const synchronizer = new RegistrySynchronizer({
      context,
      fetch: this.options.fetch,
      logger: this.options.logger,
    });
    synchronizer.events.on("endpoint-sync", (event) => {
      this.events.dispatch("context-sync", event);
    });

    const registries = context.endpoints.filter((endpoint) =>
      isOfKind(endpoint.type, "registry")
    );
    synchronizer.setIsolation(registries.length <= 1);

    if (registries.length === 0) {
      this.logger.warn("no service registry in this context");
    }

    const reports: SyncReport[] = [];
    for (const registry of registries) {
      this.logger.debug(`syncing ${registry.id} (${registry.url})`);
      reports.push(await synchronizer.synchronize(registry.id));
    }
    return reports;
  }
}

function resolveName(catalog: Catalog, name?: string): string {
  const resolved = name ?? catalog.currentContext;
  if (resolved === null) {
    throw new ContextNotFoundError("(none selected)");
  }
  return resolved;
}

function requireContext(catalog: Catalog, name: string): Context {
  const context = catalog.contexts[name];
  if (!context) {
    throw new ContextNotFoundError(name);
  }
  return context;
}
