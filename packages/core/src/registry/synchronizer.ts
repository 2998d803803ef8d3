import { DATA_SERVICE_KINDS, SERVICE_REGISTRY_TYPE } from "../constants";
import type { Context } from "../context/types";
import type { Endpoint } from "../endpoint/types";
import { endpointContentHash, isOfKind } from "../endpoint/utils";
import {
  EndpointAlreadyExistsError,
  InvalidServiceRegistryError,
  RegistryNotFoundError,
  ServiceListingError,
} from "../errors";
import { EventBus } from "../events/event-bus";
import { type Logger, scopedLogger, silentLogger } from "../logger";
import { listServices, toRootUrl } from "./client";
import { mergeAuthentications, toEndpoint } from "./mapping";
import type { Service } from "./schema";

export const SYNCHRONIZER_EVENTS = ["endpoint-sync"] as const;

export type SyncAction = "add" | "update" | "keep" | "remove" | "conflict";

export type SyncOperation = {
  action: SyncAction;
  endpoint: Endpoint;
};

export type SyncReport = {
  registryId: string;
  counts: Record<SyncAction, number>;
  operations: SyncOperation[];
};

export type RegistrySynchronizerOptions = {
  context: Context;
  fetch?: typeof fetch;
  logger?: Logger;
};

/**
 * Reconciles the endpoints of one context with the listings of its
 * registries.
 *
 * Imported endpoints carry an ownership tag (`source`): the registry id
 * and the service id in its listing. A sync of registry A only adds,
 * updates or removes endpoints tagged with A; manually added endpoints
 * and those of other registries are never touched.
 */
export class RegistrySynchronizer {
  readonly events: EventBus;

  private readonly context: Context;
  private readonly fetchImpl?: typeof fetch;
  private readonly logger: Logger;
  private isolated = false;

  constructor(options: RegistrySynchronizerOptions) {
    this.context = options.context;
    this.fetchImpl = options.fetch;
    this.logger = scopedLogger(options.logger ?? silentLogger, "registry-sync");
    this.events = new EventBus(SYNCHRONIZER_EVENTS, {
      name: "registry-sync",
      logger: this.logger,
    });
  }

  /**
   * In isolation (a single registry in the context), imported endpoints
   * keep the bare service id; otherwise ids are `<registryId>:<serviceId>`.
   */
  setIsolation(flag: boolean) {
    this.isolated = flag;
  }

  get isolation() {
    return this.isolated;
  }

  listRegistries(): Endpoint[] {
    return this.context.endpoints.filter((endpoint) =>
      isOfKind(endpoint.type, "registry")
    );
  }

  listOwnedEndpoints(registryId: string): Endpoint[] {
    return this.context.endpoints.filter(
      (endpoint) => endpoint.source?.sourceId === registryId
    );
  }

  /**
   * Fetches the listing of `registryId` and applies it to the context.
   * @throws RegistryNotFoundError when the context has no such registry
   * @throws ServiceListingError when the listing cannot be fetched
   */
  async synchronize(registryId: string): Promise<SyncReport> {
    const registry = this.listRegistries().find(
      (endpoint) => endpoint.id === registryId
    );
    if (!registry) {
      throw new RegistryNotFoundError(registryId);
    }

    const services = await listServices(registry.url, {
      fetch: this.fetchImpl,
      logger: this.logger,
    });
    return this.apply(registry.id, services);
  }

  /**
   * Adds a registry endpoint and imports its services.
   * @throws EndpointAlreadyExistsError when the id or the URL is taken
   * @throws InvalidServiceRegistryError when the URL serves no listing
   */
  async addRegistry(registryId: string, url: string): Promise<SyncReport> {
    if (this.context.endpoints.some((endpoint) => endpoint.id === registryId)) {
      throw new EndpointAlreadyExistsError(
        `Endpoint "${registryId}" already exists.`
      );
    }

    const registryUrl = toRootUrl(url);
    const sameUrl = this.listRegistries()
      .filter((endpoint) => toRootUrl(endpoint.url) === registryUrl)
      .map((endpoint) => endpoint.id);
    if (sameUrl.length > 0) {
      throw new EndpointAlreadyExistsError(
        `This URL (${registryUrl}) has already been registered with the following ID(s): ${sameUrl.join(", ")}`
      );
    }

    let services: Service[];
    try {
      services = await listServices(registryUrl, {
        fetch: this.fetchImpl,
        logger: this.logger,
      });
    } catch (error) {
      if (error instanceof ServiceListingError) {
        throw new InvalidServiceRegistryError(
          `${registryUrl} is not a service registry (${error.message})`,
          { cause: error }
        );
      }
      throw error;
    }

    const registry: Endpoint = {
      id: registryId,
      url: registryUrl,
      type: { ...SERVICE_REGISTRY_TYPE },
    };
    this.context.endpoints.push(registry);
    this.dispatch("add", registry, registryId);

    return this.apply(registryId, services);
  }

  /**
   * Drops a registry endpoint and every endpoint it imported.
   * Returns the removed endpoints.
   */
  removeRegistry(registryId: string): Endpoint[] {
    if (!this.listRegistries().some((endpoint) => endpoint.id === registryId)) {
      throw new RegistryNotFoundError(registryId);
    }

    const kept: Endpoint[] = [];
    const removed: Endpoint[] = [];

    for (const endpoint of this.context.endpoints) {
      if (
        endpoint.id === registryId ||
        endpoint.source?.sourceId === registryId
      ) {
        removed.push(endpoint);
        this.dispatch("remove", endpoint, registryId);
      } else {
        kept.push(endpoint);
        this.dispatch("keep", endpoint, registryId);
      }
    }

    this.context.endpoints = kept;
    this.refreshDefaults();
    return removed;
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  private async apply(
    registryId: string,
    listing: readonly Service[]
  ): Promise<SyncReport> {
    const services = mergeAuthentications(listing, this.logger);
    const endpoints = this.context.endpoints;
    const owned = new Map<string, Endpoint>();
    for (const endpoint of endpoints) {
      if (endpoint.source?.sourceId === registryId) {
        owned.set(endpoint.source.externalId, endpoint);
      }
    }

    const takenIds = new Set(endpoints.map((endpoint) => endpoint.id));
    const listed = new Set<string>();
    const operations: SyncOperation[] = [];
    const replacements = new Map<string, Endpoint>();
    const additions: Endpoint[] = [];

    for (const service of services) {
      if (listed.has(service.id)) {
        this.logger.warn(`${registryId}: service "${service.id}" is listed twice`);
        continue;
      }
      listed.add(service.id);

      const existing = owned.get(service.id);
      if (existing) {
        const endpoint = toEndpoint(service, existing.id, registryId);
        const changed =
          (await endpointContentHash(endpoint)) !==
          (await endpointContentHash(existing));
        operations.push({ action: changed ? "update" : "keep", endpoint });
        if (changed) {
          replacements.set(existing.id, endpoint);
        }
        continue;
      }

      const id = this.allocateId(registryId, service.id, takenIds);
      if (!id) {
        const endpoint = toEndpoint(
          service,
          this.namespacedId(registryId, service.id),
          registryId
        );
        this.logger.warn(
          `${registryId}: cannot import "${service.id}", its id is taken by another endpoint`
        );
        operations.push({ action: "conflict", endpoint });
        continue;
      }

      takenIds.add(id);
      const endpoint = toEndpoint(service, id, registryId);
      operations.push({ action: "add", endpoint });
      additions.push(endpoint);
    }

    const removals = new Set<string>();
    for (const [externalId, endpoint] of owned) {
      if (!listed.has(externalId)) {
        operations.push({ action: "remove", endpoint });
        removals.add(endpoint.id);
      }
    }

    for (const { action, endpoint } of operations) {
      this.dispatch(action, endpoint, registryId);
    }

    this.context.endpoints = [
      ...endpoints
        .filter((endpoint) => !removals.has(endpoint.id))
        .map((endpoint) => replacements.get(endpoint.id) ?? endpoint),
      ...additions,
    ];
    this.refreshDefaults();

    return { registryId, counts: countActions(operations), operations };
  }

  private allocateId(
    registryId: string,
    serviceId: string,
    takenIds: ReadonlySet<string>
  ): string | null {
    const namespaced = this.namespacedId(registryId, serviceId);
    const candidates = this.isolated ? [serviceId, namespaced] : [namespaced];
    return candidates.find((id) => !takenIds.has(id)) ?? null;
  }

  private namespacedId(registryId: string, serviceId: string) {
    return `${registryId}:${serviceId}`;
  }

  /**
   * Unsets defaults whose endpoint is gone and sets a default for every
   * kind with exactly one endpoint.
   */
  private refreshDefaults() {
    const defaults = this.context.defaults;

    for (const kind of DATA_SERVICE_KINDS) {
      const ids = this.context.endpoints
        .filter((endpoint) => isOfKind(endpoint.type, kind))
        .map((endpoint) => endpoint.id);

      const current = defaults[kind];
      if (current !== undefined && !ids.includes(current)) {
        delete defaults[kind];
        this.logger.debug(`default "${kind}" endpoint ${current} is gone, unset`);
      }

      if (defaults[kind] === undefined) {
        const [only] = ids;
        if (ids.length === 1 && only !== undefined) {
          defaults[kind] = only;
        } else if (ids.length > 1) {
          this.logger.info(
            `default "${kind}" endpoint not set, ${ids.length} candidates (${ids.join(", ")})`
          );
        }
      }
    }
  }

  private dispatch(action: SyncAction, endpoint: Endpoint, registryId: string) {
    this.events.dispatch("endpoint-sync", { action, endpoint, registryId });
  }
}

function countActions(operations: readonly SyncOperation[]) {
  const counts: Record<SyncAction, number> = {
    add: 0,
    update: 0,
    keep: 0,
    remove: 0,
    conflict: 0,
  };
  for (const { action } of operations) {
    counts[action] += 1;
  }
  return counts;
}
