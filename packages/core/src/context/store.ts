import { CATALOG_VERSION, DEFAULT_CONTEXT_NAME } from "../constants";
import { InvalidCatalogError } from "../errors";
import type { Catalog, Context } from "./types";

/**
 * Loads and saves the whole catalog at once.
 * Implementations hand out copies: edits are only kept through `save`.
 */
export type CatalogStore = {
  load(): Promise<Catalog>;
  save(catalog: Catalog): Promise<void>;
};

export function emptyContext(): Context {
  return { defaults: {}, endpoints: [] };
}

/** Catalog used when nothing has been saved yet */
export function emptyCatalog(): Catalog {
  return {
    version: CATALOG_VERSION,
    currentContext: DEFAULT_CONTEXT_NAME,
    contexts: { [DEFAULT_CONTEXT_NAME]: emptyContext() },
  };
}

/**
 * @throws InvalidCatalogError when a context holds two endpoints with one id
 */
export function assertUniqueEndpointIds(catalog: Catalog) {
  for (const [name, context] of Object.entries(catalog.contexts)) {
    const seen = new Set<string>();
    for (const { id } of context.endpoints) {
      if (seen.has(id)) {
        throw new InvalidCatalogError(
          `Context "${name}" has more than one endpoint with id "${id}".`
        );
      }
      seen.add(id);
    }
  }
}

export class InMemoryCatalogStore implements CatalogStore {
  private catalog: Catalog;

  constructor(initial: Catalog = emptyCatalog()) {
    this.catalog = structuredClone(initial);
  }

  async load(): Promise<Catalog> {
    return structuredClone(this.catalog);
  }

  async save(catalog: Catalog): Promise<void> {
    assertUniqueEndpointIds(catalog);
    this.catalog = structuredClone(catalog);
  }
}
