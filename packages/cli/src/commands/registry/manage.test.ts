import {
  emptyCatalog,
  InMemoryCatalogStore,
  InvalidServiceRegistryError,
  RegistryNotFoundError,
} from "@svcsync/core";
import { beforeEach, describe, expect, it } from "vitest";
import {
  addRegistry,
  listRegistries,
  normalizeRegistryId,
  removeRegistry,
  syncRegistries,
} from "@/commands/registry/manage";
import { initAppContext } from "@/lib/context";
import { mockFetchSequence } from "@/test-utils/fetch";
import {
  DATA_CONNECT_TYPE,
  listedService,
  REGISTRY_URL,
} from "@/test-utils/registry";

const LAB_URL = "https://lab.example.test/";

let store: InMemoryCatalogStore;
let hubListing: unknown[];

describe("registry commands", () => {
  beforeEach(() => {
    hubListing = [
      listedService("drs-1"),
      listedService("dc-1", DATA_CONNECT_TYPE, "query"),
    ];
    const { fetch } = mockFetchSequence([
      { request: `${REGISTRY_URL}services`, handler: () => ({ body: hubListing }) },
      {
        request: `${LAB_URL}services`,
        handler: () => ({ body: [listedService("drs-1")] }),
      },
    ]);
    store = new InMemoryCatalogStore(emptyCatalog());
    initAppContext({ store, fetch });
  });

  it("adds a registry and imports its services", async () => {
    const result = await addRegistry("hub", REGISTRY_URL);

    expect(result.changes.map(({ action, endpointId }) => `${action} ${endpointId}`)).toEqual([
      "add hub",
      "add drs-1",
      "add dc-1",
    ]);
    expect(result.reports[0]?.counts.add).toBe(2);
    await expect(listRegistries()).resolves.toEqual([
      { id: "hub", url: REGISTRY_URL, endpoints: 2 },
    ]);
  });

  it("namespaces the imports of a second registry", async () => {
    await addRegistry("hub", REGISTRY_URL);

    const result = await addRegistry("lab", LAB_URL);

    expect(result.changes.map(({ endpointId }) => endpointId)).toEqual([
      "lab",
      "lab:drs-1",
    ]);
    const catalog = await store.load();
    expect(catalog.contexts.default?.endpoints.map(({ id }) => id)).toEqual([
      "hub",
      "drs-1",
      "dc-1",
      "lab",
      "lab:drs-1",
    ]);
  });

  it("rejects a URL without a listing and saves nothing", async () => {
    await expect(
      addRegistry("nowhere", "https://nowhere.example.test/")
    ).rejects.toBeInstanceOf(InvalidServiceRegistryError);

    const catalog = await store.load();
    expect(catalog.contexts.default?.endpoints).toEqual([]);
  });

  it("re-synchronizes without touching manual endpoints", async () => {
    await addRegistry("hub", REGISTRY_URL);
    const catalog = await store.load();
    catalog.contexts.default?.endpoints.push({
      id: "manual",
      url: "https://manual.example.test/",
    });
    await store.save(catalog);
    hubListing = [listedService("drs-1")];

    const result = await syncRegistries();

    expect(result.changes.map(({ action, endpointId }) => `${action} ${endpointId}`)).toEqual([
      "update drs-1",
      "remove dc-1",
    ]);
    const updated = await store.load();
    expect(updated.contexts.default?.endpoints.map(({ id }) => id)).toEqual([
      "hub",
      "drs-1",
      "manual",
    ]);
  });

  it("removes a registry with its imports", async () => {
    await addRegistry("hub", REGISTRY_URL);

    await expect(removeRegistry("hub")).resolves.toEqual([
      "hub",
      "drs-1",
      "dc-1",
    ]);
    await expect(removeRegistry("hub")).rejects.toBeInstanceOf(
      RegistryNotFoundError
    );
  });

  it("validates registry ids", () => {
    expect(normalizeRegistryId(" hub-1 ")).toBe("hub-1");
    expect(() => normalizeRegistryId("")).toThrow("Registry id is required.");
    expect(() => normalizeRegistryId("a b")).toThrow(/may only contain/);
  });
});
