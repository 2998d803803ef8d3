import { describe, expect, it } from "vitest";
import { EndpointNotFoundError, InvalidCatalogError } from "../errors";
import { DATA_CONNECT_TYPE, DRS_TYPE } from "../test-utils/registry";
import { EndpointRepository } from "./repository";
import { emptyCatalog, InMemoryCatalogStore } from "./store";

const endpoints = [
  { id: "drs-a", url: "https://a.example.test/", type: DRS_TYPE },
  { id: "drs-b", url: "https://b.example.test/", type: DRS_TYPE },
  { id: "dc", url: "https://dc.example.test/", type: DATA_CONNECT_TYPE },
  { id: "plain", url: "https://plain.example.test/" },
];

describe("EndpointRepository", () => {
  it("finds endpoints by id", () => {
    const repository = new EndpointRepository({ defaults: {}, endpoints });

    expect(repository.get("dc").url).toBe("https://dc.example.test/");
    expect(repository.find("missing")).toBeUndefined();
    expect(() => repository.get("missing")).toThrow(EndpointNotFoundError);
  });

  it("filters by kind", () => {
    const repository = new EndpointRepository({ defaults: {}, endpoints });

    expect(repository.ofKind("drs").map((endpoint) => endpoint.id)).toEqual([
      "drs-a",
      "drs-b",
    ]);
    expect(repository.ofKind("workflow")).toEqual([]);
  });

  it("resolves defaults", () => {
    const repository = new EndpointRepository({
      defaults: { drs: "drs-b" },
      endpoints,
    });

    expect(repository.defaultOf("drs")?.id).toBe("drs-b");
    expect(repository.defaultOf("data-connect")?.id).toBe("dc");
    expect(repository.defaultOf("workflow")).toBeNull();
  });

  it("has no default among several candidates", () => {
    const repository = new EndpointRepository({ defaults: {}, endpoints });

    expect(repository.defaultOf("drs")).toBeNull();
  });
});

describe("InMemoryCatalogStore", () => {
  it("hands out copies", async () => {
    const store = new InMemoryCatalogStore();
    const catalog = await store.load();
    catalog.currentContext = "changed";

    await expect(store.load()).resolves.toEqual(emptyCatalog());
  });

  it("rejects duplicate endpoint ids on save", async () => {
    const store = new InMemoryCatalogStore();
    const catalog = emptyCatalog();
    catalog.contexts.default = {
      defaults: {},
      endpoints: [
        { id: "x", url: "https://a.example.test/" },
        { id: "x", url: "https://b.example.test/" },
      ],
    };

    await expect(store.save(catalog)).rejects.toThrow(InvalidCatalogError);
    await expect(store.save(catalog)).rejects.toThrow(
      'Context "default" has more than one endpoint with id "x".'
    );
  });
});
