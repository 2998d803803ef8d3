import type { Service } from "../registry/schema";
import { jsonResponse } from "./fetch";

export const DRS_TYPE = { group: "org.ga4gh", artifact: "drs", version: "1.1.0" };

export const DATA_CONNECT_TYPE = {
  group: "org.ga4gh",
  artifact: "data-connect",
  version: "1.0.0",
};

export function makeService(id: string, overrides: Partial<Service> = {}): Service {
  return {
    id,
    name: id,
    type: { ...DRS_TYPE },
    url: `https://${id}.example.test/`,
    ...overrides,
  };
}

/** Route table serving `services` at `<registryUrl>services`. */
export function registryRoutes(registryUrl: string, services: () => unknown) {
  return {
    [`GET ${registryUrl}services`]: () => jsonResponse(services()),
  };
}
