import {
  type Catalog,
  emptyCatalog,
  type Endpoint,
  InMemoryCatalogStore,
} from "@svcsync/core";
import { initAppContext } from "@/lib/context";
import { denyUnmockedFetch } from "./fetch";
import { type StaticGrant, staticGrant, type StaticGrantOptions } from "./grant";

export const SHARED_AUTH = {
  type: "oauth2",
  grant_type: "client_credentials",
  client_id: "test-client",
  client_secret: "test-secret",
  token_endpoint: "https://auth.example.test/token",
  scope: "read write",
};

export const OTHER_AUTH = { ...SHARED_AUTH, client_id: "other-client", scope: "read" };

/** `e1` and `e2` share one session, `e3` has its own. */
export function sessionCatalog(): Catalog {
  const endpoint = (id: string, authentication: Endpoint["authentication"]) => ({
    id,
    url: `https://${id}.example.test/`,
    authentication,
  });

  const catalog = emptyCatalog();
  catalog.contexts.default = {
    defaults: {},
    endpoints: [
      endpoint("e1", SHARED_AUTH),
      endpoint("e2", SHARED_AUTH),
      endpoint("e3", OTHER_AUTH),
    ],
  };
  return catalog;
}

export type SessionApp = {
  grant: StaticGrant;
  /** Epoch seconds seen by the session store checks */
  clock: { now: number };
};

export function initSessionApp(options: StaticGrantOptions = {}): SessionApp {
  const grant = staticGrant(options);
  const clock = { now: 1_000 };
  initAppContext({
    store: new InMemoryCatalogStore(sessionCatalog()),
    grants: [grant],
    fetch: denyUnmockedFetch(),
    now: () => clock.now,
  });
  return { grant, clock };
}
