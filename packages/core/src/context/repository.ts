import type { ServiceKind } from "../constants";
import type { Endpoint } from "../endpoint/types";
import { isOfKind } from "../endpoint/utils";
import { EndpointNotFoundError } from "../errors";
import type { Context } from "./types";

/**
 * Read-only view over the endpoints of one context.
 */
export class EndpointRepository {
  private readonly endpoints: readonly Endpoint[];
  private readonly defaults: Readonly<Record<string, string>>;

  constructor(context: Context) {
    this.endpoints = [...context.endpoints];
    this.defaults = { ...context.defaults };
  }

  /**
   * @throws EndpointNotFoundError
   */
  get(id: string): Endpoint {
    const endpoint = this.find(id);
    if (!endpoint) {
      throw new EndpointNotFoundError(id);
    }
    return endpoint;
  }

  find(id: string): Endpoint | undefined {
    return this.endpoints.find((endpoint) => endpoint.id === id);
  }

  all(): Endpoint[] {
    return [...this.endpoints];
  }

  ofKind(kind: ServiceKind): Endpoint[] {
    return this.endpoints.filter((endpoint) => isOfKind(endpoint.type, kind));
  }

  /** The default endpoint of a kind, or the only one when none is set */
  defaultOf(kind: ServiceKind): Endpoint | null {
    const id = this.defaults[kind];
    if (id !== undefined) {
      return this.find(id) ?? null;
    }
    const [only, ...rest] = this.ofKind(kind);
    return only && rest.length === 0 ? only : null;
  }
}
