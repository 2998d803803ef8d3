import { EventBus } from "../../events/event-bus";
import type { OAuth2Config, OAuth2ConfigField, TokenResponse } from "./config";

export const BLOCKING_RESPONSE_EVENTS = [
  "blocking-response-required",
  "blocking-response-ok",
  "blocking-response-failed",
] as const;

/**
 * One OAuth2 grant flow bound to a config.
 *
 * A flow that needs the user (e.g. visiting a verification URL)
 * dispatches `blocking-response-required` with a `kind` and waits for the
 * handlers to return before it continues.
 */
export type OAuth2Adapter = {
  readonly events: EventBus;
  exchangeTokens(signal?: AbortSignal): Promise<TokenResponse>;
};

export type OAuth2AdapterFactory = {
  name: string;
  /** Config fields that must be non-empty for this grant flow */
  requiredFields: readonly OAuth2ConfigField[];
  create(config: OAuth2Config): OAuth2Adapter;
};

export function createAdapterEvents() {
  return new EventBus(BLOCKING_RESPONSE_EVENTS);
}

/**
 * Grant flows in priority order.
 * The first factory whose required fields are all set wins.
 */
export class OAuth2AdapterRegistry {
  private readonly factories: OAuth2AdapterFactory[];

  constructor(factories: readonly OAuth2AdapterFactory[] = []) {
    this.factories = [...factories];
  }

  register(factory: OAuth2AdapterFactory): this {
    this.factories.push(factory);
    return this;
  }

  find(config: OAuth2Config): OAuth2AdapterFactory | null {
    return (
      this.factories.find((factory) => isCompatible(factory, config)) ?? null
    );
  }

  resolve(config: OAuth2Config): OAuth2Adapter | null {
    return this.find(config)?.create(config) ?? null;
  }
}

function isCompatible(factory: OAuth2AdapterFactory, config: OAuth2Config) {
  return factory.requiredFields.every((field) => {
    const value = config[field];
    return typeof value === "string" && value.length > 0;
  });
}
