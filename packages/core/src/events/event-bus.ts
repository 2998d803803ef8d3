/**
 * In-process, synchronous publish/subscribe.
 *
 * Every component owns one bus. Handlers run on the caller's stack in
 * registration order; there is no queueing and no isolation between
 * handlers. A handler error aborts the dispatch and reaches the caller.
 *
 * A bus built with a list of types only accepts those types
 * (fixed-type mode); a bus built without one accepts any type.
 */

import { UnknownEventTypeError } from "../errors";
import { type Logger, silentLogger } from "../logger";

export type EventDetails = Record<string, unknown>;

/**
 * Payload passed to every handler of one dispatch.
 * Constructed right before dispatch and discarded afterwards.
 */
export class BusEvent<TDetails extends EventDetails = EventDetails> {
  readonly details: TDetails;
  private _propagated = true;

  constructor(details: TDetails) {
    this.details = { ...details };
  }

  static make(details?: EventDetails | null): BusEvent {
    return new BusEvent(details ?? {});
  }

  get propagated(): boolean {
    return this._propagated;
  }

  /** Prevents the handlers registered after the current one from running. */
  stopPropagation() {
    this._propagated = false;
  }
}

export type EventHandler = (event: BusEvent) => void;

type HandlerTable = {
  ordered: EventHandler[];
  known: Set<EventHandler>;
};

export type EventBusOptions = {
  /** Label used in debug messages */
  name?: string;
  logger?: Logger;
};

export class EventBus {
  private readonly fixedTypes: string[];
  private readonly handlers = new Map<string, HandlerTable>();
  private readonly relayHandlers = new Map<
    EventBus,
    Map<string, EventHandler>
  >();
  private readonly name: string;
  private readonly logger: Logger;

  constructor(fixedTypes: readonly string[] = [], options: EventBusOptions = {}) {
    this.fixedTypes = [...fixedTypes];
    this.name = options.name ?? "events";
    this.logger = options.logger ?? silentLogger;
  }

  /** Whether the bus only accepts declared types */
  get isFixed(): boolean {
    return this.fixedTypes.length > 0;
  }

  getFixedTypes(): string[] {
    return [...this.fixedTypes];
  }

  addFixedTypes(...types: string[]) {
    for (const type of types) {
      if (!this.fixedTypes.includes(type)) {
        this.fixedTypes.push(type);
      }
    }
  }

  on(type: string, handler: EventHandler): this {
    this.assertKnownType(type);

    const table = this.tableFor(type);
    if (table.known.has(handler)) {
      this.logger.debug(`${this.name}/${type}: ignored duplicate handler`);
      return this;
    }

    table.ordered.push(handler);
    table.known.add(handler);
    return this;
  }

  off(type: string, handler: EventHandler): this {
    const table = this.handlers.get(type);
    if (!table || !table.known.has(handler)) {
      return this;
    }

    table.known.delete(handler);
    table.ordered.splice(table.ordered.indexOf(handler), 1);
    return this;
  }

  /**
   * Invokes the handlers of `type` in registration order.
   * Stops as soon as a handler clears `propagated`.
   */
  dispatch(type: string, event?: BusEvent | EventDetails | null): BusEvent {
    this.assertKnownType(type);

    const actual = event instanceof BusEvent ? event : BusEvent.make(event);
    const table = this.handlers.get(type);

    if (!table) {
      return actual;
    }

    // Handlers may register or remove handlers while we iterate.
    for (const handler of [...table.ordered]) {
      if (!actual.propagated) {
        break;
      }
      handler(actual);
    }

    return actual;
  }

  /**
   * Re-dispatches every `type` event on `target`, same type, same instance.
   */
  relay(target: EventBus, type: string): this {
    return this.on(type, this.relayHandlerFor(target, type));
  }

  /** Relays every fixed type of this bus to `target`. */
  relayAll(target: EventBus): this {
    for (const type of this.fixedTypes) {
      this.relay(target, type);
    }
    return this;
  }

  clear(type?: string) {
    if (type) {
      this.handlers.delete(type);
    } else {
      this.handlers.clear();
    }
  }

  // One handler per (target, type) so repeated relays stay idempotent.
  private relayHandlerFor(target: EventBus, type: string): EventHandler {
    let byType = this.relayHandlers.get(target);
    if (!byType) {
      byType = new Map();
      this.relayHandlers.set(target, byType);
    }

    let handler = byType.get(type);
    if (!handler) {
      handler = (event) => {
        target.dispatch(type, event);
      };
      byType.set(type, handler);
    }
    return handler;
  }

  private tableFor(type: string): HandlerTable {
    let table = this.handlers.get(type);
    if (!table) {
      table = { ordered: [], known: new Set() };
      this.handlers.set(type, table);
    }
    return table;
  }

  private assertKnownType(type: string) {
    if (this.isFixed && !this.fixedTypes.includes(type)) {
      this.logger.error(
        `${this.name}: unknown event type "${type}" (declared: ${this.fixedTypes.join(", ")})`
      );
      throw new UnknownEventTypeError(type, this.fixedTypes);
    }
  }
}
