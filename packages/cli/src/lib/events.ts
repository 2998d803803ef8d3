/**
 * Typed views over core bus events.
 */

import type { EventBus, EventHandler } from "@svcsync/core";
import { z } from "zod";
import { log } from "./log";

export const syncEventSchema = z.object({
  action: z.enum(["add", "update", "keep", "remove", "conflict"]),
  endpoint: z.object({ id: z.string() }).passthrough(),
  registryId: z.string(),
});

export const authEndSchema = z.object({
  sessionId: z.string(),
  endpoints: z.array(z.string()),
  outcome: z.enum([
    "authenticated",
    "already-authenticated",
    "refreshed",
    "skipped",
  ]),
});

export const sessionEventSchema = z.object({
  sessionId: z.string(),
  endpoints: z.array(z.string()),
});

export const userVerificationSchema = z.object({
  url: z.string(),
  userCode: z.string().optional(),
});

export type SyncChange = {
  action: z.infer<typeof syncEventSchema>["action"];
  endpointId: string;
  registryId: string;
};

export type SessionOutcome = z.infer<typeof authEndSchema>;

export type UserVerification = z.infer<typeof userVerificationSchema>;

export type Unsubscribe = () => void;

/**
 * Registers `handler` for `type`, passing validated details.
 * Events with other shapes are logged and dropped.
 */
export function subscribe<T extends z.ZodTypeAny>(
  bus: EventBus,
  type: string,
  schema: T,
  handler: (details: z.infer<T>) => void
): Unsubscribe {
  const listener: EventHandler = (event) => {
    const parsed = schema.safeParse(event.details);
    if (parsed.success) {
      handler(parsed.data);
    } else {
      log.debug(`Ignored ${type} event: ${parsed.error.issues[0]?.message}`);
    }
  };
  bus.on(type, listener);
  return () => {
    bus.off(type, listener);
  };
}

/**
 * Collects endpoint changes from `context-sync` events, or from
 * `endpoint-sync` on a synchronizer bus.
 */
export function collectChanges(
  bus: EventBus,
  type: "context-sync" | "endpoint-sync" = "context-sync"
) {
  const changes: SyncChange[] = [];
  const stop = subscribe(bus, type, syncEventSchema, (details) => {
    changes.push({
      action: details.action,
      endpointId: details.endpoint.id,
      registryId: details.registryId,
    });
  });
  return { changes, stop };
}

/** Collects per-session outcomes from `auth-end` events. */
export function collectOutcomes(bus: EventBus) {
  const outcomes: SessionOutcome[] = [];
  const stop = subscribe(bus, "auth-end", authEndSchema, (details) => {
    outcomes.push(details);
  });
  return { outcomes, stop };
}
