import { z } from "zod";
import { CATALOG_VERSION } from "../constants";
import { endpointSchema } from "../endpoint/schema";

export const contextSchema = z.object({
  defaults: z.record(z.string()).default({}),
  endpoints: z.array(endpointSchema).default([]),
});

export const catalogSchema = z.object({
  version: z.number().int().positive().default(CATALOG_VERSION),
  currentContext: z.string().nullable().default(null),
  contexts: z.record(contextSchema).default({}),
});
