import { z } from "zod";
import type { Endpoint, EndpointSource, ServiceType } from "./types";

export const serviceTypeSchema: z.ZodType<ServiceType> = z.object({
  group: z.string().trim().min(1, "Service type group is required"),
  artifact: z.string().trim().min(1, "Service type artifact is required"),
  version: z.string().trim().min(1, "Service type version is required"),
});

export const authenticationConfigSchema = z.record(z.unknown());

export const endpointSourceSchema: z.ZodType<EndpointSource> = z.object({
  sourceId: z.string().min(1),
  externalId: z.string().min(1),
});

export const endpointSchema: z.ZodType<Endpoint> = z.object({
  id: z.string().trim().min(1, "Endpoint id is required"),
  url: z.string().url("Endpoint URL must be a valid URL"),
  type: serviceTypeSchema.optional(),
  authentication: authenticationConfigSchema.optional(),
  fallbackAuthentications: z.array(authenticationConfigSchema).optional(),
  source: endpointSourceSchema.optional(),
});
