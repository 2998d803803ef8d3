import { z } from "zod";
import { serviceTypeSchema } from "../endpoint/schema";

const optionalText = z.string().nullish();

/** Authentication entry of a listed service (camelCase keys) */
export const serviceAuthenticationSchema = z.record(z.unknown());

/**
 * GA4GH service as listed by a service registry.
 * `authentication` is an extension some registries add.
 */
export const serviceSchema = z.object({
  id: z.string().min(1, "Service id is required"),
  name: z.string(),
  type: serviceTypeSchema,
  url: z.string().url("Service URL must be a valid URL"),
  description: optionalText,
  organization: z.object({ name: z.string(), url: z.string() }).nullish(),
  contactUrl: optionalText,
  documentationUrl: optionalText,
  createdAt: optionalText,
  updatedAt: optionalText,
  environment: optionalText,
  version: optionalText,
  authentication: z.array(serviceAuthenticationSchema).nullish(),
});

export const serviceListSchema = z.array(serviceSchema);

export type Service = z.infer<typeof serviceSchema>;

export type ServiceAuthentication = z.infer<typeof serviceAuthenticationSchema>;
