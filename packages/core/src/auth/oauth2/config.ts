import { z } from "zod";
import { DEFAULT_AUTH_TYPE } from "../../constants";

const optionalText = z.string().nullish();

/** OAuth2 authentication config as stored on an endpoint. */
export const oauth2ConfigSchema = z.object({
  type: z.literal(DEFAULT_AUTH_TYPE).default(DEFAULT_AUTH_TYPE),
  grant_type: z.string().min(1, "grant_type is required"),
  resource_url: optionalText,
  authorization_endpoint: optionalText,
  client_id: optionalText,
  client_secret: optionalText,
  device_code_endpoint: optionalText,
  personal_access_endpoint: optionalText,
  personal_access_email: optionalText,
  personal_access_token: optionalText,
  redirect_url: optionalText,
  scope: optionalText,
  token_endpoint: optionalText,
});

export type OAuth2Config = z.infer<typeof oauth2ConfigSchema>;

export type OAuth2ConfigField = keyof OAuth2Config;

/** Token endpoint response, as returned by a grant exchange. */
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1),
  expires_in: z.number().nonnegative(),
  refresh_token: z.string().nullish(),
  scope: z.string().nullish(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
