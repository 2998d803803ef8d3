export * from "./schema";
export type {
  AuthenticationConfig,
  Endpoint,
  EndpointSource,
  ServiceType,
} from "./types";
export * from "./utils";
