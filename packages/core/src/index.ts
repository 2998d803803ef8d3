// Authenticators and session orchestration
export * from "./auth";
// Constants
export * from "./constants";
// Contexts (named endpoint catalogs)
export * from "./context";
// Endpoint model
export * from "./endpoint";
// Errors
export * from "./errors";
// Event bus
export * from "./events";
// Logger handle
export * from "./logger";
// Service registry client and synchronizer
export * from "./registry";

// Utilities
export * from "./utils/hash";
export * from "./utils/properties";
