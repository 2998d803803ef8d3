export * from "./authenticator";
export * from "./factory";
export * from "./oauth2/adapter";
export * from "./oauth2/authenticator";
export * from "./oauth2/config";
export * from "./session-manager";
export * from "./session-store";
export * from "./types";
