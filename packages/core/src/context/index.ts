export * from "./manager";
export * from "./repository";
export * from "./schema";
export * from "./store";
export * from "./types";
