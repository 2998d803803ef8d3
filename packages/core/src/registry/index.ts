export * from "./client";
export * from "./discovery";
export * from "./mapping";
export * from "./schema";
export * from "./synchronizer";
