export * from "./config";
export * from "./core";
export * from "./errors";
export * from "./logger";
export * from "./runtime";
