export * from "./compat";
export * from "./ports";
export * from "./registry";
export type * from "./types";
