export * from "./WireGraphExecutor";
export * from "./WireWaitTable";
