export * from "./WireBlackboard";
export * from "./WireExecutionEvents";
export * from "./WireNodeContext";
export * from "./WireScope";
