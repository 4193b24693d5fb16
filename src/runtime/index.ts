export * from "./adapter";
export * from "./asset";
export * from "./component";
export * from "./context";
export * from "./graph";
export * from "./library";
export * from "./node";
export * from "./nodes";
export * from "./scheduler";
export * from "./token";
export * from "./validate";
