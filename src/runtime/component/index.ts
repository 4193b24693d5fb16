export * from "./WireScriptRunner";
