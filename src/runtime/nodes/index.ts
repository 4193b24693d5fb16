import { WireNodeRegistry } from "../../core/registry";
import { actionNodeDefinitions } from "./actions";
import { controlNodeDefinitions } from "./control";
import { dataNodeDefinitions } from "./data";
import { subgraphNodeDefinitions } from "./graph";
import { timeNodeDefinitions } from "./time";

export * from "./actions";
export * from "./control";
export * from "./data";
export * from "./define";
export * from "./graph";
export * from "./time";

export const builtinNodeDefinitions = [
	...controlNodeDefinitions,
	...timeNodeDefinitions,
	...dataNodeDefinitions,
	...actionNodeDefinitions,
	...subgraphNodeDefinitions,
];

export function registerBuiltinNodes(registry: WireNodeRegistry): WireNodeRegistry {
	registry.registerMany(builtinNodeDefinitions);
	return registry;
}

/** A fresh registry holding every built-in node type. */
export function createNodeRegistry(): WireNodeRegistry {
	return registerBuiltinNodes(new WireNodeRegistry());
}
