import type { WireNodeBehavior } from "../runtime/node";
import type { WireGraph } from "../runtime/graph";

export type WirePortDirection = "in" | "out";
export type WirePortSignal = "flow" | "data";
export type WirePortCapacity = "single" | "multi";
export type WireNodeKind = "data" | "action" | "flow" | "entry" | "exit" | "call";

/** Value type names understood by the compatibility rules; other names match only themselves. */
export type WireValueType = "any" | "int" | "float" | "double" | "bool" | "string" | "exec" | (string & {});

export interface WirePortOptions {
	label?: string;
	description?: string;
	capacity?: WirePortCapacity;
	required?: boolean;
	defaultValue?: unknown;
	weight?: number;
}

export interface WirePortDescriptor {
	name: string;
	label: string;
	description?: string;
	direction: WirePortDirection;
	signal: WirePortSignal;
	dataType: WireValueType;
	capacity: WirePortCapacity;
	required: boolean;
	defaultValue?: unknown;
	weight?: number;
}

export interface WireNodeOptions {
	type: string;
	label?: string;
	description?: string;
	category?: string;
}

export interface WireGraphHandle {
	readonly id: string;
	resolve(): WireGraph | undefined;
}

export interface WireNodeFactoryContext {
	graphHandle(graphId: string): WireGraphHandle;
}

export interface WireNodeDefinition {
	options: WireNodeOptions;
	create(params: Record<string, unknown>, context: WireNodeFactoryContext): WireNodeBehavior;
}
