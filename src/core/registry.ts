import { ERROR_CODES, WireError } from "../errors";
import type { WireNodeDefinition } from "./types";

/** Per-instance catalogue of node types that graph assets can reference. */
export class WireNodeRegistry {
	private readonly _definitions = new Map<string, WireNodeDefinition>();

	public register(definition: WireNodeDefinition): void {
		const type = definition.options.type;
		if (this._definitions.has(type)) {
			throw new WireError(ERROR_CODES.DUPLICATE_NODE_TYPE, `Node type '${type}' already registered.`, { type });
		}
		this._definitions.set(type, definition);
	}

	public registerMany(definitions: WireNodeDefinition[]): void {
		for (const definition of definitions) {
			this.register(definition);
		}
	}

	public has(type: string): boolean {
		return this._definitions.has(type);
	}

	public getDefinition(type: string): WireNodeDefinition | undefined {
		return this._definitions.get(type);
	}
}
