import type { WireGraphHandle, WireNodeFactoryContext } from "../core/types";
import type { WireNodeRegistry } from "../core/registry";
import { ERROR_CODES, WireError } from "../errors";
import type { WireGraphAsset } from "./asset";
import { parseGraphAsset } from "./asset";
import { WireGraph } from "./graph";

/** In-memory registry of graph assets, materialized and cached on demand. */
export class WireGraphLibrary implements WireNodeFactoryContext {
	private readonly _assets = new Map<string, WireGraphAsset>();
	private readonly _graphs = new Map<string, WireGraph>();

	public constructor(public readonly registry: WireNodeRegistry) { }

	/** Validates and stores an asset, replacing any cached graph with the same id. */
	public register(asset: unknown): WireGraphAsset {
		const parsed = parseGraphAsset(asset);
		this._assets.set(parsed.id, parsed);
		this._graphs.delete(parsed.id);
		return parsed;
	}

	public registerMany(assets: unknown[]): void {
		for (const asset of assets) {
			this.register(asset);
		}
	}

	public has(id: string): boolean {
		return this._assets.has(id);
	}

	public getAsset(id: string): WireGraphAsset {
		const asset = this._assets.get(id);
		if (!asset) {
			throw new WireError(ERROR_CODES.MISSING_GRAPH, `Graph '${id}' is not registered.`);
		}
		return asset;
	}

	public list(): WireGraphAsset[] {
		return Array.from(this._assets.values());
	}

	public load(id: string): WireGraph {
		const cached = this._graphs.get(id);
		if (cached) {
			return cached;
		}
		const asset = this.getAsset(id);
		try {
			return WireGraph.fromAsset(asset, {
				registry: this.registry,
				factory: this,
				onCreate: (graph) => this._graphs.set(id, graph),
			});
		} catch (error) {
			this._graphs.delete(id);
			throw error;
		}
	}

	/** Like `load`, but yields undefined for ids that were never registered. */
	public tryLoad(id: string): WireGraph | undefined {
		return this._assets.has(id) ? this.load(id) : undefined;
	}

	public invalidate(id?: string): void {
		if (id === undefined) {
			this._graphs.clear();
			return;
		}
		this._graphs.delete(id);
	}

	public graphHandle(graphId: string): WireGraphHandle {
		return { id: graphId, resolve: () => this.tryLoad(graphId) };
	}
}
