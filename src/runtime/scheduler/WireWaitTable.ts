import type { WireGraph } from "../graph";
import type { WireWait } from "../node";
import type { WireExecutionToken } from "../token";

export interface WireWaitEntry {
	key: string;
	graph: WireGraph;
	nodeId: string;
	/** The suspended token; resumptions fork from it. */
	token: WireExecutionToken;
	wait: WireWait;
	elapsedMs: number;
}

/** Pending waits keyed by graph, node and execution context. At most one per key. */
export class WireWaitTable {
	private readonly _entries = new Map<string, WireWaitEntry>();

	public get size(): number {
		return this._entries.size;
	}

	/** Stores the entry and returns the wait it displaced, if any. */
	public set(entry: WireWaitEntry): WireWaitEntry | undefined {
		const previous = this._entries.get(entry.key);
		this._entries.set(entry.key, entry);
		return previous;
	}

	public get(key: string): WireWaitEntry | undefined {
		return this._entries.get(key);
	}

	public isCurrent(entry: WireWaitEntry): boolean {
		return this._entries.get(entry.key) === entry;
	}

	public delete(key: string): WireWaitEntry | undefined {
		const entry = this._entries.get(key);
		this._entries.delete(key);
		return entry;
	}

	public forNode(graph: WireGraph, nodeId: string): WireWaitEntry[] {
		return this.entries().filter((entry) => entry.graph === graph && entry.nodeId === nodeId);
	}

	public entries(): WireWaitEntry[] {
		return Array.from(this._entries.values());
	}

	public clear(): WireWaitEntry[] {
		const entries = this.entries();
		this._entries.clear();
		return entries;
	}
}
