import type { WireGraph } from "./graph";

export type WireTokenState = "pending" | "running" | "suspended" | "completed" | "faulted";

export interface WireCallFrame {
	readonly graph: WireGraph;
	readonly callNodeId: string;
	/** Distinguishes separate invocations made through the same call node. */
	readonly invocationId: number;
	readonly savedData: ReadonlyMap<string, unknown>;
}

export function outputKey(nodeId: string, port: string): string {
	return `${nodeId}.${port}`;
}

/** A single control-flow cursor carrying its own data and sub-graph call stack. */
export class WireExecutionToken {
	public state: WireTokenState = "pending";

	private _data: Map<string, unknown>;
	private readonly _callStack: WireCallFrame[];

	public constructor(
		public readonly id: string,
		public graph: WireGraph,
		public nodeId: string,
		public port?: string,
		data?: ReadonlyMap<string, unknown>,
		callStack?: readonly WireCallFrame[],
	) {
		this._data = new Map(data ?? []);
		this._callStack = [...(callStack ?? [])];
	}

	public get callStack(): readonly WireCallFrame[] {
		return this._callStack;
	}

	public get depth(): number {
		return this._callStack.length;
	}

	/** Identifies the chain of call invocations that led here, outermost first. */
	public get callPath(): string {
		return this._callStack.map((frame) => `${frame.graph.id}:${frame.callNodeId}#${frame.invocationId}`).join("/");
	}

	public hasData(key: string): boolean {
		return this._data.has(key);
	}

	public getData<T>(key: string): T | undefined {
		return this._data.get(key) as T | undefined;
	}

	public setData(key: string, value: unknown): void {
		this._data.set(key, value);
	}

	public snapshotData(): ReadonlyMap<string, unknown> {
		return new Map(this._data);
	}

	public replaceData(data: ReadonlyMap<string, unknown>): void {
		this._data = new Map(data);
	}

	public pushFrame(frame: WireCallFrame): void {
		this._callStack.push(frame);
	}

	public popFrame(): WireCallFrame | undefined {
		return this._callStack.pop();
	}

	/** Creates a successor with copies of this token's data and call stack. */
	public fork(id: string, nodeId: string, port?: string, graph: WireGraph = this.graph): WireExecutionToken {
		return new WireExecutionToken(id, graph, nodeId, port, this._data, this._callStack);
	}
}
