function makeScopeKey(graphId: string, nodeId: string, port: string): string {
	return `${graphId}:${nodeId}:${port}`;
}

/** Last value produced on each output port, readable by consumers outside the producing token chain. */
export class WireScope {
	private readonly _values = new Map<string, unknown>();

	public set(graphId: string, nodeId: string, port: string, value: unknown): void {
		this._values.set(makeScopeKey(graphId, nodeId, port), value);
	}

	public has(graphId: string, nodeId: string, port: string): boolean {
		return this._values.has(makeScopeKey(graphId, nodeId, port));
	}

	public get<T>(graphId: string, nodeId: string, port: string): T | undefined {
		return this._values.get(makeScopeKey(graphId, nodeId, port)) as T | undefined;
	}

	public snapshot(): Record<string, unknown> {
		return Object.fromEntries(this._values.entries());
	}
}
