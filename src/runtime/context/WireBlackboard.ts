/** Shared key/value store for graph variables across nodes. */
export class WireBlackboard {
	private readonly _state = new Map<string, unknown>();

	public set(key: string, value: unknown): void {
		this._state.set(key, value);
	}

	public get<T>(key: string): T | undefined {
		return this._state.get(key) as T | undefined;
	}

	public has(key: string): boolean {
		return this._state.has(key);
	}

	public snapshot(): Record<string, unknown> {
		return Object.fromEntries(this._state.entries());
	}
}
