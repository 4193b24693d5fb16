import type { Logger } from "../../logger";
import type { WireFault } from "../scheduler/WireGraphExecutor";
import type { WireTokenState } from "../token";

export type WireExecutionEvent =
	| { type: "node:enter"; graphId: string; nodeId: string; tokenId: string; port?: string }
	| { type: "node:exit"; graphId: string; nodeId: string; tokenId: string; state: WireTokenState }
	| { type: "token:spawn"; graphId: string; tokenId: string; parentId?: string; nodeId: string; port?: string }
	| { type: "token:complete"; graphId: string; tokenId: string; nodeId: string }
	| { type: "token:suspend"; graphId: string; tokenId: string; nodeId: string; waitKey: string }
	| { type: "wait:cancel"; graphId: string; nodeId: string; waitKey: string; reason: "restart" | "node" | "stop" }
	| { type: "graph:return"; graphId: string; tokenId: string; port?: string; values: Record<string, unknown> }
	| { type: "fault"; fault: WireFault };

export type WireExecutionListener = (event: WireExecutionEvent) => void;

/** Fans executor events out to subscribers; a throwing listener never stops execution. */
export class WireExecutionEvents {
	private readonly _listeners = new Set<WireExecutionListener>();

	public constructor(private readonly _logger: Logger) { }

	public subscribe(listener: WireExecutionListener): () => boolean {
		this._listeners.add(listener);
		return () => this._listeners.delete(listener);
	}

	public emit(event: WireExecutionEvent): void {
		for (const listener of this._listeners) {
			try {
				listener(event);
			} catch (error) {
				this._logger.error("Execution listener failed", { event: event.type, error: String(error) });
			}
		}
	}
}
