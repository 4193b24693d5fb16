import type { WireNodeKind, WirePortDescriptor } from "../core/types";
import type { WireNodeContext } from "./context";
import type { WireSubgraphCallNode, WireSubgraphEntryNode, WireSubgraphExitNode } from "./nodes/graph";

export interface WireEmission {
	port: string;
	/** Values published on the emitting node's data outputs for this continuation only. */
	data?: Record<string, unknown>;
	/** Token-local values readable by unconnected inputs of the same name. */
	locals?: Record<string, unknown>;
}

export interface WireWaitStep {
	deltaMs: number;
	elapsedMs: number;
}

export interface WireWaitResult {
	emit?: WireEmission[];
	done: boolean;
}

/** A pending resumption owned by the executor and polled once per tick. */
export interface WireWait {
	poll(step: WireWaitStep): WireWaitResult;
}

export interface WireFlowResult {
	emit?: WireEmission[];
	outputs?: Record<string, unknown>;
	wait?: WireWait;
}

/** Base class for node behaviors; ports are derived from configuration on request. */
export abstract class WireNodeLogic<TConfig extends object = object> {
	public abstract readonly kind: WireNodeKind;

	public constructor(public config: TConfig) { }

	public abstract definePorts(): WirePortDescriptor[];

	/** Updates configuration without touching the published ports. */
	public configure(patch: Partial<TConfig>): void {
		this.config = { ...this.config, ...patch };
	}
}

/** Pure node recomputed every time a consumer pulls one of its outputs. */
export abstract class WireDataNode<TConfig extends object = object> extends WireNodeLogic<TConfig> {
	public readonly kind = "data" as const;

	public abstract evaluate(ctx: WireNodeContext): Record<string, unknown>;
}

/** Runs synchronously; the executor then follows every wired execution output. */
export abstract class WireActionNode<TConfig extends object = object> extends WireNodeLogic<TConfig> {
	public readonly kind = "action" as const;

	public abstract run(ctx: WireNodeContext): Record<string, unknown> | void;
}

/** Decides by itself which continuations to produce, if any. */
export abstract class WireFlowNode<TConfig extends object = object> extends WireNodeLogic<TConfig> {
	public readonly kind = "flow" as const;

	public abstract activate(ctx: WireNodeContext): WireFlowResult;
}

export type WireNodeBehavior =
	| WireDataNode
	| WireActionNode
	| WireFlowNode
	| WireSubgraphEntryNode
	| WireSubgraphExitNode
	| WireSubgraphCallNode;

export const WireNodeResult = {
	next(port: string, data?: Record<string, unknown>, locals?: Record<string, unknown>): WireFlowResult {
		return { emit: [{ port, data, locals }] };
	},
	fanOut(emissions: WireEmission[], outputs?: Record<string, unknown>): WireFlowResult {
		return { emit: emissions, outputs };
	},
	suspend(wait: WireWait, options?: { emit?: WireEmission[]; outputs?: Record<string, unknown> }): WireFlowResult {
		return { wait, emit: options?.emit, outputs: options?.outputs };
	},
	halt(outputs?: Record<string, unknown>): WireFlowResult {
		return { outputs };
	},
};
