import { ERROR_CODES, WireError } from "../../errors";
import type { WirePortDescriptor, WirePortDirection, WirePortSignal } from "../../core/types";
import type { Logger } from "../../logger";
import type { WireHostAdapter } from "../adapter";
import type { WireGraph, WireGraphNode } from "../graph";
import type { WireExecutionToken } from "../token";
import type { WireBlackboard } from "./WireBlackboard";

export interface WireNodeContextOptions {
	graph: WireGraph;
	node: WireGraphNode;
	token: WireExecutionToken;
	inputs: Record<string, unknown>;
	blackboard: WireBlackboard;
	logger: Logger;
	random: () => number;
	cancelWait: () => boolean;
	host?: WireHostAdapter;
}

/** What a node sees while it runs: resolved inputs, its own wiring, shared state and the host. */
export class WireNodeContext {
	public constructor(private readonly _options: WireNodeContextOptions) { }

	public get graph(): WireGraph {
		return this._options.graph;
	}

	public get node(): WireGraphNode {
		return this._options.node;
	}

	public get nodeId(): string {
		return this._options.node.id;
	}

	/** Name of the execution input the token arrived on, if any. */
	public get port(): string | undefined {
		return this._options.token.port;
	}

	public get tokenId(): string {
		return this._options.token.id;
	}

	public get inputs(): Record<string, unknown> {
		return this._options.inputs;
	}

	public get blackboard(): WireBlackboard {
		return this._options.blackboard;
	}

	public get logger(): Logger {
		return this._options.logger;
	}

	public get host(): WireHostAdapter | undefined {
		return this._options.host;
	}

	public getInput<T>(name: string, fallback?: T): T | undefined {
		return (this._options.inputs[name] as T | undefined) ?? fallback;
	}

	public getPorts(direction: WirePortDirection, signal?: WirePortSignal): WirePortDescriptor[] {
		const ports = direction === "in" ? this.node.inputs : this.node.outputs;
		return signal ? ports.filter((port) => port.signal === signal) : [...ports];
	}

	public isConnected(port: string, direction: WirePortDirection = "out"): boolean {
		return this.graph.isConnected(this.nodeId, direction, port);
	}

	public random(): number {
		return this._options.random();
	}

	public setVariable(key: string, value: unknown): void {
		this.blackboard.set(key, value);
	}

	public getVariable<T>(key: string): T | undefined {
		return this.blackboard.get<T>(key);
	}

	/** Drops this node's pending wait for the current token's context; true when one existed. */
	public cancelWait(): boolean {
		return this._options.cancelWait();
	}

	public invokeHost(target: string | undefined, actionId: string, args: unknown[]): unknown {
		const host = this._options.host;
		if (!host) {
			throw new WireError(ERROR_CODES.NO_HOST_ADAPTER, `Node '${this.nodeId}' needs a host adapter to invoke '${actionId}'`);
		}
		return host.invokeAction(target, actionId, args);
	}
}
