import { getRuntimeConfig } from "../../config";
import { coerceValue } from "../../core/compat";
import type { WirePortDescriptor } from "../../core/types";
import { ERROR_CODES, WireError, describeError, errorCodeOf } from "../../errors";
import type { WireErrorCode } from "../../errors";
import { makeLogger } from "../../logger";
import type { Logger } from "../../logger";
import type { WireHostAdapter } from "../adapter";
import { WireBlackboard, WireExecutionEvents, WireNodeContext, WireScope } from "../context";
import type { WireExecutionListener } from "../context";
import type { WireGraph, WireGraphNode, WirePortRef } from "../graph";
import type { WireEmission, WireWait, WireWaitResult } from "../node";
import { WireExecutionToken, outputKey } from "../token";
import { WireWaitTable } from "./WireWaitTable";

export type WireFaultKind = "activation" | "data-cycle" | "data-depth" | "missing-entry" | "missing-exit";

/** A runtime problem isolated to one token or one data resolution. */
export interface WireFault {
	kind: WireFaultKind;
	code: WireErrorCode;
	graphId: string;
	nodeId: string;
	tokenId?: string;
	message: string;
}

export interface WireExecutorOptions {
	/** Distinguishes executors sharing graphs; part of every wait key. */
	contextId?: string;
	logger?: Logger;
	random?: () => number;
	blackboard?: WireBlackboard;
	host?: WireHostAdapter;
	maxStepsPerTick?: number;
	maxDataDepth?: number;
}

export interface WireEnqueueOptions {
	port?: string;
	data?: Record<string, unknown>;
	graph?: WireGraph;
}

export interface WireTickReport {
	steps: number;
	resumed: number;
	pending: number;
	waits: number;
	budgetExhausted: boolean;
}

export type WireExecutorStatus = "idle" | "running" | "stopped";

type Pulled = { ok: true; value: unknown } | { ok: false };

function faultKindFor(code: WireErrorCode): WireFaultKind {
	switch (code) {
		case ERROR_CODES.MISSING_GRAPH:
		case ERROR_CODES.MISSING_ENTRY:
			return "missing-entry";
		case ERROR_CODES.MISSING_EXIT:
			return "missing-exit";
		case ERROR_CODES.DATA_CYCLE:
			return "data-cycle";
		case ERROR_CODES.DATA_DEPTH_EXCEEDED:
			return "data-depth";
		default:
			return "activation";
	}
}

function flowEmissions(ports: WirePortDescriptor[]): WireEmission[] {
	return ports.filter((port) => port.signal === "flow").map((port) => ({ port: port.name }));
}

/**
 * Interprets a graph one token at a time. Tokens wait in a FIFO queue that `tick`
 * drains up to a step budget; suspended nodes resume from the wait table, which is
 * polled at the start of every tick.
 */
export class WireGraphExecutor {
	public readonly contextId: string;
	public readonly blackboard: WireBlackboard;

	private readonly _logger: Logger;
	private readonly _random: () => number;
	private readonly _host?: WireHostAdapter;
	private readonly _events: WireExecutionEvents;
	private readonly _scope = new WireScope();
	private readonly _waits = new WireWaitTable();
	private readonly _faults: WireFault[] = [];
	private readonly _maxStepsPerTick: number;
	private readonly _maxDataDepth: number;

	private _queue: WireExecutionToken[] = [];
	private _status: WireExecutorStatus = "idle";
	private _tokenCounter = 0;
	private _invocationCounter = 0;

	public constructor(
		private readonly _graph: WireGraph,
		options: WireExecutorOptions = {},
	) {
		this.contextId = options.contextId ?? "default";
		this.blackboard = options.blackboard ?? new WireBlackboard();
		this._logger = (options.logger ?? makeLogger("executor")).child({ graphId: _graph.id, contextId: this.contextId });
		this._random = options.random ?? Math.random;
		this._host = options.host;
		this._events = new WireExecutionEvents(this._logger);
		this._maxStepsPerTick = options.maxStepsPerTick ?? getRuntimeConfig().maxStepsPerTick;
		this._maxDataDepth = options.maxDataDepth ?? getRuntimeConfig().maxDataDepth;
	}

	public get graph(): WireGraph {
		return this._graph;
	}

	public get status(): WireExecutorStatus {
		return this._status;
	}

	public get faults(): readonly WireFault[] {
		return this._faults;
	}

	public get pendingCount(): number {
		return this._queue.length;
	}

	public get activeWaitCount(): number {
		return this._waits.size;
	}

	/** True while tokens are queued or waits are pending. */
	public get busy(): boolean {
		return this._queue.length > 0 || this._waits.size > 0;
	}

	/** Last value seen on every output port, keyed `graphId:nodeId:port`. */
	public get outputs(): Record<string, unknown> {
		return this._scope.snapshot();
	}

	public subscribe(listener: WireExecutionListener): () => boolean {
		return this._events.subscribe(listener);
	}

	/** Queues one token per root of the main graph. */
	public start(): WireExecutionToken[] {
		const tokens: WireExecutionToken[] = [];
		for (const root of this._graph.roots) {
			const token = this.enqueue(root);
			if (token) {
				tokens.push(token);
			}
		}
		return tokens;
	}

	/** Queues a fresh token at `nodeId`. Ignored once the executor is stopped. */
	public enqueue(nodeId: string, options: WireEnqueueOptions = {}): WireExecutionToken | undefined {
		if (this._status === "stopped") {
			this._logger.debug("Ignoring enqueue on a stopped executor", { nodeId });
			return undefined;
		}
		const graph = options.graph ?? this._graph;
		graph.getNode(nodeId);
		const token = new WireExecutionToken(this._nextTokenId(), graph, nodeId, options.port);
		for (const [key, value] of Object.entries(options.data ?? {})) {
			token.setData(key, value);
		}
		this._queue.push(token);
		this._status = "running";
		this._events.emit({ type: "token:spawn", graphId: graph.id, tokenId: token.id, nodeId, port: options.port });
		return token;
	}

	public tick(deltaMs = 0): WireTickReport {
		if (this._status === "stopped") {
			return { steps: 0, resumed: 0, pending: 0, waits: 0, budgetExhausted: false };
		}
		const resumed = this._pollWaits(Math.max(0, deltaMs));
		let steps = 0;
		while (this._status !== "stopped" && steps < this._maxStepsPerTick) {
			const token = this._queue.shift();
			if (!token) {
				break;
			}
			steps++;
			this._step(token);
		}
		const budgetExhausted = this._status !== "stopped" && this._queue.length > 0;
		if (budgetExhausted) {
			this._logger.warn("Step budget exhausted; continuing next tick", {
				steps,
				pending: this._queue.length,
			});
		}
		if (this._status === "running" && !this.busy) {
			this._status = "idle";
		}
		return { steps, resumed, pending: this._queue.length, waits: this._waits.size, budgetExhausted };
	}

	/** Drops queued tokens and pending waits. A stopped executor accepts no further work. */
	public stop(reason = "stopped"): void {
		if (this._status === "stopped") {
			return;
		}
		this._status = "stopped";
		const dropped = this._queue.length;
		this._queue = [];
		for (const entry of this._waits.clear()) {
			this._events.emit({ type: "wait:cancel", graphId: entry.graph.id, nodeId: entry.nodeId, waitKey: entry.key, reason: "stop" });
		}
		this._logger.info("Executor stopped", { reason, dropped });
	}

	/** Cancels every pending wait owned by the node, in any call context. */
	public cancelWait(nodeId: string, graph: WireGraph = this._graph): number {
		const entries = this._waits.forNode(graph, nodeId);
		for (const entry of entries) {
			this._cancelKey(entry.key, "node");
		}
		return entries.length;
	}

	private _nextTokenId(): string {
		this._tokenCounter += 1;
		return `t${this._tokenCounter}`;
	}

	private _waitKey(token: WireExecutionToken, nodeId: string): string {
		const path = token.callPath;
		return `${token.graph.id}:${nodeId}@${this.contextId}${path ? `/${path}` : ""}`;
	}

	private _step(token: WireExecutionToken): void {
		const graph = token.graph;
		const node = graph.findNode(token.nodeId);
		if (!node) {
			token.state = "completed";
			this._logger.debug("Dropping token for a missing node", { tokenId: token.id, nodeId: token.nodeId });
			return;
		}
		token.state = "running";
		this._events.emit({ type: "node:enter", graphId: graph.id, nodeId: node.id, tokenId: token.id, port: token.port });
		try {
			this._activate(token, node);
		} catch (error) {
			const code = errorCodeOf(error);
			const source = error instanceof WireError ? error.details?.nodeId : undefined;
			this._fault(faultKindFor(code), code, graph, typeof source === "string" ? source : node.id, token, describeError(error));
			token.state = "faulted";
		}
		this._events.emit({ type: "node:exit", graphId: graph.id, nodeId: node.id, tokenId: token.id, state: token.state });
		if (token.state === "completed") {
			this._events.emit({ type: "token:complete", graphId: graph.id, tokenId: token.id, nodeId: node.id });
		}
	}

	private _activate(token: WireExecutionToken, node: WireGraphNode): void {
		const logic = node.logic;
		switch (logic.kind) {
			case "data": {
				this._evaluateData(token, node, [node.id]);
				token.state = "completed";
				return;
			}
			case "action": {
				const outputs = logic.run(this._context(token, node, this._resolveInputs(token, node, [])));
				if (outputs) {
					this._recordOutputs(token, node, outputs);
				}
				this._spawn(token, node, flowEmissions(node.outputs));
				token.state = "completed";
				return;
			}
			case "flow": {
				const result = logic.activate(this._context(token, node, this._resolveInputs(token, node, [])));
				if (result.outputs) {
					this._recordOutputs(token, node, result.outputs);
				}
				if (result.emit?.length) {
					this._spawn(token, node, result.emit);
				}
				if (result.wait) {
					this._suspend(token, node, result.wait);
					return;
				}
				token.state = "completed";
				return;
			}
			case "entry": {
				const ports = flowEmissions(node.outputs);
				this._spawn(token, node, token.port === undefined ? ports : ports.filter((emission) => emission.port === token.port));
				token.state = "completed";
				return;
			}
			case "exit": {
				this._leaveGraph(token, node);
				return;
			}
			case "call": {
				const target = logic.target.resolve();
				if (!target) {
					throw new WireError(ERROR_CODES.MISSING_GRAPH, `Call node '${node.id}' targets unknown graph '${logic.target.id}'.`);
				}
				const entry = target.entryNode();
				if (!entry) {
					throw new WireError(ERROR_CODES.MISSING_ENTRY, `Graph '${target.id}' has no entry node.`);
				}
				if (target.exitNodes().length === 0) {
					throw new WireError(ERROR_CODES.MISSING_EXIT, `Graph '${target.id}' has no exit node.`);
				}
				this._enterGraph(token, node, target, entry);
				return;
			}
		}
	}

	private _enterGraph(token: WireExecutionToken, node: WireGraphNode, target: WireGraph, entry: WireGraphNode): void {
		const inputs = this._resolveInputs(token, node, []);
		this._invocationCounter += 1;
		token.pushFrame({
			graph: token.graph,
			callNodeId: node.id,
			invocationId: this._invocationCounter,
			savedData: token.snapshotData(),
		});
		const data = new Map<string, unknown>();
		for (const port of entry.outputs) {
			if (port.signal === "data") {
				data.set(outputKey(entry.id, port.name), inputs[port.name] ?? port.defaultValue);
			}
		}
		token.replaceData(data);
		token.graph = target;
		token.nodeId = entry.id;
		token.state = "pending";
		this._queue.push(token);
		this._events.emit({ type: "token:spawn", graphId: target.id, tokenId: token.id, parentId: token.id, nodeId: entry.id, port: token.port });
	}

	private _leaveGraph(token: WireExecutionToken, node: WireGraphNode): void {
		const values = this._resolveInputs(token, node, []);
		const returnPort = token.port;
		const frame = token.popFrame();
		if (!frame) {
			token.state = "completed";
			this._events.emit({ type: "graph:return", graphId: token.graph.id, tokenId: token.id, port: returnPort, values });
			return;
		}
		token.graph = frame.graph;
		token.nodeId = frame.callNodeId;
		token.replaceData(frame.savedData);
		token.state = "completed";
		const callNode = frame.graph.findNode(frame.callNodeId);
		if (!callNode) {
			this._logger.debug("Caller vanished before the sub-graph returned", { tokenId: token.id, nodeId: frame.callNodeId });
			return;
		}
		const returned: Record<string, unknown> = {};
		for (const port of callNode.outputs) {
			if (port.signal === "data" && port.name in values) {
				returned[port.name] = values[port.name];
			}
		}
		this._recordOutputs(token, callNode, returned);
		if (returnPort !== undefined) {
			this._spawn(token, callNode, [{ port: returnPort }]);
		}
	}

	private _suspend(token: WireExecutionToken, node: WireGraphNode, wait: WireWait): void {
		if (this._status === "stopped") {
			token.state = "completed";
			return;
		}
		const key = this._waitKey(token, node.id);
		const previous = this._waits.set({ key, graph: token.graph, nodeId: node.id, token, wait, elapsedMs: 0 });
		if (previous) {
			previous.token.state = "completed";
			this._logger.debug("Restarted wait replaces the pending one", { waitKey: key });
			this._events.emit({ type: "wait:cancel", graphId: token.graph.id, nodeId: node.id, waitKey: key, reason: "restart" });
		}
		token.state = "suspended";
		this._events.emit({ type: "token:suspend", graphId: token.graph.id, tokenId: token.id, nodeId: node.id, waitKey: key });
	}

	private _cancelKey(key: string, reason: "node" | "stop"): boolean {
		const entry = this._waits.delete(key);
		if (!entry) {
			return false;
		}
		entry.token.state = "completed";
		this._logger.debug("Wait cancelled", { waitKey: key, reason });
		this._events.emit({ type: "wait:cancel", graphId: entry.graph.id, nodeId: entry.nodeId, waitKey: key, reason });
		return true;
	}

	private _pollWaits(deltaMs: number): number {
		let resumed = 0;
		for (const entry of this._waits.entries()) {
			if (!this._waits.isCurrent(entry)) {
				continue;
			}
			const node = entry.graph.findNode(entry.nodeId);
			if (!node) {
				this._waits.delete(entry.key);
				this._logger.debug("Dropping wait for a missing node", { waitKey: entry.key });
				continue;
			}
			entry.elapsedMs += deltaMs;
			let result: WireWaitResult;
			try {
				result = entry.wait.poll({ deltaMs, elapsedMs: entry.elapsedMs });
			} catch (error) {
				this._waits.delete(entry.key);
				const code = errorCodeOf(error);
				this._fault(faultKindFor(code), code, entry.graph, node.id, entry.token, describeError(error));
				entry.token.state = "faulted";
				continue;
			}
			if (result.done) {
				this._waits.delete(entry.key);
			}
			if (result.emit?.length) {
				resumed += this._spawn(entry.token, node, result.emit);
			}
			if (result.done) {
				entry.token.state = "completed";
				this._events.emit({ type: "token:complete", graphId: entry.graph.id, tokenId: entry.token.id, nodeId: node.id });
			}
		}
		return resumed;
	}

	private _spawn(source: WireExecutionToken, node: WireGraphNode, emissions: WireEmission[]): number {
		const graph = source.graph;
		let spawned = 0;
		for (const emission of emissions) {
			const port = node.outputs.find((candidate) => candidate.name === emission.port);
			if (!port || port.signal !== "flow") {
				this._logger.warn("Ignoring emission on an unknown execution output", { nodeId: node.id, port: emission.port });
				continue;
			}
			for (const [name, value] of Object.entries(emission.data ?? {})) {
				this._scope.set(graph.id, node.id, name, value);
			}
			for (const connection of graph.getOutgoing(node.id, emission.port)) {
				const child = source.fork(this._nextTokenId(), connection.to.nodeId, connection.to.port);
				for (const [name, value] of Object.entries(emission.data ?? {})) {
					child.setData(outputKey(node.id, name), value);
				}
				for (const [name, value] of Object.entries(emission.locals ?? {})) {
					child.setData(name, value);
				}
				this._queue.push(child);
				spawned++;
				this._events.emit({
					type: "token:spawn",
					graphId: graph.id,
					tokenId: child.id,
					parentId: source.id,
					nodeId: child.nodeId,
					port: child.port,
				});
			}
		}
		return spawned;
	}

	private _recordOutputs(token: WireExecutionToken, node: WireGraphNode, outputs: Record<string, unknown>): void {
		for (const [name, value] of Object.entries(outputs)) {
			token.setData(outputKey(node.id, name), value);
			this._scope.set(token.graph.id, node.id, name, value);
		}
	}

	private _context(token: WireExecutionToken, node: WireGraphNode, inputs: Record<string, unknown>): WireNodeContext {
		return new WireNodeContext({
			graph: token.graph,
			node,
			token,
			inputs,
			blackboard: this.blackboard,
			logger: this._logger,
			random: this._random,
			host: this._host,
			cancelWait: () => this._cancelKey(this._waitKey(token, node.id), "node"),
		});
	}

	private _resolveInputs(token: WireExecutionToken, node: WireGraphNode, trail: string[]): Record<string, unknown> {
		const values: Record<string, unknown> = {};
		for (const port of node.inputs) {
			if (port.signal === "data") {
				values[port.name] = this._resolveInput(token, node, port, trail);
			}
		}
		return values;
	}

	private _resolveInput(token: WireExecutionToken, node: WireGraphNode, port: WirePortDescriptor, trail: string[]): unknown {
		const incoming = token.graph.getIncoming(node.id, port.name);
		if (incoming.length === 0 && token.hasData(port.name)) {
			return coerceValue(token.getData(port.name), port.dataType);
		}
		for (const connection of incoming) {
			const pulled = this._pull(token, connection.from, trail);
			if (pulled.ok) {
				return coerceValue(pulled.value, port.dataType);
			}
		}
		const literal = Object.hasOwn(node.literalInputs, port.name) ? node.literalInputs[port.name] : port.defaultValue;
		return coerceValue(literal, port.dataType);
	}

	private _pull(token: WireExecutionToken, from: WirePortRef, trail: string[]): Pulled {
		const graph = token.graph;
		const source = graph.findNode(from.nodeId);
		if (!source || !source.outputs.some((port) => port.name === from.port)) {
			return { ok: false };
		}
		if (source.logic.kind !== "data") {
			const key = outputKey(source.id, from.port);
			if (token.hasData(key)) {
				return { ok: true, value: token.getData(key) };
			}
			if (this._scope.has(graph.id, source.id, from.port)) {
				return { ok: true, value: this._scope.get(graph.id, source.id, from.port) };
			}
			return { ok: false };
		}
		if (trail.includes(source.id)) {
			const path = [...trail, source.id].join(" -> ");
			this._fault("data-cycle", ERROR_CODES.DATA_CYCLE, graph, source.id, token, `Data cycle detected: ${path}`);
			return { ok: false };
		}
		if (trail.length >= this._maxDataDepth) {
			this._fault(
				"data-depth",
				ERROR_CODES.DATA_DEPTH_EXCEEDED,
				graph,
				source.id,
				token,
				`Data dependency chain deeper than ${this._maxDataDepth} nodes.`,
			);
			return { ok: false };
		}
		const outputs = this._evaluateData(token, source, [...trail, source.id]);
		return { ok: true, value: outputs[from.port] };
	}

	private _evaluateData(token: WireExecutionToken, node: WireGraphNode, trail: string[]): Record<string, unknown> {
		const logic = node.logic;
		if (logic.kind !== "data") {
			return {};
		}
		const inputs = this._resolveInputs(token, node, trail);
		let outputs: Record<string, unknown>;
		try {
			outputs = logic.evaluate(this._context(token, node, inputs));
		} catch (error) {
			if (error instanceof WireError && error.details?.nodeId !== undefined) {
				throw error;
			}
			throw new WireError(errorCodeOf(error), describeError(error), { nodeId: node.id });
		}
		for (const [name, value] of Object.entries(outputs)) {
			this._scope.set(token.graph.id, node.id, name, value);
		}
		return outputs;
	}

	private _fault(
		kind: WireFaultKind,
		code: WireErrorCode,
		graph: WireGraph,
		nodeId: string,
		token: WireExecutionToken | undefined,
		message: string,
	): void {
		const fault: WireFault = { kind, code, graphId: graph.id, nodeId, tokenId: token?.id, message };
		this._faults.push(fault);
		if (kind === "data-cycle" || kind === "data-depth") {
			this._logger.warn("Data resolution fault", { ...fault });
		} else {
			this._logger.error("Node fault", { ...fault });
		}
		this._events.emit({ type: "fault", fault });
	}
}
