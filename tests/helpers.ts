import { dataInput, flowInput, flowOutput } from "../src/core/ports";
import type { WirePortDescriptor } from "../src/core/types";
import { createLogger } from "../src/logger";
import type { WireNodeContext } from "../src/runtime/context";
import { WireGraphExecutor } from "../src/runtime/scheduler";
import type { WireExecutorOptions, WireTickReport } from "../src/runtime/scheduler";
import { WireGraphLibrary } from "../src/runtime/library";
import { WireActionNode } from "../src/runtime/node";
import { createNodeRegistry } from "../src/runtime/nodes";
import type { WireGraph } from "../src/runtime/graph";

export const silentLogger = createLogger({ level: "silent", pretty: false });

export interface ProbeRecord {
	nodeId: string;
	tokenId: string;
	value: unknown;
}

/** Records the value on its `value` input every time execution reaches it. */
export class ProbeNode extends WireActionNode {
	public constructor(private readonly _records: ProbeRecord[]) {
		super({});
	}

	public definePorts(): WirePortDescriptor[] {
		return [flowInput("in"), dataInput("value", "any"), flowOutput("out")];
	}

	public run(ctx: WireNodeContext): void {
		this._records.push({ nodeId: ctx.nodeId, tokenId: ctx.tokenId, value: ctx.getInput("value") });
	}
}

export class ThrowingNode extends WireActionNode {
	public definePorts(): WirePortDescriptor[] {
		return [flowInput("in"), flowOutput("out")];
	}

	public run(ctx: WireNodeContext): void {
		throw new Error(`boom from ${ctx.nodeId}`);
	}
}

export function createTestRegistry(records: ProbeRecord[] = []) {
	const registry = createNodeRegistry();
	registry.register({ options: { type: "test.probe", category: "test" }, create: () => new ProbeNode(records) });
	registry.register({ options: { type: "test.throw", category: "test" }, create: () => new ThrowingNode({}) });
	return registry;
}

export function createTestLibrary(assets: unknown[], records: ProbeRecord[] = []): WireGraphLibrary {
	const library = new WireGraphLibrary(createTestRegistry(records));
	library.registerMany(assets);
	return library;
}

export function createExecutor(graph: WireGraph, options: WireExecutorOptions = {}): WireGraphExecutor {
	return new WireGraphExecutor(graph, { logger: silentLogger, ...options });
}

/** Deterministic uniform source in [0, 1). */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export function runTicks(executor: WireGraphExecutor, count: number, deltaMs = 16): WireTickReport[] {
	const reports: WireTickReport[] = [];
	for (let index = 0; index < count; index++) {
		reports.push(executor.tick(deltaMs));
	}
	return reports;
}

export function valuesOf(records: ProbeRecord[], nodeId: string): unknown[] {
	return records.filter((record) => record.nodeId === nodeId).map((record) => record.value);
}

export function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	return undefined;
}

export function connection(from: string, to: string) {
	const [fromNode, fromPort] = from.split(".");
	const [toNode, toPort] = to.split(".");
	return { from: { nodeId: fromNode, port: fromPort }, to: { nodeId: toNode, port: toPort } };
}
