import { z } from "zod";
import { toBoolean, toNumber } from "../../core/compat";
import { dataInput, dataOutput, flowInput, flowOutput } from "../../core/ports";
import type { WirePortDescriptor } from "../../core/types";
import { ERROR_CODES, WireError } from "../../errors";
import type { WireNodeContext } from "../context";
import { WireActionNode, WireFlowNode, WireNodeResult } from "../node";
import type { WireEmission, WireFlowResult, WireWait } from "../node";
import { defineNode } from "./define";

function isIterable(value: unknown): value is Iterable<unknown> {
	if (typeof value === "string") {
		return true;
	}
	return typeof value === "object" && value !== null && typeof Reflect.get(value, Symbol.iterator) === "function";
}

/**
 * Picks one connected execution output with probability proportional to its weight.
 * Unconnected outputs take no part; when every weight is zero the first candidate wins.
 * `overrides` replaces the published weight of the named ports.
 */
export function pickWeighted(ctx: WireNodeContext, overrides: Record<string, number> = {}): WirePortDescriptor | undefined {
	const candidates = ctx.getPorts("out", "flow").filter((port) => ctx.isConnected(port.name));
	if (candidates.length === 0) {
		return undefined;
	}
	const weightOf = (port: WirePortDescriptor) => Math.max(0, overrides[port.name] ?? port.weight ?? 1);
	const total = candidates.reduce((sum, port) => sum + weightOf(port), 0);
	if (total <= 0) {
		return candidates[0];
	}
	let roll = ctx.random() * total;
	for (const port of candidates) {
		roll -= weightOf(port);
		if (roll < 0) {
			return port;
		}
	}
	return candidates[candidates.length - 1];
}

const EmptySchema = z.object({});

/** Fires its output once when the graph starts. */
export class WireOnStartNode extends WireActionNode {
	public definePorts(): WirePortDescriptor[] {
		return [flowOutput("out")];
	}

	public run(): void { }
}

/** Passes execution straight through; useful for tidying wires. */
export class WireRelayNode extends WireActionNode {
	public definePorts(): WirePortDescriptor[] {
		return [flowInput("in"), flowOutput("out")];
	}

	public run(): void { }
}

const BranchSchema = z.object({
	defaultCondition: z.boolean().default(false),
});

export class WireBranchNode extends WireFlowNode<z.infer<typeof BranchSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("in"),
			dataInput("condition", "bool", { defaultValue: this.config.defaultCondition }),
			flowOutput("true"),
			flowOutput("false"),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const decision = toBoolean(ctx.getInput("condition"), this.config.defaultCondition);
		return WireNodeResult.next(decision ? "true" : "false");
	}
}

const SequenceSchema = z.object({
	outputCount: z.number().int().min(0).max(64).default(2),
});

/** Fires `then0`, `then1`, ... in order within the same tick. */
export class WireSequenceNode extends WireFlowNode<z.infer<typeof SequenceSchema>> {
	public definePorts(): WirePortDescriptor[] {
		const ports = [flowInput("in")];
		for (let index = 0; index < this.config.outputCount; index++) {
			ports.push(flowOutput(`then${index}`, { label: `Then ${index}` }));
		}
		return ports;
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		return WireNodeResult.fanOut(ctx.getPorts("out", "flow").map((port) => ({ port: port.name })));
	}
}

/** One loop-body continuation per item, all queued in the current tick, then `completed`. */
export class WireForEachNode extends WireFlowNode {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("in"),
			dataInput("collection", "any", { required: true, description: "The list to iterate over." }),
			flowOutput("loopBody"),
			flowOutput("completed"),
			dataOutput("item", "any"),
			dataOutput("index", "int"),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const collection = ctx.getInput("collection");
		const emissions: WireEmission[] = [];
		if (collection !== undefined && collection !== null) {
			if (!isIterable(collection)) {
				throw new WireError(ERROR_CODES.NOT_ITERABLE, `Node '${ctx.nodeId}' cannot iterate over ${typeof collection}.`);
			}
			let index = 0;
			for (const item of collection) {
				emissions.push({ port: "loopBody", data: { item, index }, locals: { item, index } });
				index++;
			}
		}
		emissions.push({ port: "completed" });
		return WireNodeResult.fanOut(emissions);
	}
}

const ForLoopSchema = z.object({
	start: z.number().int().default(0),
	end: z.number().int().default(10),
	step: z.number().int().default(1),
});

/** Counts from `start` towards `end` (exclusive), one iteration per tick. */
export class WireForLoopNode extends WireFlowNode<z.infer<typeof ForLoopSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("in"),
			dataInput("start", "int", { defaultValue: this.config.start }),
			dataInput("end", "int", { defaultValue: this.config.end }),
			dataInput("step", "int", { defaultValue: this.config.step }),
			flowOutput("loopBody"),
			flowOutput("completed"),
			dataOutput("index", "int"),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const start = Math.trunc(toNumber(ctx.getInput("start"), this.config.start));
		const end = Math.trunc(toNumber(ctx.getInput("end"), this.config.end));
		const step = Math.trunc(toNumber(ctx.getInput("step"), this.config.step));
		if (step === 0) {
			throw new Error(`Node '${ctx.nodeId}' cannot loop with a step of 0.`);
		}
		const inRange = (index: number) => (step > 0 ? index < end : index > end);
		const body = (index: number): WireEmission => ({ port: "loopBody", data: { index }, locals: { index } });
		if (!inRange(start)) {
			return WireNodeResult.next("completed");
		}
		let current = start + step;
		const wait: WireWait = {
			poll: () => {
				if (!inRange(current)) {
					return { emit: [{ port: "completed" }], done: true };
				}
				const emission = body(current);
				current += step;
				return { emit: [emission], done: false };
			},
		};
		return WireNodeResult.suspend(wait, { emit: [body(start)] });
	}
}

const SwitchSchema = z.object({
	mode: z.enum(["int", "string"]).default("string"),
	cases: z.array(z.union([z.string(), z.number()])).default([]),
	hasDefault: z.boolean().default(true),
});

/** Routes execution to the case output whose value equals the input, or to `default`. */
export class WireSwitchNode extends WireFlowNode<z.infer<typeof SwitchSchema>> {
	public definePorts(): WirePortDescriptor[] {
		const ports = [flowInput("in"), dataInput("value", this.config.mode === "int" ? "int" : "string")];
		const seen = new Set<string>();
		for (const value of this.config.cases) {
			const name = `case_${value}`;
			if (seen.has(name)) {
				continue;
			}
			seen.add(name);
			ports.push(flowOutput(name, { label: `Case ${value}` }));
		}
		if (this.config.hasDefault) {
			ports.push(flowOutput("default"));
		}
		return ports;
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const value = ctx.getInput("value");
		const match = this.config.cases.find((candidate) =>
			this.config.mode === "int"
				? Math.trunc(toNumber(candidate, Number.NaN)) === Math.trunc(toNumber(value, Number.NaN))
				: String(candidate) === String(value ?? ""),
		);
		if (match !== undefined) {
			return WireNodeResult.next(`case_${match}`);
		}
		return this.config.hasDefault ? WireNodeResult.next("default") : WireNodeResult.halt();
	}
}

const ChanceSchema = z.object({
	chance: z.number().min(0).max(1).default(0.5),
});

/** Takes `true` with probability `chance`, otherwise `false`. A wired `chance` input wins over the config. */
export class WireChanceNode extends WireFlowNode<z.infer<typeof ChanceSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("in"),
			dataInput("chance", "float", { defaultValue: this.config.chance }),
			flowOutput("true", { weight: this.config.chance }),
			flowOutput("false", { weight: 1 - this.config.chance }),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const chance = Math.min(1, Math.max(0, toNumber(ctx.getInput("chance"), this.config.chance)));
		const port = pickWeighted(ctx, { true: chance, false: 1 - chance });
		return port ? WireNodeResult.next(port.name) : WireNodeResult.halt();
	}
}

const RandomBranchSchema = z.object({
	weights: z.array(z.number().min(0)).default([1, 1]),
});

export class WireRandomBranchNode extends WireFlowNode<z.infer<typeof RandomBranchSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("in"),
			...this.config.weights.map((weight, index) => flowOutput(`out${index}`, { label: `Out ${index}`, weight })),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const port = pickWeighted(ctx);
		return port ? WireNodeResult.next(port.name) : WireNodeResult.halt();
	}
}

export const controlNodeDefinitions = [
	defineNode(
		{ type: "event.onStart", label: "On Start", category: "events", description: "Fires once when the graph starts." },
		EmptySchema,
		() => new WireOnStartNode({}),
	),
	defineNode({ type: "flow.relay", label: "Relay", category: "flow" }, EmptySchema, () => new WireRelayNode({})),
	defineNode(
		{ type: "flow.branch", label: "Branch", category: "flow", description: "Routes flow based on a boolean condition." },
		BranchSchema,
		(config) => new WireBranchNode(config),
	),
	defineNode(
		{ type: "flow.sequence", label: "Sequence", category: "flow", description: "Fires each output in order." },
		SequenceSchema,
		(config) => new WireSequenceNode(config),
	),
	defineNode(
		{ type: "flow.forEach", label: "For Each", category: "flow", description: "Runs the loop body once per item." },
		EmptySchema,
		() => new WireForEachNode({}),
	),
	defineNode(
		{ type: "flow.forLoop", label: "For Loop", category: "flow", description: "Runs one iteration per tick." },
		ForLoopSchema,
		(config) => new WireForLoopNode(config),
	),
	defineNode(
		{ type: "flow.switch", label: "Switch", category: "flow", description: "Routes flow by matching a value against cases." },
		SwitchSchema,
		(config) => new WireSwitchNode(config),
	),
	defineNode(
		{ type: "flow.chance", label: "Chance", category: "flow", description: "Randomly takes True or False." },
		ChanceSchema,
		(config) => new WireChanceNode(config),
	),
	defineNode(
		{ type: "flow.randomBranch", label: "Random Branch", category: "flow", description: "Picks one weighted output." },
		RandomBranchSchema,
		(config) => new WireRandomBranchNode(config),
	),
];
