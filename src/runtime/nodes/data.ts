import { z } from "zod";
import { coerceValue, toBoolean, toNumber } from "../../core/compat";
import { dataInput, dataOutput } from "../../core/ports";
import type { WirePortDescriptor } from "../../core/types";
import type { WireNodeContext } from "../context";
import { WireDataNode } from "../node";
import { defineNode } from "./define";

const ConstantSchema = z.object({
	dataType: z.string().default("any"),
	value: z.unknown().optional(),
});

export class WireConstantNode extends WireDataNode<z.infer<typeof ConstantSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [dataOutput("value", this.config.dataType)];
	}

	public evaluate(): Record<string, unknown> {
		return { value: coerceValue(this.config.value, this.config.dataType) };
	}
}

const BINARY_OPS = {
	add: (a: number, b: number) => a + b,
	subtract: (a: number, b: number) => a - b,
	multiply: (a: number, b: number) => a * b,
	divide: (a: number, b: number) => a / b,
	min: (a: number, b: number) => Math.min(a, b),
	max: (a: number, b: number) => Math.max(a, b),
	pow: (a: number, b: number) => a ** b,
} as const;

const UNARY_OPS = {
	abs: Math.abs,
	negate: (value: number) => -value,
	sqrt: Math.sqrt,
	sin: Math.sin,
	cos: Math.cos,
	floor: Math.floor,
	ceil: Math.ceil,
	round: Math.round,
} as const;

type BinaryOp = keyof typeof BINARY_OPS;
type UnaryOp = keyof typeof UNARY_OPS;

const BINARY_NAMES: [BinaryOp, ...BinaryOp[]] = ["add", "subtract", "multiply", "divide", "min", "max", "pow"];
const UNARY_NAMES: [UnaryOp, ...UnaryOp[]] = ["abs", "negate", "sqrt", "sin", "cos", "floor", "ceil", "round"];

const MathBinarySchema = z.object({
	op: z.enum(BINARY_NAMES).default("add"),
	a: z.number().default(0),
	b: z.number().default(0),
});

export class WireMathBinaryNode extends WireDataNode<z.infer<typeof MathBinarySchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			dataInput("a", "float", { defaultValue: this.config.a }),
			dataInput("b", "float", { defaultValue: this.config.b }),
			dataOutput("result", "float"),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		const a = toNumber(ctx.getInput("a"), this.config.a);
		const b = toNumber(ctx.getInput("b"), this.config.b);
		return { result: BINARY_OPS[this.config.op](a, b) };
	}
}

const MathUnarySchema = z.object({
	op: z.enum(UNARY_NAMES).default("abs"),
});

export class WireMathUnaryNode extends WireDataNode<z.infer<typeof MathUnarySchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [dataInput("value", "float", { defaultValue: 0 }), dataOutput("result", "float")];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		return { result: UNARY_OPS[this.config.op](toNumber(ctx.getInput("value"))) };
	}
}

const RandomSchema = z.object({
	mode: z.enum(["float", "int", "bool", "unit"]).default("float"),
	min: z.number().default(0),
	max: z.number().default(1),
});

/** Draws from the executor's random source; `int` excludes `max`. */
export class WireRandomNode extends WireDataNode<z.infer<typeof RandomSchema>> {
	public definePorts(): WirePortDescriptor[] {
		const outputType = this.config.mode === "unit" ? "float" : this.config.mode;
		return [
			dataInput("min", "float", { defaultValue: this.config.min }),
			dataInput("max", "float", { defaultValue: this.config.max }),
			dataOutput("value", outputType),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		const roll = ctx.random();
		const min = toNumber(ctx.getInput("min"), this.config.min);
		const max = toNumber(ctx.getInput("max"), this.config.max);
		switch (this.config.mode) {
			case "int": {
				const low = Math.round(min);
				const high = Math.round(max);
				return { value: high <= low ? low : low + Math.floor(roll * (high - low)) };
			}
			case "bool":
				return { value: roll > 0.5 };
			case "unit":
				return { value: roll };
			default:
				return { value: min + roll * (max - min) };
		}
	}
}

const CompareSchema = z.object({
	op: z.enum(["eq", "ne", "gt", "ge", "lt", "le"]).default("eq"),
});

export class WireCompareNode extends WireDataNode<z.infer<typeof CompareSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			dataInput("a", "float", { defaultValue: 0 }),
			dataInput("b", "float", { defaultValue: 0 }),
			dataOutput("result", "bool"),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		const a = toNumber(ctx.getInput("a"));
		const b = toNumber(ctx.getInput("b"));
		switch (this.config.op) {
			case "ne":
				return { result: a !== b };
			case "gt":
				return { result: a > b };
			case "ge":
				return { result: a >= b };
			case "lt":
				return { result: a < b };
			case "le":
				return { result: a <= b };
			default:
				return { result: a === b };
		}
	}
}

const BooleanSchema = z.object({
	op: z.enum(["and", "or", "xor"]).default("and"),
});

export class WireBooleanNode extends WireDataNode<z.infer<typeof BooleanSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			dataInput("a", "bool", { defaultValue: false }),
			dataInput("b", "bool", { defaultValue: false }),
			dataOutput("result", "bool"),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		const a = toBoolean(ctx.getInput("a"));
		const b = toBoolean(ctx.getInput("b"));
		if (this.config.op === "or") {
			return { result: a || b };
		}
		return { result: this.config.op === "xor" ? a !== b : a && b };
	}
}

export class WireNotNode extends WireDataNode {
	public definePorts(): WirePortDescriptor[] {
		return [dataInput("value", "bool", { defaultValue: false }), dataOutput("result", "bool")];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		return { result: !toBoolean(ctx.getInput("value")) };
	}
}

export class WireSelectNode extends WireDataNode {
	public definePorts(): WirePortDescriptor[] {
		return [
			dataInput("condition", "bool", { defaultValue: false }),
			dataInput("ifTrue", "any"),
			dataInput("ifFalse", "any"),
			dataOutput("result", "any"),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		return { result: toBoolean(ctx.getInput("condition")) ? ctx.getInput("ifTrue") : ctx.getInput("ifFalse") };
	}
}

const PickSchema = z.object({
	defaultIndex: z.number().int().default(0),
	clampIndex: z.boolean().default(true),
	defaultValue: z.unknown().optional(),
});

/** Reads one element of an array, clamping the index unless configured otherwise. */
export class WirePickNode extends WireDataNode<z.infer<typeof PickSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			dataInput("array", "any"),
			dataInput("index", "int", { defaultValue: this.config.defaultIndex }),
			dataOutput("value", "any"),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		const source = ctx.getInput("array");
		const array = Array.isArray(source) ? source : [];
		if (array.length === 0) {
			return { value: this.config.defaultValue };
		}
		let index = Math.trunc(toNumber(ctx.getInput("index"), this.config.defaultIndex));
		if (this.config.clampIndex) {
			index = Math.max(0, Math.min(array.length - 1, index));
		}
		return { value: array[index] ?? this.config.defaultValue };
	}
}

const GetPropertySchema = z.object({
	key: z.string().default(""),
	defaultValue: z.unknown().optional(),
});

/** Looks up a dotted property path on an object input. */
export class WireGetPropertyNode extends WireDataNode<z.infer<typeof GetPropertySchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			dataInput("object", "any"),
			dataInput("key", "string", { defaultValue: this.config.key }),
			dataOutput("value", "any"),
		];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		const key = String(ctx.getInput("key") ?? this.config.key);
		let current: unknown = ctx.getInput("object");
		for (const segment of key.split(".").filter(Boolean)) {
			if (typeof current !== "object" || current === null) {
				return { value: this.config.defaultValue };
			}
			current = Reflect.get(current, segment);
		}
		return { value: current ?? this.config.defaultValue };
	}
}

const GetVariableSchema = z.object({
	key: z.string().min(1),
	defaultValue: z.unknown().optional(),
});

export class WireGetVariableNode extends WireDataNode<z.infer<typeof GetVariableSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [dataOutput("value", "any")];
	}

	public evaluate(ctx: WireNodeContext): Record<string, unknown> {
		return { value: ctx.getVariable(this.config.key) ?? this.config.defaultValue };
	}
}

const EmptySchema = z.object({});

export const dataNodeDefinitions = [
	defineNode(
		{ type: "data.constant", label: "Constant", category: "data", description: "Outputs a fixed value." },
		ConstantSchema,
		(config) => new WireConstantNode(config),
	),
	defineNode({ type: "math.binary", label: "Math", category: "math" }, MathBinarySchema, (config) => new WireMathBinaryNode(config)),
	defineNode({ type: "math.unary", label: "Math (Unary)", category: "math" }, MathUnarySchema, (config) => new WireMathUnaryNode(config)),
	defineNode({ type: "math.random", label: "Random", category: "math" }, RandomSchema, (config) => new WireRandomNode(config)),
	defineNode({ type: "logic.compare", label: "Compare", category: "logic" }, CompareSchema, (config) => new WireCompareNode(config)),
	defineNode({ type: "logic.boolean", label: "Boolean", category: "logic" }, BooleanSchema, (config) => new WireBooleanNode(config)),
	defineNode({ type: "logic.not", label: "Not", category: "logic" }, EmptySchema, () => new WireNotNode({})),
	defineNode({ type: "logic.select", label: "Select", category: "logic" }, EmptySchema, () => new WireSelectNode({})),
	defineNode(
		{ type: "data.pick", label: "Pick Array Item", category: "data", description: "Selects an item from an array." },
		PickSchema,
		(config) => new WirePickNode(config),
	),
	defineNode(
		{ type: "data.getProperty", label: "Get Property", category: "data", description: "Reads a property from an object." },
		GetPropertySchema,
		(config) => new WireGetPropertyNode(config),
	),
	defineNode(
		{ type: "data.getVariable", label: "Get Variable", category: "variables", description: "Reads a blackboard variable." },
		GetVariableSchema,
		(config) => new WireGetVariableNode(config),
	),
];
