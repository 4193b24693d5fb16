import { z } from "zod";
import { dataInput, dataOutput, flowInput, flowOutput } from "../../core/ports";
import type { WirePortDescriptor } from "../../core/types";
import type { WireNodeContext } from "../context";
import { WireActionNode } from "../node";
import { defineNode } from "./define";

const SetVariableSchema = z.object({
	key: z.string().min(1),
});

/** Writes a value to the shared blackboard and passes it through. */
export class WireSetVariableNode extends WireActionNode<z.infer<typeof SetVariableSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [flowInput("in"), dataInput("value", "any"), flowOutput("out"), dataOutput("value", "any")];
	}

	public run(ctx: WireNodeContext): Record<string, unknown> {
		const value = ctx.getInput("value");
		ctx.setVariable(this.config.key, value);
		return { value };
	}
}

const LogSchema = z.object({
	level: z.enum(["debug", "info", "warn", "error"]).default("info"),
	message: z.string().default(""),
});

export class WireLogNode extends WireActionNode<z.infer<typeof LogSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [flowInput("in"), dataInput("message", "string", { defaultValue: this.config.message }), flowOutput("out")];
	}

	public run(ctx: WireNodeContext): void {
		const message = String(ctx.getInput("message") ?? this.config.message);
		ctx.logger[this.config.level](message, { nodeId: ctx.nodeId, graphId: ctx.graph.id });
	}
}

const HostInvokeSchema = z.object({
	actionId: z.string().min(1),
	target: z.string().optional(),
	argCount: z.number().int().min(0).max(16).default(0),
});

/** Calls an action on the host application and exposes its return value. */
export class WireHostInvokeNode extends WireActionNode<z.infer<typeof HostInvokeSchema>> {
	public definePorts(): WirePortDescriptor[] {
		const ports = [flowInput("in"), dataInput("target", "string", { defaultValue: this.config.target })];
		for (let index = 0; index < this.config.argCount; index++) {
			ports.push(dataInput(`arg${index}`, "any", { label: `Arg ${index}` }));
		}
		ports.push(flowOutput("out"), dataOutput("result", "any"));
		return ports;
	}

	public run(ctx: WireNodeContext): Record<string, unknown> {
		const args: unknown[] = [];
		for (let index = 0; index < this.config.argCount; index++) {
			args.push(ctx.getInput(`arg${index}`));
		}
		const target = ctx.getInput<string>("target") ?? this.config.target;
		return { result: ctx.invokeHost(target, this.config.actionId, args) };
	}
}

export const actionNodeDefinitions = [
	defineNode(
		{ type: "action.setVariable", label: "Set Variable", category: "variables", description: "Writes a blackboard variable." },
		SetVariableSchema,
		(config) => new WireSetVariableNode(config),
	),
	defineNode(
		{ type: "debug.log", label: "Log", category: "debug", description: "Writes a message to the runtime logger." },
		LogSchema,
		(config) => new WireLogNode(config),
	),
	defineNode(
		{ type: "host.invoke", label: "Invoke Host Action", category: "host", description: "Calls into the host application." },
		HostInvokeSchema,
		(config) => new WireHostInvokeNode(config),
	),
];
