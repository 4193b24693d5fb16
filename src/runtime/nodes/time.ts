import { z } from "zod";
import { toNumber } from "../../core/compat";
import { dataInput, dataOutput, flowInput, flowOutput } from "../../core/ports";
import type { WirePortDescriptor } from "../../core/types";
import type { WireNodeContext } from "../context";
import { WireFlowNode, WireNodeResult } from "../node";
import type { WireEmission, WireFlowResult } from "../node";
import { defineNode } from "./define";

const DelaySchema = z.object({
	durationMs: z.number().min(0).default(1000),
});

/** Continues on `out` once the given time has passed. */
export class WireDelayNode extends WireFlowNode<z.infer<typeof DelaySchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("in"),
			dataInput("duration", "float", { label: "Duration (ms)", defaultValue: this.config.durationMs }),
			flowOutput("out"),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		const duration = Math.max(0, toNumber(ctx.getInput("duration"), this.config.durationMs));
		return WireNodeResult.suspend({
			poll: ({ elapsedMs }) => (elapsedMs >= duration ? { emit: [{ port: "out" }], done: true } : { done: false }),
		});
	}
}

const TimerSchema = z.object({
	durationMs: z.number().min(0).default(1000),
	loop: z.boolean().default(false),
});

/**
 * Ticks every frame until the duration elapses. Starting again while running restarts
 * the count; `stop` cancels it without firing `onComplete`.
 */
export class WireTimerNode extends WireFlowNode<z.infer<typeof TimerSchema>> {
	public definePorts(): WirePortDescriptor[] {
		return [
			flowInput("start"),
			flowInput("stop"),
			dataInput("duration", "float", { label: "Duration (ms)", defaultValue: this.config.durationMs }),
			flowOutput("onTick"),
			flowOutput("onComplete"),
			dataOutput("progress", "float"),
		];
	}

	public activate(ctx: WireNodeContext): WireFlowResult {
		if (ctx.port === "stop") {
			ctx.cancelWait();
			return WireNodeResult.halt();
		}
		const duration = Math.max(0, toNumber(ctx.getInput("duration"), this.config.durationMs));
		const loop = this.config.loop;
		const tick = (progress: number): WireEmission => ({ port: "onTick", data: { progress }, locals: { progress } });
		let elapsed = 0;
		return WireNodeResult.suspend(
			{
				poll: ({ deltaMs }) => {
					elapsed += deltaMs;
					if (elapsed < duration) {
						return { emit: [tick(elapsed / duration)], done: false };
					}
					const emit = [tick(1), { port: "onComplete" }];
					if (loop) {
						elapsed = 0;
						return { emit, done: false };
					}
					return { emit, done: true };
				},
			},
			{ outputs: { progress: 0 } },
		);
	}
}

export const timeNodeDefinitions = [
	defineNode(
		{ type: "time.delay", label: "Delay", category: "time", description: "Waits before continuing." },
		DelaySchema,
		(config) => new WireDelayNode(config),
	),
	defineNode(
		{ type: "time.timer", label: "Timer", category: "time", description: "Reports progress every tick until done." },
		TimerSchema,
		(config) => new WireTimerNode(config),
	),
];
