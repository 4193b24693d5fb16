import { z } from "zod";
import { dataInput, dataOutput, flowInput, flowOutput } from "../../core/ports";
import type { WireGraphHandle, WireNodeFactoryContext, WirePortDescriptor } from "../../core/types";
import { WireNodeLogic } from "../node";
import { defineNode } from "./define";

const SubgraphPortSchema = z.object({
	name: z.string().min(1),
	signal: z.enum(["flow", "data"]).default("data"),
	dataType: z.string().default("any"),
	label: z.string().optional(),
	defaultValue: z.unknown().optional(),
});

const SubgraphBoundarySchema = z.object({
	ports: z.array(SubgraphPortSchema).default([]),
});

const SubgraphCallSchema = z.object({
	graphId: z.string().min(1),
});

export type WireSubgraphPort = z.infer<typeof SubgraphPortSchema>;
export type WireSubgraphBoundaryConfig = z.infer<typeof SubgraphBoundarySchema>;
export type WireSubgraphCallConfig = z.infer<typeof SubgraphCallSchema>;

function boundaryPort(port: WireSubgraphPort, direction: "in" | "out"): WirePortDescriptor {
	const options = { label: port.label, defaultValue: port.defaultValue };
	if (port.signal === "flow") {
		return direction === "in" ? flowInput(port.name, options) : flowOutput(port.name, options);
	}
	return direction === "in" ? dataInput(port.name, port.dataType, options) : dataOutput(port.name, port.dataType, options);
}

/** Where a call enters the graph; its outputs are the graph's parameters and triggers. */
export class WireSubgraphEntryNode extends WireNodeLogic<WireSubgraphBoundaryConfig> {
	public readonly kind = "entry" as const;

	public definePorts(): WirePortDescriptor[] {
		return this.config.ports.map((port) => boundaryPort(port, "out"));
	}
}

/** Where a call leaves the graph; its inputs are the values handed back to the caller. */
export class WireSubgraphExitNode extends WireNodeLogic<WireSubgraphBoundaryConfig> {
	public readonly kind = "exit" as const;

	public definePorts(): WirePortDescriptor[] {
		return this.config.ports.map((port) => boundaryPort(port, "in"));
	}
}

/**
 * Invokes another graph. Inputs mirror the target's entry outputs and outputs mirror the
 * union of its exit inputs, so the ports only change when refreshed after the target does.
 */
export class WireSubgraphCallNode extends WireNodeLogic<WireSubgraphCallConfig> {
	public readonly kind = "call" as const;

	public constructor(
		config: WireSubgraphCallConfig,
		private readonly _factory: WireNodeFactoryContext,
	) {
		super(config);
	}

	public get target(): WireGraphHandle {
		return this._factory.graphHandle(this.config.graphId);
	}

	public definePorts(): WirePortDescriptor[] {
		const graph = this.target.resolve();
		if (!graph) {
			return [];
		}
		const ports: WirePortDescriptor[] = [];
		for (const port of graph.entryNode()?.outputs ?? []) {
			ports.push(
				port.signal === "flow"
					? flowInput(port.name, { label: port.label })
					: dataInput(port.name, port.dataType, { label: port.label, defaultValue: port.defaultValue }),
			);
		}
		const seen = new Set<string>();
		for (const exit of graph.exitNodes()) {
			for (const port of exit.inputs) {
				if (seen.has(port.name)) {
					continue;
				}
				seen.add(port.name);
				ports.push(
					port.signal === "flow"
						? flowOutput(port.name, { label: port.label })
						: dataOutput(port.name, port.dataType, { label: port.label }),
				);
			}
		}
		return ports;
	}
}

export const subgraphNodeDefinitions = [
	defineNode(
		{ type: "graph.entry", label: "Graph Input", category: "graph", description: "Entry point of a callable graph." },
		SubgraphBoundarySchema,
		(config) => new WireSubgraphEntryNode(config),
	),
	defineNode(
		{ type: "graph.exit", label: "Graph Output", category: "graph", description: "Returns control and values to the caller." },
		SubgraphBoundarySchema,
		(config) => new WireSubgraphExitNode(config),
	),
	defineNode(
		{ type: "graph.call", label: "Sub Graph", category: "graph", description: "Runs another graph and continues on its exits." },
		SubgraphCallSchema,
		(config, context) => new WireSubgraphCallNode(config, context),
	),
];
