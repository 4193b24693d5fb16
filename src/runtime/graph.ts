import { canConnect } from "../core/compat";
import { ERROR_CODES, WireError } from "../errors";
import type {
	WireNodeFactoryContext,
	WireNodeKind,
	WirePortDescriptor,
	WirePortDirection,
} from "../core/types";
import type { WireNodeRegistry } from "../core/registry";
import type { WireGraphAsset } from "./asset";
import type { WireNodeBehavior } from "./node";

export interface WirePortRef {
	nodeId: string;
	port: string;
}

export interface WireConnection {
	from: WirePortRef;
	to: WirePortRef;
}

export interface WireGraphNode {
	id: string;
	type: string;
	label?: string;
	category?: string;
	position: { x: number; y: number };
	logic: WireNodeBehavior;
	inputs: WirePortDescriptor[];
	outputs: WirePortDescriptor[];
	literalInputs: Record<string, unknown>;
}

export interface WireAddNodeOptions {
	id: string;
	type: string;
	logic: WireNodeBehavior;
	label?: string;
	category?: string;
	position?: { x: number; y: number };
	inputs?: Record<string, unknown>;
}

export interface WireGraphInit {
	id: string;
	name?: string;
	description?: string;
	root?: string | string[];
}

export interface WireGraphBuildOptions {
	registry: WireNodeRegistry;
	factory?: WireNodeFactoryContext;
	/** Called with the empty graph before any node is created, so sub-graph handles can resolve it. */
	onCreate?: (graph: WireGraph) => void;
}

const detachedFactory: WireNodeFactoryContext = {
	graphHandle: (graphId) => ({ id: graphId, resolve: () => undefined }),
};

function portKey(nodeId: string, port: string): string {
	return `${nodeId}:${port}`;
}

/** Arena of nodes addressed by id, plus connections indexed by port in both directions. */
export class WireGraph {
	public readonly id: string;
	public readonly name: string;
	public readonly description?: string;

	private readonly _explicitRoots?: string[];
	private readonly _nodes = new Map<string, WireGraphNode>();
	private _connections: WireConnection[] = [];
	private readonly _outgoing = new Map<string, WireConnection[]>();
	private readonly _incoming = new Map<string, WireConnection[]>();

	public constructor(init: WireGraphInit) {
		this.id = init.id;
		this.name = init.name ?? init.id;
		this.description = init.description;
		if (init.root !== undefined) {
			this._explicitRoots = Array.isArray(init.root) ? [...init.root] : [init.root];
		}
	}

	public static fromAsset(asset: WireGraphAsset, options: WireGraphBuildOptions): WireGraph {
		const graph = new WireGraph({ id: asset.id, name: asset.name, description: asset.description, root: asset.root });
		options.onCreate?.(graph);
		const factory = options.factory ?? detachedFactory;

		for (const serialized of asset.nodes) {
			const definition = options.registry.getDefinition(serialized.type);
			if (!definition) {
				throw new WireError(ERROR_CODES.UNKNOWN_NODE_TYPE, `Node type '${serialized.type}' is not registered.`, {
					graphId: asset.id,
					nodeId: serialized.id,
				});
			}
			graph._insert({
				id: serialized.id,
				type: serialized.type,
				logic: definition.create(serialized.params ?? {}, factory),
				label: serialized.label,
				category: serialized.category ?? definition.options.category,
				position: serialized.position,
				inputs: serialized.inputs,
			});
		}

		// Call nodes mirror another graph's entry/exit ports, which may live in this graph.
		const ordered = [...graph._nodes.values()].sort(
			(a, b) => Number(a.logic.kind === "call") - Number(b.logic.kind === "call"),
		);
		for (const node of ordered) {
			graph._publishPorts(node);
		}

		for (const connection of asset.connections) {
			graph._attach({ from: { ...connection.from }, to: { ...connection.to } });
		}
		return graph;
	}

	/** Explicit roots, else every node with a flow output and no wired flow input. */
	public get roots(): string[] {
		if (this._explicitRoots) {
			return [...this._explicitRoots];
		}
		const roots: string[] = [];
		for (const node of this._nodes.values()) {
			const hasFlowOut = node.outputs.some((port) => port.signal === "flow");
			const hasWiredFlowIn = node.inputs.some(
				(port) => port.signal === "flow" && this.isConnected(node.id, "in", port.name),
			);
			if (hasFlowOut && !hasWiredFlowIn) {
				roots.push(node.id);
			}
		}
		return roots;
	}

	public addNode(options: WireAddNodeOptions): WireGraphNode {
		const node = this._insert(options);
		this._publishPorts(node);
		return node;
	}

	/** Removes the node and every connection touching it. */
	public removeNode(nodeId: string): boolean {
		if (!this._nodes.delete(nodeId)) {
			return false;
		}
		for (const connection of [...this._connections]) {
			if (connection.from.nodeId === nodeId || connection.to.nodeId === nodeId) {
				this._detach(connection);
			}
		}
		return true;
	}

	public getNode(nodeId: string): WireGraphNode {
		const node = this._nodes.get(nodeId);
		if (!node) {
			throw new WireError(ERROR_CODES.MISSING_NODE, `Missing node '${nodeId}' in graph '${this.id}'.`);
		}
		return node;
	}

	public findNode(nodeId: string): WireGraphNode | undefined {
		return this._nodes.get(nodeId);
	}

	public hasNode(nodeId: string): boolean {
		return this._nodes.has(nodeId);
	}

	public listNodes(): WireGraphNode[] {
		return Array.from(this._nodes.values());
	}

	public findNodesByKind(kind: WireNodeKind): WireGraphNode[] {
		return this.listNodes().filter((node) => node.logic.kind === kind);
	}

	public entryNode(): WireGraphNode | undefined {
		return this.findNodesByKind("entry")[0];
	}

	public exitNodes(): WireGraphNode[] {
		return this.findNodesByKind("exit");
	}

	public findPort(nodeId: string, direction: WirePortDirection, name: string): WirePortDescriptor | undefined {
		const node = this._nodes.get(nodeId);
		if (!node) {
			return undefined;
		}
		const ports = direction === "in" ? node.inputs : node.outputs;
		return ports.find((port) => port.name === name);
	}

	/** Re-derives a node's ports from its current configuration. Connections are kept as they are. */
	public refreshPorts(nodeId: string): WireGraphNode {
		const node = this.getNode(nodeId);
		this._publishPorts(node);
		return node;
	}

	/**
	 * Wires an output to an input. Returns false when either port is unknown or the
	 * pair is not connectable. A single-capacity input drops its previous source.
	 */
	public connect(fromNodeId: string, fromPort: string, toNodeId: string, toPort: string): boolean {
		const source = this.findPort(fromNodeId, "out", fromPort);
		const destination = this.findPort(toNodeId, "in", toPort);
		if (!source || !destination || !canConnect(source, destination)) {
			return false;
		}
		if (this.getOutgoing(fromNodeId, fromPort).some((c) => c.to.nodeId === toNodeId && c.to.port === toPort)) {
			return true;
		}
		if (destination.capacity === "single") {
			for (const existing of this.getIncoming(toNodeId, toPort)) {
				this._detach(existing);
			}
		}
		this._attach({ from: { nodeId: fromNodeId, port: fromPort }, to: { nodeId: toNodeId, port: toPort } });
		return true;
	}

	public disconnect(fromNodeId: string, fromPort: string, toNodeId: string, toPort: string): boolean {
		const match = this.getOutgoing(fromNodeId, fromPort).find(
			(connection) => connection.to.nodeId === toNodeId && connection.to.port === toPort,
		);
		if (!match) {
			return false;
		}
		this._detach(match);
		return true;
	}

	public getConnections(): readonly WireConnection[] {
		return this._connections;
	}

	public getOutgoing(nodeId: string, port: string): readonly WireConnection[] {
		return this._outgoing.get(portKey(nodeId, port)) ?? [];
	}

	public getIncoming(nodeId: string, port: string): readonly WireConnection[] {
		return this._incoming.get(portKey(nodeId, port)) ?? [];
	}

	public isConnected(nodeId: string, direction: WirePortDirection, port: string): boolean {
		const list = direction === "in" ? this.getIncoming(nodeId, port) : this.getOutgoing(nodeId, port);
		return list.length > 0;
	}

	private _insert(options: WireAddNodeOptions): WireGraphNode {
		if (this._nodes.has(options.id)) {
			throw new WireError(ERROR_CODES.DUPLICATE_NODE_ID, `Graph '${this.id}' already has a node '${options.id}'.`);
		}
		const node: WireGraphNode = {
			id: options.id,
			type: options.type,
			label: options.label,
			category: options.category,
			position: options.position ?? { x: 0, y: 0 },
			logic: options.logic,
			inputs: [],
			outputs: [],
			literalInputs: { ...(options.inputs ?? {}) },
		};
		this._nodes.set(node.id, node);
		return node;
	}

	private _publishPorts(node: WireGraphNode): void {
		const inputs: WirePortDescriptor[] = [];
		const outputs: WirePortDescriptor[] = [];
		for (const port of node.logic.definePorts()) {
			const list = port.direction === "in" ? inputs : outputs;
			if (list.some((existing) => existing.name === port.name)) {
				throw new WireError(
					ERROR_CODES.DUPLICATE_PORT,
					`Node '${node.id}' declares ${port.direction === "in" ? "input" : "output"} port '${port.name}' twice.`,
				);
			}
			list.push(port);
		}
		node.inputs = inputs;
		node.outputs = outputs;
	}

	private _attach(connection: WireConnection): void {
		this._connections.push(connection);
		const outKey = portKey(connection.from.nodeId, connection.from.port);
		const inKey = portKey(connection.to.nodeId, connection.to.port);
		this._outgoing.set(outKey, [...(this._outgoing.get(outKey) ?? []), connection]);
		this._incoming.set(inKey, [...(this._incoming.get(inKey) ?? []), connection]);
	}

	private _detach(connection: WireConnection): void {
		this._connections = this._connections.filter((c) => c !== connection);
		const outKey = portKey(connection.from.nodeId, connection.from.port);
		const inKey = portKey(connection.to.nodeId, connection.to.port);
		this._outgoing.set(outKey, (this._outgoing.get(outKey) ?? []).filter((c) => c !== connection));
		this._incoming.set(inKey, (this._incoming.get(inKey) ?? []).filter((c) => c !== connection));
	}
}
