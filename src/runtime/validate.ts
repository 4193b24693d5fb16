import { canConnect } from "../core/compat";
import type { WireConnection, WireGraph } from "./graph";

export type WireValidationIssueKind =
	| "required-input"
	| "incompatible-connection"
	| "dangling-port"
	| "missing-node"
	| "capacity-exceeded"
	| "unresolved-subgraph";

export interface WireValidationIssue {
	kind: WireValidationIssueKind;
	graphId: string;
	nodeId: string;
	port?: string;
	message: string;
	connection?: WireConnection;
}

function checkConnection(graph: WireGraph, connection: WireConnection): WireValidationIssue | undefined {
	const { from, to } = connection;
	for (const end of [from, to]) {
		if (!graph.hasNode(end.nodeId)) {
			return { kind: "missing-node", graphId: graph.id, nodeId: end.nodeId, port: end.port, connection, message: `Connection references missing node '${end.nodeId}'.` };
		}
	}
	const source = graph.findPort(from.nodeId, "out", from.port);
	if (!source) {
		return { kind: "dangling-port", graphId: graph.id, nodeId: from.nodeId, port: from.port, connection, message: `Node '${from.nodeId}' has no output '${from.port}'.` };
	}
	const destination = graph.findPort(to.nodeId, "in", to.port);
	if (!destination) {
		return { kind: "dangling-port", graphId: graph.id, nodeId: to.nodeId, port: to.port, connection, message: `Node '${to.nodeId}' has no input '${to.port}'.` };
	}
	if (!canConnect(source, destination)) {
		return {
			kind: "incompatible-connection",
			graphId: graph.id,
			nodeId: to.nodeId,
			port: to.port,
			connection,
			message: `Cannot connect ${from.nodeId}.${from.port} (${source.signal}:${source.dataType}) to ${to.nodeId}.${to.port} (${destination.signal}:${destination.dataType}).`,
		};
	}
	return undefined;
}

/** Reports every structural problem in the graph. Never modifies it. */
export function validateGraph(graph: WireGraph): WireValidationIssue[] {
	const issues: WireValidationIssue[] = [];
	for (const connection of graph.getConnections()) {
		const issue = checkConnection(graph, connection);
		if (issue) {
			issues.push(issue);
		}
	}
	for (const node of graph.listNodes()) {
		for (const port of node.inputs) {
			const incoming = graph.getIncoming(node.id, port.name);
			if (port.required && incoming.length === 0) {
				issues.push({ kind: "required-input", graphId: graph.id, nodeId: node.id, port: port.name, message: `Required input '${port.name}' on node '${node.id}' is not connected.` });
			}
			if (port.capacity === "single" && incoming.length > 1) {
				issues.push({ kind: "capacity-exceeded", graphId: graph.id, nodeId: node.id, port: port.name, message: `Input '${port.name}' on node '${node.id}' accepts one connection but has ${incoming.length}.` });
			}
		}
		for (const port of node.outputs) {
			const outgoing = graph.getOutgoing(node.id, port.name);
			if (port.capacity === "single" && outgoing.length > 1) {
				issues.push({ kind: "capacity-exceeded", graphId: graph.id, nodeId: node.id, port: port.name, message: `Output '${port.name}' on node '${node.id}' accepts one connection but has ${outgoing.length}.` });
			}
		}
		if (node.logic.kind === "call" && !node.logic.target.resolve()) {
			issues.push({ kind: "unresolved-subgraph", graphId: graph.id, nodeId: node.id, message: `Sub-graph '${node.logic.target.id}' cannot be resolved.` });
		}
	}
	return issues;
}

export function isGraphValid(graph: WireGraph): boolean {
	return validateGraph(graph).length === 0;
}
