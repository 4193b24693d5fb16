import { describe, expect, it } from "vitest";
import { flowInput } from "../src/core/ports";
import type { WirePortDescriptor } from "../src/core/types";
import { ERROR_CODES, WireError } from "../src/errors";
import { WireGraph } from "../src/runtime/graph";
import { WireActionNode } from "../src/runtime/node";
import { WireConstantNode, WireMathBinaryNode, WireSequenceNode } from "../src/runtime/nodes";
import { captureError, connection, createTestLibrary } from "./helpers";

const mainAsset = {
	id: "main",
	name: "Main",
	nodes: [
		{ id: "start", type: "event.onStart" },
		{ id: "seq", type: "flow.sequence", params: { outputCount: 3 } },
		{ id: "a", type: "test.probe" },
		{ id: "b", type: "test.probe" },
	],
	connections: [connection("start.out", "seq.in"), connection("seq.then0", "a.in")],
};

const subAsset = {
	id: "sub",
	name: "Sub",
	nodes: [
		{
			id: "enter",
			type: "graph.entry",
			params: { ports: [{ name: "in", signal: "flow" }, { name: "value", dataType: "int" }] },
		},
		{
			id: "leave",
			type: "graph.exit",
			params: { ports: [{ name: "out", signal: "flow" }, { name: "result", dataType: "int" }] },
		},
	],
	connections: [connection("enter.in", "leave.out")],
};

class DoubledPortNode extends WireActionNode {
	public definePorts(): WirePortDescriptor[] {
		return [flowInput("in"), flowInput("in")];
	}

	public run(): void { }
}

describe("WireGraph", () => {
	it("should publish ports from node configuration", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		const seq = graph.getNode("seq");
		expect(seq.inputs.map((port) => port.name)).toEqual(["in"]);
		expect(seq.outputs.map((port) => port.name)).toEqual(["then0", "then1", "then2"]);
		expect(seq.outputs[1].label).toBe("Then 1");
		expect(seq.category).toBe("flow");
	});

	it("should derive roots from nodes with execution outputs and no wired execution inputs", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		expect(graph.roots).toEqual(["start", "b"]);
	});

	it("should treat a node with an unwired execution input as a root", () => {
		const graph = createTestLibrary([
			{
				id: "relayed",
				name: "Relayed",
				nodes: [
					{ id: "r", type: "flow.relay" },
					{ id: "p", type: "test.probe" },
				],
				connections: [connection("r.out", "p.in")],
			},
		]).load("relayed");
		expect(graph.roots).toEqual(["r"]);
	});

	it("should prefer the asset's explicit root", () => {
		const graph = createTestLibrary([{ ...mainAsset, root: "seq" }]).load("main");
		expect(graph.roots).toEqual(["seq"]);
	});

	it("should index connections in both directions", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		expect(graph.getOutgoing("seq", "then0").map((c) => c.to.nodeId)).toEqual(["a"]);
		expect(graph.getIncoming("a", "in").map((c) => c.from.nodeId)).toEqual(["seq"]);
		expect(graph.isConnected("seq", "out", "then1")).toBe(false);
		expect(graph.findPort("a", "in", "value")?.dataType).toBe("any");
		expect(graph.findNodesByKind("flow").map((node) => node.id)).toEqual(["seq"]);
	});

	it("should replace the existing source of a single-capacity input", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		graph.addNode({ id: "one", type: "data.constant", logic: new WireConstantNode({ dataType: "int", value: 1 }) });
		graph.addNode({ id: "two", type: "data.constant", logic: new WireConstantNode({ dataType: "int", value: 2 }) });

		expect(graph.connect("one", "value", "a", "value")).toBe(true);
		expect(graph.connect("two", "value", "a", "value")).toBe(true);

		expect(graph.getIncoming("a", "value").map((c) => c.from.nodeId)).toEqual(["two"]);
		expect(graph.getOutgoing("one", "value")).toHaveLength(0);
	});

	it("should let execution inputs merge several sources", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		expect(graph.connect("seq", "then1", "a", "in")).toBe(true);
		expect(graph.getIncoming("a", "in")).toHaveLength(2);
	});

	it("should refuse connections between unknown or mismatched ports", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		expect(graph.connect("seq", "then1", "b", "value")).toBe(false);
		expect(graph.connect("seq", "missing", "b", "in")).toBe(false);
		expect(graph.connect("ghost", "out", "b", "in")).toBe(false);
	});

	it("should refuse connections between incompatible data types", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		graph.addNode({ id: "v", type: "data.constant", logic: new WireConstantNode({ dataType: "Vector3" }) });
		graph.addNode({ id: "m", type: "math.binary", logic: new WireMathBinaryNode({ op: "add", a: 0, b: 0 }) });

		expect(graph.connect("v", "value", "m", "a")).toBe(false);
		expect(graph.getIncoming("m", "a")).toHaveLength(0);
		expect(graph.connect("v", "value", "a", "value")).toBe(true);
	});

	it("should disconnect a single connection", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		expect(graph.disconnect("seq", "then0", "a", "in")).toBe(true);
		expect(graph.disconnect("seq", "then0", "a", "in")).toBe(false);
		expect(graph.getConnections()).toHaveLength(1);
	});

	it("should drop every connection of a removed node", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		expect(graph.removeNode("seq")).toBe(true);
		expect(graph.getConnections()).toHaveLength(0);
		expect(graph.findNode("seq")).toBeUndefined();
		expect(graph.getIncoming("a", "in")).toHaveLength(0);
		expect(graph.removeNode("seq")).toBe(false);
	});

	it("should keep ports until they are explicitly refreshed", () => {
		const graph = createTestLibrary([mainAsset]).load("main");
		const logic = graph.getNode("seq").logic;
		if (!(logic instanceof WireSequenceNode)) {
			throw new Error("expected a sequence node");
		}
		logic.configure({ outputCount: 4 });
		expect(graph.getNode("seq").outputs).toHaveLength(3);

		graph.refreshPorts("seq");
		expect(graph.getNode("seq").outputs.map((port) => port.name)).toEqual(["then0", "then1", "then2", "then3"]);
		expect(graph.getOutgoing("seq", "then0")).toHaveLength(1);
	});

	it("should reject duplicate port names when publishing", () => {
		const graph = new WireGraph({ id: "g" });
		const error = captureError(() => graph.addNode({ id: "x", type: "custom", logic: new DoubledPortNode({}) }));
		expect(error).toBeInstanceOf(WireError);
		expect(error).toMatchObject({ code: ERROR_CODES.DUPLICATE_PORT });
	});

	it("should reject duplicate node ids", () => {
		const graph = new WireGraph({ id: "g" });
		graph.addNode({ id: "x", type: "data.constant", logic: new WireConstantNode({ dataType: "any" }) });
		const error = captureError(() =>
			graph.addNode({ id: "x", type: "data.constant", logic: new WireConstantNode({ dataType: "any" }) }),
		);
		expect(error).toMatchObject({ code: ERROR_CODES.DUPLICATE_NODE_ID });
	});

	it("should fail to load unknown node types", () => {
		const library = createTestLibrary([{ id: "bad", name: "Bad", nodes: [{ id: "n", type: "does.not.exist" }] }]);
		expect(captureError(() => library.load("bad"))).toMatchObject({ code: ERROR_CODES.UNKNOWN_NODE_TYPE });
		expect(library.tryLoad("never-registered")).toBeUndefined();
	});

	it("should validate node params when hydrating", () => {
		const library = createTestLibrary([
			{ id: "bad", name: "Bad", nodes: [{ id: "s", type: "flow.sequence", params: { outputCount: -1 } }] },
		]);
		expect(captureError(() => library.load("bad"))).toMatchObject({ code: ERROR_CODES.INVALID_NODE_CONFIG });
	});
});

describe("WireGraphLibrary", () => {
	it("should cache loaded graphs until invalidated", () => {
		const library = createTestLibrary([mainAsset]);
		const first = library.load("main");
		expect(library.load("main")).toBe(first);
		library.invalidate("main");
		expect(library.load("main")).not.toBe(first);
	});

	it("should reject malformed assets", () => {
		const library = createTestLibrary([]);
		expect(captureError(() => library.register({ id: "x", nodes: [] }))).toMatchObject({ code: ERROR_CODES.INVALID_ASSET });
		expect(
			captureError(() =>
				library.register({ id: "x", name: "X", nodes: [{ id: "n", type: "flow.relay" }, { id: "n", type: "flow.relay" }] }),
			),
		).toMatchObject({ code: ERROR_CODES.DUPLICATE_NODE_ID });
		expect(captureError(() => library.load("x"))).toMatchObject({ code: ERROR_CODES.MISSING_GRAPH });
	});

	it("should mirror the target's entry and exit ports on call nodes", () => {
		const library = createTestLibrary([
			subAsset,
			{ id: "caller", name: "Caller", nodes: [{ id: "call", type: "graph.call", params: { graphId: "sub" } }] },
		]);
		const call = library.load("caller").getNode("call");
		expect(call.inputs.map((port) => `${port.signal}:${port.name}:${port.dataType}`)).toEqual(["flow:in:exec", "data:value:int"]);
		expect(call.outputs.map((port) => `${port.signal}:${port.name}:${port.dataType}`)).toEqual(["flow:out:exec", "data:result:int"]);
		expect(call.inputs[1].capacity).toBe("single");
	});

	it("should load graphs that call themselves", () => {
		const library = createTestLibrary([
			{
				id: "rec",
				name: "Recursive",
				nodes: [
					{ id: "call", type: "graph.call", params: { graphId: "rec" } },
					{ id: "enter", type: "graph.entry", params: { ports: [{ name: "in", signal: "flow" }] } },
					{ id: "leave", type: "graph.exit", params: { ports: [{ name: "done", signal: "flow" }] } },
				],
			},
		]);
		const graph = library.load("rec");
		expect(graph.getNode("call").inputs.map((port) => port.name)).toEqual(["in"]);
		expect(graph.getNode("call").outputs.map((port) => port.name)).toEqual(["done"]);
	});
});
