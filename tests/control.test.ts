import { describe, expect, it } from "vitest";
import { ERROR_CODES } from "../src/errors";
import type { ProbeRecord } from "./helpers";
import { connection, createExecutor, createTestLibrary, runTicks, seededRandom, valuesOf } from "./helpers";

function forEachAsset(collection: unknown) {
	return {
		id: "loop",
		name: "Loop",
		nodes: [
			{ id: "start", type: "event.onStart" },
			{ id: "fe", type: "flow.forEach" },
			{ id: "items", type: "data.constant", params: { value: collection } },
			{ id: "item", type: "test.probe" },
			{ id: "index", type: "test.probe" },
			{ id: "done", type: "test.probe", inputs: { value: "done" } },
		],
		connections: [
			connection("start.out", "fe.in"),
			connection("items.value", "fe.collection"),
			connection("fe.loopBody", "item.in"),
			connection("fe.loopBody", "index.in"),
			connection("fe.item", "item.value"),
			connection("fe.index", "index.value"),
			connection("fe.completed", "done.in"),
		],
	};
}

describe("flow.forEach", () => {
	it("should queue one body continuation per item and then completed", () => {
		const records: ProbeRecord[] = [];
		const executor = createExecutor(createTestLibrary([forEachAsset(["a", "b", "c"])], records).load("loop"));
		executor.start();
		executor.tick();

		expect(valuesOf(records, "item")).toEqual(["a", "b", "c"]);
		expect(valuesOf(records, "index")).toEqual([0, 1, 2]);
		expect(valuesOf(records, "done")).toEqual(["done"]);
		expect(records[records.length - 1].nodeId).toBe("done");
	});

	it("should go straight to completed for a missing collection", () => {
		const records: ProbeRecord[] = [];
		const executor = createExecutor(createTestLibrary([forEachAsset(null)], records).load("loop"));
		executor.start();
		executor.tick();
		expect(records.map((record) => record.nodeId)).toEqual(["done"]);
	});

	it("should fault on values that cannot be iterated", () => {
		const records: ProbeRecord[] = [];
		const executor = createExecutor(createTestLibrary([forEachAsset(5)], records).load("loop"));
		executor.start();
		executor.tick();
		expect(records).toEqual([]);
		expect(executor.faults.map((fault) => [fault.nodeId, fault.code])).toEqual([["fe", ERROR_CODES.NOT_ITERABLE]]);
	});
});

describe("flow.forLoop", () => {
	it("should run one iteration per tick", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary(
			[
				{
					id: "main",
					name: "Main",
					nodes: [
						{ id: "start", type: "event.onStart" },
						{ id: "loop", type: "flow.forLoop", params: { start: 0, end: 3 } },
						{ id: "body", type: "test.probe" },
						{ id: "done", type: "test.probe" },
					],
					connections: [
						connection("start.out", "loop.in"),
						connection("loop.loopBody", "body.in"),
						connection("loop.index", "body.value"),
						connection("loop.completed", "done.in"),
					],
				},
			],
			records,
		);
		const executor = createExecutor(library.load("main"));
		executor.start();

		executor.tick(16);
		expect(valuesOf(records, "body")).toEqual([0]);
		expect(executor.activeWaitCount).toBe(1);

		runTicks(executor, 3);
		expect(valuesOf(records, "body")).toEqual([0, 1, 2]);
		expect(records.filter((record) => record.nodeId === "done")).toHaveLength(1);
		expect(executor.activeWaitCount).toBe(0);
	});
});

describe("weighted branching", () => {
	function weightedAsset(type: string, params: Record<string, unknown>, outputs: string[]) {
		return {
			id: "main",
			name: "Main",
			nodes: [{ id: "pick", type, params }, ...outputs.map((id) => ({ id, type: "test.probe" }))],
			connections: outputs.map((id, index) => connection(`pick.${type === "flow.chance" ? ["true", "false"][index] : `out${index}`}`, `${id}.in`)),
		};
	}

	it("should normalize weights over connected outputs only", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary([weightedAsset("flow.randomBranch", { weights: [0.3, 0.7, 5] }, ["A", "B"])], records);
		const graph = library.load("main");
		expect(graph.getNode("pick").outputs.map((port) => port.weight)).toEqual([0.3, 0.7, 5]);

		const executor = createExecutor(graph, { random: seededRandom(42) });
		const trials = 10_000;
		for (let trial = 0; trial < trials; trial++) {
			executor.enqueue("pick");
			executor.tick();
		}

		const hitsA = records.filter((record) => record.nodeId === "A").length;
		const hitsB = records.filter((record) => record.nodeId === "B").length;
		expect(hitsA + hitsB).toBe(trials);
		expect(hitsA / trials).toBeGreaterThanOrEqual(0.25);
		expect(hitsA / trials).toBeLessThanOrEqual(0.35);
	});

	it("should pick the first connected output when every weight is zero", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary([weightedAsset("flow.randomBranch", { weights: [0, 0] }, ["A", "B"])], records);
		const executor = createExecutor(library.load("main"), { random: seededRandom(7) });
		for (let trial = 0; trial < 5; trial++) {
			executor.enqueue("pick");
		}
		executor.tick();
		expect(records.map((record) => record.nodeId)).toEqual(["A", "A", "A", "A", "A"]);
	});

	it("should produce no continuation when nothing is connected", () => {
		const library = createTestLibrary([weightedAsset("flow.randomBranch", { weights: [1, 1] }, [])]);
		const executor = createExecutor(library.load("main"));
		executor.enqueue("pick");
		expect(executor.tick().steps).toBe(1);
		expect(executor.faults).toEqual([]);
	});

	it("should honour certain outcomes on flow.chance", () => {
		const records: ProbeRecord[] = [];
		const always = createTestLibrary([weightedAsset("flow.chance", { chance: 1 }, ["T", "F"])], records);
		const executor = createExecutor(always.load("main"), { random: seededRandom(3) });
		for (let trial = 0; trial < 20; trial++) {
			executor.enqueue("pick");
		}
		executor.tick();
		expect(new Set(records.map((record) => record.nodeId))).toEqual(new Set(["T"]));
		expect(records).toHaveLength(20);
	});

	it("should let a wired chance input override the configured one", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary(
			[
				{
					id: "main",
					name: "Main",
					nodes: [
						{ id: "pick", type: "flow.chance", params: { chance: 1 } },
						{ id: "never", type: "data.constant", params: { dataType: "float", value: 0 } },
						{ id: "T", type: "test.probe" },
						{ id: "F", type: "test.probe" },
					],
					connections: [connection("never.value", "pick.chance"), connection("pick.true", "T.in"), connection("pick.false", "F.in")],
				},
			],
			records,
		);
		const graph = library.load("main");
		expect(graph.getNode("pick").inputs.map((port) => `${port.name}:${String(port.defaultValue)}`)).toEqual(["in:undefined", "chance:1"]);

		const executor = createExecutor(graph, { random: seededRandom(5) });
		for (let trial = 0; trial < 20; trial++) {
			executor.enqueue("pick");
		}
		executor.tick();
		expect(new Set(records.map((record) => record.nodeId))).toEqual(new Set(["F"]));
		expect(records).toHaveLength(20);
	});
});

describe("flow.branch and flow.switch", () => {
	it("should route on a pulled condition and fall back to the configured default", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary(
			[
				{
					id: "main",
					name: "Main",
					nodes: [
						{ id: "start", type: "event.onStart" },
						{ id: "cmp", type: "logic.compare", params: { op: "gt" }, inputs: { a: 5, b: 3 } },
						{ id: "wired", type: "flow.branch" },
						{ id: "loose", type: "flow.branch" },
						{ id: "T", type: "test.probe" },
						{ id: "F", type: "test.probe" },
					],
					connections: [
						connection("start.out", "wired.in"),
						connection("start.out", "loose.in"),
						connection("cmp.result", "wired.condition"),
						connection("wired.true", "T.in"),
						connection("wired.false", "F.in"),
						connection("loose.true", "T.in"),
						connection("loose.false", "F.in"),
					],
				},
			],
			records,
		);
		const executor = createExecutor(library.load("main"));
		executor.start();
		executor.tick();
		expect(records.map((record) => record.nodeId)).toEqual(["T", "F"]);
	});

	function switchAsset(params: Record<string, unknown>, value: unknown, outputs: Record<string, string>) {
		return {
			id: "main",
			name: "Main",
			nodes: [
				{ id: "sw", type: "flow.switch", params, inputs: { value } },
				...Object.values(outputs).map((id) => ({ id, type: "test.probe" })),
			],
			connections: Object.entries(outputs).map(([port, id]) => connection(`sw.${port}`, `${id}.in`)),
		};
	}

	it("should follow the matching case", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary(
			[switchAsset({ cases: ["red", "green"] }, "green", { case_red: "R", case_green: "G", default: "D" })],
			records,
		);
		const executor = createExecutor(library.load("main"));
		executor.enqueue("sw");
		executor.tick();
		expect(records.map((record) => record.nodeId)).toEqual(["G"]);
	});

	it("should compare integer cases after truncating the input", () => {
		const records: ProbeRecord[] = [];
		const library = createTestLibrary(
			[switchAsset({ mode: "int", cases: [1, 2] }, 2.7, { case_1: "one", case_2: "two", default: "D" })],
			records,
		);
		const graph = library.load("main");
		expect(graph.getNode("sw").outputs.map((port) => port.name)).toEqual(["case_1", "case_2", "default"]);
		const executor = createExecutor(graph);
		executor.enqueue("sw");
		executor.tick();
		expect(records.map((record) => record.nodeId)).toEqual(["two"]);
	});

	it("should take default or nothing when no case matches", () => {
		const records: ProbeRecord[] = [];
		const withDefault = createTestLibrary([switchAsset({ cases: ["red"] }, "blue", { case_red: "R", default: "D" })], records);
		const executor = createExecutor(withDefault.load("main"));
		executor.enqueue("sw");
		executor.tick();
		expect(records.map((record) => record.nodeId)).toEqual(["D"]);

		const strict = createTestLibrary([switchAsset({ cases: ["red"], hasDefault: false }, "blue", { case_red: "R" })], records);
		const strictExecutor = createExecutor(strict.load("main"));
		strictExecutor.enqueue("sw");
		expect(strictExecutor.tick().steps).toBe(1);
		expect(records).toHaveLength(1);
	});
});
