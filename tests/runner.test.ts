import { describe, expect, it } from "vitest";
import { ERROR_CODES, WireValidationError } from "../src/errors";
import { WireScriptRunner } from "../src/runtime/component";
import type { ProbeRecord } from "./helpers";
import { captureError, connection, createTestLibrary, silentLogger, valuesOf } from "./helpers";

const countAsset = {
	id: "count",
	name: "Count",
	nodes: [
		{ id: "start", type: "event.onStart" },
		{ id: "set", type: "action.setVariable", params: { key: "runs" }, inputs: { value: 1 } },
		{ id: "p", type: "test.probe", inputs: { value: "ran" } },
	],
	connections: [connection("start.out", "set.in"), connection("set.out", "p.in")],
};

const brokenAsset = {
	id: "broken",
	name: "Broken",
	nodes: [
		{ id: "start", type: "event.onStart" },
		{ id: "fe", type: "flow.forEach" },
	],
	connections: [connection("start.out", "fe.in")],
};

describe("WireScriptRunner", () => {
	it("should play, update and stop a graph", () => {
		const records: ProbeRecord[] = [];
		const runner = new WireScriptRunner({ library: createTestLibrary([countAsset], records), logger: silentLogger });
		runner.play("count");
		expect(runner.isPlaying).toBe(true);

		expect(runner.update(16)?.steps).toBe(3);
		expect(valuesOf(records, "p")).toEqual(["ran"]);
		expect(runner.blackboard.get("runs")).toBe(1);

		runner.stop();
		expect(runner.isPlaying).toBe(false);
		expect(runner.update(16)).toBeUndefined();
	});

	it("should start on construction when asked to", () => {
		const records: ProbeRecord[] = [];
		const runner = new WireScriptRunner({
			library: createTestLibrary([countAsset], records),
			graphId: "count",
			playOnLoad: true,
			logger: silentLogger,
		});
		expect(runner.executor?.pendingCount).toBe(1);
		runner.update(16);
		expect(records).toHaveLength(1);
	});

	it("should stop the previous run when playing again", () => {
		const runner = new WireScriptRunner({ library: createTestLibrary([countAsset]), logger: silentLogger });
		const first = runner.play("count");
		const second = runner.play();
		expect(first.status).toBe("stopped");
		expect(second).not.toBe(first);
		expect(second.blackboard).toBe(runner.blackboard);
	});

	it("should give each run its own blackboard when not sharing", () => {
		const runner = new WireScriptRunner({
			library: createTestLibrary([countAsset]),
			shareBlackboard: false,
			logger: silentLogger,
		});
		const executor = runner.play("count");
		expect(executor.blackboard).not.toBe(runner.blackboard);
	});

	it("should refuse to play an invalid graph", () => {
		const runner = new WireScriptRunner({ library: createTestLibrary([brokenAsset]), logger: silentLogger });
		const error = captureError(() => runner.play("broken"));
		expect(error).toBeInstanceOf(WireValidationError);
		expect(error).toMatchObject({ code: ERROR_CODES.GRAPH_INVALID });
		if (error instanceof WireValidationError) {
			expect(error.issues.map((issue) => issue.kind)).toEqual(["required-input"]);
		}
		expect(runner.executor).toBeUndefined();

		const lenient = new WireScriptRunner({ library: createTestLibrary([brokenAsset]), validate: false, logger: silentLogger });
		expect(lenient.play("broken").pendingCount).toBe(1);
	});

	it("should need a graph id and refuse to play once disposed", () => {
		const runner = new WireScriptRunner({ library: createTestLibrary([countAsset]), logger: silentLogger });
		expect(captureError(() => runner.play())).toMatchObject({ code: ERROR_CODES.MISSING_GRAPH });

		runner.play("count");
		runner.dispose();
		expect(runner.executor).toBeUndefined();
		expect(captureError(() => runner.play("count"))).toMatchObject({ code: ERROR_CODES.GRAPH_INVALID });
	});
});
