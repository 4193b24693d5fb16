import { ERROR_CODES, WireError, WireValidationError } from "../../errors";
import { makeLogger } from "../../logger";
import type { Logger } from "../../logger";
import type { WireHostAdapter } from "../adapter";
import { WireBlackboard } from "../context";
import type { WireGraphLibrary } from "../library";
import { WireGraphExecutor } from "../scheduler";
import type { WireTickReport } from "../scheduler";
import { validateGraph } from "../validate";

export interface WireScriptRunnerOptions {
	library: WireGraphLibrary;
	graphId?: string;
	playOnLoad?: boolean;
	/** Keep one blackboard across plays instead of a fresh one per run. Defaults to true. */
	shareBlackboard?: boolean;
	/** Refuse to play graphs with validation issues. Defaults to true. */
	validate?: boolean;
	host?: WireHostAdapter;
	logger?: Logger;
	random?: () => number;
	contextId?: string;
	maxStepsPerTick?: number;
}

/** Owns one executor at a time for a host object and forwards host ticks to it. */
export class WireScriptRunner {
	private readonly _library: WireGraphLibrary;
	private readonly _shareBlackboard: boolean;
	private readonly _logger: Logger;
	private readonly _blackboard = new WireBlackboard();

	private _defaultGraphId?: string;
	private _executor?: WireGraphExecutor;
	private _disposed = false;

	public constructor(private readonly _options: WireScriptRunnerOptions) {
		this._library = _options.library;
		this._shareBlackboard = _options.shareBlackboard ?? true;
		this._defaultGraphId = _options.graphId;
		this._logger = _options.logger ?? makeLogger("runner");
		if (_options.playOnLoad && this._defaultGraphId) {
			this.play();
		}
	}

	public get executor(): WireGraphExecutor | undefined {
		return this._executor;
	}

	public get blackboard(): WireBlackboard {
		return this._blackboard;
	}

	public get isPlaying(): boolean {
		return this._executor !== undefined && this._executor.status !== "stopped";
	}

	/** Stops any current run, then loads, validates and starts the graph. */
	public play(graphId?: string): WireGraphExecutor {
		if (this._disposed) {
			throw new WireError(ERROR_CODES.GRAPH_INVALID, "Cannot play on a disposed runner.");
		}
		const target = graphId ?? this._defaultGraphId;
		if (!target) {
			throw new WireError(ERROR_CODES.MISSING_GRAPH, "Runner has no graph id to play.");
		}
		this._defaultGraphId = target;
		this.stop("restart");

		const graph = this._library.load(target);
		if (this._options.validate ?? true) {
			const issues = validateGraph(graph);
			if (issues.length) {
				this._logger.error("Refusing to play an invalid graph", { graphId: target, issues: issues.length });
				throw new WireValidationError(target, issues);
			}
		}
		const executor = new WireGraphExecutor(graph, {
			contextId: this._options.contextId,
			blackboard: this._shareBlackboard ? this._blackboard : new WireBlackboard(),
			host: this._options.host,
			logger: this._logger,
			random: this._options.random,
			maxStepsPerTick: this._options.maxStepsPerTick,
		});
		this._executor = executor;
		executor.start();
		this._logger.debug("Graph started", { graphId: target, roots: graph.roots.length });
		return executor;
	}

	/** Advances the current run by one host tick. */
	public update(deltaMs: number): WireTickReport | undefined {
		return this._executor?.tick(deltaMs);
	}

	public stop(reason = "stop"): void {
		if (this._executor) {
			this._executor.stop(reason);
			this._executor = undefined;
		}
	}

	public dispose(): void {
		this.stop("dispose");
		this._disposed = true;
	}
}
