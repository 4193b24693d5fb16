import type { WireValidationIssue } from "./runtime/validate";

export const ERROR_CODES = Object.freeze({
	UNKNOWN_NODE_TYPE: "UNKNOWN_NODE_TYPE",
	DUPLICATE_NODE_TYPE: "DUPLICATE_NODE_TYPE",
	DUPLICATE_NODE_ID: "DUPLICATE_NODE_ID",
	DUPLICATE_PORT: "DUPLICATE_PORT",
	MISSING_NODE: "MISSING_NODE",
	MISSING_GRAPH: "MISSING_GRAPH",
	INVALID_ASSET: "INVALID_ASSET",
	INVALID_NODE_CONFIG: "INVALID_NODE_CONFIG",
	GRAPH_INVALID: "GRAPH_INVALID",
	NODE_ACTIVATION_FAILED: "NODE_ACTIVATION_FAILED",
	MISSING_ENTRY: "MISSING_ENTRY",
	MISSING_EXIT: "MISSING_EXIT",
	DATA_CYCLE: "DATA_CYCLE",
	DATA_DEPTH_EXCEEDED: "DATA_DEPTH_EXCEEDED",
	NOT_ITERABLE: "NOT_ITERABLE",
	NO_HOST_ADAPTER: "NO_HOST_ADAPTER",
});

export type WireErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Error raised while building, loading or starting graphs. */
export class WireError extends Error {
	public constructor(
		public readonly code: WireErrorCode,
		message: string,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "WireError";
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

export function errorCodeOf(error: unknown): WireErrorCode {
	return error instanceof WireError ? error.code : ERROR_CODES.NODE_ACTIVATION_FAILED;
}

/** Thrown when a graph fails validation before it is played. */
export class WireValidationError extends WireError {
	public constructor(
		graphId: string,
		public readonly issues: readonly WireValidationIssue[],
	) {
		super(ERROR_CODES.GRAPH_INVALID, `Graph '${graphId}' is invalid: ${issues.map((issue) => issue.message).join(" ")}`, {
			graphId,
			issueCount: issues.length,
		});
		this.name = "WireValidationError";
	}
}
