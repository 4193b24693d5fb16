import { config as loadDotenv } from "dotenv";
import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type WireLogLevel = (typeof LOG_LEVELS)[number];

const flag = z
	.string()
	.optional()
	.transform((value) => value === "true" || value === "1");

const RuntimeEnvSchema = z.object({
	WIRE_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	WIRE_PRETTY_LOGS: flag,
	WIRE_MAX_STEPS_PER_TICK: z.coerce.number().int().positive().default(10_000),
	WIRE_MAX_DATA_DEPTH: z.coerce.number().int().positive().default(256),
});

export interface WireRuntimeConfig {
	logLevel: WireLogLevel;
	prettyLogs: boolean;
	maxStepsPerTick: number;
	maxDataDepth: number;
}

/**
 * Reads runtime settings from the environment. When no explicit env is passed,
 * a `.env` file in the working directory is merged into `process.env` first.
 */
export function loadRuntimeConfig(env?: Record<string, string | undefined>): WireRuntimeConfig {
	if (!env) {
		loadDotenv();
	}
	const source = env ?? process.env;
	const parsed = RuntimeEnvSchema.safeParse({
		WIRE_LOG_LEVEL: source.WIRE_LOG_LEVEL || undefined,
		WIRE_PRETTY_LOGS: source.WIRE_PRETTY_LOGS,
		WIRE_MAX_STEPS_PER_TICK: source.WIRE_MAX_STEPS_PER_TICK || undefined,
		WIRE_MAX_DATA_DEPTH: source.WIRE_MAX_DATA_DEPTH || undefined,
	});
	if (!parsed.success) {
		const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
		throw new Error(`Invalid runtime configuration: ${fields}`);
	}
	return {
		logLevel: parsed.data.WIRE_LOG_LEVEL,
		prettyLogs: parsed.data.WIRE_PRETTY_LOGS,
		maxStepsPerTick: parsed.data.WIRE_MAX_STEPS_PER_TICK,
		maxDataDepth: parsed.data.WIRE_MAX_DATA_DEPTH,
	};
}

let cached: WireRuntimeConfig | undefined;

export function getRuntimeConfig(): WireRuntimeConfig {
	if (!cached) {
		cached = loadRuntimeConfig();
	}
	return cached;
}

export function resetRuntimeConfig(): void {
	cached = undefined;
}
