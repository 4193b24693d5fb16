import type { WirePortDescriptor, WireValueType } from "./types";

const NUMERIC_TYPES = new Set<string>(["int", "float", "double"]);

function isNumeric(type: WireValueType): boolean {
	return NUMERIC_TYPES.has(type);
}

function isBoolConvertible(type: WireValueType): boolean {
	return type === "bool" || isNumeric(type);
}

export function isTypeCompatible(a: WireValueType, b: WireValueType): boolean {
	if (a === b) {
		return true;
	}
	if (a === "any" || b === "any") {
		return true;
	}
	if (isNumeric(a) && isNumeric(b)) {
		return true;
	}
	if ((a === "bool" && isBoolConvertible(b)) || (b === "bool" && isBoolConvertible(a))) {
		return true;
	}
	return a === "string" || b === "string";
}

/** Authoring-time connection check; argument order does not change the answer. */
export function canConnect(source: WirePortDescriptor, destination: WirePortDescriptor): boolean {
	if (source.direction === destination.direction) {
		return false;
	}
	if (source.signal !== destination.signal) {
		return false;
	}
	return isTypeCompatible(source.dataType, destination.dataType);
}

export function toBoolean(value: unknown, fallback = false): boolean {
	if (typeof value === "boolean") {
		return value;
	}
	if (typeof value === "number") {
		return value !== 0;
	}
	if (typeof value === "string") {
		return value.length > 0;
	}
	if (value === undefined || value === null) {
		return fallback;
	}
	return true;
}

export function toNumber(value: unknown, fallback = 0): number {
	if (typeof value === "boolean") {
		return value ? 1 : 0;
	}
	const num = Number(value);
	return Number.isFinite(num) ? num : fallback;
}

/** Converts a value flowing into a data port to the port's declared type. */
export function coerceValue(value: unknown, dataType: WireValueType): unknown {
	if (value === undefined || value === null) {
		return value;
	}
	switch (dataType) {
		case "int":
			return Math.trunc(toNumber(value));
		case "float":
		case "double":
			return toNumber(value);
		case "bool":
			return toBoolean(value);
		case "string":
			return typeof value === "string" ? value : typeof value === "object" ? JSON.stringify(value) : String(value);
		default:
			return value;
	}
}
