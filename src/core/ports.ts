import type { WirePortDescriptor, WirePortOptions, WireValueType } from "./types";

export function toLabel(name: string): string {
	const spaced = name.replace(/([a-z0-9])([A-Z])/g, "$1 $2").replace(/[_-]+/g, " ");
	return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export function flowInput(name: string, options: WirePortOptions = {}): WirePortDescriptor {
	return {
		name,
		label: options.label ?? toLabel(name),
		description: options.description,
		direction: "in",
		signal: "flow",
		dataType: "exec",
		capacity: options.capacity ?? "multi",
		required: options.required ?? false,
	};
}

export function flowOutput(name: string, options: WirePortOptions = {}): WirePortDescriptor {
	return {
		name,
		label: options.label ?? toLabel(name),
		description: options.description,
		direction: "out",
		signal: "flow",
		dataType: "exec",
		capacity: options.capacity ?? "multi",
		required: false,
		weight: options.weight,
	};
}

export function dataInput(name: string, dataType: WireValueType, options: WirePortOptions = {}): WirePortDescriptor {
	return {
		name,
		label: options.label ?? toLabel(name),
		description: options.description,
		direction: "in",
		signal: "data",
		dataType,
		capacity: options.capacity ?? "single",
		required: options.required ?? false,
		defaultValue: options.defaultValue,
	};
}

export function dataOutput(name: string, dataType: WireValueType, options: WirePortOptions = {}): WirePortDescriptor {
	return {
		name,
		label: options.label ?? toLabel(name),
		description: options.description,
		direction: "out",
		signal: "data",
		dataType,
		capacity: options.capacity ?? "multi",
		required: false,
		defaultValue: options.defaultValue,
	};
}
