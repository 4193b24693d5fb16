import { z } from "zod";
import { ERROR_CODES, WireError } from "../errors";

const PortRefSchema = z.object({
	nodeId: z.string().min(1),
	port: z.string().min(1),
});

export const WireSerializedNodeSchema = z.object({
	id: z.string().min(1),
	type: z.string().min(1),
	label: z.string().optional(),
	category: z.string().optional(),
	position: z.object({ x: z.number(), y: z.number() }).optional(),
	params: z.record(z.string(), z.unknown()).optional(),
	inputs: z.record(z.string(), z.unknown()).optional(),
});

export const WireSerializedConnectionSchema = z.object({
	from: PortRefSchema,
	to: PortRefSchema,
});

export const WireGraphAssetSchema = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
	description: z.string().optional(),
	root: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
	nodes: z.array(WireSerializedNodeSchema),
	connections: z.array(WireSerializedConnectionSchema).default([]),
});

export type WireGraphAsset = z.infer<typeof WireGraphAssetSchema>;

export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
		.join("; ");
}

export function parseGraphAsset(value: unknown): WireGraphAsset {
	const parsed = WireGraphAssetSchema.safeParse(value);
	if (!parsed.success) {
		throw new WireError(ERROR_CODES.INVALID_ASSET, `Invalid graph asset: ${formatIssues(parsed.error)}`);
	}
	const ids = new Set<string>();
	for (const node of parsed.data.nodes) {
		if (ids.has(node.id)) {
			throw new WireError(ERROR_CODES.DUPLICATE_NODE_ID, `Graph '${parsed.data.id}' declares node '${node.id}' twice`);
		}
		ids.add(node.id);
	}
	return parsed.data;
}
