import type { z } from "zod";
import type { WireNodeDefinition, WireNodeFactoryContext, WireNodeOptions } from "../../core/types";
import { ERROR_CODES, WireError } from "../../errors";
import { formatIssues } from "../asset";
import type { WireNodeBehavior } from "../node";

/** Builds a registry definition whose params are validated by `schema` before the node is created. */
export function defineNode<TConfig extends object>(
	options: WireNodeOptions,
	schema: z.ZodType<TConfig>,
	build: (config: TConfig, context: WireNodeFactoryContext) => WireNodeBehavior,
): WireNodeDefinition {
	return {
		options,
		create: (params, context) => {
			const parsed = schema.safeParse(params);
			if (!parsed.success) {
				throw new WireError(
					ERROR_CODES.INVALID_NODE_CONFIG,
					`Invalid params for node type '${options.type}': ${formatIssues(parsed.error)}`,
					{ type: options.type },
				);
			}
			return build(parsed.data, context);
		},
	};
}
