import { isJsonSchema, type JsonSchema } from "../core/types.js";

/**
 * Copy of a document that Ajv can compile. `wrappers` holds the nodes added
 * by the rewrite, so pointers into the original tree can be mapped onto it.
 */
export type CompiledTree = {
	root: JsonSchema;
	wrappers: WeakSet<object>;
};

function normalizeNode(node: unknown, wrappers: WeakSet<object>): unknown {
	if (Array.isArray(node)) {
		return node.map((item) => normalizeNode(item, wrappers));
	}
	if (!isJsonSchema(node)) return node;
	return normalizeObject(node, wrappers);
}

function normalizeObject(node: JsonSchema, wrappers: WeakSet<object>): JsonSchema {
	const out: JsonSchema = {};
	for (const [key, value] of Object.entries(node)) {
		out[key] = normalizeNode(value, wrappers);
	}

	// Ajv only takes `nullable` next to `type`.
	if (out.nullable !== true || out.type !== undefined) return out;
	delete out.nullable;
	const wrapper: JsonSchema = { anyOf: [{ type: "null" }, out] };
	wrappers.add(wrapper);
	return wrapper;
}

/**
 * Rewrites every `nullable: true` schema without a `type` as
 * `anyOf: [{type: "null"}, <schema>]`. The input is not modified.
 */
export function compileTree(doc: JsonSchema): CompiledTree {
	const wrappers = new WeakSet<object>();
	return { root: normalizeObject(doc, wrappers), wrappers };
}

/** Index of the original schema inside a wrapper's `anyOf`. */
export const WRAPPED_BRANCH = ["anyOf", "1"] as const;
