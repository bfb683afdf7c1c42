import { z } from "zod";

import type { JsonSchema, Logger } from "../core/types.js";
import { getSchemaRef, getSchemaType, type ParamType } from "./schema-shape.js";

export type { ParamType };

export type QueryParameter = {
	in: "query";
	name: string;
	type: ParamType;
	schema?: JsonSchema;
};

export type PathParameter = {
	in: "path";
	name: string;
	/** `$ref` of the parameter schema; inline schemas are not enforced */
	schemaRef?: string;
	schema?: JsonSchema;
};

export type ParameterSpec = QueryParameter | PathParameter;

const parameterObject = z.object({
	name: z.string().min(1),
	in: z.enum(["query", "path", "header", "cookie"]),
	required: z.boolean().optional(),
	schema: z.record(z.string(), z.unknown()).optional(),
});

type RawParameter = z.infer<typeof parameterObject>;

export type DeriveParameterOptions = {
	/** Resolves `$ref`ed parameter objects */
	deref: (ref: string) => unknown;
	logger?: Logger;
};

function listOf(value: unknown): unknown[] {
	return Array.isArray(value) ? value : [];
}

function parametersOf(node: unknown): unknown[] {
	if (!node || typeof node !== "object" || !("parameters" in node)) return [];
	return listOf(node.parameters);
}

function normalizeParam(
	entry: unknown,
	options: DeriveParameterOptions,
): RawParameter | undefined {
	const ref = getSchemaRef(entry);
	const target = ref ? options.deref(ref) : entry;

	const parsed = parameterObject.safeParse(target);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
			.join("; ");
		(options.logger ?? console).warn(`Skipping invalid parameter (${issues})`);
		return undefined;
	}
	return parsed.data;
}

/**
 * Declared parameters for an operation: path-item parameters first, then the
 * operation's own, which replace path-item entries with the same `in` and
 * `name`. Header and cookie parameters are dropped.
 */
export function deriveParameterSpecs(
	pathItem: unknown,
	operation: unknown,
	options: DeriveParameterOptions,
): ParameterSpec[] {
	const merged = new Map<string, RawParameter>();

	for (const entry of [...parametersOf(pathItem), ...parametersOf(operation)]) {
		const p = normalizeParam(entry, options);
		if (!p) continue;
		merged.set(`${p.in}:${p.name}`, p);
	}

	const out: ParameterSpec[] = [];
	for (const p of merged.values()) {
		switch (p.in) {
			case "query":
				out.push({
					in: "query",
					name: p.name,
					type: getSchemaType(p.schema),
					schema: p.schema,
				});
				break;
			case "path":
				out.push({
					in: "path",
					name: p.name,
					schemaRef: getSchemaRef(p.schema),
					schema: p.schema,
				});
				break;
			case "header":
			case "cookie":
				break;
		}
	}

	return out;
}
