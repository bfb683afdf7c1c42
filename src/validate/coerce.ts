import type { ParamType } from "../parse/schema-shape.js";

const FALSE_VALUES = new Set(["0", "f", "F", "false", "FALSE", "off", "OFF"]);

/**
 * Boolean cast for form/query strings: blank is `null`, the usual false
 * spellings are `false`, everything else is `true`.
 */
export function castBoolean(raw: unknown): boolean | null {
	if (raw === undefined || raw === null || raw === "") return null;
	if (typeof raw === "boolean") return raw;
	if (raw === 0) return false;
	return !FALSE_VALUES.has(String(raw));
}

/**
 * Query values stay strings except for booleans; other declared types are
 * passed through unchanged.
 */
export function coerceQueryValue(raw: unknown, type: ParamType): unknown {
	if (type === "boolean") return castBoolean(raw);
	return raw;
}
