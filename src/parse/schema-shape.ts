export type ParamType =
	| "string"
	| "number"
	| "integer"
	| "boolean"
	| "array"
	| "object"
	| "unknown";

export function getSchemaType(schema: unknown): ParamType {
	if (!schema || typeof schema !== "object") return "unknown";
	const t = "type" in schema ? schema.type : undefined;
	if (t === "string") return "string";
	if (t === "number") return "number";
	if (t === "integer") return "integer";
	if (t === "boolean") return "boolean";
	if (t === "array") return "array";
	if (t === "object") return "object";
	return "unknown";
}

export function getSchemaRef(schema: unknown): string | undefined {
	if (!schema || typeof schema !== "object") return undefined;
	const ref = "$ref" in schema ? schema.$ref : undefined;
	return typeof ref === "string" ? ref : undefined;
}
