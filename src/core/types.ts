export type OpenApiDoc = {
	openapi: string;
	info?: {
		title?: string;
		version?: string;
	};
	paths?: Record<string, unknown>;
	components?: {
		schemas?: Record<string, unknown>;
		parameters?: Record<string, unknown>;
	};
};

// Minimal JSON Schema-like shape for validation.
export type JsonSchema = Record<string, unknown>;

export function isJsonSchema(value: unknown): value is JsonSchema {
	return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function isOpenApiDoc(value: unknown): value is OpenApiDoc {
	return isJsonSchema(value) && typeof value.openapi === "string";
}

/**
 * Source of the raw request body. `read()` is called at most once per
 * validation and must yield the whole body.
 */
export type BodySource = {
	read: () => string | Uint8Array;
};

/**
 * What the validator needs from the HTTP layer.
 *
 * `pathParameters` may carry routing metadata (controller/action) next to the
 * URL parameters; those keys are excluded before matching. `params` is the
 * general parameter store the validator writes coerced values into.
 */
export type ValidatableRequest = {
	method: string;
	path: string;
	pathParameters: Record<string, string | undefined>;
	queryParameters: Record<string, unknown>;
	params: Record<string, unknown>;
	contentType?: string;
	body?: BodySource;
};

export type Logger = {
	log: (...args: unknown[]) => unknown;
	warn: (...args: unknown[]) => unknown;
	error: (...args: unknown[]) => unknown;
};

export function bodyFromString(text: string): BodySource {
	return { read: () => text };
}
