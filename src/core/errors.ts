/**
 * Raised when a request does not satisfy the OpenAPI document: wrong content
 * type, a path parameter violating its schema, an operation that does not
 * exist, or (from the integration hook) aggregated body errors.
 */
export class RequestValidationError extends Error {
	override name = "RequestValidationError";
}

/** The request body is empty or not valid JSON. */
export class BodyParseError extends Error {
	override name = "BodyParseError";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
	}
}

/** A JSON Pointer or `$ref` names a node the document does not have. */
export class RefNotFoundError extends Error {
	override name = "RefNotFoundError";
	readonly pointer: string;

	constructor(pointer: string) {
		super(`Reference not found: ${pointer}`);
		this.pointer = pointer;
	}
}
