import type { ErrorObject } from "ajv";

export type ValidationError = {
	/** JSON Schema keyword that failed, e.g. "required" */
	type: string;
	/** Human readable message */
	error: string;
	instancePath: string;
	schemaPath: string;
	params: Record<string, unknown>;
};

export function formatAjvError(e: ErrorObject): string {
	if (e.keyword === "required" && "missingProperty" in e.params) {
		const missing = String(e.params.missingProperty);
		const where = e.instancePath || "/";
		return `${where} missing required property '${missing}'`.trim();
	}

	const msg = e.message || "invalid";
	return `${e.instancePath} ${msg}`.trim();
}

export function toValidationError(e: ErrorObject): ValidationError {
	return {
		type: e.keyword,
		error: formatAjvError(e),
		instancePath: e.instancePath,
		schemaPath: e.schemaPath,
		params: e.params,
	};
}

export function* iterateValidationErrors(
	errors: ErrorObject[] | null | undefined,
): Generator<ValidationError, void, undefined> {
	for (const e of errors ?? []) {
		yield toValidationError(e);
	}
}

export function joinErrorMessages(
	errors: Iterable<ValidationError>,
	separator: string,
): string {
	return Array.from(errors, (e) => e.error).join(separator);
}
