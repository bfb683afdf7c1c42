import { RefNotFoundError, RequestValidationError } from "./core/errors.js";
import type { ValidatableRequest } from "./core/types.js";
import { joinErrorMessages, type ValidationError } from "./validate/error.js";
import { OpenApiValidator, type ValidatorOptions } from "./validator.js";

export function collectBodyErrors(validator: OpenApiValidator): ValidationError[] {
	try {
		return Array.from(validator.validateBody() ?? []);
	} catch (err) {
		// Operations without a JSON request body have nothing to validate.
		if (err instanceof RefNotFoundError) return [];
		throw err;
	}
}

/**
 * The "before handling" step: casts parameters, then validates the body and
 * raises every body error as one `RequestValidationError`.
 */
export function validateFromOpenApi(
	target: OpenApiValidator | ValidatableRequest,
	options?: ValidatorOptions,
): OpenApiValidator {
	const validator =
		target instanceof OpenApiValidator
			? target
			: new OpenApiValidator(target, options);

	validator.applyParameters();

	const errors = collectBodyErrors(validator);
	if (errors.length) {
		throw new RequestValidationError(joinErrorMessages(errors, "; "));
	}

	return validator;
}
