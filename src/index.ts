/**
 * Validate incoming HTTP requests against an OpenAPI 3.0 document.
 *
 * @example
 * ```ts
 * import { bodyFromString, validateFromOpenApi } from "openapi-request-guard";
 *
 * validateFromOpenApi(
 *   {
 *     method: "POST",
 *     path: "/users",
 *     pathParameters: {},
 *     queryParameters: { notify: "true" },
 *     params: { notify: "true" },
 *     contentType: "application/json",
 *     body: bodyFromString('{"name":"Ada","email":"ada@example.com"}'),
 *   },
 *   { specPath: "openapi.yml" },
 * );
 * ```
 */

export {
	BodyParseError,
	RefNotFoundError,
	RequestValidationError,
} from "./core/errors.js";
export {
	escapePointerSegment,
	unescapePointerSegment,
} from "./core/json-pointer.js";
export {
	type BodySource,
	bodyFromString,
	type Logger,
	type OpenApiDoc,
	type ValidatableRequest,
} from "./core/types.js";
export { validateFromOpenApi } from "./hook.js";
export {
	DEFAULT_ROUTING_KEYS,
	decodeRequestPath,
	operationLocator,
	templatePath,
	templateRoute,
} from "./match/path-template.js";
export type {
	ParameterSpec,
	PathParameter,
	QueryParameter,
} from "./parse/params.js";
export {
	OpenApiDocument,
	type RefResolver,
	type SchemaRef,
} from "./spec/document.js";
export { loadSpecDocument, type SpecFs } from "./spec/loader.js";
export { castBoolean } from "./validate/coerce.js";
export type { ValidationError } from "./validate/error.js";
export {
	CONTENT_TYPE_MESSAGE,
	DEFAULT_SPEC_PATH,
	OpenApiValidator,
	type ValidatorOptions,
} from "./validator.js";
