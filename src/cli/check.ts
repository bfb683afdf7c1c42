import { readFileSync } from "node:fs";

import { BodyParseError, RequestValidationError } from "../core/errors.js";
import { stableStringify } from "../core/stable-json.js";
import { bodyFromString, type ValidatableRequest } from "../core/types.js";
import { collectBodyErrors } from "../hook.js";
import { DEFAULT_SPEC_PATH, OpenApiValidator } from "../validator.js";

export type CheckOptions = {
	spec?: string;
	method: string;
	path: string;
	pathParam?: string[];
	query?: string[];
	contentType?: string;
	data?: string;
	file?: string;
};

export type CheckResult = {
	ok: boolean;
	operation: string;
	params: Record<string, unknown>;
	errors: Array<{ type: string; error: string }>;
};

export function parseKeyValuePairs(
	pairs: string[] | undefined,
): Record<string, string> {
	const out: Record<string, string> = {};
	for (const pair of pairs ?? []) {
		const idx = pair.indexOf("=");
		if (idx === -1)
			throw new Error(`Invalid pair '${pair}', expected name=value`);
		const name = pair.slice(0, idx).trim();
		const value = pair.slice(idx + 1).trim();
		if (!name) throw new Error(`Invalid pair '${pair}', missing name`);
		out[name] = value;
	}
	return out;
}

function buildRequest(options: CheckOptions): ValidatableRequest {
	const pathParameters = parseKeyValuePairs(options.pathParam);
	const queryParameters = parseKeyValuePairs(options.query);

	let bodyText: string | undefined = options.data;
	if (bodyText === undefined && options.file) {
		bodyText = readFileSync(options.file, "utf-8");
	}

	return {
		method: options.method,
		path: options.path,
		pathParameters,
		queryParameters,
		// Mirrors a framework's merged parameter store.
		params: { ...queryParameters, ...pathParameters },
		contentType: options.contentType,
		body: bodyText === undefined ? undefined : bodyFromString(bodyText),
	};
}

/**
 * Runs parameter casting and body validation for a request described on the
 * command line. Request errors are reported in the result; anything else
 * (missing spec file, broken `$ref`) is thrown.
 */
export function checkRequest(options: CheckOptions): CheckResult {
	const request = buildRequest(options);
	const validator = new OpenApiValidator(request, {
		specPath: options.spec ?? DEFAULT_SPEC_PATH,
	});
	const operation = `${options.method.toUpperCase()} ${options.path}`;

	try {
		validator.applyParameters();
		const errors = collectBodyErrors(validator).map((e) => ({
			type: e.type,
			error: e.error,
		}));
		return { ok: errors.length === 0, operation, params: request.params, errors };
	} catch (err) {
		if (err instanceof RequestValidationError) {
			return {
				ok: false,
				operation,
				params: request.params,
				errors: [{ type: "request", error: err.message }],
			};
		}
		if (err instanceof BodyParseError) {
			return {
				ok: false,
				operation,
				params: request.params,
				errors: [{ type: "body", error: err.message }],
			};
		}
		throw err;
	}
}

export function renderCheckResult(
	result: CheckResult,
	options: { json?: boolean } = {},
): string {
	if (options.json) return stableStringify(result, { space: 2 });

	const lines = [`${result.ok ? "OK" : "INVALID"} ${result.operation}`];
	const names = Object.keys(result.params).sort();
	if (names.length) {
		lines.push("params:");
		for (const name of names) {
			lines.push(`  ${name}: ${JSON.stringify(result.params[name])}`);
		}
	}
	for (const e of result.errors) {
		lines.push(`error (${e.type}): ${e.error}`);
	}
	return lines.join("\n");
}
