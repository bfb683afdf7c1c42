import { Ajv } from "ajv";
import addFormats from "ajv-formats";

import type { Logger } from "../core/types.js";

export function createAjv(logger?: Logger) {
	const ajv = new Ajv({
		allErrors: true,
		strict: false,
		coerceTypes: false,
		logger: logger ?? console,
	});

	addFormats.default(ajv);
	return ajv;
}
