import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";

import { isOpenApiDoc, type OpenApiDoc } from "../core/types.js";

/**
 * Custom filesystem interface for reading files.
 */
export type SpecFs = {
	/** Read file contents as UTF-8 string */
	readFile: (path: string) => string;
};

export type LoadSpecOptions = {
	/** Custom filesystem for reading spec files */
	fs?: SpecFs;
};

const nodeFs: SpecFs = {
	readFile: (path) => readFileSync(path, "utf-8"),
};

export function parseSpecText(text: string): unknown {
	const trimmed = text.trimStart();
	if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
		return JSON.parse(text);
	}

	return parseYaml(text);
}

/**
 * Reads and parses an OpenAPI document. Filesystem and parser errors are
 * propagated as thrown.
 */
export function loadSpecDocument(
	location: string,
	options: LoadSpecOptions = {},
): OpenApiDoc {
	const fs = options.fs ?? nodeFs;
	const doc = parseSpecText(fs.readFile(location));

	if (!isOpenApiDoc(doc)) {
		throw new Error(`${location} is not a valid OpenAPI document`);
	}

	return doc;
}
