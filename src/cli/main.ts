import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";

import { DEFAULT_SPEC_PATH } from "../validator.js";
import { checkRequest, renderCheckResult } from "./check.js";

/**
 * Reads the version from package.json at runtime. The file sits two levels up
 * from the sources and three from the build output.
 */
function getPackageVersion(): string {
	const currentDir = dirname(fileURLToPath(import.meta.url));
	for (const rel of ["../../package.json", "../../../package.json"]) {
		const packageJsonPath = join(currentDir, rel);
		if (!existsSync(packageJsonPath)) continue;
		const packageJson = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
		return packageJson.version ?? "0.0.0";
	}
	return "0.0.0";
}

function collectRepeatable(value: string, previous: string[] = []): string[] {
	return previous.concat([value]);
}

type CheckCommandOptions = {
	spec: string;
	method: string;
	path: string;
	pathParam: string[];
	query: string[];
	contentType: string;
	data?: string;
	file?: string;
	json?: boolean;
};

export async function main(argv: string[]) {
	const program = new Command();

	program
		.name("oas-guard")
		.description("Validate HTTP requests against an OpenAPI 3.0 document")
		.version(getPackageVersion(), "-v, --version", "Output the version number");

	program
		.command("check")
		.description("Validate one request and print the coerced parameters")
		.option("--spec <path>", "OpenAPI file path", DEFAULT_SPEC_PATH)
		.requiredOption("--method <verb>", "HTTP method")
		.requiredOption("--path <path>", "Concrete request path, e.g. /users/123")
		.option(
			"--path-param <name=value>",
			"Path parameter as routed (repeatable)",
			collectRepeatable,
			[],
		)
		.option(
			"--query <name=value>",
			"Query parameter (repeatable)",
			collectRepeatable,
			[],
		)
		.option("--content-type <type>", "Content-Type header", "application/json")
		.option("--data <json>", "Inline request body")
		.option("--file <path>", "Read request body from file")
		.option("--json", "Machine-readable output")
		.action((options: CheckCommandOptions) => {
			const result = checkRequest(options);
			const output = renderCheckResult(result, { json: options.json });
			if (result.ok) {
				console.log(output);
			} else {
				console.error(output);
				process.exitCode = 1;
			}
		});

	await program.parseAsync(argv);
}
