import { BodyParseError, RequestValidationError } from "./core/errors.js";
import type { Logger, ValidatableRequest } from "./core/types.js";
import {
	DEFAULT_ROUTING_KEYS,
	operationLocator,
	templateRoute,
} from "./match/path-template.js";
import {
	deriveParameterSpecs,
	type ParameterSpec,
	type PathParameter,
	type QueryParameter,
} from "./parse/params.js";
import { OpenApiDocument, type RefResolver } from "./spec/document.js";
import { loadSpecDocument, type SpecFs } from "./spec/loader.js";
import { coerceQueryValue } from "./validate/coerce.js";
import { joinErrorMessages, type ValidationError } from "./validate/error.js";

export const DEFAULT_SPEC_PATH = "openapi.yml";

export const CONTENT_TYPE_MESSAGE =
	'"Content-Type" request header must be set to "application/json".';

const BODYLESS_METHODS = new Set(["get", "delete"]);

export type ValidatorOptions = {
	/** OpenAPI file to load; defaults to `openapi.yml` */
	specPath?: string;
	/** Pre-loaded document shared across validators; `specPath` is then unused */
	document?: OpenApiDocument;
	/** Supplies documents for external `$ref` targets */
	refResolver?: RefResolver;
	/** Path parameter keys that identify the handler, not the URL */
	routingKeys?: readonly string[];
	logger?: Logger;
	fs?: SpecFs;
};

function readBodyText(request: ValidatableRequest): string {
	const raw = request.body?.read() ?? "";
	return typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
}

/**
 * Validates one request against an OpenAPI 3.0 document.
 *
 * The document is loaded on first use and kept for the lifetime of the
 * instance. `setSpecPath()` with a new path and `invalidate()` drop it.
 */
export class OpenApiValidator {
	readonly request: ValidatableRequest;
	private readonly options: ValidatorOptions;
	private specPathValue: string;
	private document: OpenApiDocument | undefined;

	constructor(request: ValidatableRequest, options: ValidatorOptions = {}) {
		this.request = request;
		this.options = options;
		this.specPathValue = options.specPath ?? DEFAULT_SPEC_PATH;
		this.document = options.document;
	}

	get specPath(): string {
		return this.specPathValue;
	}

	setSpecPath(path: string) {
		if (path === this.specPathValue) return;
		this.specPathValue = path;
		this.invalidate();
	}

	invalidate() {
		this.document = undefined;
	}

	getDocument(): OpenApiDocument {
		if (!this.document) {
			const doc = loadSpecDocument(this.specPathValue, { fs: this.options.fs });
			this.document = new OpenApiDocument(doc, {
				refResolver: this.options.refResolver,
				logger: this.options.logger,
			});
		}
		return this.document;
	}

	operationLocator(): string {
		return operationLocator(this.request, this.routeOptions());
	}

	/**
	 * Validates the JSON body against the operation's `application/json`
	 * request body schema. Returns `null` for GET and DELETE.
	 *
	 * Content violations come back as errors; a wrong content type, an
	 * unparsable body, an unknown operation or an undeclared request body
	 * throw.
	 */
	validateBody(): Iterable<ValidationError> | null {
		if (BODYLESS_METHODS.has(this.request.method.toLowerCase())) return null;

		if (this.request.contentType !== "application/json") {
			throw new RequestValidationError(CONTENT_TYPE_MESSAGE);
		}

		const locator = this.requireOperation();
		const schema = this.getDocument().ref(
			`${locator}/requestBody/content/application~1json/schema`,
		);

		let body: unknown;
		try {
			body = JSON.parse(readBodyText(this.request));
		} catch (err) {
			const detail = err instanceof Error ? err.message : String(err);
			throw new BodyParseError(`Invalid JSON body: ${detail}`, { cause: err });
		}

		return schema.validate(body);
	}

	/**
	 * Casts declared query parameters and checks `$ref`ed path parameters,
	 * writing the results into `request.params`.
	 */
	applyParameters(): void {
		const document = this.getDocument();
		const locator = this.requireOperation();
		const pathItem = document.ref(locator.slice(0, locator.lastIndexOf("/")));
		const operation = document.ref(locator);

		const specs: ParameterSpec[] = deriveParameterSpecs(
			pathItem.value,
			operation.value,
			{
				deref: (ref) => document.ref(ref).value,
				logger: this.options.logger,
			},
		);

		for (const spec of specs) {
			switch (spec.in) {
				case "query":
					this.applyQueryParameter(spec);
					break;
				case "path":
					this.applyPathParameter(spec);
					break;
			}
		}
	}

	private applyQueryParameter(spec: QueryParameter) {
		const { queryParameters, params } = this.request;
		const value = queryParameters[spec.name];
		if (value === undefined || value === null) return;
		if (params[spec.name] === undefined || params[spec.name] === null) return;

		params[spec.name] = coerceQueryValue(value, spec.type);
	}

	private applyPathParameter(spec: PathParameter) {
		const value = this.request.pathParameters[spec.name];
		if (value === undefined) return;

		// Inline path schemas are left to the router.
		if (spec.schemaRef) {
			const errors = Array.from(
				this.getDocument().ref(spec.schemaRef).validate(value),
			);
			if (errors.length) {
				throw new RequestValidationError(joinErrorMessages(errors, ", "));
			}
		}

		this.request.params[spec.name] = value;
	}

	private requireOperation(): string {
		const locator = this.operationLocator();
		if (!this.getDocument().has(locator)) {
			throw new RequestValidationError(
				`No operation defined for ${this.request.method.toUpperCase()} ${templateRoute(
					this.request,
					this.routeOptions(),
				)}`,
			);
		}
		return locator;
	}

	private routeOptions() {
		return {
			routingKeys: this.options.routingKeys ?? DEFAULT_ROUTING_KEYS,
			templates: Object.keys(this.getDocument().doc.paths ?? {}),
		};
	}
}
