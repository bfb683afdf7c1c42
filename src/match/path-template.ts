import { escapePointerSegment } from "../core/json-pointer.js";
import type { ValidatableRequest } from "../core/types.js";

/** Router metadata that lives next to URL parameters but is not part of the URL. */
export const DEFAULT_ROUTING_KEYS: readonly string[] = ["controller", "action"];

export type PathTemplateOptions = {
	routingKeys?: readonly string[];
	/** Keys of the document's `paths`, tried before plain substitution */
	templates?: Iterable<string>;
};

type PathRequest = Pick<ValidatableRequest, "path" | "pathParameters">;

/**
 * Percent-decodes a request path the way form data is decoded (`+` is a
 * space), then writes every space back as `+`. Invalid escapes are kept.
 */
export function decodeRequestPath(path: string): string {
	return path
		.replace(/\+/g, " ")
		.replace(/(%[0-9A-Fa-f]{2})+/g, (seq) => {
			try {
				return decodeURIComponent(seq);
			} catch {
				return seq;
			}
		})
		.replace(/ /g, "+");
}

function isSegmentMatch(path: string, at: number, length: number): boolean {
	if (at <= 0 || path[at - 1] !== "/") return false;
	const next = path[at + length];
	return next === undefined || next === "/" || next === ".";
}

function findSegment(path: string, value: string, from: number): number {
	let at = path.indexOf(value, from);
	while (at >= 0) {
		if (isSegmentMatch(path, at, value.length)) return at;
		at = path.indexOf(value, at + 1);
	}
	return -1;
}

const PLACEHOLDER = /\{([^{}/]+)\}/g;

/**
 * Picks the path key that expands back to `path` with the given values. A key
 * that places every value wins over one that leaves some of them literal.
 */
function findTemplate(
	path: string,
	values: Map<string, string>,
	templates: Iterable<string>,
): string | undefined {
	let partial: string | undefined;
	for (const template of templates) {
		const names = Array.from(template.matchAll(PLACEHOLDER), (m) => m[1] ?? "");
		if (!names.every((name) => values.has(name))) continue;

		const expanded = template.replace(
			PLACEHOLDER,
			(_match: string, name: string) => values.get(name) ?? "",
		);
		if (expanded !== path) continue;
		if (new Set(names).size === values.size) return template;
		if (partial === undefined) partial = template;
	}
	return partial;
}

/**
 * Turns a concrete path into the templated key used under `paths`
 * (`/users/123` with `{id: "123"}` becomes `/users/{id}`).
 *
 * With `templates`, the key whose placeholders expand back to the request path
 * is returned as is. Otherwise parameters are substituted in the mapping's
 * order, each at the first whole segment match after the previous
 * substitution, so equal values (`/users/1/posts/1`) land on their own
 * segments.
 */
export function templateRoute(
	request: PathRequest,
	options: PathTemplateOptions = {},
): string {
	const routingKeys = new Set(options.routingKeys ?? DEFAULT_ROUTING_KEYS);
	const values = new Map<string, string>();
	for (const [name, raw] of Object.entries(request.pathParameters)) {
		if (routingKeys.has(name) || !raw) continue;
		values.set(name, raw.replace(/ /g, "+"));
	}

	let path = decodeRequestPath(request.path);
	if (options.templates) {
		const template = findTemplate(path, values, options.templates);
		if (template !== undefined) return template;
	}

	let cursor = 0;
	for (const [name, value] of values) {
		let at = findSegment(path, value, cursor);
		if (at < 0) at = findSegment(path, value, 0);
		if (at < 0) continue;

		const placeholder = `{${name}}`;
		path = path.slice(0, at) + placeholder + path.slice(at + value.length);
		cursor = at + placeholder.length;
	}

	return path;
}

/** The templated path escaped as a single JSON Pointer segment. */
export function templatePath(
	request: PathRequest,
	options: PathTemplateOptions = {},
): string {
	return escapePointerSegment(templateRoute(request, options));
}

/** `paths/<templated path>/<verb>`, the resolution root for one request. */
export function operationLocator(
	request: PathRequest & Pick<ValidatableRequest, "method">,
	options: PathTemplateOptions = {},
): string {
	return `paths/${templatePath(request, options)}/${request.method.toLowerCase()}`;
}
