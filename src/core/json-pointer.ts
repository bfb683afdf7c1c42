export function escapePointerSegment(segment: string): string {
	return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function unescapePointerSegment(segment: string): string {
	return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Splits `#/a/b`, `/a/b` or `a/b` into unescaped segments.
 * The fragment form may be percent-encoded, as `$ref` values are URIs.
 */
export function parsePointer(pointer: string): string[] {
	let raw = pointer;
	if (raw.startsWith("#")) raw = safeDecode(raw.slice(1));
	if (raw.startsWith("/")) raw = raw.slice(1);
	if (!raw) return [];
	return raw.split("/").map(unescapePointerSegment);
}

/** Builds a URI fragment (`#/a/b`) from raw segments. */
export function toFragment(segments: string[]): string {
	if (!segments.length) return "#";
	return `#/${segments
		.map((s) => encodeURIComponent(escapePointerSegment(s)))
		.join("/")}`;
}

function safeDecode(value: string): string {
	try {
		return decodeURIComponent(value);
	} catch {
		return value;
	}
}
