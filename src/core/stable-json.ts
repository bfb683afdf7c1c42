export function stableStringify(
	value: unknown,
	options?: { space?: number },
): string {
	const visiting = new WeakSet<object>();
	return JSON.stringify(sort(value, visiting), null, options?.space);
}

function sort(value: unknown, visiting: WeakSet<object>): unknown {
	if (value === null) return null;

	if (Array.isArray(value)) {
		if (visiting.has(value)) return "[Circular]";
		visiting.add(value);
		const out = value.map((v) => sort(v, visiting));
		visiting.delete(value);
		return out;
	}

	if (typeof value === "object") {
		if (visiting.has(value)) return "[Circular]";
		visiting.add(value);

		const out: Record<string, unknown> = {};
		for (const [key, v] of Object.entries(value).sort(([a], [b]) =>
			a < b ? -1 : a > b ? 1 : 0,
		)) {
			out[key] = sort(v, visiting);
		}

		visiting.delete(value);
		return out;
	}

	return value;
}
