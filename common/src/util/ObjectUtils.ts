/**
 * A function for memoizing the creation of an object.
 *
 * @param F the function to create the object that will be memoized with.
 */
export function memoized<T>(F: () => T): () => T {
	const m = F();
	return () => m;
}

/**
 * Determines if a value is a plain object (not null, not an array).
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Returns a copy of the value with object keys sorted at every depth, so that
 * `JSON.stringify` of two equal values yields the same string.
 * Keys whose value is `undefined` are dropped.
 */
export function sortKeysDeep(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(sortKeysDeep);
	}
	if (isPlainRecord(value)) {
		const sorted: Record<string, unknown> = {};
		for (const key of Object.keys(value).sort()) {
			if (value[key] !== undefined) {
				sorted[key] = sortKeysDeep(value[key]);
			}
		}
		return sorted;
	}
	return value;
}

/**
 * Stable JSON rendering of a value. See {@link sortKeysDeep}.
 */
export function canonicalJson(value: unknown): string {
	return JSON.stringify(sortKeysDeep(value));
}
