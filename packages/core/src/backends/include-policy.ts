// ============================================================================
// Null-field inclusion policies
// ============================================================================

export const INCLUDE_POLICIES = ["ALWAYS", "NON_NULL", "NON_EMPTY"] as const;

export type IncludePolicy = (typeof INCLUDE_POLICIES)[number];

export const isIncludePolicy = (value: string): value is IncludePolicy =>
	(INCLUDE_POLICIES as ReadonlyArray<string>).includes(value);

const isPlainObject = (data: unknown): data is Record<string, unknown> => {
	if (typeof data !== "object" || data === null) {
		return false;
	}
	const proto = Object.getPrototypeOf(data);
	return proto === Object.prototype || proto === null;
};

const isEmpty = (value: unknown): boolean =>
	value === "" ||
	(Array.isArray(value) && value.length === 0) ||
	(isPlainObject(value) && Object.keys(value).length === 0);

/**
 * Drops object fields the policy excludes, recursively.
 *
 * - `ALWAYS`: data is returned untouched
 * - `NON_NULL`: fields holding null or undefined are omitted
 * - `NON_EMPTY`: additionally omits "", [] and {} (checked after nested fields
 *   are stripped)
 *
 * Array elements are never removed, only recursed into. Values that are not
 * plain objects (Dates, class instances) are kept as they are.
 */
export const applyIncludePolicy = (
	data: unknown,
	policy: IncludePolicy,
): unknown => {
	if (policy === "ALWAYS") {
		return data;
	}

	if (Array.isArray(data)) {
		return data.map((item) => applyIncludePolicy(item, policy));
	}

	if (isPlainObject(data)) {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(data)) {
			if (value === null || value === undefined) continue;
			const stripped = applyIncludePolicy(value, policy);
			if (policy === "NON_EMPTY" && isEmpty(stripped)) continue;
			result[key] = stripped;
		}
		return result;
	}

	return data;
};
