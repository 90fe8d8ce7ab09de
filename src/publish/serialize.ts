const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const sortKeys = (value: unknown): unknown => {
	if (Array.isArray(value)) {
		return value.map(sortKeys);
	}
	if (isRecord(value)) {
		return Object.fromEntries(
			Object.keys(value)
				.sort()
				.map((key) => [key, sortKeys(value[key])]),
		);
	}
	return value;
};

/**
 * JSON with object keys sorted at every level. Two payloads are the same
 * record content when their stable forms are equal.
 */
export const stableStringify = (value: unknown) =>
	JSON.stringify(sortKeys(value));
