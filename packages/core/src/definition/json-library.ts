// ============================================================================
// JsonLibrary: closed set of JSON backend variants
// ============================================================================

/**
 * Declared variants. The first entry is the default.
 */
export const JSON_LIBRARIES = ["Native", "Json5", "Hjson"] as const;

export type JsonLibrary = (typeof JSON_LIBRARIES)[number];

export const DEFAULT_JSON_LIBRARY: JsonLibrary = JSON_LIBRARIES[0];

/**
 * Backend registry key per variant. Adding a variant to JSON_LIBRARIES fails
 * to compile until it is mapped here.
 */
export const JSON_DATA_FORMAT_NAMES = {
	Native: "json-native",
	Json5: "json-json5",
	Hjson: "json-hjson",
} as const satisfies Record<JsonLibrary, string>;

export const dataFormatNameOf = (library?: JsonLibrary): string =>
	JSON_DATA_FORMAT_NAMES[library ?? DEFAULT_JSON_LIBRARY];

export const isJsonLibrary = (value: string): value is JsonLibrary =>
	(JSON_LIBRARIES as ReadonlyArray<string>).includes(value);
