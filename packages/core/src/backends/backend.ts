import type { Effect } from "effect";
import type { DataFormatError } from "../errors/format-errors.js";
import type { TypeResolverShape } from "../resolution/type-resolver.js";
import type { TypeHandle } from "../types/type-handle.js";

// ============================================================================
// Configurable Properties
// ============================================================================

/**
 * Every property a descriptor may push onto a backend, by value type.
 */
export interface DataFormatProperties {
	readonly unmarshalType: TypeHandle;
	readonly prettyPrint: boolean;
	readonly view: TypeHandle;
	readonly include: string;
	readonly allowTypeHeaderOverride: boolean;
	readonly collectionType: TypeHandle;
	readonly useList: boolean;
	readonly enableAnnotationInterop: boolean;
}

export type PropertyName = keyof DataFormatProperties;

/**
 * The subset of properties a descriptor actually sets. A missing key means
 * "leave the backend default alone".
 */
export type ConfiguredProperties = Partial<DataFormatProperties>;

/**
 * Order in which properties are applied. `planProperties` in
 * build/configure.ts spells the same sequence out per property and is
 * checked against this list by the applicator tests.
 */
export const PROPERTY_ORDER = [
	"unmarshalType",
	"prettyPrint",
	"view",
	"include",
	"allowTypeHeaderOverride",
	"collectionType",
	"useList",
	"enableAnnotationInterop",
] as const satisfies ReadonlyArray<PropertyName>;

export type PropertySetter<K extends PropertyName> = (
	value: DataFormatProperties[K],
) => Effect.Effect<void>;

/**
 * Setters a backend exposes. A backend lists only the properties it
 * supports; anything else is ignored by the applicator.
 */
export type PropertySetters = {
	readonly [K in PropertyName]?: PropertySetter<K>;
};

export type AllPropertySetters = {
	readonly [K in PropertyName]: PropertySetter<K>;
};

// ============================================================================
// DataFormatBackend
// ============================================================================

/**
 * Header that names the type to unmarshal into when the backend allows it.
 */
export const UNMARSHAL_TYPE_HEADER = "DataFormatUnmarshalType";

export type MessageHeaders = Readonly<Record<string, string | undefined>>;

export interface DataFormatBackend {
	readonly dataFormatName: string;
	readonly properties: PropertySetters;
	readonly marshal: (value: unknown) => Effect.Effect<string, DataFormatError>;
	readonly unmarshal: (
		body: string,
		headers?: MessageHeaders,
	) => Effect.Effect<unknown, DataFormatError>;
}

/**
 * Creates an unconfigured backend. The resolver serves run-time type
 * lookups such as the unmarshal type header.
 */
export type BackendFactory = (resolver: TypeResolverShape) => DataFormatBackend;
