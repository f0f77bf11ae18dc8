import { Data } from "effect";

// ============================================================================
// Effect TaggedError Build-Time Error Types
// ============================================================================

/**
 * Raised by a TypeResolver when a type name is not registered.
 */
export class TypeNotFoundError extends Data.TaggedError("TypeNotFoundError")<{
	readonly typeName: string;
	readonly message: string;
}> {}

/**
 * A descriptor attribute that names a type to be resolved at build time.
 */
export type TypeNameAttribute = "unmarshalTypeName" | "collectionTypeName";

/**
 * A type name on a descriptor could not be resolved. Fatal to the build of
 * that data format; the original lookup failure is kept as `cause`.
 */
export class ConfigurationResolutionError extends Data.TaggedError(
	"ConfigurationResolutionError",
)<{
	readonly attribute: TypeNameAttribute;
	readonly typeName: string;
	readonly message: string;
	readonly cause: TypeNotFoundError;
}> {}

export class BackendNotFoundError extends Data.TaggedError(
	"BackendNotFoundError",
)<{
	readonly dataFormatName: string;
	readonly available: ReadonlyArray<string>;
	readonly message: string;
}> {}

/**
 * Strict mode only: the chosen backend has no setter for attributes the
 * descriptor sets.
 */
export class UnsupportedPropertyError extends Data.TaggedError(
	"UnsupportedPropertyError",
)<{
	readonly dataFormatName: string;
	readonly properties: ReadonlyArray<string>;
	readonly message: string;
}> {}

// ============================================================================
// Build Error Union
// ============================================================================

export type DataFormatBuildError =
	| ConfigurationResolutionError
	| BackendNotFoundError
	| UnsupportedPropertyError;
