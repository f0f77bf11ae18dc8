/**
 * Main entry point for the formatdef library.
 *
 * Declarative data-format definitions resolved into configured backends at
 * build time: typed errors, Effect services for type and backend lookup,
 * and the JSON-family backend variants.
 */

// ============================================================================
// Definitions
// ============================================================================

export { JsonDataFormat } from "./definition/json-data-format.js";
export type {
	JsonDataFormatInit,
	JsonDataFormatProperties,
} from "./definition/json-data-format.js";
export type { DataFormatDefinition } from "./definition/data-format-definition.js";
export {
	DEFAULT_JSON_LIBRARY,
	JSON_DATA_FORMAT_NAMES,
	JSON_LIBRARIES,
	dataFormatNameOf,
	isJsonLibrary,
} from "./definition/json-library.js";
export type { JsonLibrary } from "./definition/json-library.js";

// ============================================================================
// Build
// ============================================================================

export {
	buildDataFormat,
	buildDataFormatSync,
	makeDataFormatLayer,
} from "./build/build-data-format.js";
export type {
	BuildOptions,
	DataFormatLayerConfig,
	DataFormatServices,
} from "./build/build-data-format.js";
export { configureBackend } from "./build/configure.js";
export type { ConfigureOptions, ConfigureResult } from "./build/configure.js";
export {
	BuildContext,
	BuildContextLive,
	DATA_FORMAT_NAME_PROPERTY,
	makeBuildContext,
} from "./build/build-context.js";
export type { BuildContextShape } from "./build/build-context.js";

// ============================================================================
// Type Resolution
// ============================================================================

export { makeTypeHandle } from "./types/type-handle.js";
export type { TypeHandle } from "./types/type-handle.js";
export {
	TypeResolver,
	makeTypeRegistry,
	makeTypeRegistryLayer,
} from "./resolution/type-resolver.js";
export type { TypeResolverShape } from "./resolution/type-resolver.js";
export {
	TypeRef,
	resolveTypeRef,
	typeRefHandle,
	typeRefName,
	withTypeHandle,
	withTypeName,
} from "./resolution/type-ref.js";

// ============================================================================
// Backends
// ============================================================================

export {
	PROPERTY_ORDER,
	UNMARSHAL_TYPE_HEADER,
} from "./backends/backend.js";
export type {
	AllPropertySetters,
	BackendFactory,
	ConfiguredProperties,
	DataFormatBackend,
	DataFormatProperties,
	MessageHeaders,
	PropertyName,
	PropertySetter,
	PropertySetters,
} from "./backends/backend.js";
export {
	BackendRegistry,
	makeBackendRegistry,
	makeBackendRegistryLayer,
} from "./backends/backend-registry.js";
export type { BackendRegistryShape } from "./backends/backend-registry.js";
export {
	DefaultBackendRegistryLayer,
	DefaultBackends,
} from "./backends/presets.js";
export { makeJsonBackend } from "./backends/json-backend.js";
export type { JsonBackendOptions, JsonEngine } from "./backends/json-backend.js";
export { nativeJsonBackend, nativeJsonEngine } from "./backends/native.js";
export { json5Backend, json5Engine } from "./backends/json5.js";
export { hjsonBackend, hjsonEngine } from "./backends/hjson.js";
export {
	INCLUDE_POLICIES,
	applyIncludePolicy,
	isIncludePolicy,
} from "./backends/include-policy.js";
export type { IncludePolicy } from "./backends/include-policy.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	BackendNotFoundError,
	ConfigurationResolutionError,
	DataFormatError,
	TypeNotFoundError,
	UnsupportedPropertyError,
} from "./errors/index.js";
export type {
	DataFormatBuildError,
	FormatdefError,
	TypeNameAttribute,
} from "./errors/index.js";
