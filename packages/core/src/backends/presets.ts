import { JSON_DATA_FORMAT_NAMES } from "../definition/json-library.js";
import type { BackendFactory } from "./backend.js";
import { makeBackendRegistryLayer } from "./backend-registry.js";
import { hjsonBackend } from "./hjson.js";
import { json5Backend } from "./json5.js";
import { nativeJsonBackend } from "./native.js";

// ============================================================================
// Preset Backends
// ============================================================================

/**
 * The three JSON variants keyed by their data format names:
 * - json-native (default)
 * - json-json5
 * - json-hjson
 */
export const DefaultBackends: Readonly<Record<string, BackendFactory>> = {
	[JSON_DATA_FORMAT_NAMES.Native]: nativeJsonBackend,
	[JSON_DATA_FORMAT_NAMES.Json5]: json5Backend,
	[JSON_DATA_FORMAT_NAMES.Hjson]: hjsonBackend,
};

/**
 * BackendRegistry Layer over DefaultBackends. Requires a TypeResolver.
 *
 * @example
 * ```typescript
 * const layer = DefaultBackendRegistryLayer.pipe(
 *   Layer.provide(makeTypeRegistryLayer([Order])),
 * )
 * ```
 */
export const DefaultBackendRegistryLayer =
	makeBackendRegistryLayer(DefaultBackends);
