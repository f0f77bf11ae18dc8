import { Effect, Layer } from "effect";
import type { BackendFactory, DataFormatBackend } from "../backends/backend.js";
import {
	BackendRegistry,
	makeBackendRegistryLayer,
} from "../backends/backend-registry.js";
import { DefaultBackends } from "../backends/presets.js";
import type { DataFormatDefinition } from "../definition/data-format-definition.js";
import type { DataFormatBuildError } from "../errors/resolution-errors.js";
import {
	makeTypeRegistryLayer,
	TypeResolver,
} from "../resolution/type-resolver.js";
import type { TypeHandle } from "../types/type-handle.js";
import {
	BuildContext,
	BuildContextLive,
	DATA_FORMAT_NAME_PROPERTY,
} from "./build-context.js";
import { type ConfigureOptions, configureBackend } from "./configure.js";

// ============================================================================
// buildDataFormat: Declared → VariantResolved → TypesResolved → Applied
// ============================================================================

export type BuildOptions = ConfigureOptions;

export type DataFormatServices = TypeResolver | BackendRegistry | BuildContext;

/**
 * Turns a definition into a configured backend instance.
 *
 * 1. Records the variant's data format name on the BuildContext
 * 2. Resolves pending type names (cached on the definition)
 * 3. Creates a backend through the BackendRegistry
 * 4. Applies the set properties
 *
 * A failure at any step fails the whole build and no backend is returned.
 * Type resolution runs before the backend is created.
 */
export const buildDataFormat = (
	definition: DataFormatDefinition,
	options?: BuildOptions,
): Effect.Effect<DataFormatBackend, DataFormatBuildError, DataFormatServices> => {
	const dataFormatName = definition.dataFormatName;

	return Effect.gen(function* () {
		const context = yield* BuildContext;
		yield* context.setProperty(DATA_FORMAT_NAME_PROPERTY, dataFormatName);
		yield* Effect.logDebug("Variant resolved");

		yield* definition.resolveTypes();
		yield* Effect.logDebug("Types resolved");

		const registry = yield* BackendRegistry;
		const backend = yield* registry.createInstance(dataFormatName);
		const { applied } = yield* configureBackend(
			backend,
			definition.configuredProperties(),
			options,
		);
		yield* Effect.logDebug(
			applied.length > 0
				? `Applied ${applied.join(", ")}`
				: "Applied no properties, backend defaults in effect",
		);

		return backend;
	}).pipe(Effect.annotateLogs({ dataFormatName }));
};

// ============================================================================
// Layer wiring
// ============================================================================

export interface DataFormatLayerConfig {
	readonly types?: ReadonlyArray<TypeHandle>;
	/** Defaults to DefaultBackends. */
	readonly backends?: Readonly<Record<string, BackendFactory>>;
}

/**
 * Provides TypeResolver, BackendRegistry and a fresh BuildContext.
 */
export const makeDataFormatLayer = (
	config?: DataFormatLayerConfig,
): Layer.Layer<DataFormatServices> => {
	const resolverLayer = makeTypeRegistryLayer(config?.types ?? []);
	const registryLayer = makeBackendRegistryLayer(
		config?.backends ?? DefaultBackends,
	).pipe(Layer.provide(resolverLayer));
	return Layer.mergeAll(resolverLayer, registryLayer, BuildContextLive);
};

/**
 * Builds synchronously against a fresh layer. Failures are thrown by
 * `Effect.runSync` as a FiberFailure wrapping the tagged error.
 */
export const buildDataFormatSync = (
	definition: DataFormatDefinition,
	config?: DataFormatLayerConfig & BuildOptions,
): DataFormatBackend =>
	Effect.runSync(
		buildDataFormat(definition, config).pipe(
			Effect.provide(makeDataFormatLayer(config)),
		),
	);
