import { Context, Effect, Layer } from "effect";
import { BackendNotFoundError } from "../errors/resolution-errors.js";
import {
	TypeResolver,
	type TypeResolverShape,
} from "../resolution/type-resolver.js";
import type { BackendFactory, DataFormatBackend } from "./backend.js";

// ============================================================================
// BackendRegistry Effect Service
// ============================================================================

export interface BackendRegistryShape {
	readonly createInstance: (
		dataFormatName: string,
	) => Effect.Effect<DataFormatBackend, BackendNotFoundError>;
	readonly dataFormatNames: ReadonlyArray<string>;
}

export class BackendRegistry extends Context.Tag("BackendRegistry")<
	BackendRegistry,
	BackendRegistryShape
>() {}

// ============================================================================
// makeBackendRegistry: Compositor over backend factories
// ============================================================================

/**
 * Creates a BackendRegistry from factories keyed by data format name.
 * Each `createInstance` call returns a fresh, unconfigured backend.
 */
export const makeBackendRegistry = (
	factories: Readonly<Record<string, BackendFactory>>,
	resolver: TypeResolverShape,
): BackendRegistryShape => {
	const byName = new Map(Object.entries(factories));
	const dataFormatNames = Array.from(byName.keys());

	return {
		dataFormatNames,
		createInstance: (dataFormatName) => {
			const factory = byName.get(dataFormatName);
			if (factory === undefined) {
				return Effect.fail(
					new BackendNotFoundError({
						dataFormatName,
						available: dataFormatNames,
						message:
							dataFormatNames.length > 0
								? `No backend registered for '${dataFormatName}'. Available backends: ${dataFormatNames.join(", ")}`
								: `No backend registered for '${dataFormatName}'. No backends registered.`,
					}),
				);
			}
			return Effect.sync(() => factory(resolver));
		},
	};
};

/**
 * BackendRegistry Layer whose backends resolve run-time type names through
 * the TypeResolver in scope.
 */
export const makeBackendRegistryLayer = (
	factories: Readonly<Record<string, BackendFactory>>,
): Layer.Layer<BackendRegistry, never, TypeResolver> =>
	Layer.effect(
		BackendRegistry,
		Effect.map(TypeResolver, (resolver) =>
			makeBackendRegistry(factories, resolver),
		),
	);
