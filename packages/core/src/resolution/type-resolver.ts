import { Context, Effect, Layer } from "effect";
import { TypeNotFoundError } from "../errors/resolution-errors.js";
import type { TypeHandle } from "../types/type-handle.js";

// ============================================================================
// TypeResolver Effect Service
// ============================================================================

export interface TypeResolverShape {
	readonly resolveMandatoryType: (
		typeName: string,
	) => Effect.Effect<TypeHandle, TypeNotFoundError>;
}

export class TypeResolver extends Context.Tag("TypeResolver")<
	TypeResolver,
	TypeResolverShape
>() {}

// ============================================================================
// makeTypeRegistry: in-process resolver over known handles
// ============================================================================

/**
 * Creates a TypeResolver backed by a name → handle map.
 *
 * Lookups never suspend. Duplicate names log a console.warn and the last
 * handle wins.
 */
export const makeTypeRegistry = (
	handles: ReadonlyArray<TypeHandle>,
): TypeResolverShape => {
	const byName = new Map<string, TypeHandle>();
	for (const handle of handles) {
		if (byName.has(handle.name)) {
			console.warn(`Duplicate type '${handle.name}': last registration wins`);
		}
		byName.set(handle.name, handle);
	}

	const registered = Array.from(byName.keys()).join(", ");

	return {
		resolveMandatoryType: (typeName) => {
			const handle = byName.get(typeName);
			if (handle === undefined) {
				return Effect.fail(
					new TypeNotFoundError({
						typeName,
						message:
							registered.length > 0
								? `Type '${typeName}' not found. Registered types: ${registered}`
								: `Type '${typeName}' not found. No types registered.`,
					}),
				);
			}
			return Effect.succeed(handle);
		},
	};
};

export const makeTypeRegistryLayer = (
	handles: ReadonlyArray<TypeHandle>,
): Layer.Layer<TypeResolver> =>
	Layer.succeed(TypeResolver, makeTypeRegistry(handles));
