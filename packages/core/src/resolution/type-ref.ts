import { Data, Effect } from "effect";
import {
	ConfigurationResolutionError,
	type TypeNameAttribute,
} from "../errors/resolution-errors.js";
import type { TypeHandle } from "../types/type-handle.js";
import { TypeResolver } from "./type-resolver.js";

// ============================================================================
// TypeRef: name-or-handle duality with lazy resolution
// ============================================================================

/**
 * A descriptor's reference to a type.
 *
 * - `Unset`: neither a name nor a handle was given
 * - `Pending`: a name waiting to be resolved at build time
 * - `Resolved`: a handle, either supplied directly or cached from a resolution.
 *   `name` is whatever name the descriptor also carries; it is not consulted.
 */
export type TypeRef = Data.TaggedEnum<{
	Unset: {};
	Pending: { readonly name: string };
	Resolved: { readonly handle: TypeHandle; readonly name: string | undefined };
}>;

export const TypeRef = Data.taggedEnum<TypeRef>();

export const typeRefName = (ref: TypeRef): string | undefined => {
	switch (ref._tag) {
		case "Unset":
			return undefined;
		case "Pending":
		case "Resolved":
			return ref.name;
	}
};

export const typeRefHandle = (ref: TypeRef): TypeHandle | undefined =>
	ref._tag === "Resolved" ? ref.handle : undefined;

/**
 * Sets the name side. A resolved handle is kept: handle wins over name.
 */
export const withTypeName = (
	ref: TypeRef,
	name: string | undefined,
): TypeRef => {
	if (ref._tag === "Resolved") {
		return TypeRef.Resolved({ handle: ref.handle, name });
	}
	return name === undefined ? TypeRef.Unset() : TypeRef.Pending({ name });
};

/**
 * Sets the handle side. Clearing the handle falls back to the name, if any.
 */
export const withTypeHandle = (
	ref: TypeRef,
	handle: TypeHandle | undefined,
): TypeRef => {
	const name = typeRefName(ref);
	if (handle === undefined) {
		return name === undefined ? TypeRef.Unset() : TypeRef.Pending({ name });
	}
	return TypeRef.Resolved({ handle, name });
};

/**
 * Resolves a `Pending` reference through the TypeResolver service.
 *
 * `Unset` and `Resolved` are returned as-is without touching the resolver.
 * A lookup failure becomes a ConfigurationResolutionError naming `attribute`.
 */
export const resolveTypeRef = (
	ref: TypeRef,
	attribute: TypeNameAttribute,
): Effect.Effect<TypeRef, ConfigurationResolutionError, TypeResolver> => {
	if (ref._tag !== "Pending") {
		return Effect.succeed(ref);
	}

	const typeName = ref.name;
	return Effect.gen(function* () {
		const resolver = yield* TypeResolver;
		const handle = yield* resolver.resolveMandatoryType(typeName).pipe(
			Effect.mapError(
				(cause) =>
					new ConfigurationResolutionError({
						attribute,
						typeName,
						message: `Cannot resolve ${attribute} '${typeName}': ${cause.message}`,
						cause,
					}),
			),
		);
		yield* Effect.logDebug(`Resolved ${attribute} '${typeName}'`);
		return TypeRef.Resolved({ handle, name: typeName });
	});
};
