import type { Schema } from "effect";

// ============================================================================
// TypeHandle: runtime stand-in for a named type
// ============================================================================

/**
 * A resolved type: its fully-qualified name and the Schema that decodes
 * values into it.
 *
 * Backends unmarshal by decoding through `schema` and filter views by
 * encoding through it.
 */
export interface TypeHandle {
	readonly name: string;
	readonly schema: Schema.Schema.AnyNoContext;
}

/**
 * @example
 * ```typescript
 * const Order = makeTypeHandle(
 *   "com.example.Order",
 *   Schema.Struct({ id: Schema.String, total: Schema.Number }),
 * );
 * ```
 */
export const makeTypeHandle = (
	name: string,
	schema: Schema.Schema.AnyNoContext,
): TypeHandle => ({ name, schema });
