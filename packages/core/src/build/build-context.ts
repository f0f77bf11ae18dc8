import { Context, Effect, HashMap, Layer, type Option, Ref } from "effect";

// ============================================================================
// BuildContext Effect Service: property bag of the enclosing pipeline build
// ============================================================================

export interface BuildContextShape {
	readonly setProperty: (name: string, value: unknown) => Effect.Effect<void>;
	readonly getProperty: (name: string) => Effect.Effect<Option.Option<unknown>>;
	readonly properties: Effect.Effect<ReadonlyMap<string, unknown>>;
}

export class BuildContext extends Context.Tag("BuildContext")<
	BuildContext,
	BuildContextShape
>() {}

/**
 * Name under which a build records the selected backend.
 */
export const DATA_FORMAT_NAME_PROPERTY = "dataFormatName";

export const makeBuildContext = (): Effect.Effect<BuildContextShape> =>
	Effect.map(Ref.make(HashMap.empty<string, unknown>()), (ref) => ({
		setProperty: (name, value) => Ref.update(ref, HashMap.set(name, value)),
		getProperty: (name) =>
			Effect.map(Ref.get(ref), (bag) => HashMap.get(bag, name)),
		properties: Effect.map(
			Ref.get(ref),
			(bag): ReadonlyMap<string, unknown> => new Map(bag),
		),
	}));

/**
 * A fresh, empty property bag per Layer build.
 */
export const BuildContextLive: Layer.Layer<BuildContext> = Layer.effect(
	BuildContext,
	makeBuildContext(),
);
