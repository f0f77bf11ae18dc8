import { Effect } from "effect";
import type {
	ConfiguredProperties,
	DataFormatBackend,
	PropertyName,
	PropertySetters,
} from "../backends/backend.js";
import { UnsupportedPropertyError } from "../errors/resolution-errors.js";

// ============================================================================
// Configuration Applicator
// ============================================================================

export interface ConfigureOptions {
	/**
	 * Fail with UnsupportedPropertyError when a set property has no setter on
	 * the backend, instead of ignoring it.
	 */
	readonly strict?: boolean;
}

export interface ConfigureResult {
	readonly applied: ReadonlyArray<PropertyName>;
	readonly ignored: ReadonlyArray<PropertyName>;
}

interface PlannedProperty {
	readonly name: PropertyName;
	/** Undefined when the backend has no setter for the property. */
	readonly apply: (() => Effect.Effect<void>) | undefined;
}

const plan = <A>(
	name: PropertyName,
	value: A | undefined,
	setter: ((value: A) => Effect.Effect<void>) | undefined,
): PlannedProperty | undefined => {
	if (value === undefined) return undefined;
	return {
		name,
		apply: setter === undefined ? undefined : () => setter(value),
	};
};

/**
 * Pairs each set property with its setter, in PROPERTY_ORDER.
 */
const planProperties = (
	setters: PropertySetters,
	properties: ConfiguredProperties,
): ReadonlyArray<PlannedProperty> =>
	[
		plan("unmarshalType", properties.unmarshalType, setters.unmarshalType),
		plan("prettyPrint", properties.prettyPrint, setters.prettyPrint),
		plan("view", properties.view, setters.view),
		plan("include", properties.include, setters.include),
		plan(
			"allowTypeHeaderOverride",
			properties.allowTypeHeaderOverride,
			setters.allowTypeHeaderOverride,
		),
		plan("collectionType", properties.collectionType, setters.collectionType),
		plan("useList", properties.useList, setters.useList),
		plan(
			"enableAnnotationInterop",
			properties.enableAnnotationInterop,
			setters.enableAnnotationInterop,
		),
	].filter((entry): entry is PlannedProperty => entry !== undefined);

/**
 * Pushes every set property onto a freshly created backend.
 *
 * Absent properties are never passed to a setter, so the backend default
 * stays in effect. Properties the backend exposes no setter for are skipped
 * (logged at debug level), or fail the call in strict mode before any setter
 * runs.
 */
export const configureBackend = (
	backend: DataFormatBackend,
	properties: ConfiguredProperties,
	options?: ConfigureOptions,
): Effect.Effect<ConfigureResult, UnsupportedPropertyError> =>
	Effect.gen(function* () {
		const planned = planProperties(backend.properties, properties);
		const ignored = planned
			.filter((property) => property.apply === undefined)
			.map((property) => property.name);

		if (options?.strict === true && ignored.length > 0) {
			return yield* Effect.fail(
				new UnsupportedPropertyError({
					dataFormatName: backend.dataFormatName,
					properties: ignored,
					message: `Backend '${backend.dataFormatName}' does not support: ${ignored.join(", ")}`,
				}),
			);
		}

		const applied: Array<PropertyName> = [];
		for (const property of planned) {
			if (property.apply === undefined) {
				yield* Effect.logDebug(
					`Property '${property.name}' not supported by '${backend.dataFormatName}', ignored`,
				);
				continue;
			}
			yield* property.apply();
			applied.push(property.name);
		}

		return { applied, ignored };
	});
