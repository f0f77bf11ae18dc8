import type { Effect } from "effect";
import type { ConfiguredProperties } from "../backends/backend.js";
import type { ConfigurationResolutionError } from "../errors/resolution-errors.js";
import type { TypeResolver } from "../resolution/type-resolver.js";

/**
 * What the build step needs from any declarative data-format description.
 */
export interface DataFormatDefinition {
	/** Backend registry key of the chosen variant. */
	readonly dataFormatName: string;
	/** Resolves pending type names and caches the handles on the definition. */
	readonly resolveTypes: () => Effect.Effect<
		void,
		ConfigurationResolutionError,
		TypeResolver
	>;
	/** Properties the user set, after type resolution. */
	readonly configuredProperties: () => ConfiguredProperties;
}
