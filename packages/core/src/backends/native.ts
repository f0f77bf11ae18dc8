import { dataFormatNameOf } from "../definition/json-library.js";
import type { BackendFactory } from "./backend.js";
import { type JsonEngine, makeJsonBackend } from "./json-backend.js";

export const nativeJsonEngine: JsonEngine = {
	name: "json",
	parse: (raw) => JSON.parse(raw),
	stringify: (data, indent) => JSON.stringify(data, null, indent),
};

/**
 * Default variant: the runtime's own JSON. Supports an unmarshal type,
 * pretty printing and the include policy.
 */
export const nativeJsonBackend: BackendFactory = (resolver) =>
	makeJsonBackend({
		dataFormatName: dataFormatNameOf("Native"),
		engine: nativeJsonEngine,
		resolver,
		capabilities: ({ unmarshalType, prettyPrint, include }) => ({
			unmarshalType,
			prettyPrint,
			include,
		}),
	});
