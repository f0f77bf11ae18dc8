import JSON5 from "json5";
import { dataFormatNameOf } from "../definition/json-library.js";
import type { BackendFactory } from "./backend.js";
import { type JsonEngine, makeJsonBackend } from "./json-backend.js";

/**
 * JSON5 accepts comments, trailing commas and unquoted keys on read and
 * prints JSON5 on write.
 */
export const json5Engine: JsonEngine = {
	name: "json5",
	parse: (raw) => JSON5.parse(raw),
	stringify: (data, indent) => JSON5.stringify(data, null, indent),
};

/**
 * The full-featured variant: every property has a setter, including views,
 * the type header override, collections and annotation interop.
 */
export const json5Backend: BackendFactory = (resolver) =>
	makeJsonBackend({
		dataFormatName: dataFormatNameOf("Json5"),
		engine: json5Engine,
		resolver,
		capabilities: (setters) => setters,
	});
