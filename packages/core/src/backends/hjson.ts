import Hjson from "hjson";
import { dataFormatNameOf } from "../definition/json-library.js";
import type { BackendFactory } from "./backend.js";
import { type JsonEngine, makeJsonBackend } from "./json-backend.js";

/**
 * Hjson (Human JSON). Pretty output is Hjson proper; compact output is plain
 * JSON, which every Hjson reader accepts.
 *
 * @see https://hjson.github.io for format specification
 */
export const hjsonEngine: JsonEngine = {
	name: "hjson",
	parse: (raw) => Hjson.parse(raw),
	stringify: (data, indent) =>
		indent === undefined
			? JSON.stringify(data)
			: Hjson.stringify(data, { space: indent }),
};

export const hjsonBackend: BackendFactory = (resolver) =>
	makeJsonBackend({
		dataFormatName: dataFormatNameOf("Hjson"),
		engine: hjsonEngine,
		resolver,
		capabilities: ({ unmarshalType, prettyPrint, useList }) => ({
			unmarshalType,
			prettyPrint,
			useList,
		}),
	});
