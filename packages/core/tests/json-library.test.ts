import { describe, expect, it } from "vitest";
import {
	DEFAULT_JSON_LIBRARY,
	dataFormatNameOf,
	isJsonLibrary,
	JSON_LIBRARIES,
} from "../src/definition/json-library.js";

describe("JsonLibrary dispatch", () => {
	it("defaults to the first declared library", () => {
		expect(DEFAULT_JSON_LIBRARY).toBe(JSON_LIBRARIES[0]);
		expect(DEFAULT_JSON_LIBRARY).toBe("Native");
	});

	it("maps each library to its backend key", () => {
		expect(dataFormatNameOf("Native")).toBe("json-native");
		expect(dataFormatNameOf("Json5")).toBe("json-json5");
		expect(dataFormatNameOf("Hjson")).toBe("json-hjson");
	});

	it("falls back to the default key when no library is given", () => {
		expect(dataFormatNameOf()).toBe("json-native");
		expect(dataFormatNameOf(undefined)).toBe("json-native");
	});

	it("recognizes declared library names only", () => {
		expect(isJsonLibrary("Json5")).toBe(true);
		expect(isJsonLibrary("json5")).toBe(false);
		expect(isJsonLibrary("Yaml")).toBe(false);
	});
});
