import { describe, expect, it } from "vitest";
import {
	applyIncludePolicy,
	isIncludePolicy,
} from "../src/backends/include-policy.js";

describe("applyIncludePolicy", () => {
	const data = {
		id: "o-1",
		note: null,
		tags: [],
		label: "",
		customer: { name: "Ada", email: null },
		lines: [{ sku: "a", discount: null }, null],
	};

	it("ALWAYS returns the value untouched", () => {
		expect(applyIncludePolicy(data, "ALWAYS")).toBe(data);
	});

	it("NON_NULL drops null fields at every depth", () => {
		expect(applyIncludePolicy(data, "NON_NULL")).toEqual({
			id: "o-1",
			tags: [],
			label: "",
			customer: { name: "Ada" },
			lines: [{ sku: "a" }, null],
		});
	});

	it("NON_EMPTY also drops empty strings, arrays and objects", () => {
		expect(
			applyIncludePolicy({ ...data, meta: { source: null } }, "NON_EMPTY"),
		).toEqual({
			id: "o-1",
			customer: { name: "Ada" },
			lines: [{ sku: "a" }, null],
		});
	});

	it("leaves non-plain objects as they are", () => {
		const placedAt = new Date("2024-01-02T03:04:05.000Z");

		const result = applyIncludePolicy({ placedAt }, "NON_EMPTY");

		expect(result).toEqual({ placedAt });
	});
});

describe("isIncludePolicy", () => {
	it("accepts the declared policies only", () => {
		expect(isIncludePolicy("NON_NULL")).toBe(true);
		expect(isIncludePolicy("non_null")).toBe(false);
		expect(isIncludePolicy("")).toBe(false);
	});
});
