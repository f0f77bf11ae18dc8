import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	BuildContext,
	BuildContextLive,
	makeBuildContext,
} from "../src/build/build-context.js";

describe("BuildContext", () => {
	it("stores and reads back properties", () => {
		const result = Effect.runSync(
			Effect.gen(function* () {
				const context = yield* makeBuildContext();
				yield* context.setProperty("dataFormatName", "json-json5");
				yield* context.setProperty("stage", 3);
				return {
					name: yield* context.getProperty("dataFormatName"),
					missing: yield* context.getProperty("nope"),
					all: yield* context.properties,
				};
			}),
		);

		expect(result.name).toEqual(Option.some("json-json5"));
		expect(Option.isNone(result.missing)).toBe(true);
		expect(Array.from(result.all.entries()).sort()).toEqual([
			["dataFormatName", "json-json5"],
			["stage", 3],
		]);
	});

	it("overwrites a property on a second set", () => {
		const name = Effect.runSync(
			Effect.gen(function* () {
				const context = yield* BuildContext;
				yield* context.setProperty("dataFormatName", "json-native");
				yield* context.setProperty("dataFormatName", "json-hjson");
				return yield* context.getProperty("dataFormatName");
			}).pipe(Effect.provide(BuildContextLive)),
		);

		expect(Option.getOrUndefined(name)).toBe("json-hjson");
	});

	it("gives each layer build its own bag", () => {
		const read = Effect.gen(function* () {
			const context = yield* BuildContext;
			return yield* context.getProperty("dataFormatName");
		});
		const write = Effect.gen(function* () {
			const context = yield* BuildContext;
			yield* context.setProperty("dataFormatName", "json-json5");
		});

		Effect.runSync(write.pipe(Effect.provide(BuildContextLive)));
		const fresh = Effect.runSync(read.pipe(Effect.provide(BuildContextLive)));

		expect(Option.isNone(fresh)).toBe(true);
	});
});
