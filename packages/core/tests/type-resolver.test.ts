import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
	makeTypeRegistry,
	makeTypeRegistryLayer,
	TypeResolver,
} from "../src/resolution/type-resolver.js";
import { makeTypeHandle } from "../src/types/type-handle.js";
import { Order, OrderSchema, OrderSummary } from "./helpers/types.js";

describe("makeTypeRegistry", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("resolves a registered name to its handle", () => {
		const registry = makeTypeRegistry([Order, OrderSummary]);

		const handle = Effect.runSync(
			registry.resolveMandatoryType("com.example.Order"),
		);

		expect(handle).toBe(Order);
	});

	it("fails with TypeNotFoundError listing the registered types", () => {
		const registry = makeTypeRegistry([Order, OrderSummary]);

		const error = Effect.runSync(
			Effect.flip(registry.resolveMandatoryType("does.not.Exist")),
		);

		expect(error._tag).toBe("TypeNotFoundError");
		expect(error.typeName).toBe("does.not.Exist");
		expect(error.message).toBe(
			"Type 'does.not.Exist' not found. Registered types: com.example.Order, com.example.OrderSummary",
		);
	});

	it("says so when no types are registered", () => {
		const registry = makeTypeRegistry([]);

		const error = Effect.runSync(
			Effect.flip(registry.resolveMandatoryType("com.example.Order")),
		);

		expect(error.message).toBe(
			"Type 'com.example.Order' not found. No types registered.",
		);
	});

	it("warns on duplicate names and keeps the last registration", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const replacement = makeTypeHandle("com.example.Order", OrderSchema);

		const registry = makeTypeRegistry([Order, replacement]);
		const handle = Effect.runSync(
			registry.resolveMandatoryType("com.example.Order"),
		);

		expect(handle).toBe(replacement);
		expect(warn).toHaveBeenCalledWith(
			"Duplicate type 'com.example.Order': last registration wins",
		);
	});
});

describe("makeTypeRegistryLayer", () => {
	it("provides the registry as the TypeResolver service", async () => {
		const handle = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* TypeResolver;
				return yield* resolver.resolveMandatoryType("com.example.OrderSummary");
			}).pipe(Effect.provide(makeTypeRegistryLayer([Order, OrderSummary]))),
		);

		expect(handle).toBe(OrderSummary);
	});
});
