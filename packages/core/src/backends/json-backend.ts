import { Effect, type ParseResult, Schema } from "effect";
import { DataFormatError } from "../errors/format-errors.js";
import type { TypeResolverShape } from "../resolution/type-resolver.js";
import type { TypeHandle } from "../types/type-handle.js";
import {
	type AllPropertySetters,
	type DataFormatBackend,
	type MessageHeaders,
	type PropertySetters,
	UNMARSHAL_TYPE_HEADER,
} from "./backend.js";
import {
	applyIncludePolicy,
	INCLUDE_POLICIES,
	type IncludePolicy,
	isIncludePolicy,
} from "./include-policy.js";

// ============================================================================
// JsonEngine: the library a backend variant delegates to
// ============================================================================

/**
 * Synchronous parse/print functions that throw on failure, in the manner of
 * a FormatCodec. `indent` is undefined for compact output. `stringify`
 * returns undefined for values with no textual form, such as `undefined`
 * or a function.
 */
export interface JsonEngine {
	readonly name: string;
	readonly parse: (raw: string) => unknown;
	readonly stringify: (
		data: unknown,
		indent: number | undefined,
	) => string | undefined;
}

export interface JsonBackendOptions {
	readonly dataFormatName: string;
	readonly engine: JsonEngine;
	readonly resolver: TypeResolverShape;
	/**
	 * Picks the setters this variant exposes.
	 */
	readonly capabilities: (setters: AllPropertySetters) => PropertySetters;
}

const PRETTY_INDENT = 2;

interface JsonBackendSettings {
	unmarshalType: TypeHandle | undefined;
	prettyPrint: boolean;
	view: TypeHandle | undefined;
	include: IncludePolicy;
	allowTypeHeaderOverride: boolean;
	collectionType: TypeHandle | undefined;
	useList: boolean;
	enableAnnotationInterop: boolean;
}

const describeCause = (cause: unknown): string =>
	cause instanceof Error ? cause.message : "Unknown error";

/**
 * Encodes through a schema, element-wise for arrays. Struct schemas drop
 * fields they do not declare.
 */
const encodeThrough = (
	handle: TypeHandle,
	value: unknown,
): Effect.Effect<unknown, ParseResult.ParseError> => {
	const encode = Schema.encodeUnknown(handle.schema);
	return Array.isArray(value)
		? Effect.forEach(value, (item) => encode(item))
		: encode(value);
};

/**
 * Creates a JSON-family backend over an engine.
 *
 * All variants share marshal/unmarshal behaviour; they differ in the engine
 * and in which setters `capabilities` exposes. A setting nobody can reach
 * keeps its default.
 */
export const makeJsonBackend = (
	options: JsonBackendOptions,
): DataFormatBackend => {
	const { dataFormatName, engine, resolver } = options;

	const settings: JsonBackendSettings = {
		unmarshalType: undefined,
		prettyPrint: false,
		view: undefined,
		include: "ALWAYS",
		allowTypeHeaderOverride: false,
		collectionType: undefined,
		useList: false,
		enableAnnotationInterop: false,
	};

	const failure = (
		operation: "marshal" | "unmarshal",
		cause: unknown,
	): DataFormatError =>
		new DataFormatError({
			format: engine.name,
			operation,
			message: `Failed to ${operation} ${engine.name} data: ${describeCause(cause)}`,
			cause,
		});

	const setters: AllPropertySetters = {
		unmarshalType: (handle) =>
			Effect.sync(() => {
				settings.unmarshalType = handle;
			}),
		prettyPrint: (enabled) =>
			Effect.sync(() => {
				settings.prettyPrint = enabled;
			}),
		view: (handle) =>
			Effect.sync(() => {
				settings.view = handle;
			}),
		include: (policy) =>
			isIncludePolicy(policy)
				? Effect.sync(() => {
						settings.include = policy;
					})
				: Effect.logWarning(
						`Unknown include policy '${policy}' ignored. Expected one of: ${INCLUDE_POLICIES.join(", ")}`,
					),
		allowTypeHeaderOverride: (allowed) =>
			Effect.sync(() => {
				settings.allowTypeHeaderOverride = allowed;
			}),
		collectionType: (handle) =>
			Effect.sync(() => {
				settings.collectionType = handle;
			}),
		useList: (enabled) =>
			Effect.sync(() => {
				settings.useList = enabled;
			}),
		enableAnnotationInterop: (enabled) =>
			Effect.sync(() => {
				settings.enableAnnotationInterop = enabled;
			}),
	};

	const shapeForOutput = (
		value: unknown,
	): Effect.Effect<unknown, ParseResult.ParseError> => {
		if (settings.view !== undefined) {
			return encodeThrough(settings.view, value);
		}
		if (settings.enableAnnotationInterop && settings.unmarshalType !== undefined) {
			return encodeThrough(settings.unmarshalType, value);
		}
		return Effect.succeed(value);
	};

	const decodeThrough = (handle: TypeHandle, value: unknown) =>
		Schema.decodeUnknown(handle.schema)(value).pipe(
			Effect.mapError((error) => failure("unmarshal", error)),
		);

	const targetType = (
		headers: MessageHeaders | undefined,
	): Effect.Effect<TypeHandle | undefined, DataFormatError> => {
		const headerType = settings.allowTypeHeaderOverride
			? headers?.[UNMARSHAL_TYPE_HEADER]
			: undefined;
		if (headerType === undefined) {
			return Effect.succeed(settings.unmarshalType);
		}
		return resolver
			.resolveMandatoryType(headerType)
			.pipe(Effect.mapError((error) => failure("unmarshal", error)));
	};

	return {
		dataFormatName,
		properties: options.capabilities(setters),

		marshal: (value) =>
			Effect.gen(function* () {
				const shaped = yield* shapeForOutput(value).pipe(
					Effect.mapError((error) => failure("marshal", error)),
				);
				const included = applyIncludePolicy(shaped, settings.include);
				const text = yield* Effect.try({
					try: () =>
						engine.stringify(
							included,
							settings.prettyPrint ? PRETTY_INDENT : undefined,
						),
					catch: (error) => failure("marshal", error),
				});
				if (text === undefined) {
					return yield* Effect.fail(
						new DataFormatError({
							format: engine.name,
							operation: "marshal",
							message: `Failed to marshal ${engine.name} data: value has no ${engine.name} representation`,
						}),
					);
				}
				return text;
			}),

		unmarshal: (body, headers) =>
			Effect.gen(function* () {
				const parsed = yield* Effect.try({
					try: () => engine.parse(body),
					catch: (error) => failure("unmarshal", error),
				});
				const itemType = yield* targetType(headers);
				const collectionType = settings.collectionType;

				if (settings.useList || collectionType !== undefined) {
					if (!Array.isArray(parsed)) {
						return yield* Effect.fail(
							new DataFormatError({
								format: engine.name,
								operation: "unmarshal",
								message: `Failed to unmarshal ${engine.name} data: expected an array for a collection`,
							}),
						);
					}
					const items =
						itemType === undefined
							? parsed
							: yield* Effect.forEach(parsed, (item) =>
									decodeThrough(itemType, item),
								);
					return collectionType === undefined
						? items
						: yield* decodeThrough(collectionType, items);
				}

				return itemType === undefined
					? parsed
					: yield* decodeThrough(itemType, parsed);
			}),
	};
};
