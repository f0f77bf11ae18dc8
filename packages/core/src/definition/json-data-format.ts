import { Effect, type Types } from "effect";
import type { ConfiguredProperties } from "../backends/backend.js";
import type { ConfigurationResolutionError } from "../errors/resolution-errors.js";
import type { TypeResolver } from "../resolution/type-resolver.js";
import {
	resolveTypeRef,
	TypeRef,
	typeRefHandle,
	typeRefName,
	withTypeHandle,
	withTypeName,
} from "../resolution/type-ref.js";
import type { TypeHandle } from "../types/type-handle.js";
import type { DataFormatDefinition } from "./data-format-definition.js";
import {
	DEFAULT_JSON_LIBRARY,
	dataFormatNameOf,
	type JsonLibrary,
} from "./json-library.js";

export interface JsonDataFormatInit {
	readonly library?: JsonLibrary;
	readonly prettyPrint?: boolean;
	readonly unmarshalTypeName?: string;
	readonly unmarshalType?: TypeHandle;
	readonly collectionTypeName?: string;
	readonly collectionType?: TypeHandle;
	readonly view?: TypeHandle;
	readonly include?: string;
	readonly allowTypeHeaderOverride?: boolean;
	readonly useList?: boolean;
	readonly enableAnnotationInterop?: boolean;
}

/**
 * Persisted form of a JsonDataFormat: attribute names map 1:1, absent
 * attributes are omitted, handles are not part of it.
 */
export interface JsonDataFormatProperties {
	readonly library: JsonLibrary;
	readonly prettyPrint?: boolean;
	readonly unmarshalTypeName?: string;
	readonly collectionTypeName?: string;
	readonly view?: string;
	readonly include?: string;
	readonly allowTypeHeaderOverride?: boolean;
	readonly useList?: boolean;
	readonly enableAnnotationInterop?: boolean;
}

/**
 * Declarative JSON data format.
 *
 * Records which JSON library to use and which options to apply; nothing is
 * instantiated until `buildDataFormat` runs. Every option stays `undefined`
 * until set, so "not set" and "set to false" remain distinct all the way to
 * the backend. Changing `library` leaves the other options in place; a
 * variant that has no use for one simply ignores it.
 *
 * @example
 * ```typescript
 * const format = new JsonDataFormat({
 *   library: "Json5",
 *   unmarshalTypeName: "com.example.Order",
 *   useList: true,
 * })
 * ```
 */
export class JsonDataFormat implements DataFormatDefinition {
	library: JsonLibrary = DEFAULT_JSON_LIBRARY;

	/** Format output with two-space indentation. Backend default is false. */
	prettyPrint: boolean | undefined;

	/**
	 * Restricts marshalled fields to those the view's schema declares.
	 */
	view: TypeHandle | undefined;

	/**
	 * Null-field inclusion policy. `NON_NULL` skips fields holding null.
	 */
	include: string | undefined;

	/**
	 * Let the `DataFormatUnmarshalType` message header name the type to
	 * unmarshal into.
	 */
	allowTypeHeaderOverride: boolean | undefined;

	/** Unmarshal to a list of maps or a list of the unmarshal type. */
	useList: boolean | undefined;

	/**
	 * Marshal through the unmarshal type's schema, so its key renames and
	 * transformations apply on output.
	 */
	enableAnnotationInterop: boolean | undefined;

	private unmarshalTypeRef: TypeRef = TypeRef.Unset();
	private collectionTypeRef: TypeRef = TypeRef.Unset();

	constructor(init?: JsonLibrary | JsonDataFormatInit) {
		if (typeof init === "string") {
			this.library = init;
			return;
		}
		if (init === undefined) {
			return;
		}
		this.library = init.library ?? DEFAULT_JSON_LIBRARY;
		this.prettyPrint = init.prettyPrint;
		this.unmarshalTypeName = init.unmarshalTypeName;
		this.unmarshalType = init.unmarshalType;
		this.collectionTypeName = init.collectionTypeName;
		this.collectionType = init.collectionType;
		this.view = init.view;
		this.include = init.include;
		this.allowTypeHeaderOverride = init.allowTypeHeaderOverride;
		this.useList = init.useList;
		this.enableAnnotationInterop = init.enableAnnotationInterop;
	}

	/** Fully-qualified name of the type to unmarshal into. */
	get unmarshalTypeName(): string | undefined {
		return typeRefName(this.unmarshalTypeRef);
	}

	set unmarshalTypeName(name: string | undefined) {
		this.unmarshalTypeRef = withTypeName(this.unmarshalTypeRef, name);
	}

	/**
	 * Type to unmarshal into. Takes precedence over `unmarshalTypeName`;
	 * filled in from the name on the first build.
	 */
	get unmarshalType(): TypeHandle | undefined {
		return typeRefHandle(this.unmarshalTypeRef);
	}

	set unmarshalType(handle: TypeHandle | undefined) {
		this.unmarshalTypeRef = withTypeHandle(this.unmarshalTypeRef, handle);
	}

	/** Name of a custom collection type to unmarshal lists into. */
	get collectionTypeName(): string | undefined {
		return typeRefName(this.collectionTypeRef);
	}

	set collectionTypeName(name: string | undefined) {
		this.collectionTypeRef = withTypeName(this.collectionTypeRef, name);
	}

	get collectionType(): TypeHandle | undefined {
		return typeRefHandle(this.collectionTypeRef);
	}

	set collectionType(handle: TypeHandle | undefined) {
		this.collectionTypeRef = withTypeHandle(this.collectionTypeRef, handle);
	}

	get dataFormatName(): string {
		return dataFormatNameOf(this.library);
	}

	resolveTypes(): Effect.Effect<void, ConfigurationResolutionError, TypeResolver> {
		return Effect.gen(this, function* () {
			this.unmarshalTypeRef = yield* resolveTypeRef(
				this.unmarshalTypeRef,
				"unmarshalTypeName",
			);
			this.collectionTypeRef = yield* resolveTypeRef(
				this.collectionTypeRef,
				"collectionTypeName",
			);
		});
	}

	configuredProperties(): ConfiguredProperties {
		return {
			unmarshalType: this.unmarshalType,
			prettyPrint: this.prettyPrint,
			view: this.view,
			include: this.include,
			allowTypeHeaderOverride: this.allowTypeHeaderOverride,
			collectionType: this.collectionType,
			useList: this.useList,
			enableAnnotationInterop: this.enableAnnotationInterop,
		};
	}

	toProperties(): JsonDataFormatProperties {
		const properties: Types.Mutable<JsonDataFormatProperties> = {
			library: this.library,
		};
		const unmarshalTypeName = this.unmarshalTypeName ?? this.unmarshalType?.name;
		const collectionTypeName =
			this.collectionTypeName ?? this.collectionType?.name;

		if (this.prettyPrint !== undefined) properties.prettyPrint = this.prettyPrint;
		if (unmarshalTypeName !== undefined) {
			properties.unmarshalTypeName = unmarshalTypeName;
		}
		if (collectionTypeName !== undefined) {
			properties.collectionTypeName = collectionTypeName;
		}
		if (this.view !== undefined) properties.view = this.view.name;
		if (this.include !== undefined) properties.include = this.include;
		if (this.allowTypeHeaderOverride !== undefined) {
			properties.allowTypeHeaderOverride = this.allowTypeHeaderOverride;
		}
		if (this.useList !== undefined) properties.useList = this.useList;
		if (this.enableAnnotationInterop !== undefined) {
			properties.enableAnnotationInterop = this.enableAnnotationInterop;
		}
		return properties;
	}
}
