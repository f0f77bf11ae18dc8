import { Data } from "effect"

// ============================================================================
// Effect TaggedError Runtime Error Types
// ============================================================================

export class DataFormatError extends Data.TaggedError("DataFormatError")<{
	readonly format: string
	readonly operation: "marshal" | "unmarshal"
	readonly message: string
	readonly cause?: unknown
}> {}
