// ============================================================================
// Build-Time Errors (re-exported from resolution-errors.ts)
// ============================================================================

export type {
	DataFormatBuildError,
	TypeNameAttribute,
} from "./resolution-errors.js";
export {
	BackendNotFoundError,
	ConfigurationResolutionError,
	TypeNotFoundError,
	UnsupportedPropertyError,
} from "./resolution-errors.js";

// ============================================================================
// Runtime Errors (re-exported from format-errors.ts)
// ============================================================================

export { DataFormatError } from "./format-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { DataFormatError } from "./format-errors.js";
import type { DataFormatBuildError } from "./resolution-errors.js";

export type FormatdefError = DataFormatBuildError | DataFormatError;
