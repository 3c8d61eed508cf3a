// ============================================================================
// Persistence Errors (re-exported from persist-errors.ts)
// ============================================================================

export type {
	PathResolutionReason,
	PersistError,
} from "./persist-errors.js";
export {
	DecodeError,
	EncodeError,
	InvalidRangeError,
	IoError,
	NotFoundError,
	PathResolutionError,
	UnsupportedFormatError,
} from "./persist-errors.js";
