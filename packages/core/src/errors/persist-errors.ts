import { Data } from "effect"

// ============================================================================
// Effect TaggedError Persistence Error Types
// ============================================================================

export type PathResolutionReason =
	| "home-unavailable"
	| "unsupported-platform"
	| "invalid-custom-path"
	| "empty-segment"
	| "invalid-segment"
	| "not-absolute"

export class PathResolutionError extends Data.TaggedError("PathResolutionError")<{
	readonly reason: PathResolutionReason
	readonly message: string
	readonly directory?: string
}> {}

export class EncodeError extends Data.TaggedError("EncodeError")<{
	readonly format: string
	readonly message: string
	readonly cause?: unknown
}> {}

export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly format: string
	readonly message: string
	readonly cause?: unknown
}> {}

export class UnsupportedFormatError extends Data.TaggedError("UnsupportedFormatError")<{
	readonly format: string
	readonly message: string
}> {}

export class IoError extends Data.TaggedError("IoError")<{
	readonly path: string
	readonly operation: "read" | "write" | "stat" | "delete" | "mkdir"
	readonly message: string
	readonly cause?: unknown
}> {}

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
	readonly path: string
	readonly message: string
}> {}

export class InvalidRangeError extends Data.TaggedError("InvalidRangeError")<{
	readonly start: number
	readonly end?: number
	readonly message: string
}> {}

// ============================================================================
// Persistence Error Union
// ============================================================================

export type PersistError =
	| PathResolutionError
	| EncodeError
	| DecodeError
	| UnsupportedFormatError
	| IoError
	| NotFoundError
	| InvalidRangeError
