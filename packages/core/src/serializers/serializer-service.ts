import { Context, type Effect } from "effect"
import type {
	DecodeError,
	EncodeError,
	UnsupportedFormatError,
} from "../errors/persist-errors.js"

// ============================================================================
// SerializerRegistry Effect Service
// ============================================================================

export interface SerializerRegistryShape {
	/** Registered codec names, in registration order */
	readonly formats: ReadonlyArray<string>
	readonly extensionOf: (
		format: string,
	) => Effect.Effect<string, UnsupportedFormatError>
	readonly encode: (
		data: unknown,
		format: string,
	) => Effect.Effect<Uint8Array, EncodeError | UnsupportedFormatError>
	readonly decode: (
		bytes: Uint8Array,
		format: string,
	) => Effect.Effect<unknown, DecodeError | UnsupportedFormatError>
}

export class SerializerRegistry extends Context.Tag("SerializerRegistry")<
	SerializerRegistry,
	SerializerRegistryShape
>() {}
