import { Effect, Layer } from "effect";
import {
	DecodeError,
	EncodeError,
	UnsupportedFormatError,
} from "../errors/persist-errors.js";
import {
	SerializerRegistry,
	type SerializerRegistryShape,
} from "./serializer-service.js";

// ============================================================================
// FormatCodec — Minimal plugin point for serialization formats
// ============================================================================

/**
 * A FormatCodec defines a serialization format with:
 * - A human-readable name (e.g., "json", "yaml", "msgpack")
 * - File extensions without dots; the first one is canonical and an empty
 *   list means files carry no extension
 * - Synchronous byte-level encode/decode functions that throw on failure
 *
 * The compositor (makeSerializerLayer) wraps these in Effect.try
 * with proper error tagging.
 */
export interface FormatCodec {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly encode: (data: unknown) => Uint8Array;
	readonly decode: (bytes: Uint8Array) => unknown;
}

/**
 * A string-based codec, adapted to bytes by makeTextCodec.
 */
export interface TextFormatCodec {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly encode: (data: unknown) => string;
	readonly decode: (raw: string) => unknown;
}

const textEncoder = new TextEncoder();

/**
 * Wrap a string codec so it reads and writes UTF-8 bytes.
 * Invalid UTF-8 input fails decoding instead of producing replacement characters.
 */
export const makeTextCodec = (codec: TextFormatCodec): FormatCodec => {
	const textDecoder = new TextDecoder("utf-8", { fatal: true });
	return {
		name: codec.name,
		extensions: codec.extensions,
		encode: (data) => textEncoder.encode(codec.encode(data)),
		decode: (bytes) => codec.decode(textDecoder.decode(bytes)),
	};
};

/**
 * Canonical extension of a codec, `""` when its files have none.
 */
export const canonicalExtension = (codec: FormatCodec): string =>
	codec.extensions[0] ?? "";

// ============================================================================
// makeSerializerLayer — Compositor for building SerializerRegistry from codecs
// ============================================================================

const describeCause = (error: unknown): string =>
	error instanceof Error ? error.message : "Unknown error";

/**
 * Creates a SerializerRegistry Layer from an array of FormatCodec instances.
 *
 * The compositor:
 * 1. Builds a name/extension → codec lookup map (O(1) dispatch)
 * 2. Wraps encode/decode in Effect.try with EncodeError/DecodeError
 * 3. Produces UnsupportedFormatError for unknown formats
 * 4. Logs console.warn on duplicate keys (last wins)
 *
 * @param codecs - Codecs to register
 */
export const makeSerializerLayer = (
	codecs: ReadonlyArray<FormatCodec>,
): Layer.Layer<SerializerRegistry> =>
	Layer.succeed(SerializerRegistry, makeSerializerRegistry(codecs));

/**
 * Builds the registry shape itself, for callers composing their own Layer.
 */
export const makeSerializerRegistry = (
	codecs: ReadonlyArray<FormatCodec>,
): SerializerRegistryShape => {
	// Build name/extension → codec lookup map
	const formatMap = new Map<string, FormatCodec>();
	const register = (key: string, codec: FormatCodec) => {
		const existing = formatMap.get(key);
		if (existing !== undefined && existing.name !== codec.name) {
			console.warn(
				`Duplicate format '${key}': '${existing.name}' overwritten by '${codec.name}'`,
			);
		}
		formatMap.set(key, codec);
	};
	for (const codec of codecs) {
		register(codec.name, codec);
		for (const ext of codec.extensions) {
			register(ext, codec);
		}
	}

	// Collect all supported formats for error messages
	const formats = Array.from(new Set(codecs.map((codec) => codec.name)));
	const available = formats.join(", ");

	const lookup = (
		format: string,
	): Effect.Effect<FormatCodec, UnsupportedFormatError> => {
		const codec = formatMap.get(format);
		if (codec === undefined) {
			return Effect.fail(
				new UnsupportedFormatError({
					format,
					message:
						available.length > 0
							? `Unsupported format '${format}'. Available formats: ${available}`
							: `Unsupported format '${format}'. No formats registered.`,
				}),
			);
		}
		return Effect.succeed(codec);
	};

	return {
		formats,

		extensionOf: (format) => lookup(format).pipe(Effect.map(canonicalExtension)),

		encode: (data, format) =>
			lookup(format).pipe(
				Effect.flatMap((codec) =>
					Effect.try({
						try: () => codec.encode(data),
						catch: (error) =>
							new EncodeError({
								format: codec.name,
								message: `Failed to encode data as ${codec.name}: ${describeCause(error)}`,
								cause: error,
							}),
					}),
				),
			),

		decode: (bytes, format) =>
			lookup(format).pipe(
				Effect.flatMap((codec) =>
					Effect.try({
						try: () => codec.decode(bytes),
						catch: (error) =>
							new DecodeError({
								format: codec.name,
								message: `Failed to decode ${codec.name} data: ${describeCause(error)}`,
								cause: error,
							}),
					}),
				),
			),
	};
};
