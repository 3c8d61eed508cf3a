/**
 * gzip compression layered around a codec's bytes. Independent of the format:
 * the codec never sees compressed data and the file extension is unchanged.
 */

import { Effect } from "effect"
import { type GzipOptions, gunzipSync, gzipSync } from "fflate"
import { DecodeError, EncodeError } from "../errors/persist-errors.js"

export type CompressionLevel = NonNullable<GzipOptions["level"]>

/** Fast compression, matching the default of most gzip tools' `-1` */
export const DEFAULT_COMPRESSION_LEVEL: CompressionLevel = 1

export const compress = (
	bytes: Uint8Array,
	level: CompressionLevel = DEFAULT_COMPRESSION_LEVEL,
): Effect.Effect<Uint8Array, EncodeError> =>
	Effect.try({
		try: () => gzipSync(bytes, { level }),
		catch: (error) =>
			new EncodeError({
				format: "gzip",
				message: `Failed to compress data: ${error instanceof Error ? error.message : "Unknown error"}`,
				cause: error,
			}),
	})

export const decompress = (
	bytes: Uint8Array,
): Effect.Effect<Uint8Array, DecodeError> =>
	Effect.try({
		try: () => gunzipSync(bytes),
		catch: (error) =>
			new DecodeError({
				format: "gzip",
				message: `Failed to decompress data: ${error instanceof Error ? error.message : "Unknown error"}`,
				cause: error,
			}),
	})
