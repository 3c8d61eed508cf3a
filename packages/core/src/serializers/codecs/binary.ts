import type { FormatCodec } from "../format-codec.js"

/**
 * Creates a raw binary codec: the payload is the file's bytes.
 * Pair it with `Schema.Uint8ArrayFromSelf` for a typed binding.
 */
export const binaryCodec = (): FormatCodec => ({
	name: "binary",
	extensions: ["bin"],
	encode: (data: unknown): Uint8Array => {
		if (!(data instanceof Uint8Array)) {
			throw new Error(`binary payload must be a Uint8Array, got ${typeof data}`)
		}
		return data
	},
	decode: (bytes: Uint8Array): unknown => bytes,
})
