import type { FormatCodec } from "../format-codec.js"

const EMPTY = new Uint8Array(0)

/**
 * Creates the empty marker codec, for files whose presence is the signal.
 *
 * Whatever the payload, the file is written with zero bytes and no extension.
 * Decoding succeeds only on zero bytes and yields `null`.
 */
export const emptyCodec = (): FormatCodec => ({
	name: "empty",
	extensions: [],
	encode: (): Uint8Array => EMPTY,
	decode: (bytes: Uint8Array): unknown => {
		if (bytes.length !== 0) {
			throw new Error(`expected an empty file, found ${bytes.length} bytes`)
		}
		return null
	},
})
