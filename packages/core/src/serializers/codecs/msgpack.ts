import { pack, unpack } from "msgpackr"
import type { FormatCodec } from "../format-codec.js"

/**
 * Creates a MessagePack codec backed by msgpackr.
 *
 * @returns A FormatCodec for MessagePack serialization
 *
 * @example
 * ```typescript
 * const layer = makeSerializerLayer([msgpackCodec()])
 * ```
 */
export const msgpackCodec = (): FormatCodec => ({
	name: "msgpack",
	extensions: ["msgpack", "mp"],
	encode: (data: unknown): Uint8Array => pack(data),
	decode: (bytes: Uint8Array): unknown => {
		if (bytes.length === 0) {
			throw new Error("no MessagePack data: input is empty")
		}
		return unpack(bytes)
	},
})
