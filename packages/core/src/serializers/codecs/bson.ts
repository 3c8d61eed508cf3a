import { BSON } from "bson"
import type { FormatCodec } from "../format-codec.js"

const isDocument = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" &&
	value !== null &&
	!Array.isArray(value) &&
	!(value instanceof Uint8Array)

/**
 * Creates a BSON codec backed by the `bson` package.
 *
 * BSON documents are always objects at the top level; arrays and scalars
 * fail to encode. Decoded numbers come back as plain JavaScript numbers.
 *
 * @returns A FormatCodec for BSON serialization
 */
export const bsonCodec = (): FormatCodec => ({
	name: "bson",
	extensions: ["bson"],
	encode: (data: unknown): Uint8Array => {
		if (!isDocument(data)) {
			throw new Error(
				`top-level value must be a document, got ${Array.isArray(data) ? "array" : typeof data}`,
			)
		}
		return BSON.serialize(data)
	},
	decode: (bytes: Uint8Array): unknown => BSON.deserialize(bytes),
})
