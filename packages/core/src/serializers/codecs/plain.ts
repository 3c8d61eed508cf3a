import { type FormatCodec, makeTextCodec } from "../format-codec.js"

/**
 * Creates a plain text codec for single scalar values.
 *
 * Strings, numbers, booleans and bigints are written as their string form.
 * Decoding always yields the file's text; give the binding a schema such as
 * `Schema.NumberFromString` to get a number back.
 *
 * @returns A FormatCodec writing `.txt` files
 *
 * @example
 * ```typescript
 * defineBinding({
 *   directory: Dir.Data,
 *   project: "MyProject",
 *   file: "counter",
 *   format: "plain",
 *   schema: Schema.NumberFromString,
 * })
 * ```
 */
export const plainCodec = (): FormatCodec =>
	makeTextCodec({
		name: "plain",
		extensions: ["txt"],
		encode: (data: unknown): string => {
			switch (typeof data) {
				case "string":
					return data
				case "number":
				case "boolean":
				case "bigint":
					return String(data)
				default:
					throw new Error(
						`plain text holds a single scalar, got ${data === null ? "null" : typeof data}`,
					)
			}
		},
		decode: (raw: string): unknown => raw,
	})
