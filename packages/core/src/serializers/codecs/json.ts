import { type FormatCodec, makeTextCodec } from "../format-codec.js"

/**
 * Options for the JSON codec.
 */
export interface JsonCodecOptions {
	readonly indent?: number
}

/**
 * Creates a JSON codec with configurable indentation.
 *
 * @param options - Optional configuration for JSON serialization
 * @param options.indent - Number of spaces for indentation (default: 2)
 * @returns A FormatCodec for JSON serialization
 *
 * @example
 * ```typescript
 * const codec = jsonCodec({ indent: 4 })
 * const layer = makeSerializerLayer([codec])
 * ```
 */
export const jsonCodec = (options?: JsonCodecOptions): FormatCodec => {
	const indent = options?.indent ?? 2

	return makeTextCodec({
		name: "json",
		extensions: ["json"],
		encode: (data: unknown): string => {
			const encoded: string | undefined = JSON.stringify(data, null, indent)
			if (encoded === undefined) {
				throw new Error(`value of type ${typeof data} has no JSON representation`)
			}
			return encoded
		},
		decode: (raw: string): unknown => {
			return JSON.parse(raw)
		},
	})
}
