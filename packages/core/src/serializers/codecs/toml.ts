import * as TOML from "smol-toml";
import { type FormatCodec, makeTextCodec } from "../format-codec.js";

const isTable = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" &&
	value !== null &&
	!Array.isArray(value) &&
	!(value instanceof Date);

/**
 * Recursively strips null and undefined values from an object for TOML compatibility.
 *
 * TOML has no null type, so null values must be removed before serialization.
 * - null values → key omitted
 * - undefined values → key omitted
 * - Nested objects → recursed
 * - Arrays → null/undefined elements removed
 * - All other values → preserved
 */
const stripNulls = (data: unknown): unknown => {
	if (data === null || data === undefined) {
		return undefined;
	}

	if (Array.isArray(data)) {
		return data
			.filter((item) => item !== null && item !== undefined)
			.map(stripNulls);
	}

	if (isTable(data)) {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(data)) {
			const stripped = stripNulls(value);
			if (stripped !== undefined) {
				result[key] = stripped;
			}
		}
		return result;
	}

	return data;
};

/**
 * Creates a TOML codec.
 *
 * TOML has no null type, so null values are recursively stripped on encode.
 * Missing keys naturally become undefined on decode.
 *
 * @returns A FormatCodec for TOML serialization
 *
 * @remarks
 * - The top-level value must be a table (a plain object)
 * - TOML dates are returned as Date objects by smol-toml
 * - Bindings whose schema requires nullable fields won't round-trip through TOML
 */
export const tomlCodec = (): FormatCodec => {
	return makeTextCodec({
		name: "toml",
		extensions: ["toml"],
		encode: (data: unknown): string => {
			const stripped = stripNulls(data);
			if (!isTable(stripped)) {
				throw new Error(
					`top-level value must be a table, got ${Array.isArray(data) ? "array" : typeof data}`,
				);
			}
			return TOML.stringify(stripped);
		},
		decode: (raw: string): unknown => {
			return TOML.parse(raw);
		},
	});
};
