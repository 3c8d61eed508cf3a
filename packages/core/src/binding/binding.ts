/**
 * Binding declarations: one value fixes where a payload lives on disk and how
 * it is encoded, so save/load calls never repeat directory or format arguments.
 */

import { Schema } from "effect";
import type { BaseDirectory } from "../dirs/base-directory.js";
import type { FileHeader } from "../transforms/header.js";
import type { CompressionLevel } from "../transforms/gzip.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Fields shared by the declaration input and the frozen binding.
 */
interface BindingFields {
	/** OS-convention root the project directory is created under */
	readonly directory: BaseDirectory;
	/** Project directory name; lower-cased with whitespace turned into `-` */
	readonly project: string;
	/** File name without extension */
	readonly file: string;
	/** Codec name or extension registered in the SerializerRegistry */
	readonly format: string;
	readonly header?: FileHeader;
}

export interface BindingConfig extends BindingFields {
	/**
	 * `/`-separated directories between the project directory and the file.
	 * `""` (the default) and `"."` both place the file in the project directory.
	 */
	readonly subDirectory?: string;
	/**
	 * gzip the encoded bytes before writing. `true` uses the fast level;
	 * a number picks the level. The file extension does not change.
	 */
	readonly gzip?: boolean | CompressionLevel;
}

export interface Binding<
	S extends Schema.Schema.AnyNoContext = typeof Schema.Unknown,
> extends BindingFields {
	readonly subDirectory: string;
	/** Compression level, or false when the file is stored uncompressed */
	readonly gzip: false | CompressionLevel;
	/** Schema values pass through on save (encode) and load (decode) */
	readonly schema: S;
}

// ============================================================================
// defineBinding
// ============================================================================

const compressionLevel = (
	gzip: BindingConfig["gzip"],
): false | CompressionLevel => {
	if (gzip === undefined || gzip === false) return false;
	if (gzip === true) return 1;
	return gzip;
};

/**
 * Declare a binding. The result is frozen and meant to be created once,
 * typically at module level, then handed to `makePersistent` or `createStore`.
 *
 * Inputs are validated when a path is first resolved, so an invalid binding
 * fails its first operation with a PathResolutionError.
 *
 * @example
 * ```typescript
 * const State = defineBinding({
 *   directory: Dir.Config,
 *   project: "MyProject",
 *   file: "state",
 *   format: "json",
 *   schema: Schema.Struct({ number: Schema.Number }),
 * })
 * ```
 */
export function defineBinding<S extends Schema.Schema.AnyNoContext>(
	config: BindingConfig & { readonly schema: S },
): Binding<S>;
export function defineBinding(config: BindingConfig): Binding;
export function defineBinding(
	config: BindingConfig & { readonly schema?: Schema.Schema.AnyNoContext },
): Binding<Schema.Schema.AnyNoContext> {
	return Object.freeze({
		directory: config.directory,
		project: config.project,
		subDirectory: config.subDirectory ?? "",
		file: config.file,
		format: config.format,
		gzip: compressionLevel(config.gzip),
		schema: config.schema ?? Schema.Unknown,
		...(config.header !== undefined ? { header: config.header } : {}),
	});
}
