/**
 * Persistence handle for one binding: uniform save/load plus the file and
 * directory housekeeping that goes with a fixed on-disk location.
 *
 * Every operation is an Effect requiring the StorageAdapter, SerializerRegistry
 * and BaseDirectories services; the path is recomputed each time.
 *
 * Save flow:
 * 1. Resolve paths (base directory → project → sub-directories → file)
 * 2. Encode through the binding's Schema (Type → Encoded)
 * 3. Encode to bytes via SerializerRegistry
 * 4. Prepend the header, then gzip (each only when configured)
 * 5. Ensure the directory exists and write atomically via StorageAdapter
 *
 * Load runs the same steps in reverse.
 */

import { Effect, Schema } from "effect";
import type { Binding } from "../binding/binding.js";
import { BaseDirectories } from "../dirs/base-directories-service.js";
import {
	DecodeError,
	EncodeError,
	InvalidRangeError,
	type IoError,
	type NotFoundError,
	type PathResolutionError,
	type PersistError,
	type UnsupportedFormatError,
} from "../errors/persist-errors.js";
import { type ResolvedPaths, resolvePaths } from "../paths/path-resolver.js";
import { SerializerRegistry } from "../serializers/serializer-service.js";
import { StorageAdapter } from "../storage/storage-service.js";
import { compress, decompress } from "../transforms/gzip.js";
import {
	prependHeader,
	readHeaderVersion,
	stripHeader,
} from "../transforms/header.js";
import type { Metadata } from "./metadata.js";

// ============================================================================
// Types
// ============================================================================

export type PersistenceServices =
	| StorageAdapter
	| SerializerRegistry
	| BaseDirectories;

export type ResolveError = PathResolutionError | UnsupportedFormatError;

type Op<A, E, R = PersistenceServices> = Effect.Effect<A, E, R>;

/**
 * `R` is what every operation still requires; `never` once the services have
 * been provided (see the Node package's `createNodeStore`).
 */
export interface Persistent<
	S extends Schema.Schema.AnyNoContext,
	R = PersistenceServices,
> {
	readonly binding: Binding<S>;
	/** Every path derived from the binding; no I/O */
	readonly paths: () => Op<ResolvedPaths, ResolveError, R>;
	readonly absolutePath: () => Op<string, ResolveError, R>;
	/** Atomically replace the file with the encoded value */
	readonly save: (
		value: Schema.Schema.Type<S>,
	) => Op<Metadata, PersistError, R>;
	/** Read and decode the file; NotFoundError when it does not exist */
	readonly load: () => Op<Schema.Schema.Type<S>, PersistError, R>;
	readonly exists: () => Op<boolean, ResolveError | IoError, R>;
	/** Size on disk (compressed size for gzip bindings) */
	readonly metadata: () => Op<
		Metadata,
		ResolveError | IoError | NotFoundError,
		R
	>;
	/** Create the directories leading up to the file; returns the file's directory */
	readonly mkdir: () => Op<string, ResolveError | IoError, R>;
	/** Delete the file; size 0 when there was nothing to delete */
	readonly remove: () => Op<Metadata, ResolveError | IoError, R>;
	/**
	 * Delete temporary files an interrupted save left beside the file
	 * (`<file>.tmp` and `<file>.tmp.*`). Size is the total removed.
	 */
	readonly removeTemporary: () => Op<Metadata, ResolveError | IoError, R>;
	/**
	 * Recursively delete the first sub-directory level, or the project
	 * directory when the binding has no sub-directory.
	 * Size is what the directory held; 0 when it did not exist.
	 */
	readonly removeSubDirectory: () => Op<Metadata, ResolveError | IoError, R>;
	/** Recursively delete the project directory */
	readonly removeProject: () => Op<Metadata, ResolveError | IoError, R>;
	/** Bytes held below the first sub-directory level (see removeSubDirectory) */
	readonly subDirectorySize: () => Op<
		Metadata,
		ResolveError | IoError | NotFoundError,
		R
	>;
	readonly projectDirectorySize: () => Op<
		Metadata,
		ResolveError | IoError | NotFoundError,
		R
	>;
	/**
	 * Raw on-disk bytes in `[start, end)`, before decompression.
	 * `start` and `end` are non-negative integers with `start <= end`;
	 * ranges past the end of the file are clamped.
	 */
	readonly readBytes: (
		start: number,
		end?: number,
	) => Op<
		Uint8Array,
		ResolveError | IoError | NotFoundError | InvalidRangeError,
		R
	>;
	/** Version byte of the file's header, whichever version it was written with */
	readonly fileVersion: () => Op<
		number,
		ResolveError | IoError | NotFoundError | DecodeError,
		R
	>;
}

// ============================================================================
// makePersistent
// ============================================================================

export const makePersistent = <S extends Schema.Schema.AnyNoContext>(
	binding: Binding<S>,
): Persistent<S> => {
	const resolve: Op<ResolvedPaths, ResolveError> = Effect.gen(function* () {
		const directories = yield* BaseDirectories;
		const registry = yield* SerializerRegistry;
		const baseDirectory = yield* directories.resolve(binding.directory);
		const extension = yield* registry.extensionOf(binding.format);
		return yield* resolvePaths({
			baseDirectory,
			platform: directories.platform,
			project: binding.project,
			subDirectory: binding.subDirectory,
			file: binding.file,
			extension,
		});
	});

	const encodeValue = Schema.encode(binding.schema);
	const decodeValue = Schema.decodeUnknown(binding.schema);

	const save = (value: Schema.Schema.Type<S>): Op<Metadata, PersistError> =>
		Effect.gen(function* () {
			const storage = yield* StorageAdapter;
			const registry = yield* SerializerRegistry;
			const paths = yield* resolve;

			const encoded = yield* encodeValue(value).pipe(
				Effect.mapError(
					(parseError) =>
						new EncodeError({
							format: "schema",
							message: `Value does not match the schema of '${paths.file}': ${parseError.message}`,
							cause: parseError,
						}),
				),
			);

			let bytes = yield* registry.encode(encoded, binding.format);
			if (binding.header !== undefined) {
				bytes = yield* prependHeader(bytes, binding.header);
			}
			if (binding.gzip !== false) {
				bytes = yield* compress(bytes, binding.gzip);
			}

			yield* storage.ensureDirectory(paths.directory);
			yield* storage.write(paths.file, bytes);
			yield* Effect.logDebug(`Saved ${bytes.length} bytes`).pipe(
				Effect.annotateLogs({ path: paths.file, format: binding.format }),
			);

			return { size: bytes.length, path: paths.file };
		});

	const load = (): Op<Schema.Schema.Type<S>, PersistError> =>
		Effect.gen(function* () {
			const storage = yield* StorageAdapter;
			const registry = yield* SerializerRegistry;
			const paths = yield* resolve;

			const raw = yield* storage.read(paths.file);
			let bytes = binding.gzip !== false ? yield* decompress(raw) : raw;
			if (binding.header !== undefined) {
				bytes = yield* stripHeader(bytes, binding.header);
			}

			const decoded = yield* registry.decode(bytes, binding.format);
			const value = yield* decodeValue(decoded).pipe(
				Effect.mapError(
					(parseError) =>
						new DecodeError({
							format: "schema",
							message: `Contents of '${paths.file}' do not match the schema: ${parseError.message}`,
							cause: parseError,
						}),
				),
			);

			yield* Effect.logDebug(`Loaded ${raw.length} bytes`).pipe(
				Effect.annotateLogs({ path: paths.file, format: binding.format }),
			);
			return value;
		});

	const directorySize = (
		pick: (paths: ResolvedPaths) => string,
	): Op<Metadata, ResolveError | IoError | NotFoundError> =>
		Effect.gen(function* () {
			const storage = yield* StorageAdapter;
			const target = pick(yield* resolve);
			const size = yield* storage.directorySize(target);
			return { size, path: target };
		});

	const removeDirectory = (
		pick: (paths: ResolvedPaths) => string,
	): Op<Metadata, ResolveError | IoError> =>
		Effect.gen(function* () {
			const storage = yield* StorageAdapter;
			const target = pick(yield* resolve);
			const size = yield* storage
				.directorySize(target)
				.pipe(Effect.catchTag("NotFoundError", () => Effect.succeed(0)));
			yield* storage.removeDirectory(target);
			yield* Effect.logDebug(`Removed ${size} bytes`).pipe(
				Effect.annotateLogs({ path: target }),
			);
			return { size, path: target };
		});

	const removeTemporary = (): Op<Metadata, ResolveError | IoError> =>
		Effect.gen(function* () {
			const storage = yield* StorageAdapter;
			const paths = yield* resolve;
			const fileName = paths.file.slice(paths.directory.length + 1);
			const parent = paths.file.slice(0, paths.file.length - fileName.length);
			const prefix = `${fileName}.tmp`;
			const leftovers = (yield* storage.list(paths.directory)).filter(
				(name) => name === prefix || name.startsWith(`${prefix}.`),
			);

			let size = 0;
			for (const name of leftovers) {
				const path = `${parent}${name}`;
				// Another process may finish its rename in between
				size += yield* storage.size(path).pipe(
					Effect.zipLeft(storage.remove(path)),
					Effect.catchTag("NotFoundError", () => Effect.succeed(0)),
				);
			}
			return { size, path: paths.directory };
		});

	const checkRange = (
		start: number,
		end: number | undefined,
	): Effect.Effect<void, InvalidRangeError> => {
		const valid =
			Number.isSafeInteger(start) &&
			start >= 0 &&
			(end === undefined || (Number.isSafeInteger(end) && end >= start));
		return valid
			? Effect.void
			: Effect.fail(
					new InvalidRangeError({
						start,
						end,
						message: `Invalid byte range [${start}, ${end ?? "end"})`,
					}),
				);
	};

	const readRaw = Effect.gen(function* () {
		const storage = yield* StorageAdapter;
		const paths = yield* resolve;
		return yield* storage.read(paths.file);
	});

	return {
		binding,

		paths: () => resolve,

		absolutePath: () => resolve.pipe(Effect.map((paths) => paths.file)),

		save,

		load,

		exists: () =>
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				const paths = yield* resolve;
				return yield* storage.exists(paths.file);
			}),

		metadata: () =>
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				const paths = yield* resolve;
				const size = yield* storage.size(paths.file);
				return { size, path: paths.file };
			}),

		mkdir: () =>
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				const paths = yield* resolve;
				yield* storage.ensureDirectory(paths.directory);
				return paths.directory;
			}),

		remove: () =>
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				const paths = yield* resolve;
				const removed: Effect.Effect<Metadata, IoError | NotFoundError> =
					Effect.gen(function* () {
						const size = yield* storage.size(paths.file);
						yield* storage.remove(paths.file);
						return { size, path: paths.file };
					});
				return yield* removed.pipe(
					Effect.catchTag("NotFoundError", () =>
						Effect.succeed({ size: 0, path: paths.file }),
					),
				);
			}),

		removeTemporary,

		removeSubDirectory: () => removeDirectory((paths) => paths.subDirectoryRoot),

		removeProject: () => removeDirectory((paths) => paths.projectDirectory),

		subDirectorySize: () => directorySize((paths) => paths.subDirectoryRoot),

		projectDirectorySize: () => directorySize((paths) => paths.projectDirectory),

		readBytes: (start, end) =>
			checkRange(start, end).pipe(
				Effect.andThen(readRaw),
				Effect.map((bytes) => bytes.subarray(start, end)),
			),

		fileVersion: () =>
			Effect.gen(function* () {
				const header = binding.header;
				if (header === undefined) {
					return yield* Effect.fail(
						new DecodeError({
							format: "header",
							message: `Binding for '${binding.file}' declares no header`,
						}),
					);
				}
				const raw = yield* readRaw;
				const bytes = binding.gzip !== false ? yield* decompress(raw) : raw;
				return yield* readHeaderVersion(bytes, header.magic);
			}),
	};
};
