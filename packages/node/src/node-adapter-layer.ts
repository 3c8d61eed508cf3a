/**
 * Node.js filesystem implementation of StorageAdapter as an Effect Layer.
 * Provides atomic writes (temp file + rename) and retry with exponential backoff.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname, join } from "node:path";
import {
	IoError,
	NotFoundError,
	StorageAdapter,
	type StorageAdapterShape,
} from "@filebound/core";
import { Effect, Layer, Schedule } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeAdapterConfig {
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
	readonly createMissingDirectories?: boolean;
	/** Mode for new files; the process umask still applies */
	readonly fileMode?: number;
	/** Mode for new directories; the process umask still applies */
	readonly dirMode?: number;
}

const defaultConfig: Required<NodeAdapterConfig> = {
	maxRetries: 3,
	baseDelay: 100,
	createMissingDirectories: true,
	fileMode: 0o644,
	dirMode: 0o755,
};

// ============================================================================
// Helpers
// ============================================================================

const errorCode = (error: unknown): string | undefined =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	typeof error.code === "string"
		? error.code
		: undefined;

const toIoError = (
	path: string,
	operation: IoError["operation"],
	error: unknown,
): IoError =>
	new IoError({
		path,
		operation,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

const toReadError =
	(path: string, operation: IoError["operation"]) =>
	(error: unknown): IoError | NotFoundError =>
		errorCode(error) === "ENOENT"
			? new NotFoundError({ path, message: `File not found: ${path}` })
			: toIoError(path, operation, error);

const retryPolicy = (config: Required<NodeAdapterConfig>) =>
	Schedule.intersect(
		Schedule.exponential(config.baseDelay),
		Schedule.recurs(config.maxRetries),
	);

// A missing file stays missing; only I/O failures are worth another attempt
const retryIo =
	(config: Required<NodeAdapterConfig>) =>
	<A, E extends IoError | NotFoundError>(
		effect: Effect.Effect<A, E>,
	): Effect.Effect<A, E> =>
		Effect.retry(effect, {
			schedule: retryPolicy(config),
			while: (error) => error._tag === "IoError",
		});

// ============================================================================
// Storage operations
// ============================================================================

const makeRead =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<Uint8Array, IoError | NotFoundError> =>
		Effect.tryPromise({
			try: () => fs.readFile(path),
			catch: toReadError(path, "read"),
		}).pipe(retryIo(config));

const makeEnsureDirectory =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<void, IoError> =>
		Effect.tryPromise({
			try: () => fs.mkdir(path, { recursive: true, mode: config.dirMode }),
			catch: (error) => toIoError(path, "mkdir", error),
		}).pipe(Effect.asVoid, retryIo(config));

const makeWrite =
	(config: Required<NodeAdapterConfig>) =>
	(path: string, data: Uint8Array): Effect.Effect<void, IoError> => {
		const tempPath = `${path}.tmp.${randomBytes(8).toString("hex")}`;

		const ensureParentDir = config.createMissingDirectories
			? Effect.tryPromise({
					try: () =>
						fs.mkdir(dirname(path), {
							recursive: true,
							mode: config.dirMode,
						}),
					catch: (error) => toIoError(dirname(path), "mkdir", error),
				}).pipe(Effect.asVoid)
			: Effect.void;

		const writeAndRename = Effect.tryPromise({
			try: () => fs.writeFile(tempPath, data, { mode: config.fileMode }),
			catch: (error) => toIoError(path, "write", error),
		}).pipe(
			Effect.andThen(
				Effect.tryPromise({
					try: () => fs.rename(tempPath, path),
					catch: (error) => toIoError(path, "write", error),
				}),
			),
			Effect.catchAll((error) =>
				Effect.tryPromise({
					try: () => fs.unlink(tempPath),
					catch: () => error,
				}).pipe(Effect.ignore, Effect.andThen(Effect.fail(error))),
			),
		);

		return ensureParentDir.pipe(
			Effect.andThen(writeAndRename),
			retryIo(config),
		);
	};

const makeExists = (path: string): Effect.Effect<boolean, IoError> =>
	Effect.tryPromise({
		try: () => fs.access(path).then(() => true),
		catch: toReadError(path, "stat"),
	}).pipe(Effect.catchTag("NotFoundError", () => Effect.succeed(false)));

const makeSize =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<number, IoError | NotFoundError> =>
		Effect.tryPromise({
			try: () => fs.stat(path).then((stats) => stats.size),
			catch: toReadError(path, "stat"),
		}).pipe(retryIo(config));

const makeRemove =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<void, IoError | NotFoundError> =>
		Effect.tryPromise({
			try: () => fs.unlink(path),
			catch: toReadError(path, "delete"),
		}).pipe(retryIo(config));

const makeRemoveDirectory =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<void, IoError> =>
		Effect.tryPromise({
			try: () => fs.rm(path, { recursive: true, force: true }),
			catch: (error) => toIoError(path, "delete", error),
		}).pipe(retryIo(config));

// Symlinks are not followed, matching fs.rm
const sumFileSizes = async (directory: string): Promise<number> => {
	let total = 0;
	for (const entry of await fs.readdir(directory, { withFileTypes: true })) {
		const path = join(directory, entry.name);
		if (entry.isDirectory()) {
			total += await sumFileSizes(path);
		} else if (entry.isFile()) {
			total += (await fs.stat(path)).size;
		}
	}
	return total;
};

const makeDirectorySize =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<number, IoError | NotFoundError> =>
		Effect.tryPromise({
			try: () => sumFileSizes(path),
			catch: toReadError(path, "stat"),
		}).pipe(retryIo(config));

const makeList =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<ReadonlyArray<string>, IoError> =>
		Effect.tryPromise({
			try: () => fs.readdir(path).then((names) => names.sort()),
			catch: toReadError(path, "read"),
		}).pipe(
			retryIo(config),
			Effect.catchTag("NotFoundError", () => Effect.succeed([])),
		);

// ============================================================================
// Layer construction
// ============================================================================

const makeAdapter = (
	config: Required<NodeAdapterConfig>,
): StorageAdapterShape => ({
	read: makeRead(config),
	write: makeWrite(config),
	exists: makeExists,
	size: makeSize(config),
	remove: makeRemove(config),
	removeDirectory: makeRemoveDirectory(config),
	directorySize: makeDirectorySize(config),
	list: makeList(config),
	ensureDirectory: makeEnsureDirectory(config),
});

/**
 * Creates a NodeStorageLayer with custom configuration.
 */
export const makeNodeStorageLayer = (
	config: NodeAdapterConfig = {},
): Layer.Layer<StorageAdapter> => {
	const resolved = { ...defaultConfig, ...config };
	return Layer.succeed(StorageAdapter, makeAdapter(resolved));
};

/**
 * Default NodeStorageLayer with standard configuration.
 */
export const NodeStorageLayer: Layer.Layer<StorageAdapter> =
	makeNodeStorageLayer();
