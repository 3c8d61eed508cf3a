import { Context, type Effect } from "effect";
import type { IoError, NotFoundError } from "../errors/persist-errors.js";

// ============================================================================
// StorageAdapter Effect Service
// ============================================================================

/**
 * Byte-level file access. Paths are absolute; directories are created
 * explicitly through `ensureDirectory` or by the adapter's own write policy.
 */
export interface StorageAdapterShape {
	readonly read: (
		path: string,
	) => Effect.Effect<Uint8Array, IoError | NotFoundError>;
	/** Replaces the file as a whole; readers see the old or the new content, never a mix */
	readonly write: (path: string, data: Uint8Array) => Effect.Effect<void, IoError>;
	readonly exists: (path: string) => Effect.Effect<boolean, IoError>;
	readonly size: (path: string) => Effect.Effect<number, IoError | NotFoundError>;
	readonly remove: (path: string) => Effect.Effect<void, IoError | NotFoundError>;
	/** Recursive; succeeds when the directory is already gone */
	readonly removeDirectory: (path: string) => Effect.Effect<void, IoError>;
	/** Total bytes of the files below a directory, counted recursively */
	readonly directorySize: (
		path: string,
	) => Effect.Effect<number, IoError | NotFoundError>;
	/** Names of a directory's direct entries; empty when it does not exist */
	readonly list: (path: string) => Effect.Effect<ReadonlyArray<string>, IoError>;
	/** Recursive and idempotent */
	readonly ensureDirectory: (path: string) => Effect.Effect<void, IoError>;
}

export class StorageAdapter extends Context.Tag("StorageAdapter")<
	StorageAdapter,
	StorageAdapterShape
>() {}
