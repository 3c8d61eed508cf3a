/**
 * In-memory implementation of StorageAdapter as an Effect Layer.
 * Intended for testing — stores data in a Map<string, Uint8Array> instead of the filesystem.
 */

import { Effect, Layer } from "effect"
import { NotFoundError } from "../errors/persist-errors.js"
import { StorageAdapter, type StorageAdapterShape } from "./storage-service.js"

// ============================================================================
// In-memory storage adapter
// ============================================================================

const isInside = (path: string, directory: string): boolean =>
	path.startsWith(`${directory}/`) || path.startsWith(`${directory}\\`)

const childName = (path: string, directory: string): string | undefined => {
	if (!isInside(path, directory)) return undefined
	const rest = path.slice(directory.length + 1)
	return rest.split(/[\\/]/)[0]
}

const notFound = (path: string) =>
	new NotFoundError({ path, message: `File not found: ${path}` })

const makeInMemoryAdapter = (
	store: Map<string, Uint8Array>,
	directories: Set<string>,
): StorageAdapterShape => ({
	read: (path: string) =>
		Effect.suspend(() => {
			const content = store.get(path)
			if (content === undefined) {
				return Effect.fail(notFound(path))
			}
			return Effect.succeed(content.slice())
		}),

	write: (path: string, data: Uint8Array) =>
		Effect.sync(() => {
			// Copy so later mutation of the caller's buffer cannot alter the "file"
			store.set(path, data.slice())
		}),

	exists: (path: string) =>
		Effect.sync(() => store.has(path) || directories.has(path)),

	size: (path: string) =>
		Effect.suspend(() => {
			const content = store.get(path)
			return content === undefined
				? Effect.fail(notFound(path))
				: Effect.succeed(content.length)
		}),

	remove: (path: string) =>
		Effect.suspend(() => {
			if (!store.has(path)) {
				return Effect.fail(notFound(path))
			}
			store.delete(path)
			return Effect.void
		}),

	removeDirectory: (path: string) =>
		Effect.sync(() => {
			for (const key of Array.from(store.keys())) {
				if (isInside(key, path)) store.delete(key)
			}
			for (const dir of Array.from(directories)) {
				if (dir === path || isInside(dir, path)) directories.delete(dir)
			}
		}),

	directorySize: (path: string) =>
		Effect.suspend(() => {
			let total = 0
			let found = directories.has(path)
			for (const [key, content] of store) {
				if (isInside(key, path)) {
					found = true
					total += content.length
				}
			}
			for (const dir of directories) {
				if (isInside(dir, path)) found = true
			}
			return found ? Effect.succeed(total) : Effect.fail(notFound(path))
		}),

	list: (path: string) =>
		Effect.sync(() => {
			const names = new Set<string>()
			for (const entry of [...store.keys(), ...directories]) {
				const name = childName(entry, path)
				if (name !== undefined && name !== "") names.add(name)
			}
			return Array.from(names).sort()
		}),

	ensureDirectory: (path: string) =>
		Effect.sync(() => {
			directories.add(path)
		}),
})

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an InMemoryStorageLayer backed by the provided Map.
 * Pass your own Map to inspect stored data in tests.
 */
export const makeInMemoryStorageLayer = (
	store: Map<string, Uint8Array> = new Map(),
	directories: Set<string> = new Set(),
): Layer.Layer<StorageAdapter> =>
	Layer.succeed(StorageAdapter, makeInMemoryAdapter(store, directories))
