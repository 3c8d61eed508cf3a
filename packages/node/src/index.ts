/**
 * @filebound/node - Node.js runtime for filebound
 *
 * Re-exports everything from @filebound/core plus filesystem storage and the
 * process's base directories.
 */

// Re-export everything from core
export * from "@filebound/core";
// Convenience wrappers (binding-driven, no manual layer wiring)
export {
	createNodeStore,
	makeNodePersistenceLayer,
} from "./convenience.js";
export type {
	NodePersistenceOptions,
	NodePersistent,
	NodeStore,
} from "./convenience.js";
// Base directories of the running process
export { NodeBaseDirectoriesLayer } from "./node-base-directories.js";
export type { NodeAdapterConfig } from "./node-adapter-layer.js";
// Export Node.js storage adapter
export {
	makeNodeStorageLayer,
	NodeStorageLayer,
} from "./node-adapter-layer.js";
