/**
 * Convenience wrappers that eliminate manual codec/layer wiring.
 *
 * Codecs are inferred from the formats the bindings name, so a store only
 * pays for the encoders it actually uses.
 */

import {
	allCodecs,
	type Binding,
	type FormatCodec,
	inferCodecsFromBindings,
	makeBaseDirectoriesLayer,
	makePersistent,
	makeSerializerLayer,
	type PersistenceServices,
	type Persistent,
	type PlatformEnvironment,
	type StoreConfig,
} from "@filebound/core";
import { Effect, Layer, type Schema } from "effect";
import {
	type NodeAdapterConfig,
	makeNodeStorageLayer,
} from "./node-adapter-layer.js";
import { NodeBaseDirectoriesLayer } from "./node-base-directories.js";

export interface NodePersistenceOptions {
	/** Bindings to infer codecs from; every built-in codec when omitted */
	readonly bindings?: Iterable<Pick<Binding, "format">>;
	/** Replaces inferred codecs entirely */
	readonly codecs?: ReadonlyArray<FormatCodec>;
	readonly storage?: NodeAdapterConfig;
	/** Resolve base directories against this instead of the current process */
	readonly environment?: PlatformEnvironment;
}

/**
 * Build a persistence Layer for Node.js.
 *
 * Combines NodeStorageLayer, a SerializerRegistry and BaseDirectories.
 *
 * @returns A Layer providing StorageAdapter + SerializerRegistry + BaseDirectories
 */
export const makeNodePersistenceLayer = (
	options: NodePersistenceOptions = {},
): Layer.Layer<PersistenceServices> => {
	const codecs =
		options.codecs ??
		(options.bindings !== undefined
			? inferCodecsFromBindings(options.bindings)
			: allCodecs());
	const directories =
		options.environment !== undefined
			? makeBaseDirectoriesLayer(options.environment)
			: NodeBaseDirectoriesLayer;
	return Layer.mergeAll(
		makeNodeStorageLayer(options.storage),
		makeSerializerLayer(codecs),
		directories,
	);
};

// ============================================================================
// Node store
// ============================================================================

export type NodePersistent<S extends Schema.Schema.AnyNoContext> = Persistent<
	S,
	never
>;

export type NodeStore<Config extends StoreConfig> = {
	readonly [K in keyof Config]: NodePersistent<Config[K]["schema"]>;
};

const provideHandle = <S extends Schema.Schema.AnyNoContext>(
	handle: Persistent<S>,
	layer: Layer.Layer<PersistenceServices>,
): NodePersistent<S> => ({
	binding: handle.binding,
	paths: () => handle.paths().pipe(Effect.provide(layer)),
	absolutePath: () => handle.absolutePath().pipe(Effect.provide(layer)),
	save: (value) => handle.save(value).pipe(Effect.provide(layer)),
	load: () => handle.load().pipe(Effect.provide(layer)),
	exists: () => handle.exists().pipe(Effect.provide(layer)),
	metadata: () => handle.metadata().pipe(Effect.provide(layer)),
	mkdir: () => handle.mkdir().pipe(Effect.provide(layer)),
	remove: () => handle.remove().pipe(Effect.provide(layer)),
	removeTemporary: () => handle.removeTemporary().pipe(Effect.provide(layer)),
	removeSubDirectory: () =>
		handle.removeSubDirectory().pipe(Effect.provide(layer)),
	removeProject: () => handle.removeProject().pipe(Effect.provide(layer)),
	subDirectorySize: () => handle.subDirectorySize().pipe(Effect.provide(layer)),
	projectDirectorySize: () =>
		handle.projectDirectorySize().pipe(Effect.provide(layer)),
	readBytes: (start, end) =>
		handle.readBytes(start, end).pipe(Effect.provide(layer)),
	fileVersion: () => handle.fileVersion().pipe(Effect.provide(layer)),
});

/**
 * Create a store backed by the Node.js filesystem — no manual layer wiring.
 *
 * Codecs are inferred from the bindings' formats. Every handle operation is
 * an Effect with no remaining requirements.
 *
 * @example
 * ```typescript
 * const store = createNodeStore({
 *   state: defineBinding({ directory: Dir.Config, project: "MyProject", file: "state", format: "json" }),
 * })
 *
 * await Effect.runPromise(store.state.save({ number: 7 }))
 * ```
 */
export const createNodeStore = <Config extends StoreConfig>(
	config: Config,
	options: Omit<NodePersistenceOptions, "bindings"> = {},
): NodeStore<Config> => {
	const layer = makeNodePersistenceLayer({
		...options,
		bindings: Object.values(config),
	});
	const handles: Record<
		string,
		NodePersistent<Schema.Schema.AnyNoContext>
	> = {};
	for (const [name, binding] of Object.entries(config)) {
		handles[name] = provideHandle(makePersistent(binding), layer);
	}
	return handles as NodeStore<Config>;
};
