/**
 * Groups bindings under names and turns each one into a Persistent handle.
 *
 * Names are object-literal keys, so declaring the same name twice in one
 * store config is a compile-time error.
 */

import type { Schema } from "effect";
import type { Binding } from "../binding/binding.js";
import { makePersistent, type Persistent } from "../persistence/persistent.js";

export type StoreConfig = Readonly<
	Record<string, Binding<Schema.Schema.AnyNoContext>>
>;

export type Store<Config extends StoreConfig> = {
	readonly [K in keyof Config]: Persistent<Config[K]["schema"]>;
};

/**
 * Create one Persistent handle per binding.
 *
 * @example
 * ```typescript
 * const store = createStore({
 *   state: defineBinding({ directory: Dir.Config, project: "MyProject", file: "state", format: "json" }),
 *   cache: defineBinding({ directory: Dir.Cache, project: "MyProject", file: "index", format: "msgpack", gzip: true }),
 * })
 *
 * yield* store.state.save({ number: 7 })
 * ```
 */
export const createStore = <Config extends StoreConfig>(
	config: Config,
): Store<Config> => {
	const handles: Record<string, Persistent<Schema.Schema.AnyNoContext>> = {};
	for (const [name, binding] of Object.entries(config)) {
		handles[name] = makePersistent(binding);
	}
	return handles as Store<Config>;
};
