/**
 * Infer which codecs are needed from the formats a set of bindings names.
 */

import type { Binding } from "../binding/binding.js";
import { binaryCodec } from "./codecs/binary.js";
import { bsonCodec } from "./codecs/bson.js";
import { emptyCodec } from "./codecs/empty.js";
import { jsonCodec } from "./codecs/json.js";
import { msgpackCodec } from "./codecs/msgpack.js";
import { plainCodec } from "./codecs/plain.js";
import { tomlCodec } from "./codecs/toml.js";
import { yamlCodec } from "./codecs/yaml.js";
import type { FormatCodec } from "./format-codec.js";

const CODEC_FACTORIES: Record<string, () => FormatCodec> = {
	json: () => jsonCodec(),
	yaml: () => yamlCodec(),
	yml: () => yamlCodec(),
	toml: () => tomlCodec(),
	msgpack: () => msgpackCodec(),
	mp: () => msgpackCodec(),
	bson: () => bsonCodec(),
	plain: () => plainCodec(),
	txt: () => plainCodec(),
	binary: () => binaryCodec(),
	bin: () => binaryCodec(),
	empty: () => emptyCodec(),
};

/**
 * Infer which FormatCodec instances a set of bindings needs.
 *
 * Each binding's `format` is matched against the built-in codec names and
 * extensions. Returns a deduped array of codec instances. Unknown formats are
 * skipped here and reported as UnsupportedFormatError when the binding is used.
 *
 * @param bindings - Bindings to analyze
 * @returns A deduplicated array of FormatCodec instances
 */
export const inferCodecsFromBindings = (
	bindings: Iterable<Pick<Binding, "format">>,
): ReadonlyArray<FormatCodec> => {
	const seen = new Set<string>();
	const codecs: FormatCodec[] = [];

	for (const binding of bindings) {
		const factory = CODEC_FACTORIES[binding.format];
		if (!factory) continue;

		const codec = factory();
		if (!seen.has(codec.name)) {
			seen.add(codec.name);
			codecs.push(codec);
		}
	}

	return codecs;
};
