import { binaryCodec } from "./codecs/binary.js"
import { bsonCodec } from "./codecs/bson.js"
import { emptyCodec } from "./codecs/empty.js"
import { jsonCodec } from "./codecs/json.js"
import { msgpackCodec } from "./codecs/msgpack.js"
import { plainCodec } from "./codecs/plain.js"
import { tomlCodec } from "./codecs/toml.js"
import { yamlCodec } from "./codecs/yaml.js"
import { type FormatCodec, makeSerializerLayer } from "./format-codec.js"

// ============================================================================
// Preset Layers — Pre-configured SerializerRegistry Layers
// ============================================================================

/**
 * Fresh instances of every built-in codec.
 */
export const allCodecs = (): ReadonlyArray<FormatCodec> => [
	jsonCodec(),
	yamlCodec(),
	tomlCodec(),
	msgpackCodec(),
	bsonCodec(),
	plainCodec(),
	binaryCodec(),
	emptyCodec(),
]

/**
 * A SerializerRegistry Layer that supports every built-in format:
 * - JSON (.json)
 * - YAML (.yaml, .yml)
 * - TOML (.toml)
 * - MessagePack (.msgpack, .mp)
 * - BSON (.bson)
 * - Plain text (.txt)
 * - Raw binary (.bin)
 * - Empty marker (no extension)
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const registry = yield* SerializerRegistry
 *   return yield* registry.encode({ number: 7 }, "toml")
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(AllFormatsLayer)))
 * ```
 */
export const AllFormatsLayer = makeSerializerLayer(allCodecs())

/**
 * A SerializerRegistry Layer with the default text formats:
 * - JSON (.json)
 * - YAML (.yaml, .yml)
 */
export const DefaultSerializerLayer = makeSerializerLayer([
	jsonCodec(),
	yamlCodec(),
])
