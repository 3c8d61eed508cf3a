/**
 * Property-based round-trip tests for codecs and compression.
 *
 * - JSON returns any JSON value it encoded
 * - MessagePack and BSON return any flat record they encoded
 * - gzip returns any byte string it compressed
 */
import { Effect } from "effect";
import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { bsonCodec } from "../../src/serializers/codecs/bson.js";
import { jsonCodec } from "../../src/serializers/codecs/json.js";
import { msgpackCodec } from "../../src/serializers/codecs/msgpack.js";
import { compress, decompress } from "../../src/transforms/gzip.js";
import { getNumRuns, recordArbitrary } from "./generators.js";

describe("codec round-trip properties", () => {
	it("JSON decodes what it encoded", () => {
		const codec = jsonCodec();
		fc.assert(
			fc.property(fc.jsonValue(), (value) => {
				expect(codec.decode(codec.encode(value))).toEqual(value);
			}),
			{ numRuns: getNumRuns() },
		);
	});

	it("MessagePack decodes what it encoded", () => {
		const codec = msgpackCodec();
		fc.assert(
			fc.property(recordArbitrary(), (value) => {
				expect(codec.decode(codec.encode(value))).toEqual(value);
			}),
			{ numRuns: getNumRuns() },
		);
	});

	it("BSON decodes what it encoded", () => {
		const codec = bsonCodec();
		fc.assert(
			fc.property(recordArbitrary(), (value) => {
				expect(codec.decode(codec.encode(value))).toEqual(value);
			}),
			{ numRuns: getNumRuns() },
		);
	});

	it("gzip restores any byte string", () => {
		fc.assert(
			fc.property(fc.uint8Array({ maxLength: 512 }), (bytes) => {
				const restored = Effect.runSync(
					compress(bytes).pipe(Effect.flatMap(decompress)),
				);
				expect(Array.from(restored)).toEqual(Array.from(bytes));
			}),
			{ numRuns: getNumRuns() },
		);
	});
});
