import { describe, expect, it } from "vitest";
import { binaryCodec } from "../src/serializers/codecs/binary.js";
import { bsonCodec } from "../src/serializers/codecs/bson.js";
import { emptyCodec } from "../src/serializers/codecs/empty.js";
import { jsonCodec } from "../src/serializers/codecs/json.js";
import { msgpackCodec } from "../src/serializers/codecs/msgpack.js";
import { plainCodec } from "../src/serializers/codecs/plain.js";
import { tomlCodec } from "../src/serializers/codecs/toml.js";
import { yamlCodec } from "../src/serializers/codecs/yaml.js";
import type { FormatCodec } from "../src/serializers/format-codec.js";

/**
 * Round-trip and edge-case tests for every built-in codec.
 */

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);
const bytesOf = (value: string) => new TextEncoder().encode(value);

const settings = {
	theme: "dark",
	volume: 7,
	ratio: 0.25,
	enabled: true,
	recent: ["a.txt", "b.txt"],
	window: { width: 800, height: 600 },
};

const roundTrip = (codec: FormatCodec, data: unknown) =>
	codec.decode(codec.encode(data));

describe("jsonCodec", () => {
	const codec = jsonCodec();

	it("round-trips nested data", () => {
		expect(roundTrip(codec, settings)).toEqual(settings);
	});

	it("indents with two spaces by default", () => {
		expect(text(codec.encode({ a: [1] }))).toBe('{\n  "a": [\n    1\n  ]\n}');
	});

	it("honours the indent option", () => {
		expect(text(jsonCodec({ indent: 0 }).encode({ a: 1 }))).toBe('{"a":1}');
		expect(text(jsonCodec({ indent: 4 }).encode({ a: 1 }))).toBe('{\n    "a": 1\n}');
	});

	it("keeps null values", () => {
		expect(roundTrip(codec, { a: null })).toEqual({ a: null });
	});

	it("throws on values without a JSON form", () => {
		expect(() => codec.encode(() => 1)).toThrow(
			"value of type function has no JSON representation",
		);
	});
});

describe("yamlCodec", () => {
	const codec = yamlCodec();

	it("round-trips nested data", () => {
		expect(roundTrip(codec, settings)).toEqual(settings);
	});

	it("writes block-style mappings and sequences", () => {
		expect(text(codec.encode({ a: 1, b: [1, 2] }))).toBe(
			"a: 1\nb:\n  - 1\n  - 2\n",
		);
	});

	it("honours the indent option", () => {
		expect(text(yamlCodec({ indent: 4 }).encode({ a: { b: 1 } }))).toBe(
			"a:\n    b: 1\n",
		);
	});

	it("claims both yaml and yml extensions", () => {
		expect(codec.extensions).toEqual(["yaml", "yml"]);
	});
});

describe("tomlCodec", () => {
	const codec = tomlCodec();

	it("round-trips tables", () => {
		expect(roundTrip(codec, settings)).toEqual(settings);
	});

	it("parses TOML documents", () => {
		expect(codec.decode(bytesOf('number = 7\n\n[owner]\nname = "x"\n'))).toEqual(
			{ number: 7, owner: { name: "x" } },
		);
	});

	it("strips null and undefined values recursively", () => {
		const input = {
			a: 1,
			b: null,
			c: { d: undefined, e: 2 },
			list: [1, null, 3],
		};
		expect(roundTrip(codec, input)).toEqual({ a: 1, c: { e: 2 }, list: [1, 3] });
	});

	it("requires a table at the top level", () => {
		expect(() => codec.encode([1, 2])).toThrow(
			"top-level value must be a table, got array",
		);
		expect(() => codec.encode(7)).toThrow(
			"top-level value must be a table, got number",
		);
	});
});

describe("msgpackCodec", () => {
	const codec = msgpackCodec();

	it("round-trips nested data", () => {
		expect(roundTrip(codec, settings)).toEqual(settings);
	});

	it("encodes small integers as a single byte", () => {
		expect(Array.from(codec.encode(7))).toEqual([0x07]);
	});

	it("rejects empty input", () => {
		expect(() => codec.decode(new Uint8Array(0))).toThrow(
			"no MessagePack data: input is empty",
		);
	});
});

describe("bsonCodec", () => {
	const codec = bsonCodec();

	it("round-trips documents", () => {
		expect(roundTrip(codec, settings)).toEqual(settings);
	});

	it("requires a document at the top level", () => {
		expect(() => codec.encode(["a"])).toThrow(
			"top-level value must be a document, got array",
		);
		expect(() => codec.encode("a")).toThrow(
			"top-level value must be a document, got string",
		);
	});
});

describe("plainCodec", () => {
	const codec = plainCodec();

	it("writes scalars as their string form", () => {
		expect(text(codec.encode("hello"))).toBe("hello");
		expect(text(codec.encode(42))).toBe("42");
		expect(text(codec.encode(false))).toBe("false");
		expect(text(codec.encode(10n))).toBe("10");
	});

	it("reads the file's text unchanged", () => {
		expect(codec.decode(bytesOf("42\n"))).toBe("42\n");
	});

	it("rejects structured values", () => {
		expect(() => codec.encode({ a: 1 })).toThrow(
			"plain text holds a single scalar, got object",
		);
		expect(() => codec.encode(null)).toThrow(
			"plain text holds a single scalar, got null",
		);
	});
});

describe("binaryCodec", () => {
	const codec = binaryCodec();

	it("passes bytes through unchanged", () => {
		const bytes = new Uint8Array([0, 1, 255]);
		expect(Array.from(codec.encode(bytes))).toEqual([0, 1, 255]);
		expect(codec.decode(bytes)).toBe(bytes);
	});

	it("requires a Uint8Array payload", () => {
		expect(() => codec.encode("bytes")).toThrow(
			"binary payload must be a Uint8Array, got string",
		);
	});
});

describe("emptyCodec", () => {
	const codec = emptyCodec();

	it("writes zero bytes whatever the payload", () => {
		expect(codec.encode({ ignored: true }).length).toBe(0);
		expect(codec.encode(null).length).toBe(0);
	});

	it("decodes an empty file to null", () => {
		expect(codec.decode(new Uint8Array(0))).toBeNull();
	});

	it("rejects a non-empty file", () => {
		expect(() => codec.decode(new Uint8Array([1]))).toThrow(
			"expected an empty file, found 1 bytes",
		);
	});

	it("has no extension", () => {
		expect(codec.extensions).toEqual([]);
	});
});
