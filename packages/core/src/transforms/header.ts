/**
 * Fixed identifying header for files: 24 magic bytes followed by one version
 * byte, written in front of the codec output (and therefore inside the gzip
 * stream when compression is on).
 */

import { Effect } from "effect";
import { DecodeError, EncodeError } from "../errors/persist-errors.js";

export const HEADER_MAGIC_LENGTH = 24;
export const HEADER_LENGTH = HEADER_MAGIC_LENGTH + 1;

export interface FileHeader {
	readonly magic: Uint8Array;
	readonly version: number;
}

/**
 * Build a header from a string of exactly 24 UTF-8 bytes.
 *
 * @example
 * headerFromString("filebound-state-v1-----x", 3)
 */
export const headerFromString = (magic: string, version: number): FileHeader => ({
	magic: new TextEncoder().encode(magic),
	version,
});

const validateHeader = (header: FileHeader): string | undefined => {
	if (header.magic.length !== HEADER_MAGIC_LENGTH) {
		return `header magic must be ${HEADER_MAGIC_LENGTH} bytes, got ${header.magic.length}`;
	}
	if (!Number.isInteger(header.version) || header.version < 0 || header.version > 255) {
		return `header version must be an integer in 0..255, got ${header.version}`;
	}
	return undefined;
};

const magicMatches = (bytes: Uint8Array, magic: Uint8Array): boolean =>
	magic.every((byte, index) => bytes[index] === byte);

const headerError = (message: string): DecodeError =>
	new DecodeError({ format: "header", message });

export const prependHeader = (
	bytes: Uint8Array,
	header: FileHeader,
): Effect.Effect<Uint8Array, EncodeError> => {
	const problem = validateHeader(header);
	if (problem !== undefined) {
		return Effect.fail(new EncodeError({ format: "header", message: problem }));
	}
	const framed = new Uint8Array(HEADER_LENGTH + bytes.length);
	framed.set(header.magic, 0);
	framed[HEADER_MAGIC_LENGTH] = header.version;
	framed.set(bytes, HEADER_LENGTH);
	return Effect.succeed(framed);
};

export const stripHeader = (
	bytes: Uint8Array,
	header: FileHeader,
): Effect.Effect<Uint8Array, DecodeError> => {
	if (bytes.length < HEADER_LENGTH) {
		return Effect.fail(
			headerError(
				`Invalid header bytes, total byte length less than ${HEADER_LENGTH}: ${bytes.length}`,
			),
		);
	}
	if (!magicMatches(bytes, header.magic)) {
		return Effect.fail(headerError("Incorrect header bytes"));
	}
	const version = bytes[HEADER_MAGIC_LENGTH];
	if (version !== header.version) {
		return Effect.fail(
			headerError(`Incorrect version byte: expected ${header.version}, found ${version}`),
		);
	}
	return Effect.succeed(bytes.subarray(HEADER_LENGTH));
};

/**
 * Version byte of a file whose magic matches, whatever version it carries.
 */
export const readHeaderVersion = (
	bytes: Uint8Array,
	magic: Uint8Array,
): Effect.Effect<number, DecodeError> => {
	const version = bytes[HEADER_MAGIC_LENGTH];
	if (bytes.length < HEADER_LENGTH || version === undefined) {
		return Effect.fail(
			headerError(
				`Invalid header bytes, total byte length less than ${HEADER_LENGTH}: ${bytes.length}`,
			),
		);
	}
	if (!magicMatches(bytes, magic)) {
		return Effect.fail(headerError("Incorrect header bytes"));
	}
	return Effect.succeed(version);
};
