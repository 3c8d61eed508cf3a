/**
 * Path resolution: `<base>/<project>/<sub...>/<file>[.<ext>]`.
 *
 * Inputs are checked at resolution time; every failure is a
 * PathResolutionError, so a bad binding fails its first operation instead of
 * writing somewhere unexpected.
 */

import { Effect } from "effect";
import { pathModuleFor } from "../dirs/os-directories.js";
import { PathResolutionError } from "../errors/persist-errors.js";

// ============================================================================
// Types
// ============================================================================

export interface PathInput {
	readonly baseDirectory: string;
	readonly platform: NodeJS.Platform;
	readonly project: string;
	readonly subDirectory: string;
	readonly file: string;
	readonly extension: string;
}

export interface ResolvedPaths {
	/** `<base>/<project>` */
	readonly projectDirectory: string;
	/** `<base>/<project>/<sub...>`, the directory holding the file */
	readonly directory: string;
	/** `<base>/<project>/<first sub>`, or the project directory without sub-directories */
	readonly subDirectoryRoot: string;
	/** Absolute path of the file itself */
	readonly file: string;
}

// ============================================================================
// Limits
// ============================================================================

export const MAX_SEGMENT_BYTES = 255;
export const MAX_TOTAL_BYTES = 4000;
export const MAX_SUB_DIRECTORY_DEPTH = 10;

const FORBIDDEN_SYMBOLS: ReadonlyArray<string> = [
	"<",
	">",
	":",
	'"',
	"'",
	"|",
	"?",
	"*",
	"^",
	"$",
	"&",
	"(",
	")",
];

const EDGE_SYMBOLS: ReadonlyArray<string> = [" ", "/", "\\"];

const encoder = new TextEncoder();
const byteLength = (value: string): number => encoder.encode(value).length;

// ============================================================================
// Validation
// ============================================================================

const invalid = (message: string): PathResolutionError =>
	new PathResolutionError({ reason: "invalid-segment", message });

const checkSymbols = (
	label: string,
	value: string,
): PathResolutionError | undefined => {
	const symbol = FORBIDDEN_SYMBOLS.find((s) => value.includes(s));
	if (symbol !== undefined) {
		return invalid(`${label} must not contain '${symbol}': '${value}'`);
	}
	const edge = EDGE_SYMBOLS.find((s) => value.startsWith(s) || value.endsWith(s));
	if (edge !== undefined) {
		return invalid(`${label} must not start or end with '${edge}': '${value}'`);
	}
	return undefined;
};

const checkNamedSegment = (
	label: string,
	value: string,
): PathResolutionError | undefined => {
	if (value.length === 0) {
		return new PathResolutionError({
			reason: "empty-segment",
			message: `${label} must not be an empty string`,
		});
	}
	if (value === "." || value === "..") {
		return invalid(`${label} must not be '.' or '..'`);
	}
	if (byteLength(value) >= MAX_SEGMENT_BYTES) {
		return invalid(`${label} must be less than ${MAX_SEGMENT_BYTES} bytes long`);
	}
	if (value.includes("/") || value.includes("\\")) {
		return invalid(`${label} must not contain a path separator: '${value}'`);
	}
	return checkSymbols(label, value);
};

/**
 * Split a sub-directory string into segments.
 * `""` and `"."` both mean "no sub-directory"; `..` is never allowed.
 */
export const splitSubDirectory = (
	subDirectory: string,
	platform: NodeJS.Platform,
): Effect.Effect<ReadonlyArray<string>, PathResolutionError> =>
	Effect.suspend(() => {
		const separator = platform === "win32" ? /[\\/]/ : /\//;
		const segments = subDirectory
			.split(separator)
			.filter((segment) => segment !== "" && segment !== ".");

		if (segments.length >= MAX_SUB_DIRECTORY_DEPTH) {
			return Effect.fail(
				invalid(
					`Sub-directories are limited to ${MAX_SUB_DIRECTORY_DEPTH - 1} levels, got ${segments.length}`,
				),
			);
		}

		for (const segment of segments) {
			if (segment === "..") {
				return Effect.fail(
					invalid(`Sub-directory must not contain '..': '${subDirectory}'`),
				);
			}
			if (byteLength(segment) >= MAX_SEGMENT_BYTES) {
				return Effect.fail(
					invalid(
						`Sub-directory '${segment}' must be less than ${MAX_SEGMENT_BYTES} bytes long`,
					),
				);
			}
			const error = checkSymbols("Sub-directory", segment);
			if (error !== undefined) {
				return Effect.fail(error);
			}
		}

		return Effect.succeed(segments);
	});

/**
 * Normalize a project name into its directory segment:
 * trimmed, inner whitespace collapsed to `-`, lower-cased.
 *
 * @example
 * projectSegment("MyProject") // "myproject"
 * projectSegment("My Project") // "my-project"
 */
export const projectSegment = (project: string): string =>
	project.trim().replace(/\s+/g, "-").toLowerCase();

// ============================================================================
// resolvePaths
// ============================================================================

/**
 * Resolve every path a binding needs from an already-resolved base directory.
 * Pure: the same input always yields the same paths and nothing is touched on disk.
 */
export const resolvePaths = (
	input: PathInput,
): Effect.Effect<ResolvedPaths, PathResolutionError> =>
	Effect.gen(function* () {
		const projectError = checkNamedSegment("Project directory", input.project);
		if (projectError !== undefined) {
			return yield* Effect.fail(projectError);
		}
		// Normalization may still collapse a name onto the base directory itself
		const normalizedProject = projectSegment(input.project);
		if (["", ".", ".."].includes(normalizedProject)) {
			return yield* Effect.fail(
				invalid(`Project directory '${input.project}' does not name a directory`),
			);
		}
		const fileError = checkNamedSegment("File name", input.file);
		if (fileError !== undefined) {
			return yield* Effect.fail(fileError);
		}

		const total =
			byteLength(input.project) +
			byteLength(input.subDirectory) +
			byteLength(input.file);
		if (total >= MAX_TOTAL_BYTES) {
			return yield* Effect.fail(
				invalid(`Directories combined must be less than ${MAX_TOTAL_BYTES} bytes long`),
			);
		}

		const segments = yield* splitSubDirectory(input.subDirectory, input.platform);
		const path = pathModuleFor(input.platform);

		const projectDirectory = path.join(input.baseDirectory, normalizedProject);
		const directory = path.join(projectDirectory, ...segments);
		const firstSegment = segments[0];
		const subDirectoryRoot =
			firstSegment === undefined
				? projectDirectory
				: path.join(projectDirectory, firstSegment);
		const fileName =
			input.extension === "" ? input.file : `${input.file}.${input.extension}`;
		const file = path.join(directory, fileName);

		if (!path.isAbsolute(file)) {
			return yield* Effect.fail(
				new PathResolutionError({
					reason: "not-absolute",
					message: `Refusing to use a relative path: '${file}'`,
				}),
			);
		}

		return { projectDirectory, directory, subDirectoryRoot, file };
	});
