/**
 * OS directory resolution following the XDG base directory conventions on
 * Linux and the BSDs, `~/Library` on macOS and the known folders on Windows.
 *
 * Everything the resolution depends on (platform, environment, home directory)
 * is passed in, so the same function serves the Node layer and the tests.
 */

import { posix, win32 } from "node:path";
import { Effect } from "effect";
import { PathResolutionError } from "../errors/persist-errors.js";
import {
	type BaseDirectory,
	describeDirectory,
	isCustomDirectory,
	type StandardDirectoryKind,
} from "./base-directory.js";

// ============================================================================
// Environment
// ============================================================================

export interface PlatformEnvironment {
	readonly platform: NodeJS.Platform;
	readonly env: Readonly<Record<string, string | undefined>>;
	readonly homeDirectory: string | undefined;
}

type PlatformFamily = "xdg" | "macos" | "windows";

const XDG_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set<NodeJS.Platform>([
	"linux",
	"freebsd",
	"openbsd",
	"netbsd",
	"sunos",
	"aix",
]);

const platformFamily = (platform: NodeJS.Platform): PlatformFamily | undefined => {
	if (platform === "darwin") return "macos";
	if (platform === "win32") return "windows";
	if (XDG_PLATFORMS.has(platform)) return "xdg";
	return undefined;
};

export const pathModuleFor = (platform: NodeJS.Platform) =>
	platform === "win32" ? win32 : posix;

// ============================================================================
// Per-family tables
// ============================================================================

interface XdgRule {
	readonly variable: string;
	readonly fallback: ReadonlyArray<string>;
}

const XDG_RULES: Record<StandardDirectoryKind, XdgRule> = {
	data: { variable: "XDG_DATA_HOME", fallback: [".local", "share"] },
	dataLocal: { variable: "XDG_DATA_HOME", fallback: [".local", "share"] },
	config: { variable: "XDG_CONFIG_HOME", fallback: [".config"] },
	preference: { variable: "XDG_CONFIG_HOME", fallback: [".config"] },
	cache: { variable: "XDG_CACHE_HOME", fallback: [".cache"] },
	state: { variable: "XDG_STATE_HOME", fallback: [".local", "state"] },
	download: { variable: "XDG_DOWNLOAD_DIR", fallback: ["Downloads"] },
};

const MACOS_RULES: Record<StandardDirectoryKind, ReadonlyArray<string>> = {
	data: ["Library", "Application Support"],
	dataLocal: ["Library", "Application Support"],
	config: ["Library", "Application Support"],
	preference: ["Library", "Preferences"],
	cache: ["Library", "Caches"],
	state: ["Library", "Application Support"],
	download: ["Downloads"],
};

interface WindowsRule {
	readonly variable: string | undefined;
	readonly fallback: ReadonlyArray<string>;
}

const ROAMING: WindowsRule = { variable: "APPDATA", fallback: ["AppData", "Roaming"] };
const LOCAL: WindowsRule = { variable: "LOCALAPPDATA", fallback: ["AppData", "Local"] };

const WINDOWS_RULES: Record<StandardDirectoryKind, WindowsRule> = {
	data: ROAMING,
	dataLocal: LOCAL,
	config: ROAMING,
	preference: ROAMING,
	cache: LOCAL,
	state: LOCAL,
	download: { variable: undefined, fallback: ["Downloads"] },
};

// ============================================================================
// Resolution
// ============================================================================

const nonEmpty = (value: string | undefined): string | undefined =>
	value !== undefined && value.trim().length > 0 ? value : undefined;

const requireHome = (
	environment: PlatformEnvironment,
	kind: StandardDirectoryKind,
): Effect.Effect<string, PathResolutionError> => {
	const home = nonEmpty(environment.homeDirectory);
	return home === undefined
		? Effect.fail(
				new PathResolutionError({
					reason: "home-unavailable",
					directory: kind,
					message: `Cannot resolve the '${kind}' directory: home directory is unknown`,
				}),
			)
		: Effect.succeed(home);
};

const resolveStandard = (
	kind: StandardDirectoryKind,
	family: PlatformFamily,
	environment: PlatformEnvironment,
): Effect.Effect<string, PathResolutionError> => {
	const path = pathModuleFor(environment.platform);

	switch (family) {
		case "xdg": {
			const rule = XDG_RULES[kind];
			const configured = nonEmpty(environment.env[rule.variable]);
			// XDG requires absolute values; relative ones are ignored
			if (configured !== undefined && path.isAbsolute(configured)) {
				return Effect.succeed(path.normalize(configured));
			}
			return requireHome(environment, kind).pipe(
				Effect.map((home) => path.join(home, ...rule.fallback)),
			);
		}
		case "macos":
			return requireHome(environment, kind).pipe(
				Effect.map((home) => path.join(home, ...MACOS_RULES[kind])),
			);
		case "windows": {
			const rule = WINDOWS_RULES[kind];
			const configured =
				rule.variable === undefined ? undefined : nonEmpty(environment.env[rule.variable]);
			if (configured !== undefined && path.isAbsolute(configured)) {
				return Effect.succeed(path.normalize(configured));
			}
			return requireHome(environment, kind).pipe(
				Effect.map((home) => path.join(home, ...rule.fallback)),
			);
		}
	}
};

/**
 * Resolve a base directory to an absolute path for the given environment.
 *
 * @example
 * ```typescript
 * resolveBaseDirectory("config", { platform: "linux", env: {}, homeDirectory: "/home/alice" })
 * // Effect succeeding with "/home/alice/.config"
 * ```
 */
export const resolveBaseDirectory = (
	directory: BaseDirectory,
	environment: PlatformEnvironment,
): Effect.Effect<string, PathResolutionError> => {
	const path = pathModuleFor(environment.platform);

	if (isCustomDirectory(directory)) {
		return path.isAbsolute(directory.path)
			? Effect.succeed(path.normalize(directory.path))
			: Effect.fail(
					new PathResolutionError({
						reason: "invalid-custom-path",
						directory: describeDirectory(directory),
						message: `Custom base directory must be an absolute path, got '${directory.path}'`,
					}),
				);
	}

	const family = platformFamily(environment.platform);
	if (family === undefined) {
		return Effect.fail(
			new PathResolutionError({
				reason: "unsupported-platform",
				directory,
				message: `User directories are not known for platform '${environment.platform}'`,
			}),
		);
	}

	return resolveStandard(directory, family, environment);
};
