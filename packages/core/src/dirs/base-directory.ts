/**
 * Base directory kinds: the OS-convention roots a binding can live under.
 */

export type StandardDirectoryKind =
	| "data"
	| "dataLocal"
	| "config"
	| "preference"
	| "cache"
	| "state"
	| "download";

export interface CustomDirectory {
	readonly kind: "custom";
	readonly path: string;
}

export type BaseDirectory = StandardDirectoryKind | CustomDirectory;

/**
 * Named constructors for every base directory kind.
 *
 * @example
 * ```typescript
 * defineBinding({ directory: Dir.Config, project: "MyProject", file: "state", format: "json" })
 * defineBinding({ directory: Dir.custom("/srv/app"), project: "MyProject", file: "state", format: "toml" })
 * ```
 */
export const Dir = {
	Data: "data",
	DataLocal: "dataLocal",
	Config: "config",
	Preference: "preference",
	Cache: "cache",
	State: "state",
	Download: "download",
	custom: (path: string): CustomDirectory => ({ kind: "custom", path }),
} as const;

export const isCustomDirectory = (
	directory: BaseDirectory,
): directory is CustomDirectory => typeof directory !== "string";

/**
 * Human-readable label used in error messages and logs.
 */
export const describeDirectory = (directory: BaseDirectory): string =>
	isCustomDirectory(directory) ? `custom(${directory.path})` : directory;
