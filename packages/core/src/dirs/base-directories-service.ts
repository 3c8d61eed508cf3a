import { Context, type Effect, Layer } from "effect"
import type { PathResolutionError } from "../errors/persist-errors.js"
import type { BaseDirectory } from "./base-directory.js"
import { type PlatformEnvironment, resolveBaseDirectory } from "./os-directories.js"

// ============================================================================
// BaseDirectories Effect Service
// ============================================================================

export interface BaseDirectoriesShape {
	readonly platform: NodeJS.Platform
	readonly resolve: (
		directory: BaseDirectory,
	) => Effect.Effect<string, PathResolutionError>
}

export class BaseDirectories extends Context.Tag("BaseDirectories")<
	BaseDirectories,
	BaseDirectoriesShape
>() {}

/**
 * Creates a BaseDirectories Layer resolving against a fixed environment.
 * Tests pass a synthetic environment; the Node package passes the process one.
 */
export const makeBaseDirectoriesLayer = (
	environment: PlatformEnvironment,
): Layer.Layer<BaseDirectories> =>
	Layer.succeed(BaseDirectories, {
		platform: environment.platform,
		resolve: (directory) => resolveBaseDirectory(directory, environment),
	})
