/**
 * BaseDirectories for the running process: platform, environment variables
 * and home directory are read once, when the layer is built.
 */

import { homedir } from "node:os";
import { type BaseDirectories, makeBaseDirectoriesLayer } from "@filebound/core";
import { Effect, Layer } from "effect";

const currentHome = (): string | undefined => {
	try {
		const home = homedir();
		return home === "" ? undefined : home;
	} catch (error) {
		// homedir throws when the user has no passwd entry and HOME is unset
		if (error instanceof Error) return undefined;
		throw error;
	}
};

export const NodeBaseDirectoriesLayer: Layer.Layer<BaseDirectories> =
	Layer.unwrapEffect(
		Effect.sync(() =>
			makeBaseDirectoriesLayer({
				platform: process.platform,
				env: { ...process.env },
				homeDirectory: currentHome(),
			}),
		),
	);
