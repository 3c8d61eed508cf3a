import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	BaseDirectories,
	Dir,
	defineBinding,
	makePersistent,
	type PlatformEnvironment,
} from "@filebound/core";
import { Effect, Schema } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	createNodeStore,
	makeNodePersistenceLayer,
} from "../src/convenience.js";
import { NodeBaseDirectoriesLayer } from "../src/node-base-directories.js";

const StateSchema = Schema.Struct({ number: Schema.Number });

let tempDir: string;
let environment: PlatformEnvironment;

beforeEach(async () => {
	tempDir = join(tmpdir(), `filebound-convenience-${randomBytes(8).toString("hex")}`);
	await fs.mkdir(tempDir, { recursive: true });
	environment = {
		platform: "linux",
		env: { XDG_CONFIG_HOME: tempDir, XDG_CACHE_HOME: join(tempDir, "cache") },
		homeDirectory: undefined,
	};
});

afterEach(async () => {
	vi.unstubAllEnvs();
	await fs.rm(tempDir, { recursive: true, force: true });
});

const bindings = {
	state: defineBinding({
		directory: Dir.Config,
		project: "MyProject",
		file: "state",
		format: "json",
		schema: StateSchema,
	}),
	journal: defineBinding({
		directory: Dir.Cache,
		project: "MyProject",
		subDirectory: "logs",
		file: "journal",
		format: "json",
		gzip: true,
		schema: Schema.Struct({ text: Schema.String }),
	}),
};

describe("createNodeStore", () => {
	it("saves to the XDG config directory and loads it back", async () => {
		const store = createNodeStore(bindings, { environment });

		const metadata = await Effect.runPromise(store.state.save({ number: 7 }));
		const expectedPath = join(tempDir, "myproject", "state.json");

		expect(metadata).toEqual({ size: 17, path: expectedPath });
		expect(await fs.readFile(expectedPath, "utf-8")).toBe('{\n  "number": 7\n}');
		expect(await Effect.runPromise(store.state.load())).toEqual({ number: 7 });
	});

	it("fails with NotFoundError before anything is saved", async () => {
		const store = createNodeStore(bindings, { environment });
		const error = await Effect.runPromise(Effect.flip(store.state.load()));
		expect(error._tag).toBe("NotFoundError");
	});

	it("compresses gzip bindings without changing the extension", async () => {
		const store = createNodeStore(bindings, { environment });
		const value = { text: "a".repeat(2000) };

		const metadata = await Effect.runPromise(store.journal.save(value));

		expect(metadata.path).toBe(
			join(tempDir, "cache", "myproject", "logs", "journal.json"),
		);
		expect(metadata.size).toBeLessThan(JSON.stringify(value).length);
		expect(await Effect.runPromise(store.journal.load())).toEqual(value);
	});

	it("removes the project directory with everything in it", async () => {
		const store = createNodeStore(bindings, { environment });
		await Effect.runPromise(store.state.save({ number: 1 }));

		const removed = await Effect.runPromise(store.state.removeProject());

		expect(removed).toEqual({ size: 17, path: join(tempDir, "myproject") });
		expect(await Effect.runPromise(store.state.exists())).toBe(false);
		expect(await fs.readdir(tempDir)).toEqual([]);
	});

	it("measures the directories of a nested binding", async () => {
		const store = createNodeStore(bindings, { environment });
		const saved = await Effect.runPromise(
			store.journal.save({ text: "a".repeat(100) }),
		);

		const sub = await Effect.runPromise(store.journal.subDirectorySize());
		const project = await Effect.runPromise(store.journal.projectDirectorySize());

		expect(sub).toEqual({
			size: saved.size,
			path: join(tempDir, "cache", "myproject", "logs"),
		});
		expect(project).toEqual({
			size: saved.size,
			path: join(tempDir, "cache", "myproject"),
		});
	});

	it("cleans up temporary files left by an interrupted save", async () => {
		const store = createNodeStore(bindings, { environment });
		await Effect.runPromise(store.state.save({ number: 7 }));
		const directory = join(tempDir, "myproject");
		await fs.writeFile(join(directory, "state.json.tmp.0a1b2c3d4e5f6a7b"), "part");

		const removed = await Effect.runPromise(store.state.removeTemporary());

		expect(removed).toEqual({ size: 4, path: directory });
		expect(await fs.readdir(directory)).toEqual(["state.json"]);
	});

	it("only registers the codecs its bindings use", async () => {
		const store = createNodeStore(
			{
				...bindings,
				report: defineBinding({
					directory: Dir.Config,
					project: "MyProject",
					file: "report",
					format: "xml",
				}),
			},
			{ environment },
		);
		const error = await Effect.runPromise(Effect.flip(store.report.save({})));
		expect(error._tag).toBe("UnsupportedFormatError");
		expect(error.message).toBe(
			"Unsupported format 'xml'. Available formats: json",
		);
	});
});

describe("makeNodePersistenceLayer", () => {
	it("registers every built-in codec when no bindings are given", async () => {
		const settings = makePersistent(
			defineBinding({
				directory: Dir.Config,
				project: "MyProject",
				file: "settings",
				format: "toml",
				schema: StateSchema,
			}),
		);
		const layer = makeNodePersistenceLayer({ environment });

		const loaded = await Effect.runPromise(
			Effect.gen(function* () {
				yield* settings.save({ number: 3 });
				return yield* settings.load();
			}).pipe(Effect.provide(layer)),
		);

		expect(loaded).toEqual({ number: 3 });
		expect(
			await fs.readFile(join(tempDir, "myproject", "settings.toml"), "utf-8"),
		).toMatch(/^number = 3\n?$/);
	});
});

describe("NodeBaseDirectoriesLayer", () => {
	it.runIf(process.platform === "linux")(
		"reads XDG variables from the process environment",
		async () => {
			vi.stubEnv("XDG_STATE_HOME", tempDir);
			const resolved = await Effect.runPromise(
				Effect.gen(function* () {
					const directories = yield* BaseDirectories;
					return yield* directories.resolve(Dir.State);
				}).pipe(Effect.provide(NodeBaseDirectoriesLayer)),
			);
			expect(resolved).toBe(tempDir);
		},
	);
});
