// CHANGE: Specs for persistent and ephemeral output directories
// PURITY: SHELL (file system I/O)
// INVARIANT: the ephemeral directory does not outlive its scope, whatever the exit

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect, Exit } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ScriptCollision } from "../../../src/core/errors.js";
import {
	ephemeralDir,
	persistentDir,
	provisionOutputDir,
} from "../../../src/shell/fs/output-dir.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

describe("persistentDir", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("creates nested directories recursively", async () => {
		const target = path.join(temp.cwd, "a", "b", "c");
		const dir = await Effect.runPromise(persistentDir(target));
		expect(dir).toBe(target);
		expect(fs.statSync(target).isDirectory()).toBe(true);
	});

	it("accepts an existing directory", async () => {
		const dir = await Effect.runPromise(persistentDir(temp.cwd));
		expect(dir).toBe(temp.cwd);
	});

	it("fails with OutputDirError when a file is in the way", async () => {
		const blocker = path.join(temp.cwd, "blocker");
		fs.writeFileSync(blocker, "");
		const error = await Effect.runPromise(
			Effect.flip(persistentDir(path.join(blocker, "out"))),
		);
		expect(error._tag).toBe("OutputDirError");
	});

	it("keeps the dump directory after the scope closes", async () => {
		const target = path.join(temp.cwd, "dump");
		await Effect.runPromise(
			Effect.scoped(provisionOutputDir({ _tag: "Dump", output: target })),
		);
		expect(fs.existsSync(target)).toBe(true);
	});
});

describe("ephemeralDir", () => {
	it("exists inside the scope and is removed with its content afterwards", async () => {
		let seen = "";
		await Effect.runPromise(
			Effect.scoped(
				Effect.gen(function* () {
					const dir = yield* ephemeralDir;
					seen = dir;
					fs.writeFileSync(path.join(dir, "build.sh"), "make\n");
					expect(fs.existsSync(dir)).toBe(true);
				}),
			),
		);
		expect(seen).not.toBe("");
		expect(fs.existsSync(seen)).toBe(false);
	});

	it("is removed when the scoped work fails", async () => {
		let seen = "";
		const exit = await Effect.runPromiseExit(
			Effect.scoped(
				Effect.gen(function* () {
					seen = yield* provisionOutputDir({ _tag: "Run" });
					return yield* Effect.fail(new ScriptCollision({ path: "x" }));
				}),
			),
		);
		expect(Exit.isFailure(exit)).toBe(true);
		expect(seen).not.toBe("");
		expect(fs.existsSync(seen)).toBe(false);
	});
});
