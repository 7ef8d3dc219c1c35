// CHANGE: Specs for exclusive-create materialization
// PURITY: SHELL (writes into a per-test temporary directory)
// INVARIANT: an existing file is never overwritten

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Catchall, Ruff, Shellcheck } from "../../../src/core/handlers.js";
import { materializeScript } from "../../../src/shell/fs/materialize.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

describe("materializeScript", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("writes the transformed content under the qualified file name", async () => {
		const filePath = await Effect.runPromise(
			materializeScript(temp.cwd, "services start", Shellcheck, {
				executor: "bash",
				source: "echo start\n",
			}),
		);
		expect(filePath).toBe(path.join(temp.cwd, "services_start.sh"));
		expect(fs.readFileSync(filePath, "utf8")).toBe(
			"#!/bin/usr/env bash\necho start\n",
		);
	});

	it("writes Catchall scripts without extension", async () => {
		const filePath = await Effect.runPromise(
			materializeScript(temp.cwd, "deploy", Catchall, {
				executor: "lua",
				source: "print(1)\n",
			}),
		);
		expect(path.basename(filePath)).toBe("deploy");
		expect(fs.readFileSync(filePath, "utf8")).toBe("print(1)\n");
	});

	it("fails with ScriptCollision and leaves the existing file untouched", async () => {
		const existing = path.join(temp.cwd, "lint.py");
		fs.writeFileSync(existing, "original\n");

		const error = await Effect.runPromise(
			Effect.flip(
				materializeScript(temp.cwd, "lint", Ruff, {
					executor: "py",
					source: "print('new')\n",
				}),
			),
		);
		expect(error._tag).toBe("ScriptCollision");
		expect(error).toMatchObject({ path: existing });
		expect(fs.readFileSync(existing, "utf8")).toBe("original\n");
	});

	it("fails with FSError when the directory is missing", async () => {
		const missing = path.join(temp.cwd, "missing");
		const error = await Effect.runPromise(
			Effect.flip(
				materializeScript(missing, "build", Shellcheck, {
					executor: "sh",
					source: "make\n",
				}),
			),
		);
		expect(error._tag).toBe("FS");
	});
});
