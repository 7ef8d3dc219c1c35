// CHANGE: Output directory provisioning for dump (persistent) and run (ephemeral)
// PURITY: SHELL
// EFFECT: Effect<string, OutputDirError, Scope>
// INVARIANT: the ephemeral directory is removed when its scope closes, on success, failure or interruption
// COMPLEXITY: O(1) to acquire, O(n) to release where n = files written

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Effect, type Scope } from "effect";
import { match } from "ts-pattern";

import { errorDetail, OutputDirError } from "../../core/errors.js";
import type { CommandMode } from "../../core/types/index.js";

const TEMP_PREFIX = "maskfile-lint-";

/**
 * Creates `dir` recursively; existing directories are accepted as is.
 *
 * @effect Effect<string, OutputDirError>
 */
export function persistentDir(
	dir: string,
): Effect.Effect<string, OutputDirError> {
	return Effect.try({
		try: () => {
			fs.mkdirSync(dir, { recursive: true });
			return dir;
		},
		catch: (error) =>
			new OutputDirError({ path: dir, detail: errorDetail(error) }),
	});
}

/**
 * Fresh directory under the OS temp dir, removed recursively on scope close.
 *
 * @effect Effect<string, OutputDirError, Scope>
 */
export const ephemeralDir: Effect.Effect<
	string,
	OutputDirError,
	Scope.Scope
> = Effect.acquireRelease(
	Effect.try({
		try: () => fs.mkdtempSync(path.join(os.tmpdir(), TEMP_PREFIX)),
		catch: (error) =>
			new OutputDirError({ path: os.tmpdir(), detail: errorDetail(error) }),
	}),
	(dir) =>
		Effect.sync(() => {
			fs.rmSync(dir, { recursive: true, force: true });
		}),
);

/**
 * Output directory for a subcommand.
 *
 * @effect Effect<string, OutputDirError, Scope>
 */
export const provisionOutputDir = (
	mode: CommandMode,
): Effect.Effect<string, OutputDirError, Scope.Scope> =>
	match(mode)
		.with({ _tag: "Dump" }, ({ output }) => persistentDir(output))
		.with({ _tag: "Run" }, () => ephemeralDir)
		.exhaustive();
