// CHANGE: Application orchestration for run and dump
// PURITY: APP (no process.exit; console output only through the reporter)
// EFFECT: Effect<ReadonlyArray<ScriptOutcome>, RunError>
// INVARIANT: maskfile read before the output directory exists; the temporary directory is released on every exit path
// COMPLEXITY: O(n) where n = commands in the maskfile

import { Effect } from "effect";

import type {
	MaskfileReadError,
	OutputDirError,
	WalkError,
} from "../core/errors.js";
import { shouldEmphasize } from "../core/format/emphasis.js";
import type { ScriptOutcome } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { loadMaskfile } from "../shell/fs/maskfile.js";
import { provisionOutputDir } from "../shell/fs/output-dir.js";
import { runTool, type ToolRunner } from "../shell/utils/exec.js";
import { walkCommands } from "./walk.js";

export type RunError = MaskfileReadError | OutputDirError | WalkError;

/**
 * Process-level collaborators; tests replace them.
 */
export interface RunDependencies {
	readonly runner: ToolRunner;
	readonly emphasize: boolean;
}

/**
 * @pure false (reads environment)
 */
export const defaultDependencies = (): RunDependencies => ({
	runner: runTool,
	emphasize: shouldEmphasize(process.env, process.stdout.isTTY === true),
});

/**
 * Materializes every script of the maskfile and, for `run`, lints and reports it.
 *
 * @param options - Parsed CLI options
 * @param dependencies - Tool runner and emphasis flag
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ReadonlyArray<ScriptOutcome>, RunError>
 * @postcondition options.command = Run → the temporary directory no longer exists
 */
export function runMaskfileLint(
	options: CLIOptions,
	dependencies: RunDependencies = defaultDependencies(),
): Effect.Effect<readonly ScriptOutcome[], RunError> {
	return Effect.scoped(
		Effect.gen(function* () {
			const maskfile = yield* loadMaskfile(options.maskfile);
			const outDir = yield* provisionOutputDir(options.command);
			return yield* walkCommands(maskfile.commands, {
				outDir,
				dumpOnly: options.command._tag === "Dump",
				emphasize: dependencies.emphasize,
				runner: dependencies.runner,
			});
		}),
	);
}
