// CHANGE: Execute a handler's linter against a materialized script
// PURITY: SHELL (delegates to the tool runner)
// EFFECT: Effect<string, LinterNotFound | ExecError>
// INVARIANT: Catchall never spawns; ExecutableNotFound becomes LinterNotFound naming the handler
// COMPLEXITY: O(n) where n = linter stdout length

import { Effect } from "effect";

import { type ExecError, LinterNotFound } from "../../core/errors.js";
import {
	CATCHALL_FINDING,
	handlerName,
	type LanguageHandler,
} from "../../core/handlers.js";
import { linterFor, toolInvocation } from "../../core/linters/invocation.js";
import { runTool, type ToolRunner } from "../utils/exec.js";

/**
 * Runs the handler's linter once (no retry) and returns the normalized findings.
 *
 * @param handler - Handler selected from the script's executor
 * @param filePath - Materialized script
 * @param runner - Process boundary, `runTool` outside tests
 *
 * @pure false - executes external process
 * @effect Effect<string, LinterNotFound | ExecError>
 */
export function executeHandler(
	handler: LanguageHandler,
	filePath: string,
	runner: ToolRunner = runTool,
): Effect.Effect<string, LinterNotFound | ExecError> {
	const linter = linterFor(handler);
	if (linter === null) return Effect.succeed(CATCHALL_FINDING);

	return runner(toolInvocation(linter, filePath)).pipe(
		Effect.catchTag("ExecutableNotFound", () =>
			Effect.fail(new LinterNotFound({ handler: handlerName(handler) })),
		),
		Effect.map((stdout) => linter.normalize(stdout, filePath)),
	);
}
