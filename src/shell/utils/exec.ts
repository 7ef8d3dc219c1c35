// CHANGE: Spawn an external tool with an exact argv and capture stdout
// WHY: Linters exit non-zero when they report findings; only spawn failures are errors
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecutableNotFound | ExecError>
// INVARIANT: ∀ invocation: exit status ≠ 0 → stdout still returned; ENOENT → ExecutableNotFound
// COMPLEXITY: O(n) where n = stdout length

import { type ExecFileException, execFile } from "node:child_process";
import { Effect } from "effect";

import { ExecError, ExecutableNotFound } from "../../core/errors.js";
import {
	renderInvocation,
	type ToolInvocation,
} from "../../core/linters/invocation.js";

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs a tool invocation and resolves with its stdout.
 *
 * Injected into the walker so tests can replace the process boundary.
 */
export type ToolRunner = (
	invocation: ToolInvocation,
) => Effect.Effect<string, ExecutableNotFound | ExecError>;

/**
 * Classifies a failed execFile call.
 *
 * @pure true
 * @invariant numeric code or terminating signal → the process ran; stdout is the result
 */
export function classifyExecFailure(
	invocation: ToolInvocation,
	error: ExecFileException,
	stdout: string,
): Effect.Effect<string, ExecutableNotFound | ExecError> {
	if (error.code === "ENOENT") {
		return Effect.fail(new ExecutableNotFound({ binary: invocation.binary }));
	}
	const ran =
		typeof error.code === "number" ||
		(error.signal !== undefined && error.signal !== null);
	if (ran) return Effect.succeed(stdout);
	return Effect.fail(
		new ExecError({
			command: renderInvocation(invocation),
			detail: error.message,
		}),
	);
}

/**
 * Default runner backed by `child_process.execFile` (no shell).
 *
 * @pure false (spawns a process)
 * @effect Effect<string, ExecutableNotFound | ExecError>
 * @postcondition the child is killed when the effect is interrupted
 */
export const runTool: ToolRunner = (invocation) =>
	Effect.async<string, ExecutableNotFound | ExecError>((resume) => {
		const child = execFile(
			invocation.binary,
			[...invocation.args],
			{ encoding: "utf8", maxBuffer: MAX_BUFFER },
			(error, stdout) => {
				resume(
					error === null
						? Effect.succeed(stdout)
						: classifyExecFailure(invocation, error, stdout),
				);
			},
		);
		return Effect.sync(() => {
			child.kill();
		});
	});
