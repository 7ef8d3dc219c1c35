// CHANGE: Programmatic CLI entry; returns ExitCode as value
// PURITY: APP (no process.exit; only composition and the final error line)
// INVARIANT: ExitCode ∈ {0,1}; every error prints exactly one message
// COMPLEXITY: O(1) orchestration

import { Effect, Either } from "effect";

import { type AppError, describeError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import {
	defaultDependencies,
	type RunDependencies,
	runMaskfileLint,
} from "./app/runMaskfileLint.js";
import { parseCLIArgs, USAGE } from "./shell/config/cli.js";

const reportFatal = (error: AppError): Effect.Effect<ExitCode> =>
	Effect.sync((): ExitCode => {
		console.error(`Error: ${describeError(error)}`);
		if (error._tag === "UsageError") console.error(`\n${USAGE}`);
		return 1;
	});

/**
 * Parses `args`, runs the selected command and maps the outcome to an exit code.
 *
 * @returns Effect<ExitCode, never> - errors are reported and turned into 1
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
	dependencies: RunDependencies = defaultDependencies(),
): Effect.Effect<ExitCode> {
	const request = parseCLIArgs(args);
	if (Either.isLeft(request)) return reportFatal(request.left);

	const parsed = request.right;
	if (parsed._tag === "Help") {
		return Effect.sync((): ExitCode => {
			console.log(USAGE);
			return 0;
		});
	}

	return runMaskfileLint(parsed.options, dependencies).pipe(
		Effect.map((): ExitCode => 0),
		Effect.catchAll(reportFatal),
	);
}
