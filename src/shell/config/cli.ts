// CHANGE: Command line parsing for `run` and `dump --output <dir>`
// PURITY: SHELL (reads process.argv by default), parsing itself is pure
// INVARIANT: --maskfile is global (accepted before or after the subcommand), default "maskfile.md"
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CLIRequest } from "../../core/types/index.js";

export const DEFAULT_MASKFILE = "maskfile.md";

export const USAGE = [
	"Usage: maskfile-lint [--maskfile <path>] <command>",
	"",
	"Commands:",
	"  run                    Runs the linters",
	"  dump --output <dir>    Extracts all the commands from the maskfile and dumps them as files into <dir>",
	"",
	"Options:",
	`  --maskfile <path>      Path to a different maskfile you want to use (default: ${DEFAULT_MASKFILE})`,
	"  -o, --output <dir>     Output directory for dump",
	"  -h, --help             Print help",
].join("\n");

interface ArgState {
	readonly maskfile: string;
	readonly subcommand: string | undefined;
	readonly output: string | undefined;
	readonly help: boolean;
}

interface ArgStep {
	readonly state: ArgState;
	readonly consumed: number;
}

type ValueKey = "maskfile" | "output";

const valueFlags: Readonly<Record<string, ValueKey>> = {
	"--maskfile": "maskfile",
	"--output": "output",
	"-o": "output",
};

/**
 * Splits `--flag=value` into its parts.
 *
 * @pure true
 */
function splitInlineValue(arg: string): readonly [string, string | undefined] {
	const eq = arg.indexOf("=");
	if (!arg.startsWith("--") || eq === -1) return [arg, undefined];
	return [arg.slice(0, eq), arg.slice(eq + 1)];
}

function processArgument(
	args: readonly string[],
	index: number,
	state: ArgState,
): Either.Either<ArgStep, UsageError> {
	const arg = args[index] ?? "";
	const [flag, inline] = splitInlineValue(arg);

	const key = valueFlags[flag];
	if (key !== undefined) {
		const value = inline ?? args[index + 1];
		if (value === undefined || value.length === 0) {
			return Either.left(
				new UsageError({ detail: `option ${flag} requires a value` }),
			);
		}
		return Either.right({
			state:
				key === "maskfile"
					? { ...state, maskfile: value }
					: { ...state, output: value },
			consumed: inline === undefined ? 2 : 1,
		});
	}

	if (arg === "-h" || arg === "--help") {
		return Either.right({ state: { ...state, help: true }, consumed: 1 });
	}

	if (arg.startsWith("-")) {
		return Either.left(new UsageError({ detail: `unknown option ${arg}` }));
	}

	if (state.subcommand !== undefined) {
		return Either.left(
			new UsageError({ detail: `unexpected argument ${arg}` }),
		);
	}
	return Either.right({ state: { ...state, subcommand: arg }, consumed: 1 });
}

function toRequest(state: ArgState): Either.Either<CLIRequest, UsageError> {
	if (state.help) return Either.right({ _tag: "Help" });

	switch (state.subcommand) {
		case undefined:
			return Either.left(new UsageError({ detail: "missing command" }));
		case "run":
			if (state.output !== undefined) {
				return Either.left(
					new UsageError({ detail: "option --output is only valid for dump" }),
				);
			}
			return Either.right({
				_tag: "Execute",
				options: { maskfile: state.maskfile, command: { _tag: "Run" } },
			});
		case "dump":
			if (state.output === undefined) {
				return Either.left(
					new UsageError({ detail: "dump requires --output <dir>" }),
				);
			}
			return Either.right({
				_tag: "Execute",
				options: {
					maskfile: state.maskfile,
					command: { _tag: "Dump", output: state.output },
				},
			});
		default:
			return Either.left(
				new UsageError({ detail: `unknown command ${state.subcommand}` }),
			);
	}
}

/**
 * Parses command line arguments.
 *
 * @param args - Arguments without the node and script entries
 * @returns Run request, help request, or the usage error
 *
 * @example
 * ```ts
 * // Command: maskfile-lint --maskfile tasks.md dump -o out
 * parseCLIArgs(["--maskfile", "tasks.md", "dump", "-o", "out"]);
 * // Right({ _tag: "Execute", options: { maskfile: "tasks.md", command: { _tag: "Dump", output: "out" } } })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIRequest, UsageError> {
	let state: ArgState = {
		maskfile: DEFAULT_MASKFILE,
		subcommand: undefined,
		output: undefined,
		help: false,
	};

	for (let i = 0; i < args.length; ) {
		// empty arguments carry nothing
		if ((args[i] ?? "").length === 0) {
			i++;
			continue;
		}
		const step = processArgument(args, i, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		i += step.right.consumed;
	}

	return toRequest(state);
}
