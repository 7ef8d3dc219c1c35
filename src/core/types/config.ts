// CHANGE: CLI option model for the two subcommands
// PURITY: CORE
// INVARIANT: Dump always carries an output directory; Run never does

/**
 * Subcommand selected on the command line.
 *
 * - `Run`: materialize into an ephemeral directory, lint, report
 * - `Dump`: materialize into `output`, no linting, no output
 */
export type CommandMode =
	| { readonly _tag: "Run" }
	| { readonly _tag: "Dump"; readonly output: string };

/**
 * Parsed command line options.
 */
export interface CLIOptions {
	readonly maskfile: string;
	readonly command: CommandMode;
}

/**
 * Outcome of argument parsing: either a run request or a usage request.
 */
export type CLIRequest =
	| { readonly _tag: "Execute"; readonly options: CLIOptions }
	| { readonly _tag: "Help" };
