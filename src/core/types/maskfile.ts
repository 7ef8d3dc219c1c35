// CHANGE: Immutable command tree produced by the maskfile parser
// PURITY: CORE
// INVARIANT: subcommands keep document order; names are unique among siblings
// COMPLEXITY: O(1)

/**
 * Script embedded in a command.
 *
 * @remarks
 * - `executor` is the fenced block's language tag (`sh`, `py`, `rb`, ...)
 * - `source` is the raw block body
 */
export interface Script {
	readonly executor: string;
	readonly source: string;
}

/**
 * Node of the command tree.
 *
 * @invariant read-only during the walk; a node without script still owns its subcommands
 */
export interface CommandNode {
	readonly name: string;
	readonly description: string;
	readonly script?: Script;
	readonly subcommands: readonly CommandNode[];
}

/**
 * Parsed maskfile: title, free text before the first command and the root commands.
 */
export interface Maskfile {
	readonly title: string;
	readonly description: string;
	readonly commands: readonly CommandNode[];
}
