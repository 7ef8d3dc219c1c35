// CHANGE: Depth-first, preorder walk of the command tree
// PURITY: APP (composes CORE naming/dispatch with SHELL fs, linters and console)
// EFFECT: Effect<ReadonlyArray<ScriptOutcome>, WalkError>
// INVARIANT: ∀ node: visited exactly once, children in document order, after the node itself
// INVARIANT: side effects only for nodes carrying a script
// COMPLEXITY: O(n) nodes, sequential linter runs

import { Effect } from "effect";

import type { WalkError } from "../core/errors.js";
import { handlerName, selectHandler } from "../core/handlers.js";
import type { ScriptOutcome } from "../core/models.js";
import { qualifyName } from "../core/naming.js";
import type { CommandNode, Script } from "../core/types/index.js";
import { materializeScript } from "../shell/fs/materialize.js";
import { executeHandler } from "../shell/linters/index.js";
import { reportFindings } from "../shell/output/reporter.js";
import type { ToolRunner } from "../shell/utils/exec.js";

/**
 * Read-only context threaded through the recursion.
 *
 * @invariant never mutated during the walk
 */
export interface WalkContext {
	readonly outDir: string;
	/** extraction only: no linter runs, nothing printed */
	readonly dumpOnly: boolean;
	readonly emphasize: boolean;
	readonly runner: ToolRunner;
}

function processScript(
	script: Script,
	qualifiedName: string,
	context: WalkContext,
): Effect.Effect<ScriptOutcome, WalkError> {
	return Effect.gen(function* () {
		const handler = selectHandler(script.executor);
		const filePath = yield* materializeScript(
			context.outDir,
			qualifiedName,
			handler,
			script,
		);
		const outcome = {
			qualifiedName,
			handler: handlerName(handler),
			filePath,
		};
		if (context.dumpOnly) return { ...outcome, findings: undefined };

		const findings = yield* executeHandler(handler, filePath, context.runner);
		yield* reportFindings(qualifiedName, findings, context.emphasize);
		return { ...outcome, findings };
	});
}

/**
 * Visits `node` and its subtree.
 *
 * @param parent - Qualified name of the parent; undefined for root commands
 * @returns Outcomes of the script-bearing nodes, in visit order
 *
 * @pure false - writes files, spawns linters, prints findings
 * @effect Effect<ReadonlyArray<ScriptOutcome>, WalkError> - the first error aborts the walk
 */
export function walkCommand(
	node: CommandNode,
	context: WalkContext,
	parent?: string,
): Effect.Effect<readonly ScriptOutcome[], WalkError> {
	return Effect.gen(function* () {
		const qualifiedName = qualifyName(parent, node.name);
		const outcomes: ScriptOutcome[] = [];

		if (node.script !== undefined) {
			outcomes.push(yield* processScript(node.script, qualifiedName, context));
		}
		for (const subcommand of node.subcommands) {
			outcomes.push(...(yield* walkCommand(subcommand, context, qualifiedName)));
		}
		return outcomes;
	});
}

/**
 * Walks every root command in document order.
 *
 * @effect Effect<ReadonlyArray<ScriptOutcome>, WalkError>
 */
export function walkCommands(
	commands: readonly CommandNode[],
	context: WalkContext,
): Effect.Effect<readonly ScriptOutcome[], WalkError> {
	return Effect.gen(function* () {
		const outcomes: ScriptOutcome[] = [];
		for (const command of commands) {
			outcomes.push(...(yield* walkCommand(command, context)));
		}
		return outcomes;
	});
}
