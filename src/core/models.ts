// CHANGE: Functional Core domain models shared by APP and SHELL
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { HandlerName } from "./handlers.js";

/**
 * Exit code for the process.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Record of one script-bearing node visited by the walk.
 *
 * @remarks
 * - `findings` is undefined in extraction-only mode (no linter was run)
 * - `filePath` points into the output directory; for `run` it no longer exists once the run returns
 */
export interface ScriptOutcome {
	readonly qualifiedName: string;
	readonly handler: HandlerName;
	readonly filePath: string;
	readonly findings: string | undefined;
}
