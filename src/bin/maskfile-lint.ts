#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";

/**
 * CLI entry point for maskfile-lint.
 *
 * @remarks
 * - @invariant exit code is 0 when every command was processed, otherwise 1
 * - @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(main());
		process.exit(code);
	} catch (error) {
		// defects only; typed errors were already reported by main
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
