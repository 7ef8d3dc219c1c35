// CHANGE: Print findings for one command to stdout
// PURITY: SHELL (console output)
// EFFECT: Effect<void, never>
// INVARIANT: output order = call order (no buffering)

import { Effect } from "effect";

import { formatReport } from "../../core/format/report.js";

/**
 * Prints the emphasized header, the findings and a blank line; nothing for empty findings.
 *
 * @pure false (console output)
 */
export const reportFindings = (
	qualifiedName: string,
	findings: string,
	emphasize: boolean,
): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of formatReport(qualifiedName, findings, emphasize)) {
			console.log(line);
		}
	});
