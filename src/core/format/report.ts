// CHANGE: Report lines for one linted command
// PURITY: CORE
// INVARIANT: findings = "" → []; otherwise [header, findings + blank line]
// COMPLEXITY: O(n) where n = |findings|

import { emphasizeHeader } from "./emphasis.js";

/**
 * Lines printed for a command's findings, in order.
 *
 * The second entry ends with "\n" so that printing it line by line leaves
 * a blank line between commands.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatReport("build", "line 3:1: E501 msg", false);
 * // ["build", "line 3:1: E501 msg\n"]
 * ```
 */
export const formatReport = (
	qualifiedName: string,
	findings: string,
	emphasize: boolean,
): readonly string[] =>
	findings.length === 0
		? []
		: [emphasizeHeader(qualifiedName, emphasize), `${findings}\n`];
