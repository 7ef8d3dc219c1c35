// CHANGE: Stateless header emphasis decoupled from terminal state
// PURITY: CORE
// INVARIANT: emphasize = false → output = input
// COMPLEXITY: O(n) where n = |text|

import { Chalk } from "chalk";

const plain = new Chalk({ level: 0 });
const basic = new Chalk({ level: 1 });

/**
 * Bold, cyan, underlined text when `emphasize` holds; unchanged text otherwise.
 *
 * @pure true
 */
export const emphasizeHeader = (text: string, emphasize: boolean): string =>
	(emphasize ? basic : plain).bold.cyan.underline(text);

/**
 * Environment variables consulted for the color decision.
 */
export interface ColorEnv {
	readonly NO_COLOR?: string | undefined;
	readonly FORCE_COLOR?: string | undefined;
}

/**
 * Decides whether headers are emphasized.
 *
 * - non-empty `NO_COLOR` disables emphasis
 * - `FORCE_COLOR` other than `"0"` enables it
 * - otherwise emphasis follows whether stdout is a terminal
 *
 * @pure true
 */
export const shouldEmphasize = (env: ColorEnv, isTTY: boolean): boolean => {
	if (env.NO_COLOR !== undefined && env.NO_COLOR.length > 0) return false;
	if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== "0";
	return isTTY;
};
