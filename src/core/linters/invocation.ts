// CHANGE: Table of external linters: binary, exact argv and output normalizer per handler
// PURITY: CORE
// INVARIANT: the materialized file path is always the last argument, passed verbatim (no shell)
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { LanguageHandler } from "../handlers.js";
import {
	normalizeRubocop,
	normalizeRuff,
	normalizeShellcheck,
} from "./normalize.js";

/**
 * External process to spawn.
 */
export interface ToolInvocation {
	readonly binary: string;
	readonly args: readonly string[];
}

/**
 * External linter bound to a handler.
 */
export interface Linter {
	readonly binary: string;
	readonly args: (filePath: string) => readonly string[];
	readonly normalize: (stdout: string, filePath: string) => string;
}

export const SHELLCHECK: Linter = {
	binary: "shellcheck",
	args: (filePath) => [filePath],
	normalize: normalizeShellcheck,
};

export const RUFF: Linter = {
	binary: "ruff",
	args: (filePath) => ["check", "--output-format=full", "--no-cache", filePath],
	normalize: normalizeRuff,
};

export const RUBOCOP: Linter = {
	binary: "rubocop",
	args: (filePath) => ["--format=clang", "--display-style-guide", filePath],
	normalize: normalizeRubocop,
};

/**
 * Linter of a handler, or null when the handler has none.
 *
 * @pure true
 * @postcondition handler = Catchall ↔ result = null
 */
export const linterFor = (handler: LanguageHandler): Linter | null =>
	match(handler._tag)
		.with("Shellcheck", () => SHELLCHECK)
		.with("Ruff", () => RUFF)
		.with("Rubocop", () => RUBOCOP)
		.with("Catchall", () => null)
		.exhaustive();

/**
 * @pure true
 */
export const toolInvocation = (
	linter: Linter,
	filePath: string,
): ToolInvocation => ({ binary: linter.binary, args: linter.args(filePath) });

/**
 * Human readable command line, used in error messages.
 *
 * @pure true
 */
export const renderInvocation = (invocation: ToolInvocation): string =>
	[invocation.binary, ...invocation.args].join(" ");
