// CHANGE: Closed registry of language handlers keyed by executor tag
// WHY: Executor dispatch is a total function over a fixed variant set; ts-pattern keeps every per-variant table exhaustive
// PURITY: CORE
// INVARIANT: ∀ executor: selectHandler(executor) ∈ {Catchall, Shellcheck, Ruff, Rubocop}
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { Script } from "./types/index.js";

/**
 * Language handler variant. Stateless; carries only its tag.
 */
export type LanguageHandler =
	| { readonly _tag: "Catchall" }
	| { readonly _tag: "Shellcheck" }
	| { readonly _tag: "Ruff" }
	| { readonly _tag: "Rubocop" };

/**
 * Display name of a handler, used in error messages.
 */
export type HandlerName = "catchall" | "shellcheck" | "ruff" | "rubocop";

export const Catchall: LanguageHandler = { _tag: "Catchall" };
export const Shellcheck: LanguageHandler = { _tag: "Shellcheck" };
export const Ruff: LanguageHandler = { _tag: "Ruff" };
export const Rubocop: LanguageHandler = { _tag: "Rubocop" };

/**
 * Finding reported for scripts whose executor has no linter.
 */
export const CATCHALL_FINDING = "no linter found for target";

/**
 * Selects the handler for an executor tag.
 *
 * @param executor - Language tag of the fenced block (exact match, case-sensitive)
 * @returns Matching handler, Catchall for unknown tags
 *
 * @pure true
 * @invariant total: never fails
 * @complexity O(1)
 *
 * @example
 * ```ts
 * selectHandler("bash"); // Shellcheck
 * selectHandler("lua");  // Catchall
 * ```
 */
export const selectHandler = (executor: string): LanguageHandler =>
	match(executor)
		.with("sh", "bash", "zsh", () => Shellcheck)
		.with("py", "python", () => Ruff)
		.with("rb", "ruby", () => Rubocop)
		.otherwise(() => Catchall);

/**
 * @pure true
 */
export const handlerName = (handler: LanguageHandler): HandlerName =>
	match(handler._tag)
		.with("Catchall", (): HandlerName => "catchall")
		.with("Shellcheck", (): HandlerName => "shellcheck")
		.with("Ruff", (): HandlerName => "ruff")
		.with("Rubocop", (): HandlerName => "rubocop")
		.exhaustive();

/**
 * File extension appended to materialized scripts (leading dot included).
 *
 * @pure true
 * @invariant Catchall → ""
 */
export const fileExtension = (handler: LanguageHandler): string =>
	match(handler._tag)
		.with("Shellcheck", () => ".sh")
		.with("Ruff", () => ".py")
		.with("Rubocop", () => ".rb")
		.with("Catchall", () => "")
		.exhaustive();

/**
 * Content written to the materialized file.
 *
 * Shellcheck needs an interpreter marker to pick its dialect, so shell
 * scripts get `#!/bin/usr/env <executor>` as first line (path verbatim,
 * not `/usr/bin/env`).
 *
 * @pure true
 * @postcondition handler ≠ Shellcheck → result = script.source
 */
export const transformContent = (
	handler: LanguageHandler,
	script: Script,
): string =>
	match(handler._tag)
		.with(
			"Shellcheck",
			() => `#!/bin/usr/env ${script.executor}\n${script.source}`,
		)
		.otherwise(() => script.source);
