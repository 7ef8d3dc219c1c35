// CHANGE: Qualified names and materialized file names
// PURITY: CORE
// INVARIANT: qualifyName is recomputed per visit from the parent chain, never cached
// COMPLEXITY: O(n) where n = |qualifiedName|

import { fileExtension, type LanguageHandler } from "./handlers.js";

/**
 * Space-joined ancestor chain ending with `name`.
 *
 * @param parent - Qualified name of the parent, undefined at the root
 * @param name - Name of the current node
 *
 * @pure true
 * @postcondition parent = undefined → result = name
 *
 * @example
 * ```ts
 * qualifyName(undefined, "services"); // "services"
 * qualifyName("services", "start");   // "services start"
 * ```
 */
export const qualifyName = (parent: string | undefined, name: string): string =>
	parent === undefined ? name : `${parent} ${name}`;

/**
 * Name of the file a script is materialized into.
 *
 * @pure true
 * @invariant result contains no space
 */
export const scriptFileName = (
	qualifiedName: string,
	handler: LanguageHandler,
): string => `${qualifiedName.replaceAll(" ", "_")}${fileExtension(handler)}`;
