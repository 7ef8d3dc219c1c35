// CHANGE: Write a script into the output directory with exclusive-create semantics
// PURITY: SHELL
// EFFECT: Effect<string, ScriptCollision | FSError>
// INVARIANT: an existing file is never overwritten or appended to
// COMPLEXITY: O(n) where n = |content|

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { errorDetail, FSError, ScriptCollision } from "../../core/errors.js";
import {
	type LanguageHandler,
	transformContent,
} from "../../core/handlers.js";
import { scriptFileName } from "../../core/naming.js";
import type { Script } from "../../core/types/index.js";

const hasErrnoCode = (error: unknown, code: string): boolean =>
	error instanceof Error && "code" in error && error.code === code;

/**
 * Materializes `script` as `<outDir>/<qualified_name><ext>`.
 *
 * @returns Path of the written file
 *
 * @pure false - writes the filesystem
 * @effect Effect<string, ScriptCollision | FSError>
 */
export function materializeScript(
	outDir: string,
	qualifiedName: string,
	handler: LanguageHandler,
	script: Script,
): Effect.Effect<string, ScriptCollision | FSError> {
	const filePath = path.join(outDir, scriptFileName(qualifiedName, handler));
	return Effect.try({
		try: () => {
			fs.writeFileSync(filePath, transformContent(handler, script), {
				encoding: "utf8",
				flag: "wx",
			});
			return filePath;
		},
		catch: (error) =>
			hasErrnoCode(error, "EEXIST")
				? new ScriptCollision({ path: filePath })
				: new FSError({ path: filePath, detail: errorDetail(error) }),
	});
}
