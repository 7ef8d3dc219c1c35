// CHANGE: Read and parse the maskfile
// PURITY: SHELL
// EFFECT: Effect<Maskfile, MaskfileReadError>

import * as fs from "node:fs";
import { Effect } from "effect";

import { errorDetail, MaskfileReadError } from "../../core/errors.js";
import { parseMaskfile } from "../../core/parser/maskfile.js";
import type { Maskfile } from "../../core/types/index.js";

/**
 * @pure false - reads the filesystem
 * @effect Effect<Maskfile, MaskfileReadError>
 */
export function loadMaskfile(
	maskfilePath: string,
): Effect.Effect<Maskfile, MaskfileReadError> {
	return Effect.try({
		try: () => fs.readFileSync(maskfilePath, "utf8"),
		catch: (error) =>
			new MaskfileReadError({ path: maskfilePath, detail: errorDetail(error) }),
	}).pipe(Effect.map(parseMaskfile));
}
