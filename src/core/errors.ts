// CHANGE: Typed error ADT for the extraction/lint pipeline using Effect.Data
// WHY: Every failure aborts the run; the tag decides the single message printed at the bin boundary
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { HandlerName } from "./handlers.js";

/**
 * Maskfile could not be read from disk.
 *
 * @invariant path.length > 0
 */
export class MaskfileReadError extends Data.TaggedError("MaskfileReadError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Output directory (persistent or temporary) could not be created.
 */
export class OutputDirError extends Data.TaggedError("OutputDirError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Materialized file name already taken in the output directory.
 *
 * @invariant no byte of the existing file was touched
 */
export class ScriptCollision extends Data.TaggedError("ScriptCollision")<{
	readonly path: string;
}> {}

/**
 * Filesystem operation error
 *
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Spawn failed because the binary is not on $PATH (ENOENT).
 * Raised by the tool runner, before the handler is known.
 */
export class ExecutableNotFound extends Data.TaggedError(
	"ExecutableNotFound",
)<{
	readonly binary: string;
}> {}

/**
 * Linter executable for a handler is missing.
 */
export class LinterNotFound extends Data.TaggedError("LinterNotFound")<{
	readonly handler: HandlerName;
}> {}

/**
 * Command execution error other than a missing binary
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Invalid command line.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Errors that can abort the tree walk.
 */
export type WalkError = ScriptCollision | FSError | LinterNotFound | ExecError;

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| MaskfileReadError
	| OutputDirError
	| UsageError
	| ExecutableNotFound
	| WalkError;

/**
 * Message carried by a thrown value, for wrapping into typed errors.
 *
 * @pure true
 */
export const errorDetail = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Renders the single user-facing message for an error.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeError = (error: AppError): string => {
	switch (error._tag) {
		case "MaskfileReadError":
			return `failed to read maskfile ${error.path}: ${error.detail}`;
		case "OutputDirError":
			return `failed to create output directory ${error.path}: ${error.detail}`;
		case "ScriptCollision":
			return `file exists: ${error.path}`;
		case "FS":
			return error.path === undefined
				? error.detail
				: `${error.path}: ${error.detail}`;
		case "ExecutableNotFound":
			return `executable ${error.binary} not found in $PATH`;
		case "LinterNotFound":
			return `executable for ${error.handler} not found in $PATH`;
		case "Exec":
			return `${error.command}: ${error.detail}`;
		case "UsageError":
			return error.detail;
	}
};
