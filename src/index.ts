// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect-returning orchestrators

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Materialize (and for `run`, lint) every script of a maskfile.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runMaskfileLint } from "maskfile-lint";
 *
 * const outcomes = await Effect.runPromise(
 *   runMaskfileLint({ maskfile: "maskfile.md", command: { _tag: "Dump", output: "out" } }),
 * );
 * ```
 */
export {
	defaultDependencies,
	type RunDependencies,
	type RunError,
	runMaskfileLint,
} from "./app/runMaskfileLint.js";
export { walkCommand, walkCommands, type WalkContext } from "./app/walk.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode, ScriptOutcome } from "./core/models.js";
export type {
	CLIOptions,
	CLIRequest,
	CommandMode,
	CommandNode,
	Maskfile,
	Script,
} from "./core/types/index.js";
export {
	CATCHALL_FINDING,
	fileExtension,
	type HandlerName,
	handlerName,
	type LanguageHandler,
	selectHandler,
	transformContent,
} from "./core/handlers.js";
export { qualifyName, scriptFileName } from "./core/naming.js";
export {
	normalizeRubocop,
	normalizeRuff,
	normalizeShellcheck,
} from "./core/linters/normalize.js";
export { parseMaskfile } from "./core/parser/maskfile.js";
export {
	type AppError,
	describeError,
	ExecError,
	ExecutableNotFound,
	FSError,
	LinterNotFound,
	MaskfileReadError,
	OutputDirError,
	ScriptCollision,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL
// ═══════════════════════════════════════════════════════════════════════════════

export { runTool, type ToolRunner } from "./shell/utils/exec.js";
