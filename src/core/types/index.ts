// CHANGE: Central export file for CORE type definitions

export type { CLIOptions, CLIRequest, CommandMode } from "./config.js";
export type { CommandNode, Maskfile, Script } from "./maskfile.js";
