// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for types used across modules

export type { CommandResult, CommandSpec } from "./command.js";
export type {
	CLIOptions,
	CoverageConfig,
	TargetKind,
	ToolPaths,
} from "./config.js";
