// CHANGE: Typed domain error ADT for the coverage pipeline using Effect.Data
// WHY: Every failing step surfaces as a value discriminated by `_tag`, never as a thrown exception
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { TargetKind } from "./types/index.js";

/**
 * `cargo rustc` exited non-zero while building a test target.
 *
 * @invariant exitCode !== 0
 */
export class CompileFailed extends Data.TaggedError("CompileFailed")<{
	readonly target: TargetKind;
	readonly exitCode: number;
}> {}

/**
 * Cargo finished but named no test executable for the requested target.
 */
export class MissingArtifact extends Data.TaggedError("MissingArtifact")<{
	readonly target: TargetKind;
	readonly detail: string;
}> {}

/**
 * Instrumented test binary exited non-zero.
 *
 * @invariant exitCode !== 0
 */
export class TestFailed extends Data.TaggedError("TestFailed")<{
	readonly target: TargetKind;
	readonly executable: string;
	readonly exitCode: number;
}> {}

/**
 * lcov exited non-zero in one of its modes.
 */
export class CoverageToolFailed extends Data.TaggedError("CoverageToolFailed")<{
	readonly operation: "capture" | "merge" | "extract";
	readonly output: string;
	readonly exitCode: number;
}> {}

/**
 * genhtml failed, or left the report directory empty.
 *
 * @invariant exitCode === null ⇔ genhtml succeeded but produced nothing
 */
export class ReportFailed extends Data.TaggedError("ReportFailed")<{
	readonly outputDir: string;
	readonly exitCode: number | null;
	readonly detail: string;
}> {}

/**
 * `cargo clean` exited non-zero.
 */
export class CleanupFailed extends Data.TaggedError("CleanupFailed")<{
	readonly exitCode: number;
}> {}

/**
 * A child process could not be started at all (missing executable, EACCES, ...).
 */
export class SpawnFailed extends Data.TaggedError("SpawnFailed")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * A step ran longer than the configured per-step timeout.
 */
export class StepTimeout extends Data.TaggedError("StepTimeout")<{
	readonly step: string;
	readonly timeoutMs: number;
}> {}

/**
 * Invariant violation - a postcondition of a step does not hold
 *
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Invalid command line or configuration file.
 *
 * @invariant issues.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly issues: readonly string[];
}> {}

/**
 * Union of every error a pipeline step can fail with.
 */
export type StepError =
	| CompileFailed
	| MissingArtifact
	| TestFailed
	| CoverageToolFailed
	| ReportFailed
	| CleanupFailed
	| SpawnFailed
	| FSError
	| StepTimeout
	| InvariantViolation
	| ConfigError;

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError = StepError;
