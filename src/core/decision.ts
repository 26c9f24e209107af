// CHANGE: Pure decision functions mapping a run outcome to an exit code and a failure message
// WHY: Centralize termination logic in Functional Core; the bin layer only calls process.exit
// FORMAT THEOREM: ∀o ∈ RunOutcome: o.state = "Rendered" ↔ computeExitCode(o) = 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Outcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { StepError } from "./errors.js";
import type { ExitCode, RunOutcome } from "./models.js";

export const EXIT_CONFIG_ERROR: ExitCode = 2;
export const EXIT_TIMEOUT: ExitCode = 124;
export const EXIT_INTERRUPTED: ExitCode = 130;

const targetLabel = (target: "lib" | "tests"): string =>
	target === "lib" ? "unit" : "integration";

const propagate = (exitCode: number): ExitCode => (exitCode > 0 ? exitCode : 1);

/**
 * Exit code for a failed step: the failing tool's own status when there is one.
 *
 * @pure true
 * @postcondition result ≠ 0
 */
export const exitCodeForError = (error: StepError): ExitCode =>
	match(error)
		.with({ _tag: "CompileFailed" }, (e) => propagate(e.exitCode))
		.with({ _tag: "TestFailed" }, (e) => propagate(e.exitCode))
		.with({ _tag: "CoverageToolFailed" }, (e) => propagate(e.exitCode))
		.with({ _tag: "CleanupFailed" }, (e) => propagate(e.exitCode))
		.with({ _tag: "ReportFailed" }, (e) =>
			e.exitCode === null ? 1 : propagate(e.exitCode),
		)
		.with({ _tag: "StepTimeout" }, () => EXIT_TIMEOUT)
		.with({ _tag: "ConfigError" }, () => EXIT_CONFIG_ERROR)
		.with(
			{ _tag: "MissingArtifact" },
			{ _tag: "SpawnFailed" },
			{ _tag: "FS" },
			{ _tag: "InvariantViolation" },
			() => 1,
		)
		.exhaustive();

/**
 * Computes process exit code from the run outcome (pure function).
 *
 * @pure true
 * @invariant outcome.state = "Rendered" → 0
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	outcome.state === "Rendered" ? 0 : exitCodeForError(outcome.error);

/**
 * One-line description of a step failure.
 *
 * @pure true
 *
 * @example
 * ```ts
 * describeFailure(new TestFailed({ target: "lib", executable: "/t/mesabox-1", exitCode: 101 }));
 * // "unit test binary /t/mesabox-1 exited with code 101"
 * ```
 */
export const describeFailure = (error: StepError): string =>
	match(error)
		.with(
			{ _tag: "CompileFailed" },
			(e) => `cargo build of ${targetLabel(e.target)} tests exited with code ${e.exitCode}`,
		)
		.with(
			{ _tag: "MissingArtifact" },
			(e) => `no ${targetLabel(e.target)} test binary: ${e.detail}`,
		)
		.with(
			{ _tag: "TestFailed" },
			(e) => `${targetLabel(e.target)} test binary ${e.executable} exited with code ${e.exitCode}`,
		)
		.with(
			{ _tag: "CoverageToolFailed" },
			(e) => `lcov ${e.operation} (${e.output}) exited with code ${e.exitCode}`,
		)
		.with({ _tag: "ReportFailed" }, (e) => `genhtml → ${e.outputDir}: ${e.detail}`)
		.with({ _tag: "CleanupFailed" }, (e) => `cargo clean exited with code ${e.exitCode}`)
		.with({ _tag: "SpawnFailed" }, (e) => `cannot start ${e.command}: ${e.detail}`)
		.with({ _tag: "FS" }, (e) => `${e.path}: ${e.detail}`)
		.with(
			{ _tag: "StepTimeout" },
			(e) => `${e.step} did not finish within ${e.timeoutMs} ms`,
		)
		.with({ _tag: "InvariantViolation" }, (e) => `${e.where}: ${e.detail}`)
		.with({ _tag: "ConfigError" }, (e) => e.issues.join("; "))
		.exhaustive();
