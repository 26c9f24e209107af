// CHANGE: Functional Core domain models for the coverage pipeline (pure, immutable)
// WHY: The run is an explicit state machine; steps are data, not inline statements
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { StepError } from "./errors.js";
import type { CoverageSummary } from "./lcov/tracefile.js";
import type { TargetKind } from "./types/index.js";

/**
 * Exit code of the covrun process.
 *
 * @remarks
 * - 0 on a rendered report
 * - the failing tool's own exit code when it has one, otherwise 1
 * - 2 for configuration errors, 124 for step timeouts, 130 for interrupts
 */
export type ExitCode = number;

/**
 * States of a coverage run. `Rendered` and `Aborted` are terminal.
 */
export type PipelineState =
	| "Pending"
	| "Cleaned"
	| "UnitBuilt"
	| "UnitCaptured"
	| "CacheReset"
	| "IntegrationBuilt"
	| "IntegrationCaptured"
	| "Merged"
	| "Filtered"
	| "Rendered"
	| "Aborted";

/**
 * What a transition executes. File paths are relative to the project root.
 */
export type StepDescriptor =
	| { readonly kind: "cleanup" }
	| { readonly kind: "buildAndRun"; readonly target: TargetKind }
	| { readonly kind: "capture"; readonly output: string }
	| { readonly kind: "resetCache" }
	| {
			readonly kind: "merge";
			readonly inputs: readonly string[];
			readonly output: string;
	  }
	| {
			readonly kind: "filter";
			readonly input: string;
			readonly output: string;
			readonly sourceDir: string;
	  }
	| {
			readonly kind: "render";
			readonly input: string;
			readonly outputDir: string;
	  };

/**
 * One directed edge of the run's state machine.
 *
 * @invariant from ≠ to; neither is "Aborted"
 */
export interface Transition {
	readonly from: PipelineState;
	readonly to: PipelineState;
	readonly step: StepDescriptor;
}

/**
 * Terminal result of walking the plan.
 */
export type RunOutcome =
	| {
			readonly state: "Rendered";
			readonly history: readonly PipelineState[];
			readonly summary: CoverageSummary | null;
	  }
	| {
			readonly state: "Aborted";
			readonly history: readonly PipelineState[];
			readonly failedAt: Transition;
			readonly error: StepError;
	  };
