// CHANGE: Coverage run as an explicit transition table
// WHY: Step ordering and fail-fast are checked on data, independently of the process runner
// FORMAT THEOREM: ∀i < |plan|-1: plan[i].to = plan[i+1].from
// PURITY: CORE
// INVARIANT: plan[0].from = "Pending" ∧ plan[last].to = "Rendered"; no branch, no loop
// COMPLEXITY: O(1)

import {
	FILTERED_TRACEFILE,
	MERGED_TRACEFILE,
} from "./config/defaults.js";
import type { PipelineState, StepDescriptor, Transition } from "./models.js";
import type { CoverageConfig } from "./types/index.js";

export const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set<PipelineState>([
	"Rendered",
	"Aborted",
]);

/** Capture produced by the unit-test phase, named after the crate. */
export const unitTracefile = (config: CoverageConfig): string =>
	`${config.crateName}.info`;

/** Capture produced by the integration-test phase, named after the test target. */
export const integrationTracefile = (config: CoverageConfig): string =>
	`${config.integrationTest}.info`;

/**
 * Build the ordered transition table of a coverage run.
 *
 * @pure true
 * @postcondition result is a chain from "Pending" to "Rendered"
 *
 * @example
 * ```ts
 * buildPlan(defaultConfig("/repo")).map((t) => t.to);
 * // ["Cleaned", "UnitBuilt", "UnitCaptured", "CacheReset", "IntegrationBuilt",
 * //  "IntegrationCaptured", "Merged", "Filtered", "Rendered"]
 * ```
 */
export function buildPlan(config: CoverageConfig): readonly Transition[] {
	const unit = unitTracefile(config);
	const integration = integrationTracefile(config);

	const edges: ReadonlyArray<readonly [PipelineState, PipelineState, StepDescriptor]> = [
		["Pending", "Cleaned", { kind: "cleanup" }],
		["Cleaned", "UnitBuilt", { kind: "buildAndRun", target: "lib" }],
		["UnitBuilt", "UnitCaptured", { kind: "capture", output: unit }],
		["UnitCaptured", "CacheReset", { kind: "resetCache" }],
		["CacheReset", "IntegrationBuilt", { kind: "buildAndRun", target: "tests" }],
		["IntegrationBuilt", "IntegrationCaptured", { kind: "capture", output: integration }],
		[
			"IntegrationCaptured",
			"Merged",
			{ kind: "merge", inputs: [unit, integration], output: MERGED_TRACEFILE },
		],
		[
			"Merged",
			"Filtered",
			{
				kind: "filter",
				input: MERGED_TRACEFILE,
				output: FILTERED_TRACEFILE,
				sourceDir: config.sourceDir,
			},
		],
		[
			"Filtered",
			"Rendered",
			{ kind: "render", input: FILTERED_TRACEFILE, outputDir: config.reportDir },
		],
	];

	return edges.map(([from, to, step]) => ({ from, to, step }));
}

/**
 * Transition leaving `state`, or undefined for terminal states.
 *
 * @pure true
 */
export function nextTransition(
	plan: readonly Transition[],
	state: PipelineState,
): Transition | undefined {
	if (TERMINAL_STATES.has(state)) return undefined;
	return plan.find((t) => t.from === state);
}

/**
 * Short human label of a step, used in progress lines and failure summaries.
 *
 * @pure true
 */
export function describeStep(step: StepDescriptor): string {
	switch (step.kind) {
		case "cleanup":
			return "cleanup";
		case "buildAndRun":
			return `build and run ${step.target === "lib" ? "unit" : "integration"} tests`;
		case "capture":
			return `capture ${step.output}`;
		case "resetCache":
			return "reset build cache";
		case "merge":
			return `merge ${step.inputs.join(" + ")} → ${step.output}`;
		case "filter":
			return `filter ${step.input} → ${step.output}`;
		case "render":
			return `render ${step.input} → ${step.outputDir}`;
	}
}
