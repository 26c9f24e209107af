// CHANGE: Dispatch a step descriptor to its shell implementation
// WHY: The app walks the transition table; this is the only place that knows which effect runs a step
// PURITY: SHELL
// EFFECT: Effect<CoverageSummary | null, StepError, CommandRunner>

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { StepError } from "../../core/errors.js";
import type { CoverageSummary } from "../../core/lcov/tracefile.js";
import type { StepDescriptor } from "../../core/models.js";
import type { CoverageConfig } from "../../core/types/index.js";
import type { CommandRunner } from "../process/runner.js";
import { buildAndRun } from "./build.js";
import { cleanup, resetCache } from "./cleanup.js";
import { capture, filter, merge } from "./lcov.js";
import { render } from "./report.js";

export { buildAndRun, buildTestBinary } from "./build.js";
export { cleanup, resetCache } from "./cleanup.js";
export { capture, filter, merge, verifyTracefileRoot } from "./lcov.js";
export { render } from "./report.js";

/**
 * Execute one step. Only `render` yields a summary; every other step yields null.
 *
 * @pure false
 */
export function executeStep(
	config: CoverageConfig,
	step: StepDescriptor,
): Effect.Effect<CoverageSummary | null, StepError, CommandRunner> {
	const done = Effect.as(null);
	return match<
		StepDescriptor,
		Effect.Effect<CoverageSummary | null, StepError, CommandRunner>
	>(step)
		.with({ kind: "cleanup" }, () => cleanup(config).pipe(done))
		.with({ kind: "buildAndRun" }, (s) => buildAndRun(config, s.target).pipe(done))
		.with({ kind: "capture" }, (s) => capture(config, s.output).pipe(done))
		.with({ kind: "resetCache" }, () => resetCache(config).pipe(done))
		.with({ kind: "merge" }, (s) => merge(config, s.inputs, s.output).pipe(done))
		.with({ kind: "filter" }, (s) =>
			filter(config, s.input, s.output, s.sourceDir).pipe(done),
		)
		.with({ kind: "render" }, (s) => render(config, s.input, s.outputDir))
		.exhaustive();
}
