// CHANGE: Application layer walking the coverage transition table
// WHY: APP composes the pure plan with SHELL steps; fail-fast is a property of this loop, not of a script
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never, CommandRunner>
// INVARIANT: Steps run strictly one after another; the first failure ends the run in "Aborted"
// COMPLEXITY: O(n) where n = |plan|

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { computeExitCode, describeFailure, EXIT_CONFIG_ERROR } from "../core/decision.js";
import { StepTimeout, type StepError } from "../core/errors.js";
import type { CoverageSummary } from "../core/lcov/tracefile.js";
import type {
	ExitCode,
	PipelineState,
	RunOutcome,
	StepDescriptor,
} from "../core/models.js";
import { buildPlan, describeStep, nextTransition } from "../core/pipeline.js";
import type { CLIOptions, CoverageConfig } from "../core/types/index.js";
import { checkAndReportPreflight } from "../shell/analysis/preflight.js";
import { loadCoverageConfig } from "../shell/config/index.js";
import type { CommandRunner } from "../shell/process/runner.js";
import { executeStep } from "../shell/steps/index.js";
import {
	checkDependencies,
	reportMissingDependencies,
} from "../shell/utils/dependencies.js";

const stepIcon = (step: StepDescriptor): string =>
	match(step.kind)
		.with("cleanup", "resetCache", () => "🧹")
		.with("buildAndRun", () => "🔨")
		.with("capture", () => "📥")
		.with("merge", () => "🔗")
		.with("filter", () => "🔍")
		.with("render", () => "📊")
		.exhaustive();

/**
 * Bound a step by the configured timeout; interruption kills its child process.
 *
 * @effect Effect<A, StepError | StepTimeout, R>
 */
function withStepTimeout<A, R>(
	effect: Effect.Effect<A, StepError, R>,
	config: CoverageConfig,
	step: StepDescriptor,
): Effect.Effect<A, StepError, R> {
	const timeoutMs = config.stepTimeoutMs;
	if (timeoutMs === undefined) return effect;
	return effect.pipe(
		Effect.timeoutFail({
			duration: timeoutMs,
			onTimeout: () => new StepTimeout({ step: describeStep(step), timeoutMs }),
		}),
	);
}

/**
 * Walk the plan from "Pending" until a terminal state.
 *
 * @pure false (runs every step through the CommandRunner)
 * @effect Effect<RunOutcome, never, CommandRunner>
 * @postcondition outcome.history starts with "Pending" and ends with outcome.state
 */
export function runPipeline(
	config: CoverageConfig,
): Effect.Effect<RunOutcome, never, CommandRunner> {
	return Effect.gen(function* () {
		const plan = buildPlan(config);
		const history: PipelineState[] = ["Pending"];
		let summary: CoverageSummary | null = null;
		let state: PipelineState = "Pending";
		let transition = nextTransition(plan, state);

		while (transition !== undefined) {
			const position = plan.indexOf(transition) + 1;
			console.log(
				`${stepIcon(transition.step)} [${position}/${plan.length}] ${describeStep(transition.step)}`,
			);

			const result = yield* Effect.either(
				withStepTimeout(executeStep(config, transition.step), config, transition.step),
			);
			if (Either.isLeft(result)) {
				history.push("Aborted");
				return {
					state: "Aborted",
					history,
					failedAt: transition,
					error: result.left,
				} satisfies RunOutcome;
			}

			summary = result.right ?? summary;
			state = transition.to;
			history.push(state);
			transition = nextTransition(plan, state);
		}

		return { state: "Rendered", history, summary } satisfies RunOutcome;
	});
}

/**
 * Print the final line of a run.
 *
 * @pure false (console output)
 */
export function reportOutcome(outcome: RunOutcome, config: CoverageConfig): void {
	if (outcome.state === "Aborted") {
		console.error(
			`\n❌ Aborted at "${describeStep(outcome.failedAt.step)}": ${describeFailure(outcome.error)}`,
		);
		return;
	}
	if (outcome.summary !== null) {
		const s = outcome.summary;
		console.log(
			`\n📊 Coverage: lines ${s.linePercent}% (${s.linesHit}/${s.linesFound}), ` +
				`branches ${s.branchPercent}% (${s.branchesHit}/${s.branchesFound}), ${s.files} files`,
		);
	}
	console.log(`✅ Report written to ${config.reportDir}/`);
}

/**
 * Ensure required tools are present. Returns boolean success.
 */
function haveTools(config: CoverageConfig): Effect.Effect<boolean, never, CommandRunner> {
	return Effect.gen(function* () {
		const depCheck = yield* checkDependencies(config);
		if (!depCheck.allAvailable) {
			reportMissingDependencies(depCheck.missing);
			return false;
		}
		return true;
	});
}

/**
 * Orchestrates the coverage run and returns ExitCode as value (no process.exit).
 *
 * @param cliOptions - Parsed CLI options
 * @returns Effect<ExitCode, never, CommandRunner>
 *
 * @postcondition outcome "Rendered" → 0; configuration problems → 2; preflight problems → 1
 */
export function runCoverage(
	cliOptions: CLIOptions,
): Effect.Effect<ExitCode, never, CommandRunner> {
	return Effect.gen(function* () {
		const loaded = yield* Effect.either(loadCoverageConfig(cliOptions));
		if (Either.isLeft(loaded)) {
			console.error(`❌ Configuration error: ${describeFailure(loaded.left)}`);
			return EXIT_CONFIG_ERROR;
		}
		const config = loaded.right;

		if (!cliOptions.noPreflight) {
			if (!checkAndReportPreflight(config).ok) return 1;
			if (!(yield* haveTools(config))) return 1;
		}

		console.log(`🧪 Coverage run in: ${config.projectRoot}`);
		const outcome = yield* runPipeline(config);
		reportOutcome(outcome, config);
		return computeExitCode(outcome);
	});
}
