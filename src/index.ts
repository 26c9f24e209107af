// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, the runner service and CORE utilities; keep step internals reachable for embedding
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effect programs or typed interfaces

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the coverage pipeline for a project.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { NodeCommandRunnerLive, runCoverage } from "covrun";
 *
 * const exitCode = await Effect.runPromise(
 *   runCoverage({ projectRoot: "../mesabox", noPreflight: false, showHelp: false }).pipe(
 *     Effect.provide(NodeCommandRunnerLive),
 *   ),
 * );
 * ```
 */
export { reportOutcome, runCoverage, runPipeline } from "./app/runCoverage.js";
export { main, program } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (pure)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	ExitCode,
	PipelineState,
	RunOutcome,
	StepDescriptor,
	Transition,
} from "./core/models.js";
export {
	buildPlan,
	describeStep,
	integrationTracefile,
	nextTransition,
	TERMINAL_STATES,
	unitTracefile,
} from "./core/pipeline.js";
export {
	cargoBuildCommand,
	cargoCleanCommand,
	captureCommand,
	coverageEnv,
	extractCommand,
	formatCommand,
	mergeCommand,
	renderCommand,
	testBinaryCommand,
} from "./core/commands.js";
export {
	DEFAULT_SETTINGS,
	defaultConfig,
	FILTERED_TRACEFILE,
	MERGED_TRACEFILE,
} from "./core/config/defaults.js";
export {
	type CompilerArtifact,
	parseCargoMessages,
	renderedDiagnostics,
	selectTestExecutable,
} from "./core/cargo/artifacts.js";
export {
	type CoverageSummary,
	type TracefileRecord,
	parseTracefile,
	summarize,
} from "./core/lcov/tracefile.js";
export {
	computeExitCode,
	describeFailure,
	exitCodeForError,
} from "./core/decision.js";
export * from "./core/errors.js";
export type {
	CLIOptions,
	CommandResult,
	CommandSpec,
	CoverageConfig,
	TargetKind,
	ToolPaths,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	CommandRunner,
	type CommandRunnerService,
	NodeCommandRunnerLive,
} from "./shell/process/runner.js";
export { loadCoverageConfig, parseCLIArgs } from "./shell/config/index.js";
