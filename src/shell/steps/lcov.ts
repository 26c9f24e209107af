// CHANGE: lcov capture, merge and extract steps
// WHY: Each mode writes one tracefile that the next step reads; all share the common option set
// PURITY: SHELL
// EFFECT: Effect<void, CoverageToolFailed | SpawnFailed | FSError | ..., CommandRunner>
// INVARIANT: Output files are overwritten by lcov (-o), never appended

import * as path from "node:path";
import { Effect } from "effect";

import {
	captureCommand,
	extractCommand,
	mergeCommand,
} from "../../core/commands.js";
import {
	ConfigError,
	CoverageToolFailed,
	type FSError,
	InvariantViolation,
	type SpawnFailed,
} from "../../core/errors.js";
import {
	type TracefileRecord,
	filesOutsideRoot,
	parseTracefile,
} from "../../core/lcov/tracefile.js";
import type { CoverageConfig } from "../../core/types/index.js";
import {
	listSourceFiles,
	readTextFile,
	resolveRealPath,
} from "../fs/artifacts.js";
import type { CommandRunner } from "../process/runner.js";
import { runChecked } from "../utils/exec.js";

/**
 * `lcov --capture` over the project into `output`.
 */
export function capture(
	config: CoverageConfig,
	output: string,
): Effect.Effect<void, CoverageToolFailed | SpawnFailed, CommandRunner> {
	return runChecked(
		captureCommand(config, output),
		(exitCode) => new CoverageToolFailed({ operation: "capture", output, exitCode }),
	).pipe(Effect.asVoid);
}

/**
 * Combine `inputs` into `output`.
 */
export function merge(
	config: CoverageConfig,
	inputs: readonly string[],
	output: string,
): Effect.Effect<void, CoverageToolFailed | SpawnFailed, CommandRunner> {
	return runChecked(
		mergeCommand(config, inputs, output),
		(exitCode) => new CoverageToolFailed({ operation: "merge", output, exitCode }),
	).pipe(Effect.asVoid);
}

/**
 * Read a tracefile and check that every SF entry lies under `root`.
 *
 * @postcondition ∀r ∈ result: isUnderRoot(r.file, root)
 */
export function verifyTracefileRoot(
	tracefile: string,
	root: string,
): Effect.Effect<readonly TracefileRecord[], FSError | InvariantViolation> {
	return Effect.gen(function* () {
		const records = parseTracefile(yield* readTextFile(tracefile));
		const outside = filesOutsideRoot(records, root);
		if (outside.length > 0) {
			return yield* Effect.fail(
				new InvariantViolation({
					where: tracefile,
					detail: `${outside.length} file(s) outside ${root}: ${outside.join(", ")}`,
				}),
			);
		}
		return records;
	});
}

/**
 * Restrict `input` to the source files under `sourceDir`, resolved to an absolute path now.
 *
 * @returns The resolved source root
 */
export function filter(
	config: CoverageConfig,
	input: string,
	output: string,
	sourceDir: string,
): Effect.Effect<
	string,
	CoverageToolFailed | SpawnFailed | FSError | ConfigError | InvariantViolation,
	CommandRunner
> {
	return Effect.gen(function* () {
		const root = yield* resolveRealPath(path.resolve(config.projectRoot, sourceDir));
		const files = yield* listSourceFiles(root, config.sourceExtension);
		if (files.length === 0) {
			return yield* Effect.fail(
				new ConfigError({
					issues: [`no *${config.sourceExtension} files under ${root}`],
				}),
			);
		}
		console.log(`   Source root: ${root} (${files.length} files)`);

		yield* runChecked(
			extractCommand(config, input, output, files),
			(exitCode) => new CoverageToolFailed({ operation: "extract", output, exitCode }),
		);
		yield* verifyTracefileRoot(path.resolve(config.projectRoot, output), root);
		return root;
	});
}
