// CHANGE: HTML report step
// WHY: Terminal step of the run; genhtml itself tolerates "source" read errors
// PURITY: SHELL
// EFFECT: Effect<CoverageSummary, ReportFailed | SpawnFailed | FSError, CommandRunner>

import * as path from "node:path";
import { Effect } from "effect";

import { renderCommand } from "../../core/commands.js";
import { type FSError, ReportFailed, type SpawnFailed } from "../../core/errors.js";
import {
	type CoverageSummary,
	parseTracefile,
	summarize,
} from "../../core/lcov/tracefile.js";
import type { CoverageConfig } from "../../core/types/index.js";
import { isNonEmptyDirectory, readTextFile } from "../fs/artifacts.js";
import type { CommandRunner } from "../process/runner.js";
import { runChecked } from "../utils/exec.js";

/**
 * Render `input` into `outputDir` and summarize the tracefile.
 *
 * @postcondition outputDir exists and is non-empty
 */
export function render(
	config: CoverageConfig,
	input: string,
	outputDir: string,
): Effect.Effect<CoverageSummary, ReportFailed | SpawnFailed | FSError, CommandRunner> {
	return Effect.gen(function* () {
		yield* runChecked(
			renderCommand(config, input, outputDir),
			(exitCode) =>
				new ReportFailed({ outputDir, exitCode, detail: `exited with code ${exitCode}` }),
		);

		const absoluteOutput = path.resolve(config.projectRoot, outputDir);
		if (!(yield* isNonEmptyDirectory(absoluteOutput))) {
			return yield* Effect.fail(
				new ReportFailed({
					outputDir,
					exitCode: null,
					detail: "report directory is missing or empty",
				}),
			);
		}

		const content = yield* readTextFile(path.resolve(config.projectRoot, input));
		return summarize(parseTracefile(content));
	});
}
