// CHANGE: Build an instrumented test target and run its binary
// WHY: Coverage counters are only written by executing the instrumented binary
// PURITY: SHELL
// EFFECT: Effect<string, CompileFailed | MissingArtifact | TestFailed | SpawnFailed | FSError, CommandRunner>
// INVARIANT: The binary runs only after its .d file is gone; the binary itself is untouched

import { Effect } from "effect";

import {
	dependencyInfoPath,
	parseCargoMessages,
	renderedDiagnostics,
	selectTestExecutable,
} from "../../core/cargo/artifacts.js";
import { cargoBuildCommand, testBinaryCommand } from "../../core/commands.js";
import {
	CompileFailed,
	type FSError,
	MissingArtifact,
	type SpawnFailed,
	TestFailed,
} from "../../core/errors.js";
import type { CoverageConfig, TargetKind } from "../../core/types/index.js";
import { removeIfExists } from "../fs/artifacts.js";
import type { CommandRunner } from "../process/runner.js";
import { runChecked, runCommand } from "../utils/exec.js";

type BuildError =
	| CompileFailed
	| MissingArtifact
	| TestFailed
	| SpawnFailed
	| FSError;

/**
 * Compile `target`, locate its test binary from cargo's JSON output and return the path.
 *
 * @effect Effect<string, CompileFailed | MissingArtifact | SpawnFailed, CommandRunner>
 */
export function buildTestBinary(
	config: CoverageConfig,
	target: TargetKind,
): Effect.Effect<string, CompileFailed | MissingArtifact | SpawnFailed, CommandRunner> {
	return Effect.gen(function* () {
		const { exitCode, stdout } = yield* runCommand(cargoBuildCommand(config, target));
		for (const diagnostic of renderedDiagnostics(stdout)) {
			console.error(diagnostic.trimEnd());
		}
		if (exitCode !== 0) {
			return yield* Effect.fail(new CompileFailed({ target, exitCode }));
		}
		const artifacts = parseCargoMessages(stdout);
		const executable = selectTestExecutable(
			artifacts,
			target,
			config.integrationTest,
		);
		if (executable === null) {
			return yield* Effect.fail(
				new MissingArtifact({
					target,
					detail: `cargo reported ${artifacts.length} artifact(s), none is a test executable`,
				}),
			);
		}
		return executable;
	});
}

/**
 * build_and_run: compile, drop the dependency-metadata file, execute the binary.
 *
 * @returns The executed binary's path
 * @postcondition the binary exited with status 0
 */
export function buildAndRun(
	config: CoverageConfig,
	target: TargetKind,
): Effect.Effect<string, BuildError, CommandRunner> {
	return Effect.gen(function* () {
		const executable = yield* buildTestBinary(config, target);
		console.log(`   Binary: ${executable}`);

		// lcov must not ingest rustc's dependency listing
		yield* removeIfExists(dependencyInfoPath(executable));

		yield* runChecked(
			testBinaryCommand(config, executable),
			(exitCode) => new TestFailed({ target, executable, exitCode }),
		);
		return executable;
	});
}
