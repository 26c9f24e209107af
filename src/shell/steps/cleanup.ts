// CHANGE: Cleanup and cache-reset steps
// WHY: Every run starts without stale tracefiles/counters and each test phase starts from an empty target dir
// PURITY: SHELL
// EFFECT: Effect<void, CleanupFailed | SpawnFailed | FSError, CommandRunner>

import { Effect } from "effect";

import { cargoCleanCommand } from "../../core/commands.js";
import { STALE_ARTIFACT_EXTENSIONS } from "../../core/config/defaults.js";
import { CleanupFailed, type FSError, type SpawnFailed } from "../../core/errors.js";
import type { CoverageConfig } from "../../core/types/index.js";
import { removeStaleArtifacts } from "../fs/artifacts.js";
import type { CommandRunner } from "../process/runner.js";
import { runChecked } from "../utils/exec.js";

/**
 * `cargo clean` under the instrumentation environment.
 *
 * @effect Effect<void, CleanupFailed | SpawnFailed, CommandRunner>
 */
export function resetCache(
	config: CoverageConfig,
): Effect.Effect<void, CleanupFailed | SpawnFailed, CommandRunner> {
	return runChecked(
		cargoCleanCommand(config),
		(exitCode) => new CleanupFailed({ exitCode }),
	).pipe(Effect.asVoid);
}

/**
 * Delete `*.info`, `*.gcda`, `*.gcno` in the project root, then reset the build cache.
 *
 * @postcondition no stale artifact remains at the top level of projectRoot
 */
export function cleanup(
	config: CoverageConfig,
): Effect.Effect<void, CleanupFailed | SpawnFailed | FSError, CommandRunner> {
	return Effect.gen(function* () {
		const removed = yield* removeStaleArtifacts(
			config.projectRoot,
			STALE_ARTIFACT_EXTENSIONS,
		);
		if (removed.length > 0) {
			console.log(`   Removed: ${removed.join(", ")}`);
		}
		yield* resetCache(config);
	});
}
