// CHANGE: Common "log the command, run it, check the status" pattern for every step
// WHY: DRY principle - identical pattern used by cleanup, build, lcov and genhtml steps
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, SpawnFailed | E, CommandRunner>
// INVARIANT: ∀ spec: the logged line reproduces exactly the spawned command

import { Effect } from "effect";

import { formatCommand } from "../../core/commands.js";
import type { SpawnFailed } from "../../core/errors.js";
import type { CommandResult, CommandSpec } from "../../core/types/index.js";
import { CommandRunner } from "../process/runner.js";

/**
 * Run a command through the CommandRunner service, logging it first.
 *
 * @pure false
 * @effect Effect<CommandResult, SpawnFailed, CommandRunner>
 */
export function runCommand(
	spec: CommandSpec,
): Effect.Effect<CommandResult, SpawnFailed, CommandRunner> {
	return Effect.gen(function* () {
		console.log(`   ↳ Command: ${formatCommand(spec)}`);
		const runner = yield* CommandRunner;
		return yield* runner.run(spec);
	});
}

/**
 * Run a command and fail with `onFailure(exitCode)` when it exits non-zero.
 *
 * @pure false
 * @postcondition success ⇒ result.exitCode = 0
 */
export function runChecked<E>(
	spec: CommandSpec,
	onFailure: (exitCode: number) => E,
): Effect.Effect<CommandResult, SpawnFailed | E, CommandRunner> {
	return runCommand(spec).pipe(
		Effect.flatMap((result) =>
			result.exitCode === 0
				? Effect.succeed(result)
				: Effect.fail(onFailure(result.exitCode)),
		),
	);
}
