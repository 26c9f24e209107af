// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options, provides the node process runner and delegates orchestration to app/runCoverage
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { describeFailure, EXIT_CONFIG_ERROR } from "./core/decision.js";
import type { ExitCode } from "./core/models.js";
import { runCoverage } from "./app/runCoverage.js";
import { HELP, parseCLIArgs } from "./shell/config/index.js";
import { NodeCommandRunnerLive } from "./shell/process/runner.js";

/**
 * Build the whole program for a command line.
 *
 * @effect Effect<ExitCode, never, never>
 */
export function program(args: readonly string[]): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const parsed = parseCLIArgs(args);
		if (Either.isLeft(parsed)) {
			console.error(`❌ ${describeFailure(parsed.left)}`);
			console.log(HELP);
			return EXIT_CONFIG_ERROR;
		}
		if (parsed.right.showHelp) {
			console.log(HELP);
			return 0;
		}
		return yield* runCoverage(parsed.right);
	}).pipe(Effect.provide(NodeCommandRunnerLive));
}

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(program(args));
}
