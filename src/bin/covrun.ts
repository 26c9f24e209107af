#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN forwards signals to the running fiber and exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; SIGINT/SIGTERM interrupt the run, which kills the in-flight child
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Cause, Effect, Exit, Fiber } from "effect";

import { EXIT_INTERRUPTED } from "../core/decision.js";
import { program } from "../main.js";

void (async (): Promise<void> => {
	const fiber = Effect.runFork(program(process.argv.slice(2)));

	const interrupt = (): void => {
		Effect.runFork(Fiber.interrupt(fiber));
	};
	process.once("SIGINT", interrupt);
	process.once("SIGTERM", interrupt);

	const exit = await Effect.runPromise(Fiber.await(fiber));
	if (Exit.isSuccess(exit)) {
		process.exit(exit.value);
	}
	if (Cause.isInterruptedOnly(exit.cause)) {
		console.error("\n⛔ Interrupted");
		process.exit(EXIT_INTERRUPTED);
	}
	console.error("Fatal error:", Cause.pretty(exit.cause));
	process.exit(1);
})();
