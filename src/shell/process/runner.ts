// CHANGE: Command runner as an Effect service with a node:child_process implementation
// WHY: Steps depend on the CommandRunner tag, so tests substitute a recording fake for real processes
// PURITY: SHELL (spawns external processes)
// EFFECT: Effect<CommandResult, SpawnFailed>
// INVARIANT: Interrupting the effect kills the in-flight child
// COMPLEXITY: O(n) where n = captured stdout size

import { spawn } from "node:child_process";
import { constants } from "node:os";
import { Context, Effect, Layer } from "effect";

import { SpawnFailed } from "../../core/errors.js";
import type { CommandResult, CommandSpec } from "../../core/types/index.js";

/**
 * Executes one child process to completion.
 */
export interface CommandRunnerService {
	readonly run: (spec: CommandSpec) => Effect.Effect<CommandResult, SpawnFailed>;
}

export class CommandRunner extends Context.Tag("CommandRunner")<
	CommandRunner,
	CommandRunnerService
>() {}

/**
 * Map a child's termination to a single exit status (shell convention for signals).
 *
 * @pure true
 */
export function exitStatusOf(
	code: number | null,
	signal: NodeJS.Signals | null,
): number {
	if (code !== null) return code;
	if (signal === null) return 1;
	const signalNumber = Object.entries(constants.signals).find(
		([name]) => name === signal,
	)?.[1];
	return signalNumber === undefined ? 1 : 128 + signalNumber;
}

/**
 * Spawn `spec` without a shell; stderr (and stdout unless captured) stream to the terminal.
 *
 * @pure false
 * @effect Effect<CommandResult, SpawnFailed>
 * @postcondition the child has exited when the effect succeeds
 */
export function spawnCommand(
	spec: CommandSpec,
): Effect.Effect<CommandResult, SpawnFailed> {
	return Effect.async<CommandResult, SpawnFailed>((resume) => {
		const stdoutChunks: Buffer[] = [];
		let settled = false;

		const child = spawn(spec.command, [...spec.args], {
			cwd: spec.cwd,
			env: { ...process.env, ...spec.env },
			stdio: ["inherit", spec.captureStdout ? "pipe" : "inherit", "inherit"],
		});

		child.stdout?.on("data", (data: Buffer) => {
			stdoutChunks.push(data);
		});

		child.once("error", (error) => {
			if (settled) return;
			settled = true;
			resume(
				Effect.fail(
					new SpawnFailed({ command: spec.command, detail: error.message }),
				),
			);
		});

		child.once("close", (code, signal) => {
			if (settled) return;
			settled = true;
			resume(
				Effect.succeed({
					exitCode: exitStatusOf(code, signal),
					stdout: Buffer.concat(stdoutChunks).toString("utf8"),
				}),
			);
		});

		return Effect.sync(() => {
			if (!settled && child.exitCode === null) {
				child.kill("SIGTERM");
			}
		});
	});
}

export const NodeCommandRunnerLive = Layer.succeed(CommandRunner, {
	run: spawnCommand,
});
