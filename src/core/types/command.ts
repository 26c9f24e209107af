// CHANGE: Explicit per-child process description
// WHY: Environment travels with each spawned command instead of being exported into process.env
// PURITY: CORE
// INVARIANT: env holds only the overrides for this child; the runner layers them over the inherited environment

/**
 * A single external process invocation.
 *
 * @property command Executable name or path
 * @property args Arguments, passed without a shell
 * @property cwd Working directory of the child
 * @property env Variables set for this child only
 * @property captureStdout Collect stdout instead of streaming it to the terminal
 */
export interface CommandSpec {
	readonly command: string;
	readonly args: readonly string[];
	readonly cwd: string;
	readonly env: Readonly<Record<string, string>>;
	readonly captureStdout: boolean;
}

/**
 * Outcome of a finished child process.
 *
 * @property exitCode Exit status; 128 + signal number when the child was killed by a signal
 * @property stdout Captured stdout, empty unless captureStdout was set
 */
export interface CommandResult {
	readonly exitCode: number;
	readonly stdout: string;
}
