// CHANGE: Pure builders for every external command of the coverage run
// WHY: Arguments and environment are data; the shell only executes what CORE describes
// PURITY: CORE
// INVARIANT: Every pipeline command carries the instrumentation environment as its own record; nothing touches process.env
// COMPLEXITY: O(n) where n = number of arguments

import type { CommandSpec, CoverageConfig, TargetKind } from "./types/index.js";

/**
 * Environment record attached to every child of the run.
 *
 * @pure true
 * @postcondition keys = { COVERAGE_OPTIONS, RUSTC_WRAPPER, CARGO_INCREMENTAL }
 */
export function coverageEnv(
	config: CoverageConfig,
): Readonly<Record<string, string>> {
	return {
		COVERAGE_OPTIONS: config.instrumentationFlags.join(" "),
		RUSTC_WRAPPER: config.compilerWrapper,
		CARGO_INCREMENTAL: "0",
	};
}

/**
 * Options shared by every lcov mode: custom gcov reader, branch accounting, line exclusion.
 *
 * @pure true
 */
export function lcovCommonArgs(config: CoverageConfig): readonly string[] {
	return [
		"--gcov-tool",
		config.gcovTool,
		"--rc",
		"lcov_branch_coverage=1",
		"--rc",
		`lcov_excl_line=${config.excludeLinePattern}`,
	];
}

const spec = (
	config: CoverageConfig,
	command: string,
	args: readonly string[],
	captureStdout = false,
): CommandSpec => ({
	command,
	args,
	cwd: config.projectRoot,
	env: coverageEnv(config),
	captureStdout,
});

/** `cargo clean` with the instrumentation environment. */
export function cargoCleanCommand(config: CoverageConfig): CommandSpec {
	return spec(config, config.tools.cargo, ["clean"]);
}

/**
 * `cargo rustc` for one test target, reporting artifacts as JSON on stdout.
 *
 * @pure true
 * @postcondition result.captureStdout = true (artifact messages are parsed afterwards)
 */
export function cargoBuildCommand(
	config: CoverageConfig,
	target: TargetKind,
): CommandSpec {
	const targetArgs =
		target === "lib"
			? ["--profile", "test", "--lib"]
			: ["--test", config.integrationTest];
	return spec(
		config,
		config.tools.cargo,
		["rustc", "--all-features", ...targetArgs, "--message-format=json"],
		true,
	);
}

/**
 * Runs an instrumented test binary with no arguments.
 * Integration tests build the crate's own binary through cargo, which needs the wrapper too.
 */
export function testBinaryCommand(
	config: CoverageConfig,
	executable: string,
): CommandSpec {
	return spec(config, executable, []);
}

/** `lcov --capture` over the whole project tree. */
export function captureCommand(
	config: CoverageConfig,
	output: string,
): CommandSpec {
	return spec(config, config.tools.lcov, [
		...lcovCommonArgs(config),
		"--capture",
		"--directory",
		".",
		"--base-directory",
		".",
		"-o",
		output,
	]);
}

/** `lcov --add-tracefile` for every input, in order. */
export function mergeCommand(
	config: CoverageConfig,
	inputs: readonly string[],
	output: string,
): CommandSpec {
	return spec(config, config.tools.lcov, [
		...lcovCommonArgs(config),
		...inputs.flatMap((input) => ["--add-tracefile", input]),
		"-o",
		output,
	]);
}

/**
 * `lcov --extract` keeping only the listed source files.
 *
 * @precondition files.length > 0
 */
export function extractCommand(
	config: CoverageConfig,
	input: string,
	output: string,
	files: readonly string[],
): CommandSpec {
	return spec(config, config.tools.lcov, [
		...lcovCommonArgs(config),
		"--extract",
		input,
		...files,
		"-o",
		output,
	]);
}

/**
 * `genhtml` with branch coverage, demangling and a legend; "source" read errors are tolerated.
 */
export function renderCommand(
	config: CoverageConfig,
	input: string,
	outputDir: string,
): CommandSpec {
	return spec(config, config.tools.genhtml, [
		"--branch-coverage",
		"--demangle-cpp",
		"--legend",
		input,
		"-o",
		outputDir,
		"--ignore-errors",
		"source",
	]);
}

const SAFE_WORD = /^[A-Za-z0-9_./=:,@%+-]+$/;

/**
 * Quote a word for a POSIX shell only when needed.
 *
 * @pure true
 */
export function shellQuote(word: string): string {
	if (SAFE_WORD.test(word)) return word;
	return `'${word.replaceAll("'", `'\\''`)}'`;
}

/**
 * Render a command as a line that can be pasted into a shell to reproduce it.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatCommand(cargoCleanCommand(defaultConfig("/repo")));
 * // "COVERAGE_OPTIONS='-Zprofile ...' RUSTC_WRAPPER=./util/cov-rustc CARGO_INCREMENTAL=0 cargo clean"
 * ```
 */
export function formatCommand(command: CommandSpec): string {
	const assignments = Object.entries(command.env).map(
		([name, value]) => `${name}=${shellQuote(value)}`,
	);
	return [...assignments, shellQuote(command.command), ...command.args.map(shellQuote)].join(" ");
}
