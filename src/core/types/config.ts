// CHANGE: Configuration and CLI option types for the coverage run
// WHY: Every fixed value of the pipeline (flags, tool paths, file names) is a field with a default
// PURITY: CORE
// INVARIANT: All records are immutable

/**
 * Which test binary a build targets: the library unit tests or the integration test.
 */
export type TargetKind = "lib" | "tests";

/**
 * Executables invoked by the pipeline, resolved through PATH unless absolute.
 */
export interface ToolPaths {
	readonly cargo: string;
	readonly lcov: string;
	readonly genhtml: string;
}

/**
 * Fully resolved configuration of a coverage run.
 *
 * @property projectRoot Absolute path of the Cargo project; every child runs here
 * @property crateName Library crate name, also names the unit capture (`<crateName>.info`)
 * @property integrationTest Integration test target, also names its capture (`<name>.info`)
 * @property instrumentationFlags Passed to the compiler wrapper through COVERAGE_OPTIONS
 * @property compilerWrapper Value of RUSTC_WRAPPER
 * @property gcovTool gcov-compatible reader handed to lcov via --gcov-tool
 * @property excludeLinePattern Lines matching this pattern are excluded by lcov
 * @property sourceDir Project source tree, relative to projectRoot
 * @property sourceExtension Extension of the source files kept by the extract step
 * @property reportDir genhtml output directory, relative to projectRoot
 * @property stepTimeoutMs Upper bound for a single step; absent means unbounded
 */
export interface CoverageConfig {
	readonly projectRoot: string;
	readonly crateName: string;
	readonly integrationTest: string;
	readonly instrumentationFlags: readonly string[];
	readonly compilerWrapper: string;
	readonly gcovTool: string;
	readonly excludeLinePattern: string;
	readonly sourceDir: string;
	readonly sourceExtension: string;
	readonly reportDir: string;
	readonly tools: ToolPaths;
	readonly stepTimeoutMs?: number;
}

/**
 * Опции командной строки covrun.
 *
 * @property projectRoot Project directory (positional, defaults to ".")
 * @property configPath Explicit configuration file (--config)
 * @property stepTimeoutMs Per-step timeout (--timeout)
 * @property noPreflight Skip the tool availability checks (--no-preflight)
 * @property showHelp --help / -h was given
 */
export interface CLIOptions {
	readonly projectRoot: string;
	readonly configPath?: string;
	readonly stepTimeoutMs?: number;
	readonly noPreflight: boolean;
	readonly showHelp: boolean;
}
