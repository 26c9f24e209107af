// CHANGE: Default coverage configuration
// WHY: Defaults reproduce the fixed pipeline exactly; overrides come from covrun.config.json and CLI flags
// PURITY: CORE
// INVARIANT: DEFAULT_SETTINGS contains every CoverageConfig field except projectRoot and stepTimeoutMs

import type { CoverageConfig } from "../types/index.js";

/**
 * CoverageConfig without the run-specific fields.
 */
export type CoverageSettings = Omit<CoverageConfig, "projectRoot" | "stepTimeoutMs">;

export const DEFAULT_SETTINGS: CoverageSettings = {
	crateName: "mesabox",
	integrationTest: "tests",
	instrumentationFlags: [
		"-Zprofile",
		"-Copt-level=1",
		"-Clink-dead-code",
		"-Ccodegen-units=1",
		"-Zno-landing-pads",
	],
	compilerWrapper: "./util/cov-rustc",
	gcovTool: "./util/llvm-gcov",
	excludeLinePattern: "assert",
	sourceDir: "src",
	sourceExtension: ".rs",
	reportDir: "target/coverage",
	tools: {
		cargo: "cargo",
		lcov: "lcov",
		genhtml: "genhtml",
	},
};

/** File looked up in the project root when --config is not given. */
export const CONFIG_FILE_NAME = "covrun.config.json";

/** Root-level leftovers of a previous run removed by the cleanup step. */
export const STALE_ARTIFACT_EXTENSIONS: readonly string[] = [
	".info",
	".gcda",
	".gcno",
];

export const MERGED_TRACEFILE = "coverage.info";
export const FILTERED_TRACEFILE = "final.info";

/**
 * Build a full configuration for a project root with default settings.
 *
 * @pure true
 */
export function defaultConfig(projectRoot: string): CoverageConfig {
	return { projectRoot, ...DEFAULT_SETTINGS };
}
