// CHANGE: Preflight checks of the project layout before a coverage run
// WHY: A missing wrapper, gcov tool or source tree would otherwise fail minutes into the run
// PURITY: SHELL (fs checks only)
// INVARIANT: ok ⇔ issues = ∅

import * as fs from "node:fs";
import * as path from "node:path";

import type { CoverageConfig } from "../../core/types/index.js";

/**
 * Preflight issue codes enumerating the problems we can detect prior to run.
 */
export type PreflightIssueCode =
	| "noCargoToml"
	| "missingSourceDir"
	| "missingCompilerWrapper"
	| "missingGcovTool";

/**
 * Result of preflight checks.
 */
export interface PreflightResult {
	readonly ok: boolean;
	readonly issues: ReadonlyArray<PreflightIssueCode>;
}

const isFile = (file: string): boolean =>
	fs.existsSync(file) && fs.statSync(file).isFile();

const isDirectory = (dir: string): boolean =>
	fs.existsSync(dir) && fs.statSync(dir).isDirectory();

/**
 * A configured helper path is either a bare command name (looked up in PATH at spawn time)
 * or a path relative to the project root, which must exist.
 */
function helperExists(projectRoot: string, helper: string): boolean {
	if (!helper.includes("/")) return true;
	return isFile(path.resolve(projectRoot, helper));
}

/**
 * Run preflight checks and return a structured result.
 *
 * @complexity O(1) fs checks; no traversal
 */
export function runPreflight(config: CoverageConfig): PreflightResult {
	const root = config.projectRoot;
	const checks: ReadonlyArray<readonly [boolean, PreflightIssueCode]> = [
		[isFile(path.join(root, "Cargo.toml")), "noCargoToml"],
		[isDirectory(path.resolve(root, config.sourceDir)), "missingSourceDir"],
		[helperExists(root, config.compilerWrapper), "missingCompilerWrapper"],
		[helperExists(root, config.gcovTool), "missingGcovTool"],
	];
	const issues = checks.filter(([ok]) => !ok).map(([, code]) => code);
	return { ok: issues.length === 0, issues };
}

/**
 * Human-readable remediation for an issue.
 *
 * @pure true
 */
export function describePreflightIssue(
	code: PreflightIssueCode,
	config: CoverageConfig,
): string {
	switch (code) {
		case "noCargoToml":
			return `No Cargo.toml in ${config.projectRoot}. Run covrun from the crate root or pass the project directory.`;
		case "missingSourceDir":
			return `Source directory "${config.sourceDir}" not found. Set "sourceDir" in covrun.config.json.`;
		case "missingCompilerWrapper":
			return `Compiler wrapper ${config.compilerWrapper} not found. Set "compilerWrapper" in covrun.config.json.`;
		case "missingGcovTool":
			return `gcov tool ${config.gcovTool} not found. Set "gcovTool" in covrun.config.json.`;
	}
}

/**
 * Run preflight and print every issue. Returns the result for the caller to decide.
 */
export function checkAndReportPreflight(config: CoverageConfig): PreflightResult {
	const result = runPreflight(config);
	if (!result.ok) {
		console.error("\n❌ Preflight failed:\n");
		for (const code of result.issues) {
			console.error(`  • ${describePreflightIssue(code, config)}`);
		}
		console.error("");
	}
	return result;
}
