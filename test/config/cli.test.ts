// CHANGE: Unit tests for CLI argument parsing
// WHY: Flags and the positional project directory are parsed deterministically; bad input is a ConfigError

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../src/core/types/index.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 *
 * Invariants:
 * - Always restore original argv to avoid cross-test contamination.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

function parsed(args: readonly string[]): CLIOptions {
	const result = parseCLIArgs(args);
	if (Either.isLeft(result)) {
		throw new Error(`unexpected parse failure: ${result.left.issues.join("; ")}`);
	}
	return result.right;
}

function issuesOf(args: readonly string[]): readonly string[] {
	const result = parseCLIArgs(args);
	return Either.isLeft(result) ? result.left.issues : [];
}

describe("parseCLIArgs: defaults and positional", () => {
	it("returns defaults when no args provided", (): void => {
		const result = withArgv([], () => parseCLIArgs());
		expect(Either.getOrNull(result)).toEqual({
			projectRoot: ".",
			noPreflight: false,
			showHelp: false,
		});
	});

	it("parses single positional as projectRoot", (): void => {
		expect(parsed(["../mesabox"]).projectRoot).toBe("../mesabox");
	});

	it("ignores empty string arguments", (): void => {
		expect(parsed(["", "crate"]).projectRoot).toBe("crate");
	});

	it("omits configPath and stepTimeoutMs when not given", (): void => {
		const opts = parsed(["crate"]);
		expect("configPath" in opts).toBe(false);
		expect("stepTimeoutMs" in opts).toBe(false);
	});
});

describe("parseCLIArgs: flags", () => {
	it("--config sets configPath", (): void => {
		expect(parsed(["--config", "cov.json"]).configPath).toBe("cov.json");
	});

	it("--timeout sets stepTimeoutMs", (): void => {
		expect(parsed(["--timeout", "600000"]).stepTimeoutMs).toBe(600000);
	});

	it("--no-preflight and --help are boolean", (): void => {
		const opts = parsed(["--no-preflight", "--help"]);
		expect(opts.noPreflight).toBe(true);
		expect(opts.showHelp).toBe(true);
		expect(parsed(["-h"]).showHelp).toBe(true);
	});

	it("accepts flags on both sides of the positional", (): void => {
		expect(parsed(["--timeout", "5", "crate", "--config", "c.json"])).toEqual({
			projectRoot: "crate",
			noPreflight: false,
			showHelp: false,
			configPath: "c.json",
			stepTimeoutMs: 5,
		});
	});
});

describe("parseCLIArgs: errors", () => {
	it("rejects unknown options", (): void => {
		expect(issuesOf(["--verbose"])).toEqual(["Unknown option: --verbose"]);
	});

	it("rejects a second positional", (): void => {
		expect(issuesOf(["a", "b"])).toEqual(["Unexpected argument: b"]);
	});

	it("rejects a flag without its value", (): void => {
		expect(issuesOf(["--config"])).toEqual(["Missing value for --config"]);
	});

	it.each(["0", "-5", "1.5", "soon"])("rejects --timeout %s", (value): void => {
		expect(issuesOf(["--timeout", value])).toEqual([
			`--timeout expects a positive integer, got "${value}"`,
		]);
	});
});
