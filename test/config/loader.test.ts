// CHANGE: Unit tests for configuration loading and validation
// WHY: defaults < covrun.config.json < CLI flags; malformed files never start a run

import * as path from "node:path";
import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS, defaultConfig } from "../../src/core/config/defaults.js";
import { ConfigError } from "../../src/core/errors.js";
import type { CLIOptions, CoverageConfig } from "../../src/core/types/index.js";
import {
	loadCoverageConfig,
	validateConfigDocument,
} from "../../src/shell/config/index.js";
import { createTempProject } from "../utils/tempProject.js";

const cli = (projectRoot: string, extra: Partial<CLIOptions> = {}): CLIOptions => ({
	projectRoot,
	noPreflight: false,
	showHelp: false,
	...extra,
});

const load = (
	options: CLIOptions,
): Either.Either<CoverageConfig, ConfigError> =>
	Effect.runSync(Effect.either(loadCoverageConfig(options)));

const loaded = (options: CLIOptions): CoverageConfig => {
	const result = load(options);
	if (Either.isLeft(result)) {
		throw new Error(`unexpected config error: ${result.left.issues.join("; ")}`);
	}
	return result.right;
};

const issues = (options: CLIOptions): readonly string[] => {
	const result = load(options);
	return Either.isLeft(result) ? result.left.issues : [];
};

describe("validateConfigDocument", () => {
	it("returns the defaults for an empty object", () => {
		expect(validateConfigDocument({}, "/repo")).toEqual(defaultConfig("/repo"));
	});

	it("overrides only the given fields", () => {
		const result = validateConfigDocument(
			{
				crateName: "toolbox",
				tools: { lcov: "/opt/lcov/bin/lcov" },
				stepTimeoutMs: 1000,
			},
			"/repo",
		);
		expect(result).toEqual({
			...defaultConfig("/repo"),
			crateName: "toolbox",
			tools: { ...DEFAULT_SETTINGS.tools, lcov: "/opt/lcov/bin/lcov" },
			stepTimeoutMs: 1000,
		});
	});

	it("rejects a non-object document", () => {
		const result = validateConfigDocument(["src"], "/repo");
		expect(result).toBeInstanceOf(ConfigError);
		if (result instanceof ConfigError) {
			expect(result.issues).toEqual(["configuration must be a JSON object"]);
		}
	});

	it("collects every problem", () => {
		const result = validateConfigDocument(
			{
				crateName: "",
				instrumentationFlags: ["-Zprofile", 3],
				tools: { gcc: "gcc" },
				stepTimeoutMs: -1,
				extra: true,
			},
			"/repo",
		);
		expect(result).toBeInstanceOf(ConfigError);
		if (result instanceof ConfigError) {
			expect(result.issues).toEqual([
				"unknown key extra",
				"crateName must be a non-empty string",
				"instrumentationFlags must be an array of strings",
				"unknown key tools.gcc",
				"stepTimeoutMs must be a positive integer",
			]);
		}
	});
});

describe("loadCoverageConfig", () => {
	it("uses defaults when no configuration file exists", () => {
		const t = createTempProject({ withCargoToml: true });
		try {
			expect(loaded(cli(t.cwd))).toEqual(defaultConfig(t.cwd));
		} finally {
			t.cleanup();
		}
	});

	it("reads covrun.config.json from the project root", () => {
		const t = createTempProject({
			files: { "covrun.config.json": JSON.stringify({ reportDir: "out/cov" }) },
		});
		try {
			expect(loaded(cli(t.cwd))).toEqual({ ...defaultConfig(t.cwd), reportDir: "out/cov" });
		} finally {
			t.cleanup();
		}
	});

	it("lets --timeout override the file", () => {
		const t = createTempProject({
			files: { "covrun.config.json": JSON.stringify({ stepTimeoutMs: 1000 }) },
		});
		try {
			expect(loaded(cli(t.cwd, { stepTimeoutMs: 50 })).stepTimeoutMs).toBe(50);
		} finally {
			t.cleanup();
		}
	});

	it("reads an explicit --config file", () => {
		const t = createTempProject({
			files: { "ci/cov.json": JSON.stringify({ integrationTest: "it" }) },
		});
		try {
			const config = loaded(cli(t.cwd, { configPath: path.join(t.cwd, "ci/cov.json") }));
			expect(config.integrationTest).toBe("it");
		} finally {
			t.cleanup();
		}
	});

	it("fails when an explicit --config file is missing", () => {
		const t = createTempProject();
		try {
			const missing = path.join(t.cwd, "absent.json");
			const found = issues(cli(t.cwd, { configPath: missing }));
			expect(found).toHaveLength(1);
			expect(found[0]?.startsWith(`cannot read ${missing}: `)).toBe(true);
		} finally {
			t.cleanup();
		}
	});

	it("prefixes validation issues with the file path", () => {
		const t = createTempProject({
			files: { "covrun.config.json": JSON.stringify({ sourceDir: 1 }) },
		});
		try {
			const file = path.join(t.cwd, "covrun.config.json");
			expect(issues(cli(t.cwd))).toEqual([`${file}: sourceDir must be a non-empty string`]);
		} finally {
			t.cleanup();
		}
	});

	it("fails for a missing project directory", () => {
		const t = createTempProject();
		const gone = path.join(t.cwd, "nope");
		try {
			expect(issues(cli(gone))).toEqual([`project directory not found: ${gone}`]);
		} finally {
			t.cleanup();
		}
	});
});
