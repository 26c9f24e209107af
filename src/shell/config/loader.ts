// CHANGE: Load covrun.config.json and merge it over the defaults
// WHY: Every fixed value of the pipeline can be overridden per project without code changes
// PURITY: SHELL (reads the configuration file)
// EFFECT: Effect<CoverageConfig, ConfigError>
// INVARIANT: defaults < config file < CLI flags; unknown keys and wrong types are rejected

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import {
	CONFIG_FILE_NAME,
	DEFAULT_SETTINGS,
} from "../../core/config/defaults.js";
import { ConfigError } from "../../core/errors.js";
import type {
	CLIOptions,
	CoverageConfig,
	ToolPaths,
} from "../../core/types/index.js";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Type guard to check if value is a JSON object.
 */
function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

const STRING_KEYS = [
	"crateName",
	"integrationTest",
	"compilerWrapper",
	"gcovTool",
	"excludeLinePattern",
	"sourceDir",
	"sourceExtension",
	"reportDir",
] as const;

type StringKey = (typeof STRING_KEYS)[number];

const TOOL_KEYS = ["cargo", "lcov", "genhtml"] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>([
	...STRING_KEYS,
	"instrumentationFlags",
	"tools",
	"stepTimeoutMs",
]);

/**
 * Collects validation issues while reading fields of one JSON object.
 */
class FieldReader {
	readonly issues: string[] = [];

	constructor(
		private readonly source: JSONObject,
		private readonly prefix: string,
	) {}

	string(key: string): string | undefined {
		const value = this.source[key];
		if (value === undefined) return undefined;
		if (typeof value !== "string" || value.length === 0) {
			this.issues.push(`${this.prefix}${key} must be a non-empty string`);
			return undefined;
		}
		return value;
	}

	stringArray(key: string): readonly string[] | undefined {
		const value = this.source[key];
		if (value === undefined) return undefined;
		if (!Array.isArray(value)) {
			this.issues.push(`${this.prefix}${key} must be an array of strings`);
			return undefined;
		}
		const strings = value.filter((v): v is string => typeof v === "string");
		if (strings.length !== value.length) {
			this.issues.push(`${this.prefix}${key} must be an array of strings`);
			return undefined;
		}
		return strings;
	}

	positiveInteger(key: string): number | undefined {
		const value = this.source[key];
		if (value === undefined) return undefined;
		if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
			this.issues.push(`${this.prefix}${key} must be a positive integer`);
			return undefined;
		}
		return value;
	}

	object(key: string): JSONObject | undefined {
		const value = this.source[key];
		if (value === undefined) return undefined;
		if (!isJSONObject(value)) {
			this.issues.push(`${this.prefix}${key} must be an object`);
			return undefined;
		}
		return value;
	}

	rejectUnknown(known: ReadonlySet<string>): void {
		for (const key of Object.keys(this.source)) {
			if (!known.has(key)) this.issues.push(`unknown key ${this.prefix}${key}`);
		}
	}
}

function readTools(reader: FieldReader): ToolPaths {
	const tools = reader.object("tools");
	if (tools === undefined) return DEFAULT_SETTINGS.tools;
	const toolReader = new FieldReader(tools, "tools.");
	toolReader.rejectUnknown(new Set<string>(TOOL_KEYS));
	const result: ToolPaths = {
		cargo: toolReader.string("cargo") ?? DEFAULT_SETTINGS.tools.cargo,
		lcov: toolReader.string("lcov") ?? DEFAULT_SETTINGS.tools.lcov,
		genhtml: toolReader.string("genhtml") ?? DEFAULT_SETTINGS.tools.genhtml,
	};
	reader.issues.push(...toolReader.issues);
	return result;
}

/**
 * Validate a parsed configuration document and merge it over the defaults.
 *
 * @pure true
 * @returns CoverageConfig, or the list of problems found
 */
export function validateConfigDocument(
	document: JSONValue,
	projectRoot: string,
): CoverageConfig | ConfigError {
	if (!isJSONObject(document)) {
		return new ConfigError({ issues: ["configuration must be a JSON object"] });
	}
	const reader = new FieldReader(document, "");
	reader.rejectUnknown(KNOWN_KEYS);

	const text = (key: StringKey): string =>
		reader.string(key) ?? DEFAULT_SETTINGS[key];
	const settings = {
		crateName: text("crateName"),
		integrationTest: text("integrationTest"),
		compilerWrapper: text("compilerWrapper"),
		gcovTool: text("gcovTool"),
		excludeLinePattern: text("excludeLinePattern"),
		sourceDir: text("sourceDir"),
		sourceExtension: text("sourceExtension"),
		reportDir: text("reportDir"),
	} satisfies Record<StringKey, string>;
	const instrumentationFlags =
		reader.stringArray("instrumentationFlags") ??
		DEFAULT_SETTINGS.instrumentationFlags;
	const tools = readTools(reader);
	const stepTimeoutMs = reader.positiveInteger("stepTimeoutMs");

	if (reader.issues.length > 0) {
		return new ConfigError({ issues: reader.issues });
	}
	return {
		projectRoot,
		...settings,
		instrumentationFlags,
		tools,
		...(stepTimeoutMs === undefined ? {} : { stepTimeoutMs }),
	};
}

function readDocument(file: string): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: () => {
			const parsed: JSONValue = JSON.parse(fs.readFileSync(file, "utf8"));
			return parsed;
		},
		catch: (error) =>
			new ConfigError({
				issues: [
					`cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
				],
			}),
	});
}

/**
 * Загружает конфигурацию covrun.
 *
 * - `--config <file>`: the file must exist
 * - otherwise `<projectRoot>/covrun.config.json` is used when present
 * - `--timeout` overrides stepTimeoutMs from the file
 *
 * @effect Effect<CoverageConfig, ConfigError>
 */
export function loadCoverageConfig(
	options: CLIOptions,
): Effect.Effect<CoverageConfig, ConfigError> {
	return Effect.gen(function* () {
		const projectRoot = path.resolve(options.projectRoot);
		if (!fs.existsSync(projectRoot) || !fs.statSync(projectRoot).isDirectory()) {
			return yield* Effect.fail(
				new ConfigError({ issues: [`project directory not found: ${projectRoot}`] }),
			);
		}

		const configPath =
			options.configPath === undefined
				? path.join(projectRoot, CONFIG_FILE_NAME)
				: path.resolve(options.configPath);
		const useFile = options.configPath !== undefined || fs.existsSync(configPath);

		const document: JSONValue = useFile ? yield* readDocument(configPath) : {};
		const validated = validateConfigDocument(document, projectRoot);
		if (validated instanceof ConfigError) {
			return yield* Effect.fail(
				new ConfigError({
					issues: validated.issues.map((issue) => `${configPath}: ${issue}`),
				}),
			);
		}

		return options.stepTimeoutMs === undefined
			? validated
			: { ...validated, stepTimeoutMs: options.stepTimeoutMs };
	});
}
