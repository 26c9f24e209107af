// CHANGE: CLI argument parsing for covrun
// WHY: With no arguments the fixed pipeline runs in the current directory; flags only override defaults
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Unknown flags and malformed values are reported, never silently ignored

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { CLIOptions } from "../../core/types/index.js";

export const HELP = `
covrun - coverage run orchestrator for Cargo projects

Usage:
  covrun [projectDir] [options]

Runs: cleanup → unit tests → capture → cargo clean → integration tests → capture
      → merge → filter to src/ → genhtml

Options:
  --config <file>     Configuration file (default: <projectDir>/covrun.config.json if present)
  --timeout <ms>      Abort a step that runs longer than <ms> milliseconds
  --no-preflight      Skip checking that cargo, lcov and genhtml are available
  -h, --help          Show this help message
`;

type ParseState = {
	readonly projectRoot: string;
	readonly configPath: string | undefined;
	readonly stepTimeoutMs: number | undefined;
	readonly noPreflight: boolean;
	readonly showHelp: boolean;
	readonly projectRootSet: boolean;
};

// CHANGE: Handlers for flags taking a value
// WHY: Lookup table instead of branching in processArgument
type ValueFlagHandler = (
	value: string,
	current: ParseState,
) => Either.Either<ParseState, string>;

const valueHandlers: ReadonlyMap<string, ValueFlagHandler> = new Map<
	string,
	ValueFlagHandler
>([
	["--config", (value, current) => Either.right({ ...current, configPath: value })],
	[
		"--timeout",
		(value, current) => {
			const ms = Number(value);
			if (!Number.isInteger(ms) || ms <= 0) {
				return Either.left(`--timeout expects a positive integer, got "${value}"`);
			}
			return Either.right({ ...current, stepTimeoutMs: ms });
		},
	],
]);

const showHelp = (current: ParseState): ParseState => ({ ...current, showHelp: true });

const booleanFlags: ReadonlyMap<string, (current: ParseState) => ParseState> = new Map([
	["--no-preflight", (current: ParseState): ParseState => ({ ...current, noPreflight: true })],
	["--help", showHelp],
	["-h", showHelp],
]);

/**
 * Parse one argument; returns the new state and how many tokens were consumed.
 */
function processArgument(
	args: readonly string[],
	index: number,
	current: ParseState,
): Either.Either<readonly [ParseState, number], string> {
	const arg = args[index] ?? "";

	const valueHandler = valueHandlers.get(arg);
	if (valueHandler !== undefined) {
		const value = args[index + 1];
		if (value === undefined) {
			return Either.left(`Missing value for ${arg}`);
		}
		return Either.map(valueHandler(value, current), (next) => [next, 2] as const);
	}

	const booleanHandler = booleanFlags.get(arg);
	if (booleanHandler !== undefined) {
		return Either.right([booleanHandler(current), 1] as const);
	}

	if (arg.startsWith("-")) {
		return Either.left(`Unknown option: ${arg}`);
	}
	if (current.projectRootSet) {
		return Either.left(`Unexpected argument: ${arg}`);
	}
	return Either.right([{ ...current, projectRoot: arg, projectRootSet: true }, 1] as const);
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Arguments without the node and script entries
 * @returns CLIOptions, or ConfigError listing the first problem
 *
 * @example
 * ```ts
 * parseCLIArgs(["../mesabox", "--timeout", "600000"]);
 * // Right({ projectRoot: "../mesabox", stepTimeoutMs: 600000, noPreflight: false, showHelp: false })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, ConfigError> {
	let state: ParseState = {
		projectRoot: ".",
		configPath: undefined,
		stepTimeoutMs: undefined,
		noPreflight: false,
		showHelp: false,
		projectRootSet: false,
	};

	let i = 0;
	while (i < args.length) {
		if ((args[i] ?? "").length === 0) {
			i += 1;
			continue;
		}
		const result = processArgument(args, i, state);
		if (Either.isLeft(result)) {
			return Either.left(new ConfigError({ issues: [result.left] }));
		}
		const [next, consumed] = result.right;
		state = next;
		i += consumed;
	}

	// exactOptionalPropertyTypes: absent fields model "not given"
	const { configPath, stepTimeoutMs } = state;
	return Either.right({
		projectRoot: state.projectRoot,
		noPreflight: state.noPreflight,
		showHelp: state.showHelp,
		...(configPath === undefined ? {} : { configPath }),
		...(stepTimeoutMs === undefined ? {} : { stepTimeoutMs }),
	});
}
