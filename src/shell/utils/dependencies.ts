// CHANGE: Dependency checker for the external tools of the coverage run
// WHY: Verify cargo, lcov and genhtml are runnable before cleaning anything
// PURITY: SHELL (spawns `<tool> --version`)
// EFFECT: Effect<DependencyCheckResult, never, CommandRunner>

import { Effect, Either } from "effect";

import type { CoverageConfig } from "../../core/types/index.js";
import { CommandRunner } from "../process/runner.js";

/**
 * Информация о зависимости.
 */
export interface Dependency {
	readonly name: string;
	readonly command: string;
	readonly installCommand: string;
}

/**
 * External tools of a run, with the executables configured for it.
 */
export function requiredDependencies(
	config: CoverageConfig,
): readonly Dependency[] {
	return [
		{
			name: "Cargo",
			command: config.tools.cargo,
			installCommand: "Visit https://rustup.rs/ (a nightly toolchain is needed for -Zprofile)",
		},
		{
			name: "lcov",
			command: config.tools.lcov,
			installCommand: "apt install lcov / brew install lcov",
		},
		{
			name: "genhtml",
			command: config.tools.genhtml,
			installCommand: "ships with lcov",
		},
	];
}

/**
 * Результат проверки зависимостей.
 */
export interface DependencyCheckResult {
	readonly allAvailable: boolean;
	readonly missing: readonly Dependency[];
}

/**
 * Проверяет доступность команды.
 *
 * @returns True when `<command> --version` starts and exits with 0
 */
function isCommandAvailable(
	config: CoverageConfig,
	command: string,
): Effect.Effect<boolean, never, CommandRunner> {
	return Effect.gen(function* () {
		const runner = yield* CommandRunner;
		const result = yield* Effect.either(
			runner.run({
				command,
				args: ["--version"],
				cwd: config.projectRoot,
				env: {},
				captureStdout: true,
			}),
		);
		return Either.isRight(result) && result.right.exitCode === 0;
	});
}

/**
 * Проверяет наличие всех необходимых зависимостей.
 */
export function checkDependencies(
	config: CoverageConfig,
): Effect.Effect<DependencyCheckResult, never, CommandRunner> {
	return Effect.gen(function* () {
		const missing: Dependency[] = [];
		for (const dep of requiredDependencies(config)) {
			if (!(yield* isCommandAvailable(config, dep.command))) {
				missing.push(dep);
			}
		}
		return { allAvailable: missing.length === 0, missing };
	});
}

/**
 * Выводит информацию о недостающих зависимостях.
 */
export function reportMissingDependencies(
	missing: readonly Dependency[],
): void {
	console.error("\n❌ Missing required tools:\n");

	for (const dep of missing) {
		console.error(`  • ${dep.name} (${dep.command})`);
		console.error(`    Check: ${dep.command} --version`);
		console.error(`    Install: ${dep.installCommand}\n`);
	}

	console.error("Please install the missing tools and try again.\n");
}
