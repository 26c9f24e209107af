// CHANGE: In-process stand-in for cargo, the test binaries, lcov and genhtml
// WHY: Pipeline tests verify ordering, fail-fast and artifacts without spawning real tools
// INVARIANT: Every call is recorded in order; files are written where the real tool would write them

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect, Either, Layer } from "effect";

import { SpawnFailed } from "../../src/core/errors.js";
import type {
	CommandResult,
	CommandSpec,
	TargetKind,
} from "../../src/core/types/index.js";
import {
	CommandRunner,
	type CommandRunnerService,
} from "../../src/shell/process/runner.js";

export type FakeResponse = CommandResult | SpawnFailed | "hang";

export interface FakeRunner {
	readonly calls: CommandSpec[];
	readonly layer: Layer.Layer<CommandRunner>;
}

const ok: CommandResult = { exitCode: 0, stdout: "" };

/**
 * Runner recording every spec and answering with `respond`.
 * "hang" never completes, so only interruption ends the call.
 */
export function createFakeRunner(
	respond: (spec: CommandSpec) => FakeResponse,
): FakeRunner {
	const calls: CommandSpec[] = [];
	const service: CommandRunnerService = {
		run: (spec) =>
			Effect.suspend((): Effect.Effect<CommandResult, SpawnFailed> => {
				calls.push(spec);
				const response = respond(spec);
				if (response === "hang") return Effect.never;
				if (response instanceof SpawnFailed) return Effect.fail(response);
				return Effect.succeed(response);
			}),
	};
	return { calls, layer: Layer.succeed(CommandRunner, service) };
}

/**
 * Run a step against a fake runner and return its outcome as a value.
 */
export function runEither<A, E>(
	effect: Effect.Effect<A, E, CommandRunner>,
	layer: Layer.Layer<CommandRunner>,
): Promise<Either.Either<A, E>> {
	return Effect.runPromise(Effect.either(Effect.provide(effect, layer)));
}

/**
 * Unwrap the error of a failed step, asserting its tag.
 */
export function failureOf<A, E extends { readonly _tag: string }, T extends E["_tag"]>(
	result: Either.Either<A, E>,
	tag: T,
): Extract<E, { readonly _tag: T }> {
	if (Either.isRight(result)) {
		throw new Error(`expected ${tag}, step succeeded`);
	}
	const error = result.left;
	if (!isTagged(error, tag)) {
		throw new Error(`expected ${tag}, got ${error._tag}`);
	}
	return error;
}

function isTagged<E extends { readonly _tag: string }, T extends E["_tag"]>(
	error: E,
	tag: T,
): error is Extract<E, { readonly _tag: T }> {
	return error._tag === tag;
}

export type FailurePoint =
	| "clean"
	| "build:lib"
	| "build:tests"
	| "capture"
	| "merge"
	| "extract"
	| "genhtml";

export interface ToolchainOptions {
	readonly testExitCodes?: Partial<Record<TargetKind, number>>;
	readonly failures?: Partial<Record<FailurePoint, number>>;
	readonly hangOn?: FailurePoint;
	readonly emptyReport?: boolean;
	readonly missingExecutable?: boolean;
}

export interface Toolchain {
	readonly respond: (spec: CommandSpec) => FakeResponse;
	/** Test binaries that still had their .d file next to them when executed. */
	readonly dFilePresentAtRun: string[];
}

export const LIB_EXECUTABLE = "target/debug/deps/mesabox-1a2b3c4d";
export const TESTS_EXECUTABLE = "target/debug/deps/tests-5e6f7a8b";
export const STD_SOURCE = "/rustc/0123abcd/library/core/src/option.rs";

function argAfter(args: readonly string[], flag: string): string {
	const index = args.indexOf(flag);
	const value = index < 0 ? undefined : args[index + 1];
	if (value === undefined) throw new Error(`fake toolchain: no value for ${flag}`);
	return value;
}

/**
 * Tracefile the fake lcov captures for a phase: project records plus one std record.
 */
export function captureContent(root: string, output: string): string {
	const src = path.join(root, "src");
	if (output === "mesabox.info") {
		return [
			"TN:",
			`SF:${path.join(src, "lib.rs")}`,
			"DA:1,1",
			"DA:2,0",
			"BRDA:2,0,0,1",
			"BRDA:2,0,1,-",
			"end_of_record",
			`SF:${STD_SOURCE}`,
			"DA:10,3",
			"end_of_record",
			"",
		].join("\n");
	}
	return [
		"TN:",
		`SF:${path.join(src, "posix", "mod.rs")}`,
		"DA:5,1",
		"DA:6,1",
		"end_of_record",
		"",
	].join("\n");
}

export const COMPILE_ERROR =
	"error[E0308]: mismatched types\n --> src/lib.rs:1:26\n  |\n1 | pub fn answer() -> u32 { \"42\" }\n  |                          ^^^^ expected `u32`, found `&str`\n\n";

function compilerMessage(rendered: string): string {
	return `${JSON.stringify({
		reason: "compiler-message",
		package_id: "mesabox 0.1.0",
		message: { level: "error", message: "mismatched types", rendered },
	})}\n${JSON.stringify({ reason: "build-finished", success: false })}\n`;
}

function cargoMessages(target: TargetKind, executable: string | null): string {
	const messages = [
		{
			reason: "compiler-artifact",
			target: { kind: ["lib"], name: "libc" },
			profile: { test: false },
			executable: null,
		},
		{
			reason: "compiler-artifact",
			target: {
				kind: target === "lib" ? ["lib"] : ["test"],
				name: target === "lib" ? "mesabox" : "tests",
			},
			profile: { test: true },
			executable,
		},
		{ reason: "build-finished", success: true },
	];
	return `${messages.map((m) => JSON.stringify(m)).join("\n")}\n`;
}

/**
 * Extract keeps the records whose SF is one of the listed files, like lcov does.
 */
function extractRecords(content: string, keep: ReadonlySet<string>): string {
	return content
		.split("end_of_record")
		.map((block) => block.trim())
		.filter((block) => {
			const sf = block.split("\n").find((line) => line.startsWith("SF:"));
			return sf !== undefined && keep.has(sf.slice(3));
		})
		.map((block) => `${block}\nend_of_record\n`)
		.join("");
}

export function createToolchain(
	root: string,
	options: ToolchainOptions = {},
): Toolchain {
	const dFilePresentAtRun: string[] = [];
	const failures = options.failures ?? {};
	const out = (spec: CommandSpec): string =>
		path.resolve(spec.cwd, argAfter(spec.args, "-o"));
	const fail = (point: FailurePoint): CommandResult | "hang" | null => {
		if (options.hangOn === point) return "hang";
		const code = failures[point];
		return code === undefined ? null : { exitCode: code, stdout: "" };
	};

	const cargo = (spec: CommandSpec): FakeResponse => {
		if (spec.args[0] === "clean") {
			const failure = fail("clean");
			if (failure !== null) return failure;
			fs.rmSync(path.join(root, "target"), { recursive: true, force: true });
			return ok;
		}
		const target: TargetKind = spec.args.includes("--lib") ? "lib" : "tests";
		const failure = fail(target === "lib" ? "build:lib" : "build:tests");
		if (failure === "hang") return failure;
		if (failure !== null) {
			return { exitCode: failure.exitCode, stdout: compilerMessage(COMPILE_ERROR) };
		}
		if (options.missingExecutable === true) {
			return { exitCode: 0, stdout: cargoMessages(target, null) };
		}
		const executable = path.join(
			root,
			target === "lib" ? LIB_EXECUTABLE : TESTS_EXECUTABLE,
		);
		fs.mkdirSync(path.dirname(executable), { recursive: true });
		fs.writeFileSync(executable, "binary");
		fs.writeFileSync(`${executable}.d`, `${executable}: src/lib.rs\n`);
		return { exitCode: 0, stdout: cargoMessages(target, executable) };
	};

	const testBinary = (spec: CommandSpec): FakeResponse => {
		if (fs.existsSync(`${spec.command}.d`)) dFilePresentAtRun.push(spec.command);
		const target: TargetKind = path.basename(spec.command).startsWith("mesabox")
			? "lib"
			: "tests";
		return { exitCode: options.testExitCodes?.[target] ?? 0, stdout: "" };
	};

	const lcov = (spec: CommandSpec): FakeResponse => {
		const output = out(spec);
		if (spec.args.includes("--capture")) {
			const failure = fail("capture");
			if (failure !== null) return failure;
			fs.writeFileSync(output, captureContent(root, path.basename(output)));
			return ok;
		}
		if (spec.args.includes("--add-tracefile")) {
			const failure = fail("merge");
			if (failure !== null) return failure;
			const inputs = spec.args
				.filter((_, i) => spec.args[i - 1] === "--add-tracefile")
				.map((input) => fs.readFileSync(path.resolve(spec.cwd, input), "utf8"));
			fs.writeFileSync(output, inputs.join(""));
			return ok;
		}
		const failure = fail("extract");
		if (failure !== null) return failure;
		const input = argAfter(spec.args, "--extract");
		const start = spec.args.indexOf("--extract") + 2;
		const files = new Set(spec.args.slice(start, spec.args.indexOf("-o")));
		const content = fs.readFileSync(path.resolve(spec.cwd, input), "utf8");
		fs.writeFileSync(output, extractRecords(content, files));
		return ok;
	};

	const genhtml = (spec: CommandSpec): FakeResponse => {
		const failure = fail("genhtml");
		if (failure !== null) return failure;
		const dir = out(spec);
		fs.mkdirSync(dir, { recursive: true });
		if (options.emptyReport !== true) {
			fs.writeFileSync(path.join(dir, "index.html"), "<html></html>");
		}
		return ok;
	};

	const respond = (spec: CommandSpec): FakeResponse => {
		if (spec.args.includes("--version")) return ok;
		if (spec.command === "cargo") return cargo(spec);
		if (spec.command === "lcov") return lcov(spec);
		if (spec.command === "genhtml") return genhtml(spec);
		if (spec.command.startsWith(path.join(root, "target"))) return testBinary(spec);
		return new SpawnFailed({ command: spec.command, detail: "spawn ENOENT" });
	};

	return { respond, dFilePresentAtRun };
}

/**
 * Compact label of a recorded call, e.g. "cargo rustc --lib", "lcov --capture mesabox.info".
 */
export function label(spec: CommandSpec, root: string): string {
	if (spec.args.includes("--version")) return `${spec.command} --version`;
	if (spec.command === "cargo") {
		if (spec.args[0] === "clean") return "cargo clean";
		return spec.args.includes("--lib") ? "cargo rustc --lib" : "cargo rustc --test";
	}
	if (spec.command === "lcov") {
		const output = argAfter(spec.args, "-o");
		if (spec.args.includes("--capture")) return `lcov --capture ${output}`;
		if (spec.args.includes("--add-tracefile")) return `lcov --add-tracefile ${output}`;
		return `lcov --extract ${output}`;
	}
	if (spec.command === "genhtml") return "genhtml";
	return path.relative(root, spec.command);
}
