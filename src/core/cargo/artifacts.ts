// CHANGE: Resolve test binaries from cargo's JSON messages
// WHY: The executable path comes from the build tool's structured output instead of a filename glob
// SOURCE: https://doc.rust-lang.org/cargo/reference/external-tools.html#json-messages
// PURITY: CORE
// INVARIANT: Lines that are not JSON objects are ignored
// COMPLEXITY: O(n) where n = number of stdout lines

import type { TargetKind } from "../types/index.js";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

function stringArray(value: JSONValue | undefined): readonly string[] {
	if (!Array.isArray(value)) return [];
	return value.filter((v): v is string => typeof v === "string");
}

/**
 * The fields of a `compiler-artifact` message that matter for locating test binaries.
 *
 * @property executable Absolute path of the produced binary, null for libraries
 */
export interface CompilerArtifact {
	readonly targetName: string;
	readonly kinds: readonly string[];
	readonly test: boolean;
	readonly executable: string | null;
}

function parseLine(line: string): JSONValue | undefined {
	try {
		const parsed: JSONValue = JSON.parse(line);
		return parsed;
	} catch {
		return undefined;
	}
}

function toArtifact(message: JSONValue | undefined): CompilerArtifact | null {
	if (!isJSONObject(message) || message["reason"] !== "compiler-artifact") {
		return null;
	}
	const target = message["target"];
	const profile = message["profile"];
	if (!isJSONObject(target)) return null;
	const name = target["name"];
	if (typeof name !== "string") return null;
	const executable = message["executable"];
	return {
		targetName: name,
		kinds: stringArray(target["kind"]),
		test: isJSONObject(profile) && profile["test"] === true,
		executable: typeof executable === "string" ? executable : null,
	};
}

/**
 * Parse `cargo --message-format=json` stdout into compiler artifacts.
 *
 * @pure true
 */
export function parseCargoMessages(stdout: string): readonly CompilerArtifact[] {
	const artifacts: CompilerArtifact[] = [];
	for (const message of jsonLines(stdout)) {
		const artifact = toArtifact(message);
		if (artifact !== null) artifacts.push(artifact);
	}
	return artifacts;
}

function jsonLines(stdout: string): readonly JSONValue[] {
	const messages: JSONValue[] = [];
	for (const line of stdout.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (!trimmed.startsWith("{")) continue;
		const parsed = parseLine(trimmed);
		if (parsed !== undefined) messages.push(parsed);
	}
	return messages;
}

/**
 * Rendered rustc diagnostics carried by `compiler-message` lines, in order.
 *
 * With JSON output cargo moves these to stdout, so they are printed from here.
 *
 * @pure true
 */
export function renderedDiagnostics(stdout: string): readonly string[] {
	const rendered: string[] = [];
	for (const message of jsonLines(stdout)) {
		if (!isJSONObject(message) || message["reason"] !== "compiler-message") continue;
		const diagnostic = message["message"];
		if (!isJSONObject(diagnostic)) continue;
		const text = diagnostic["rendered"];
		if (typeof text === "string" && text.length > 0) rendered.push(text);
	}
	return rendered;
}

/**
 * Pick the test executable built for `target`.
 *
 * - `lib`: a test-profile artifact of kind "lib" (dependencies build without the test profile)
 * - `tests`: an artifact of kind "test" named `integrationTest`
 *
 * The last match wins, as cargo reports the final link last.
 *
 * @pure true
 * @returns Absolute executable path or null
 */
export function selectTestExecutable(
	artifacts: readonly CompilerArtifact[],
	target: TargetKind,
	integrationTest: string,
): string | null {
	const matches = artifacts.filter((a) => {
		if (a.executable === null || !a.test) return false;
		return target === "lib"
			? a.kinds.includes("lib")
			: a.kinds.includes("test") && a.targetName === integrationTest;
	});
	return matches.at(-1)?.executable ?? null;
}

/**
 * Dependency-metadata file rustc writes next to a binary.
 *
 * @pure true
 */
export const dependencyInfoPath = (executable: string): string =>
	`${executable}.d`;
