// CHANGE: Filesystem side of the coverage run (stale artifacts, source listing, report checks)
// WHY: Keep fs access in the shell; every failure becomes a typed FSError
// PURITY: SHELL (file system I/O)
// EFFECT: Effect<T, FSError>

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { FSError } from "../../core/errors.js";

const fsError = (target: string) => (error: unknown): FSError =>
	new FSError({
		path: target,
		detail: error instanceof Error ? error.message : String(error),
	});

/**
 * Remove files directly inside `dir` whose name ends with one of `extensions`.
 * Absent files are not an error.
 *
 * @returns Names of the removed entries, sorted
 * @invariant only the top level of dir is inspected
 */
export function removeStaleArtifacts(
	dir: string,
	extensions: readonly string[],
): Effect.Effect<readonly string[], FSError> {
	return Effect.try({
		try: () => {
			const removed = fs
				.readdirSync(dir)
				.filter((name) => extensions.some((ext) => name.endsWith(ext)))
				.sort();
			for (const name of removed) {
				fs.rmSync(path.join(dir, name), { recursive: true, force: true });
			}
			return removed;
		},
		catch: fsError(dir),
	});
}

/**
 * Remove a single file if it exists.
 *
 * @returns true when a file was removed
 */
export function removeIfExists(file: string): Effect.Effect<boolean, FSError> {
	return Effect.try({
		try: () => {
			if (!fs.existsSync(file)) return false;
			fs.rmSync(file, { force: true });
			return true;
		},
		catch: fsError(file),
	});
}

function walk(dir: string, extension: string, out: string[]): void {
	for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
		const full = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			walk(full, extension, out);
		} else if (entry.isFile() && entry.name.endsWith(extension)) {
			out.push(full);
		}
	}
}

/**
 * Every file below `root` with the given extension, as absolute sorted paths.
 *
 * @complexity O(n) where n = number of entries under root
 */
export function listSourceFiles(
	root: string,
	extension: string,
): Effect.Effect<readonly string[], FSError> {
	return Effect.try({
		try: () => {
			const files: string[] = [];
			walk(root, extension, files);
			return files.sort();
		},
		catch: fsError(root),
	});
}

/**
 * Absolute path of a directory with every symlink resolved.
 * lcov records SF paths as the compiler saw them, which is the physical path.
 */
export function resolveRealPath(target: string): Effect.Effect<string, FSError> {
	return Effect.try({
		try: () => fs.realpathSync(target),
		catch: fsError(target),
	});
}

export function readTextFile(file: string): Effect.Effect<string, FSError> {
	return Effect.try({
		try: () => fs.readFileSync(file, "utf8"),
		catch: fsError(file),
	});
}

/**
 * True when `dir` exists, is a directory and has at least one entry.
 */
export function isNonEmptyDirectory(dir: string): Effect.Effect<boolean> {
	return Effect.sync(() => {
		try {
			return fs.statSync(dir).isDirectory() && fs.readdirSync(dir).length > 0;
		} catch {
			return false;
		}
	});
}
