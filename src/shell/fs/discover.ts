// PURITY: SHELL (filesystem reads)
// INVARIANT: Result is sorted and duplicate-free
// COMPLEXITY: O(f) where f = entries under the targets

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";

export const HCL_EXTENSIONS: readonly string[] = [".tf", ".tfvars"];

export const isHclFile = (filePath: string): boolean =>
	HCL_EXTENSIONS.includes(path.extname(filePath));

const statPath = (target: string): Effect.Effect<fs.Stats, FSError> =>
	Effect.try({
		try: () => fs.statSync(target),
		catch: () => new FSError({ detail: "path not found", path: target }),
	});

const listDir = (dir: string): Effect.Effect<fs.Dirent[], FSError> =>
	Effect.try({
		try: () => fs.readdirSync(dir, { withFileTypes: true }),
		catch: (error) => new FSError({ detail: String(error), path: dir }),
	});

function walk(
	dir: string,
	excluded: ReadonlySet<string>,
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const found: string[] = [];
		for (const entry of yield* listDir(dir)) {
			const full = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				if (!excluded.has(entry.name)) found.push(...(yield* walk(full, excluded)));
			} else if (entry.isFile() && isHclFile(entry.name)) {
				found.push(full);
			}
		}
		return found;
	});
}

/**
 * Expands targets into the HCL files to check.
 *
 * Directories are walked recursively for `.tf` and `.tfvars` files, skipping
 * directories whose name is in excludeDirs. File targets are kept as given.
 *
 * @param targets - Files or directories
 * @param excludeDirs - Directory names never entered
 *
 * @effect Effect<readonly string[], FSError>
 * @postcondition result is sorted ascending without duplicates
 */
export function discoverFiles(
	targets: readonly string[],
	excludeDirs: readonly string[],
): Effect.Effect<readonly string[], FSError> {
	const excluded = new Set(excludeDirs);
	return Effect.gen(function* () {
		const files = new Set<string>();
		for (const target of targets) {
			const stats = yield* statPath(target);
			const found = stats.isDirectory() ? yield* walk(target, excluded) : [target];
			for (const file of found) files.add(file);
		}
		return [...files].sort();
	});
}

/**
 * Reads one source file as UTF-8.
 *
 * @effect Effect<string, FSError>
 */
export const readSource = (filePath: string): Effect.Effect<string, FSError> =>
	Effect.try({
		try: () => fs.readFileSync(filePath, "utf8"),
		catch: (error) => new FSError({ detail: String(error), path: filePath }),
	});
