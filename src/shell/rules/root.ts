// CHANGE: Root marker discovery
// WHY: Rule inheritance stops at the nearest ancestor carrying the marker
// PURITY: SHELL
// EFFECT: Effect<string, NoRootFound>
// INVARIANT: Result is canonical and contains ROOT_MARKER_NAME
// COMPLEXITY: O(depth)

import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect } from "effect";

import { NoRootFound } from "../../core/errors.js";
import { ROOT_MARKER_NAME } from "../../core/rule/names.js";
import { pathExists } from "./loader.js";

/**
 * Canonical absolute path; a missing path has no root.
 *
 * @effect Effect<string, NoRootFound>
 */
export const canonicalPath = (start: string): Effect.Effect<string, NoRootFound> =>
	Effect.tryPromise({
		try: () => fs.realpath(start),
		catch: () => new NoRootFound({ start }),
	});

/**
 * Directories from `dir` up to the filesystem root, nearest first.
 *
 * @pure true
 */
export const ancestorsOf = (dir: string): ReadonlyArray<string> => {
	const out: string[] = [dir];
	let current = dir;
	for (;;) {
		const parent = path.dirname(current);
		if (parent === current) return out;
		out.push(parent);
		current = parent;
	}
};

export const isRootDir = (dir: string): Effect.Effect<boolean> =>
	pathExists(path.join(dir, ROOT_MARKER_NAME));

/**
 * Nearest ancestor (inclusive) holding the root marker.
 *
 * @effect Effect<string, NoRootFound>
 */
export const findRoot = (start: string): Effect.Effect<string, NoRootFound> =>
	Effect.gen(function* () {
		const dir = yield* canonicalPath(start);
		for (const candidate of ancestorsOf(dir)) {
			if (yield* isRootDir(candidate)) return candidate;
		}
		return yield* Effect.fail(new NoRootFound({ start }));
	});
