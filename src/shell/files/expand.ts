// CHANGE: Expansion of input paths into validation targets
// WHY: Directories are walked once, honoring the root's extension and directory filters
// PURITY: SHELL
// EFFECT: Effect<Expansion>
// INVARIANT: Symlinks met during a walk are neither followed nor returned
// INVARIANT: Configuration files are never targets
// COMPLEXITY: O(|tree|)

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect, pipe } from "effect";

import { FileReadError } from "../../core/errors.js";
import {
	defaultRootConfig,
	shouldExcludeDir,
	shouldIncludeExtension,
} from "../../core/filter/filters.js";
import { isConfigFileName, ROOT_MARKER_NAME } from "../../core/rule/names.js";
import type { RootConfig } from "../../core/types/index.js";
import { loadRootConfig } from "../rules/loader.js";
import { findRoot } from "../rules/root.js";

/**
 * Files to validate plus directories that could not be listed.
 */
export interface Expansion {
	readonly files: ReadonlyArray<string>;
	readonly errors: ReadonlyArray<FileReadError>;
}

type Kind = "file" | "dir" | "missing";

const kindOf = (target: string): Effect.Effect<Kind> =>
	Effect.promise(() =>
		fs.stat(target).then(
			(s): Kind => (s.isFile() ? "file" : s.isDirectory() ? "dir" : "missing"),
			(): Kind => "missing",
		),
	);

const isTarget = (config: RootConfig, file: string): boolean =>
	!isConfigFileName(path.basename(file)) &&
	shouldIncludeExtension(config, file);

const listDir = (
	dir: string,
): Effect.Effect<ReadonlyArray<Dirent>, FileReadError> =>
	Effect.tryPromise({
		try: () => fs.readdir(dir, { withFileTypes: true }),
		catch: (e) =>
			new FileReadError({
				path: dir,
				detail: e instanceof Error ? e.message : String(e),
			}),
	});

/**
 * Depth-first walk in name order.
 *
 * @effect Effect<Expansion>
 */
const walk = (dir: string, config: RootConfig): Effect.Effect<Expansion> =>
	pipe(
		listDir(dir),
		Effect.flatMap((entries) =>
			Effect.gen(function* () {
				const files: string[] = [];
				const errors: FileReadError[] = [];
				const sorted = [...entries].sort((a, b) =>
					a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
				);
				for (const entry of sorted) {
					const full = path.join(dir, entry.name);
					if (entry.isDirectory()) {
						if (shouldExcludeDir(config, entry.name)) continue;
						const sub = yield* walk(full, config);
						files.push(...sub.files);
						errors.push(...sub.errors);
					} else if (entry.isFile() && isTarget(config, full)) {
						files.push(full);
					}
				}
				return { files, errors };
			}),
		),
		Effect.catchAll((error) => Effect.succeed({ files: [], errors: [error] })),
	);

/**
 * Expands files and directories into target files, in argument order.
 *
 * @effect Effect<Expansion>
 * @postcondition missing paths and excluded directory arguments contribute nothing
 */
export const expandPaths = (
	paths: ReadonlyArray<string>,
	config: RootConfig,
): Effect.Effect<Expansion> =>
	Effect.gen(function* () {
		const files: string[] = [];
		const errors: FileReadError[] = [];
		for (const target of paths) {
			const kind = yield* kindOf(target);
			if (kind === "file") {
				if (isTarget(config, target)) files.push(target);
			} else if (
				kind === "dir" &&
				!shouldExcludeDir(config, path.basename(path.resolve(target)))
			) {
				const sub = yield* walk(target, config);
				files.push(...sub.files);
				errors.push(...sub.errors);
			}
		}
		return { files, errors };
	});

/**
 * RootConfig of the first path whose root can be found; defaults otherwise.
 *
 * @effect Effect<RootConfig>
 */
export const rootConfigForPaths = (
	paths: ReadonlyArray<string>,
): Effect.Effect<RootConfig> =>
	Effect.gen(function* () {
		for (const target of paths) {
			const kind = yield* kindOf(target);
			const dir = kind === "file" ? path.dirname(target) : target;
			const config = yield* pipe(
				findRoot(dir),
				Effect.flatMap((root) =>
					loadRootConfig(path.join(root, ROOT_MARKER_NAME)),
				),
				Effect.option,
			);
			if (config._tag === "Some") return config.value;
		}
		return defaultRootConfig;
	});
