// CHANGE: Tests for input path expansion
// INVARIANT: Walk order is name order; symlinks and config files are never targets
// PURITY: SHELL (temporary directories)

import * as fs from "node:fs";

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { defaultRootConfig } from "../../../src/core/filter/filters.js";
import {
	expandPaths,
	rootConfigForPaths,
} from "../../../src/shell/files/expand.js";
import { createTempTree, type TempTree } from "../../utils/tempTree.js";

let tree: TempTree | undefined;

afterEach(() => {
	tree?.cleanup();
	tree = undefined;
});

const setup = (): TempTree => {
	tree = createTempTree({
		".cascade-lint-root.yaml": "exclude_dirs: [build]\n",
		".cascade-lint.yaml": "",
		"src/b.kt": "",
		"src/a.kt": "",
		"src/notes.txt": "",
		"src/.git/config": "",
		"build/out.kt": "",
		"lib/build/gen.kt": "",
	});
	return tree;
};

const kotlinOnly = {
	includeExtensions: new Set([".kt"]),
	excludeDirs: new Set(["build"]),
};

describe("expandPaths", () => {
	it("walks directories in name order, skipping excluded names", async () => {
		const t = setup();
		const result = await Effect.runPromise(
			expandPaths([t.root], { ...defaultRootConfig, excludeDirs: new Set(["build"]) }),
		);
		expect(result.files).toEqual([
			t.path("src", "a.kt"),
			t.path("src", "b.kt"),
			t.path("src", "notes.txt"),
		]);
		expect(result.errors).toEqual([]);
	});

	it("applies the extension gate", async () => {
		const t = setup();
		const result = await Effect.runPromise(expandPaths([t.path("src")], kotlinOnly));
		expect(result.files).toEqual([t.path("src", "a.kt"), t.path("src", "b.kt")]);
	});

	it("keeps argument order and ignores config files and missing paths", async () => {
		const t = setup();
		const result = await Effect.runPromise(
			expandPaths(
				[
					t.path("src", "b.kt"),
					t.path(".cascade-lint.yaml"),
					t.path("missing.kt"),
					t.path("src", "a.kt"),
				],
				defaultRootConfig,
			),
		);
		expect(result.files).toEqual([t.path("src", "b.kt"), t.path("src", "a.kt")]);
	});

	it("applies directory exclusions to directory arguments", async () => {
		const t = setup();
		const result = await Effect.runPromise(
			expandPaths([t.path("build"), t.path("src", ".git"), t.path("src")], kotlinOnly),
		);
		expect(result.files).toEqual([t.path("src", "a.kt"), t.path("src", "b.kt")]);
	});

	it("does not follow symlinks during a walk", async () => {
		const t = setup();
		fs.symlinkSync(t.path("src", "a.kt"), t.path("src", "link.kt"));
		fs.symlinkSync(t.path("lib"), t.path("src", "linked-dir"));
		const result = await Effect.runPromise(
			expandPaths([t.path("src")], kotlinOnly),
		);
		expect(result.files).toEqual([t.path("src", "a.kt"), t.path("src", "b.kt")]);
	});
});

describe("rootConfigForPaths", () => {
	it("loads the marker of the first resolvable path", async () => {
		const t = setup();
		const config = await Effect.runPromise(
			rootConfigForPaths([t.path("missing"), t.path("src", "a.kt")]),
		);
		expect([...config.excludeDirs]).toEqual(["build"]);
	});

	it("falls back to defaults without a root", async () => {
		const t = setup();
		fs.rmSync(t.path(".cascade-lint-root.yaml"));
		const config = await Effect.runPromise(rootConfigForPaths([t.path("src")]));
		expect(config).toBe(defaultRootConfig);
	});
});
