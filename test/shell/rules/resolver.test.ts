// CHANGE: Tests for ancestor-chain rule resolution
// INVARIANT: Entries are root-first; a child's file never reaches its parent
// PURITY: SHELL (temporary directories)

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { describeError } from "../../../src/core/errors.js";
import { resolveEffectiveRules } from "../../../src/shell/rules/resolver.js";
import { findRoot } from "../../../src/shell/rules/root.js";
import { createTempTree, type TempTree } from "../../utils/tempTree.js";

const text = (label: string, keyword: string): string =>
	`  - type: forbidden_texts\n    label: ${label}\n    message: ${label} message\n    keywords: [${keyword}]\n`;

let tree: TempTree | undefined;

afterEach(() => {
	tree?.cleanup();
	tree = undefined;
});

const setup = (): TempTree => {
	tree = createTempTree({
		".cascade-lint-root.yaml": "# root\n",
		".cascade-lint.yaml": `rule:\n${text("root-rule", "TODO")}guideline:\n  - message: Keep functions small\n`,
		"src/.cascade-lint.yaml": `rule:\n${text("src-rule", "FIXME")}  - type: custom\n    label: check\n    message: check fails\n    exec: "true"\nreview:\n  - message: Check error paths\n`,
		"src/api/Handler.kt": "fun handle() = Unit\n",
		"docs/readme.md": "# docs\n",
	});
	return tree;
};

describe("resolveEffectiveRules", () => {
	it("merges root-first with provenance", async () => {
		const t = setup();
		const set = await Effect.runPromise(resolveEffectiveRules(t.path("src", "api")));

		expect(set.rootDir).toBe(t.root);
		expect(
			set.categories.forbidden.map((r) => [r.entry.label, r.sourceDir]),
		).toEqual([
			["root-rule", t.root],
			["src-rule", t.path("src")],
		]);
		expect(set.categories.required.map((r) => r.entry.label)).toEqual(["check"]);
		expect(set.categories.guideline.map((g) => g.entry.message)).toEqual([
			"Keep functions small",
		]);
		expect(set.categories.review.map((g) => g.sourceDir)).toEqual([
			t.path("src"),
		]);
	});

	it("does not see rule files of child directories", async () => {
		const t = setup();
		const set = await Effect.runPromise(resolveEffectiveRules(t.path("docs")));
		expect(set.categories.forbidden.map((r) => r.entry.label)).toEqual([
			"root-rule",
		]);
		expect(set.categories.required).toEqual([]);
		expect(set.categories.review).toEqual([]);
	});

	it("reads root config from the marker", async () => {
		const t = setup();
		t.write({
			".cascade-lint-root.yaml":
				"include_extensions: [.kt]\nexclude_dirs: [build]\n",
		});
		const set = await Effect.runPromise(resolveEffectiveRules(t.root));
		expect([...set.rootConfig.includeExtensions]).toEqual([".kt"]);
		expect([...set.rootConfig.excludeDirs]).toEqual(["build"]);
	});

	it("fails with a parse error naming the file", async () => {
		const t = setup();
		t.write({ "src/.cascade-lint.yaml": "rule: [\n" });
		const error = await Effect.runPromise(
			Effect.flip(resolveEffectiveRules(t.path("src"))),
		);
		expect(error._tag).toBe("RuleFileParseError");
	});

	it("fails with InvalidRule for a bad rule", async () => {
		const t = setup();
		t.write({
			"src/.cascade-lint.yaml":
				"rule:\n  - type: forbidden_texts\n    label: bad\n    message: m\n",
		});
		const error = await Effect.runPromise(
			Effect.flip(resolveEffectiveRules(t.path("src"))),
		);
		expect(describeError(error)).toBe(
			"Rule 'bad': type 'forbidden_texts' requires 'keywords'",
		);
	});
});

describe("findRoot", () => {
	it("finds the nearest marker", async () => {
		const t = setup();
		t.write({ "src/api/.cascade-lint-root.yaml": "" });
		expect(await Effect.runPromise(findRoot(t.path("src", "api")))).toBe(
			t.path("src", "api"),
		);
		expect(await Effect.runPromise(findRoot(t.path("src")))).toBe(t.root);
	});

	it("fails for a missing path", async () => {
		const t = setup();
		const error = await Effect.runPromise(
			Effect.flip(findRoot(t.path("nowhere"))),
		);
		expect(error._tag).toBe("NoRootFound");
	});
});
