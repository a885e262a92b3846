// CHANGE: Tests for guideline and review listing
// PURITY: APP (temporary directories)

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { listGuidance } from "../../src/app/guidance.js";
import { createTempTree, type TempTree } from "../utils/tempTree.js";

let tree: TempTree | undefined;

afterEach(() => {
	tree?.cleanup();
	tree = undefined;
});

const setup = (): TempTree => {
	tree = createTempTree({
		".cascade-lint-root.yaml": "",
		".cascade-lint.yaml":
			"guideline:\n  - message: Prefer immutable data\nreview:\n  - message: Check naming\n",
		"src/api/.cascade-lint.yaml": `guideline:
  - message: Validate request bodies
    include_exts: [.kt]
  - message: Handlers end with Handler
    match:
      - pattern: file_ends_with
        keywords: [Handler.kt]
review:
  - message: Check error paths
`,
		"src/api/UserHandler.kt": "",
		"src/api/routes.ts": "",
	});
	return tree;
};

describe("listGuidance", () => {
	it("lists every item for a directory", async () => {
		const t = setup();
		expect(
			await Effect.runPromise(listGuidance(t.path("src", "api"), "guideline")),
		).toEqual([
			"[ guideline ] Prefer immutable data",
			"[ guideline ] src/api: Validate request bodies",
			"[ guideline ] src/api: Handlers end with Handler",
		]);
		expect(
			await Effect.runPromise(listGuidance(t.path("src", "api"), "review")),
		).toEqual(["review: Check naming", "review: Check error paths @ src/api"]);
	});

	it("scopes items to a file target", async () => {
		const t = setup();
		expect(
			await Effect.runPromise(
				listGuidance(t.path("src", "api", "routes.ts"), "guideline"),
			),
		).toEqual(["[ guideline ] Prefer immutable data"]);
		expect(
			await Effect.runPromise(
				listGuidance(t.path("src", "api", "UserHandler.kt"), "guideline"),
			),
		).toHaveLength(3);
	});

	it("hides items of child directories", async () => {
		const t = setup();
		expect(await Effect.runPromise(listGuidance(t.path("src"), "review"))).toEqual(
			["review: Check naming"],
		);
	});
});
