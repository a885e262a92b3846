// CHANGE: Unit and property tests for the path matcher
// INVARIANT: matches({ items: [] }, p) = true
// PURITY: CORE
// COMPLEXITY: O(n) per test

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	fileNameOf,
	matchAll,
	matches,
} from "../../../src/core/matcher/matcher.js";
import type {
	MatchCond,
	Matcher,
	MatchPattern,
} from "../../../src/core/types/index.js";

const one = (
	pattern: MatchPattern,
	keywords: ReadonlyArray<string>,
	cond: MatchCond = "or",
): Matcher => ({ items: [{ pattern, keywords, cond }] });

describe("matches", () => {
	it("accepts every path when there are no items", () => {
		fc.assert(fc.property(fc.string(), (p) => matches(matchAll, p)));
	});

	it("treats zero keywords as true under and, false under or", () => {
		fc.assert(
			fc.property(fc.string(), (p) => {
				expect(matches(one("path_contains", [], "and"), p)).toBe(true);
				expect(matches(one("path_contains", [], "or"), p)).toBe(false);
			}),
		);
	});

	it("negates each keyword before combining with or", () => {
		const m = one("path_not_contains", ["/test/", "/generated/"], "or");
		expect(matches(m, "/r/test/generated/x")).toBe(false);
		expect(matches(m, "/r/test/x")).toBe(true);
		expect(matches(m, "/r/generated/x")).toBe(true);
		expect(matches(m, "x")).toBe(true);
	});

	it("requires every negated keyword under and", () => {
		const m = one("file_not_ends_with", [".kt", ".java"], "and");
		expect(matches(m, "/r/a.kt")).toBe(false);
		expect(matches(m, "/r/a.ts")).toBe(true);
	});

	it("tests file patterns against the last segment only", () => {
		expect(matches(one("file_starts_with", ["src"]), "/src/Main.kt")).toBe(false);
		expect(matches(one("file_starts_with", ["Main"]), "/src/Main.kt")).toBe(true);
		expect(matches(one("file_ends_with", [".kt"]), "/src.kt/Main.java")).toBe(
			false,
		);
	});

	it("AND-combines items", () => {
		const m: Matcher = {
			items: [
				{ pattern: "path_contains", keywords: ["/api/"], cond: "or" },
				{ pattern: "file_ends_with", keywords: [".kt"], cond: "or" },
			],
		};
		expect(matches(m, "/r/api/User.kt")).toBe(true);
		expect(matches(m, "/r/api/User.java")).toBe(false);
		expect(matches(m, "/r/web/User.kt")).toBe(false);
	});

	it("is the complement of the positive kind for a single keyword", () => {
		fc.assert(
			fc.property(fc.string(), fc.string(), (path, k) => {
				const pos = matches(one("path_contains", [k]), path);
				const neg = matches(one("path_not_contains", [k]), path);
				expect(neg).toBe(!pos);
			}),
		);
	});
});

describe("fileNameOf", () => {
	it("returns the last segment", () => {
		expect(fileNameOf("/a/b/c.ts")).toBe("c.ts");
		expect(fileNameOf("c.ts")).toBe("c.ts");
		expect(fileNameOf("C:\\x\\y.kt")).toBe("y.kt");
	});
});
