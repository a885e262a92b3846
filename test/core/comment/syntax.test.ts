// CHANGE: Tests for built-in syntaxes and script detection
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	containsJapanese,
	isDecoration,
	truncateFound,
} from "../../../src/core/comment/language.js";
import { commentsFor } from "../../../src/core/comment/syntax.js";

describe("commentsFor", () => {
	const source = "/// doc\n//! inner\n// plain";

	it("drops rust doc comments", () => {
		expect(commentsFor({ _tag: "Lang", lang: "rust" }, source)).toEqual([
			{ line: 3, text: "plain" },
		]);
	});

	it("keeps them for java", () => {
		expect(commentsFor({ _tag: "Lang", lang: "java" }, source)).toEqual([
			{ line: 1, text: "/ doc" },
			{ line: 2, text: "! inner" },
			{ line: 3, text: "plain" },
		]);
	});

	it("uses a custom syntax as given", () => {
		const custom = {
			_tag: "Custom" as const,
			syntax: { lineMarkers: ["#"], blockMarkers: [] },
		};
		expect(commentsFor(custom, "x = 1 # note")).toEqual([
			{ line: 1, text: "note" },
		]);
	});
});

describe("containsJapanese", () => {
	it.each([
		["ひらがな", true],
		["カタカナ", true],
		["漢字", true],
		["ｱｲｳ", true],
		["plain ascii", false],
		["한국어", false],
	])("%s → %s", (text, expected) => {
		expect(containsJapanese(text)).toBe(expected);
	});
});

describe("isDecoration / truncateFound", () => {
	it("treats blank and lone star as decoration", () => {
		expect(isDecoration("  ")).toBe(true);
		expect(isDecoration(" * ")).toBe(true);
		expect(isDecoration("* note")).toBe(false);
	});

	it("cuts after 40 characters", () => {
		expect(truncateFound("a".repeat(40))).toBe("a".repeat(40));
		expect(truncateFound("a".repeat(41))).toBe(`${"a".repeat(40)}...`);
		expect(truncateFound("日".repeat(41))).toBe(`${"日".repeat(40)}...`);
	});
});
