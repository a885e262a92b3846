// CHANGE: Tests for the generic comment tokenizer
// INVARIANT: Line markers win ties against block markers at the same column
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { extractComments } from "../../../src/core/comment/tokenizer.js";
import type { CommentSyntax } from "../../../src/core/types/index.js";

const slashes: CommentSyntax = {
	lineMarkers: ["//"],
	blockMarkers: [{ start: "/*", end: "*/" }],
};

describe("extractComments", () => {
	it("extracts a line comment", () => {
		expect(extractComments("// hello", slashes)).toEqual([
			{ line: 1, text: "hello" },
		]);
	});

	it("skips // preceded by a colon", () => {
		expect(extractComments("http://example.com", slashes)).toEqual([]);
	});

	it("keeps scanning after a skipped URL marker", () => {
		expect(extractComments("x = 'a://b' // real", slashes)).toEqual([
			{ line: 1, text: "real" },
		]);
	});

	it("emits one comment per line of a block", () => {
		expect(extractComments("/* a\nb */", slashes)).toEqual([
			{ line: 1, text: "a" },
			{ line: 2, text: "b" },
		]);
	});

	it("finds several block comments on one line", () => {
		expect(extractComments("x /* one */ y /* two */", slashes)).toEqual([
			{ line: 1, text: "one" },
			{ line: 1, text: "two" },
		]);
	});

	it("finds a line comment after a closed block", () => {
		expect(extractComments("/* a */ // b", slashes)).toEqual([
			{ line: 1, text: "a" },
			{ line: 1, text: "b" },
		]);
	});

	it("resumes scanning after a block closes", () => {
		expect(extractComments("/* a\n b */ // c", slashes)).toEqual([
			{ line: 1, text: "a" },
			{ line: 2, text: "b" },
			{ line: 2, text: "c" },
		]);
	});

	it("keeps empty lines inside a block but not empty edges", () => {
		expect(extractComments("/*\n\n*/", slashes)).toEqual([
			{ line: 2, text: "" },
		]);
	});

	it("emits empty line comments", () => {
		expect(extractComments("code //", slashes)).toEqual([
			{ line: 1, text: "" },
		]);
	});

	it("matches markers inside string literals", () => {
		expect(extractComments('s = "// not code"', slashes)).toEqual([
			{ line: 1, text: 'not code"' },
		]);
	});

	it("prefers the line marker on a tie", () => {
		const lisp: CommentSyntax = {
			lineMarkers: ["#"],
			blockMarkers: [{ start: "#|", end: "|#" }],
		};
		expect(extractComments("#| x |#", lisp)).toEqual([
			{ line: 1, text: "| x |#" },
		]);
	});

	it("supports custom block delimiters", () => {
		const html: CommentSyntax = {
			lineMarkers: [],
			blockMarkers: [{ start: "<!--", end: "-->" }],
		};
		expect(
			extractComments("// not a comment\n<!-- real comment -->", html),
		).toEqual([{ line: 2, text: "real comment" }]);
	});

	it("handles CRLF and empty input", () => {
		expect(extractComments("// a\r\n// b\r\n", slashes)).toEqual([
			{ line: 1, text: "a" },
			{ line: 2, text: "b" },
		]);
		expect(extractComments("", slashes)).toEqual([]);
	});
});
