// CHANGE: Shared rule and violation builders for tests
// WHY: Rule fixtures repeat the same scoping fields

import { Either } from "effect";

import type {
	CommentLanguage,
	CommentLanguageRule,
	CommentSource,
	FlatViolation,
	RegexRule,
	TextRule,
} from "../../src/core/types/index.js";
import {
	noExcludeFilter,
	noExtFilter,
} from "../../src/core/filter/filters.js";
import { compilePattern } from "../../src/core/rule/convert.js";

const scope = {
	label: "test-rule",
	message: "message",
	matcher: { items: [] },
	extFilter: noExtFilter,
	excludeFilter: noExcludeFilter,
} as const;

/** Text rule over the given keywords. */
export const textRule = (keywords: ReadonlyArray<string>): TextRule => ({
	...scope,
	kind: "text",
	keywords,
});

/** Regex rule compiled the way rule conversion does. */
export const regexRule = (keywords: ReadonlyArray<string>): RegexRule => ({
	...scope,
	kind: "regex",
	keywords,
	patterns: keywords.map((k) => Either.getOrThrow(compilePattern(k))),
});

/** Comment-language rule, java syntax unless given. */
export const commentRule = (
	language: CommentLanguage,
	source: CommentSource = { _tag: "Lang", lang: "java" },
): CommentLanguageRule => ({
	...scope,
	kind: "comment_language",
	language,
	source,
});

/** Flat violation with neutral defaults. */
export const flat = (over: Partial<FlatViolation> = {}): FlatViolation => ({
	message: "message",
	file: "a.kt",
	line: 1,
	col: 1,
	found: "",
	output: "",
	...over,
});
