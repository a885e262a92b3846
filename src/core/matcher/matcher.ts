// CHANGE: Path predicate evaluation for rule and guidance scoping
// WHY: Every rule and auxiliary item decides applicability through one pure function
// REF: matcher language (file_*/path_* patterns)
// PURITY: CORE
// INVARIANT: matches({ items: [] }, p) = true for every p
// COMPLEXITY: O(|items| · |keywords| · |path|)

import { match } from "ts-pattern";

import type {
	MatchCond,
	Matcher,
	MatchItem,
	MatchPattern,
} from "../types/index.js";

/**
 * Last path segment (both separators accepted).
 *
 * @pure true
 */
export const fileNameOf = (path: string): string => {
	const cut = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
	return cut === -1 ? path : path.slice(cut + 1);
};

const testKeyword = (
	pattern: MatchPattern,
	fileName: string,
	path: string,
	keyword: string,
): boolean =>
	match(pattern)
		.with("file_starts_with", () => fileName.startsWith(keyword))
		.with("file_ends_with", () => fileName.endsWith(keyword))
		.with("path_contains", () => path.includes(keyword))
		.with("file_not_starts_with", () => !fileName.startsWith(keyword))
		.with("file_not_ends_with", () => !fileName.endsWith(keyword))
		.with("path_not_contains", () => !path.includes(keyword))
		.exhaustive();

const combine = (
	cond: MatchCond,
	results: ReadonlyArray<boolean>,
): boolean =>
	cond === "and" ? results.every(Boolean) : results.some(Boolean);

/**
 * Evaluates one item; negative kinds negate each keyword test before combining.
 *
 * @pure true
 * @invariant keywords = [] → (cond = "and")
 */
export const matchesItem = (
	item: MatchItem,
	fileName: string,
	path: string,
): boolean =>
	combine(
		item.cond,
		item.keywords.map((k) => testKeyword(item.pattern, fileName, path, k)),
	);

/**
 * AND over all items of the matcher.
 *
 * @param path Full (canonical) path string
 *
 * @pure true
 * @complexity O(|items| · |keywords| · |path|)
 *
 * @example
 * ```ts
 * matches(
 *   { items: [{ pattern: "file_not_ends_with", keywords: [".kt", ".java"], cond: "or" }] },
 *   "/r/a.kt",
 * ); // true: ".java" is not a suffix of "a.kt"
 * ```
 */
export const matches = (matcher: Matcher, path: string): boolean => {
	const fileName = fileNameOf(path);
	return matcher.items.every((item) => matchesItem(item, fileName, path));
};

export const matchAll: Matcher = { items: [] };
