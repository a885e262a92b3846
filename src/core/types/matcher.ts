// CHANGE: Matcher and filter type definitions
// WHY: Rule files and auxiliary items share one path-predicate language
// REF: matcher language (file_*/path_* patterns)
// PURITY: CORE
// INVARIANT: All structures are immutable; keyword order is preserved
// COMPLEXITY: O(1)

/**
 * Positive pattern kinds of a match item.
 */
export type PositivePattern =
	| "file_starts_with"
	| "file_ends_with"
	| "path_contains";

/**
 * Negated pattern kinds of a match item.
 */
export type NegativePattern =
	| "file_not_starts_with"
	| "file_not_ends_with"
	| "path_not_contains";

export type MatchPattern = PositivePattern | NegativePattern;

/**
 * Combinator applied across the keywords of a single match item.
 */
export type MatchCond = "and" | "or";

/**
 * One matcher clause.
 *
 * @invariant keywords keep declaration order
 */
export interface MatchItem {
	readonly pattern: MatchPattern;
	readonly keywords: ReadonlyArray<string>;
	readonly cond: MatchCond;
}

/**
 * Boolean predicate over a file path; items are AND-combined.
 *
 * @invariant items.length === 0 → matches every path
 */
export interface Matcher {
	readonly items: ReadonlyArray<MatchItem>;
}

/**
 * Single exclude_files entry.
 */
export interface ExcludeEntry {
	readonly filter: PositivePattern;
	readonly keyword: string;
}

/**
 * OR-combined list of exclusions; empty excludes nothing.
 */
export interface ExcludeFilter {
	readonly entries: ReadonlyArray<ExcludeEntry>;
}

/**
 * Suffix filter on the file name.
 *
 * @invariant include.length === 0 → every suffix allowed
 * @invariant exclude wins over include
 */
export interface ExtFilter {
	readonly include: ReadonlyArray<string>;
	readonly exclude: ReadonlyArray<string>;
}

/**
 * Configuration loaded from the root marker.
 *
 * @property includeExtensions Dot-prefixed suffixes; empty = allow all
 * @property excludeDirs Bare directory names skipped during expansion
 */
export interface RootConfig {
	readonly includeExtensions: ReadonlySet<string>;
	readonly excludeDirs: ReadonlySet<string>;
}
