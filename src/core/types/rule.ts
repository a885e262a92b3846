// CHANGE: Closed tagged union for rules and auxiliary items
// WHY: Every rule kind is matched exhaustively at conversion and validation sites
// REF: Rule model (text, regex, command, doc, comment_language, test_name, test_existence)
// PURITY: CORE
// INVARIANT: Rules are immutable once constructed and shared read-only across workers
// COMPLEXITY: O(1)

import type { CommentSource } from "./comment.js";
import type {
	ExcludeFilter,
	ExtFilter,
	Matcher,
	RootConfig,
} from "./matcher.js";

/**
 * Validation phase a rule belongs to.
 */
export type RuleCategory = "required" | "forbidden";

/**
 * Auxiliary list a guidance item belongs to.
 */
export type GuidanceCategory = "guideline" | "review";

export type Category = RuleCategory | GuidanceCategory;

export type Visibility = "public" | "all";

export type DocLanguage = "java" | "kotlin" | "rust" | "php";

export type TestFramework = "phpunit" | "kotest" | "rust";

export type TestRequireLevel = "exists" | "all_public";

export type CommentLanguage = "japanese" | "english";

/**
 * Fields shared by every rule variant.
 */
interface BaseRule {
	readonly label: string;
	readonly message: string;
	readonly matcher: Matcher;
	readonly extFilter: ExtFilter;
	readonly excludeFilter: ExcludeFilter;
}

export interface TextRule extends BaseRule {
	readonly kind: "text";
	readonly keywords: ReadonlyArray<string>;
}

export interface RegexRule extends BaseRule {
	readonly kind: "regex";
	readonly keywords: ReadonlyArray<string>;
	readonly patterns: ReadonlyArray<RegExp>;
}

export interface CommandRule extends BaseRule {
	readonly kind: "command";
	readonly exec: string;
}

/**
 * Element name → required visibility, e.g. `{ class: "public" }`.
 *
 * @invariant size ≥ 1
 */
export type DocConfig = ReadonlyMap<string, Visibility>;

export interface DocRule extends BaseRule {
	readonly kind: "doc";
	readonly language: DocLanguage;
	readonly config: DocConfig;
}

export interface CommentLanguageRule extends BaseRule {
	readonly kind: "comment_language";
	readonly language: CommentLanguage;
	readonly source: CommentSource;
}

export interface TestNameRule extends BaseRule {
	readonly kind: "test_name";
	readonly framework: TestFramework;
}

/**
 * Test existence settings.
 *
 * @property testDirectory Relative to the root directory; null for same-file tests
 */
export interface TestExistenceConfig {
	readonly testDirectory: string | null;
	readonly require: TestRequireLevel;
	readonly testFileSuffix: string;
}

export interface TestExistenceRule extends BaseRule {
	readonly kind: "test_existence";
	readonly framework: TestFramework;
	readonly config: TestExistenceConfig;
}

export type Rule =
	| TextRule
	| RegexRule
	| CommandRule
	| DocRule
	| CommentLanguageRule
	| TestNameRule
	| TestExistenceRule;

export type RuleKind = Rule["kind"];

/**
 * Rule kinds whose checks are supplied through the validator registry.
 */
export type ValidatorRule = Extract<
	Rule,
	{ readonly kind: "doc" | "comment_language" | "test_name" | "test_existence" }
>;

/**
 * Guideline / review item: a message scoped by a matcher, no enforcement.
 */
export interface GuidanceItem {
	readonly message: string;
	readonly matcher: Matcher;
	readonly extFilter: ExtFilter;
}

/**
 * Converted content of one RuleFile.
 */
export interface RuleFile {
	readonly rules: ReadonlyArray<Rule>;
	readonly guideline: ReadonlyArray<GuidanceItem>;
	readonly review: ReadonlyArray<GuidanceItem>;
}

/**
 * Entry tagged with the directory whose RuleFile declared it.
 */
export interface Sourced<A> {
	readonly entry: A;
	readonly sourceDir: string;
}

type CategoryEntry<C extends Category> = C extends RuleCategory
	? Rule
	: GuidanceItem;

/**
 * Category → ordered provenance-tagged entries.
 */
export type CategoryMap = {
	readonly [C in Category]: ReadonlyArray<Sourced<CategoryEntry<C>>>;
};

/**
 * Effective rule set for one target directory.
 *
 * @invariant categories keep root-to-target, then declaration, order
 */
export interface CollectedRuleSet {
	readonly rootDir: string;
	readonly rootConfig: RootConfig;
	readonly categories: CategoryMap;
}
