// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effects, or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validates paths against their effective rules.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { printReport, runValidate } from "cascade-lint";
 *
 * const exitCode = await Effect.runPromise(
 *   Effect.flatMap(runValidate(["src/"], { sort: "file" }), printReport),
 * );
 * ```
 */
export {
	type RunValidateOptions,
	ruleApplies,
	runValidate,
} from "./app/runValidate.js";
export { guidanceApplies, listGuidance } from "./app/guidance.js";
export { findRoot } from "./shell/rules/root.js";
export { resolveEffectiveRules } from "./shell/rules/resolver.js";
export { printLines, printReport } from "./shell/output/printer.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode, decisionOf } from "./core/decision.js";
export { matches } from "./core/matcher/matcher.js";
export { extAllows, isExcluded, shouldIncludeExtension } from "./core/filter/filters.js";
export { extractComments } from "./core/comment/tokenizer.js";
export { builtinSyntaxes, commentsFor } from "./core/comment/syntax.js";
export { containsJapanese } from "./core/comment/language.js";
export { convertRule, convertRuleFile, ruleCategory } from "./core/rule/convert.js";
export { decodeRootConfig, decodeRuleFile } from "./core/rule/raw.js";
export { ROOT_MARKER_NAME, RULE_FILE_NAME } from "./core/rule/names.js";
export { checkRegex, checkText } from "./core/check/line.js";
export {
	flattenViolations,
	formatViolation,
	formatViolations,
	type RuleViolations,
	sortViolations,
} from "./core/format/violations.js";
export { formatGuidance } from "./core/format/guidance.js";
export {
	defaultRegistry,
	englishCommentValidator,
	japaneseCommentValidator,
} from "./core/validators/comment-language.js";
export { validatorKey } from "./core/validators/registry.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type { DecisionState, ExitCode, ValidationReport } from "./core/models.js";
export type {
	BlockMarker,
	Category,
	CategoryMap,
	CollectedRuleSet,
	CommandRule,
	CommandViolation,
	Comment,
	CommentLang,
	CommentLanguage,
	CommentLanguageRule,
	CommentSource,
	CommentSyntax,
	DocConfig,
	DocLanguage,
	DocRule,
	ExcludeEntry,
	ExcludeFilter,
	ExtFilter,
	Finding,
	FindingViolation,
	FlatViolation,
	GuidanceCategory,
	GuidanceItem,
	LineViolation,
	MatchCond,
	Matcher,
	MatchItem,
	MatchPattern,
	NegativePattern,
	PositivePattern,
	RegexRule,
	RootConfig,
	Rule,
	RuleCategory,
	RuleFile,
	RuleKind,
	SortMode,
	Sourced,
	TestExistenceConfig,
	TestExistenceRule,
	TestFramework,
	TestNameRule,
	TestRequireLevel,
	TextRule,
	Validator,
	ValidatorInput,
	ValidatorKey,
	ValidatorRegistry,
	ValidatorRule,
	Violation,
	Visibility,
} from "./core/types/index.js";
export {
	type AppError,
	CommandSpawnError,
	type ConfigurationError,
	describeError,
	type FileError,
	FileReadError,
	InvalidRule,
	MissingValidator,
	NoRootFound,
	RuleFileParseError,
	ValidatorFailed,
} from "./core/errors.js";
