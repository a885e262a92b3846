// CHANGE: Central export point for domain types
// WHY: Modules import types from one place

export type {
	BlockMarker,
	Comment,
	CommentLang,
	CommentSource,
	CommentSyntax,
} from "./comment.js";
export type {
	ExcludeEntry,
	ExcludeFilter,
	ExtFilter,
	MatchCond,
	Matcher,
	MatchItem,
	MatchPattern,
	NegativePattern,
	PositivePattern,
	RootConfig,
} from "./matcher.js";
export type {
	Category,
	CategoryMap,
	CollectedRuleSet,
	CommandRule,
	CommentLanguage,
	CommentLanguageRule,
	DocConfig,
	DocLanguage,
	DocRule,
	GuidanceCategory,
	GuidanceItem,
	RegexRule,
	Rule,
	RuleCategory,
	RuleFile,
	RuleKind,
	Sourced,
	TestExistenceConfig,
	TestExistenceRule,
	TestFramework,
	TestNameRule,
	TestRequireLevel,
	TextRule,
	ValidatorRule,
	Visibility,
} from "./rule.js";
export type {
	Validator,
	ValidatorInput,
	ValidatorKey,
	ValidatorRegistry,
} from "./validator.js";
export type {
	CommandViolation,
	Finding,
	FindingViolation,
	FlatViolation,
	LineViolation,
	SortMode,
	Violation,
} from "./violation.js";

