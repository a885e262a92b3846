// CHANGE: Conversion of decoded entries into the closed Rule union
// WHY: Each variant's structural invariants are enforced once, at load time
// REF: src/core/rule/raw.ts, src/core/types/rule.ts
// PURITY: CORE
// INVARIANT: ∀ r ∈ convertRuleFile(raw).rules: r satisfies its variant's field table
// COMPLEXITY: O(n) where n = number of entries

import { Either } from "effect";
import { match, P } from "ts-pattern";

import { InvalidRule } from "../errors.js";
import type {
	CommentLang,
	CommentSource,
	DocLanguage,
	ExcludeFilter,
	ExtFilter,
	GuidanceItem,
	Matcher,
	RootConfig,
	Rule,
	RuleCategory,
	RuleFile,
	TestExistenceConfig,
	TestFramework,
	Visibility,
} from "../types/index.js";
import type {
	RawGuidance,
	RawMatchItem,
	RawRootConfig,
	RawRule,
	RawRuleFile,
	RawScope,
} from "./raw.js";

type Converted<A> = Either.Either<A, InvalidRule>;

type Field = "keywords" | "exec" | "doc" | "comment" | "test";

const DOC_ELEMENTS: Readonly<Record<DocLanguage, ReadonlyArray<string>>> = {
	java: ["class", "interface", "enum", "record", "annotation", "method"],
	kotlin: [
		"class",
		"interface",
		"object",
		"enum_class",
		"sealed_class",
		"sealed_interface",
		"data_class",
		"value_class",
		"annotation_class",
		"typealias",
		"function",
	],
	rust: [
		"struct",
		"enum",
		"trait",
		"type_alias",
		"union",
		"fn",
		"macro_rules",
		"mod",
	],
	php: ["class", "interface", "trait", "enum", "function", "method"],
};

const COMMENT_LANGS: ReadonlyArray<CommentLang> = ["java", "kotlin", "rust"];

const invalid = (raw: RawRule, detail: string): InvalidRule =>
	new InvalidRule({ label: raw.label, detail });

const present = (raw: RawRule, field: Field): boolean => raw[field] !== undefined;

/**
 * Rejects the first field from `forbidden` that is present.
 *
 * @pure true
 */
const forbid = (
	raw: RawRule,
	forbidden: ReadonlyArray<Field>,
): Converted<void> => {
	const hit = forbidden.find((field) => present(raw, field));
	return hit === undefined
		? Either.right(undefined)
		: Either.left(invalid(raw, `type '${raw.type}' must not have '${hit}'`));
};

const requireField = <A>(
	raw: RawRule,
	value: A | undefined,
	field: Field,
): Converted<A> =>
	value === undefined
		? Either.left(invalid(raw, `type '${raw.type}' requires '${field}'`))
		: Either.right(value);

export const toMatcher = (
	items: ReadonlyArray<RawMatchItem> | undefined,
): Matcher => ({
	items: (items ?? []).map((item) => ({
		pattern: item.pattern,
		keywords: item.keywords,
		cond: item.cond ?? "or",
	})),
});

const toExtFilter = (scope: RawScope): ExtFilter => ({
	include: scope.includeExts ?? [],
	exclude: scope.excludeExts ?? [],
});

const toExcludeFilter = (raw: RawRule): ExcludeFilter => ({
	entries: raw.excludeFiles ?? [],
});

const INLINE_FLAGS = /^\(\?([ims]+)\)/u;

/**
 * Compiles a rule pattern. A leading inline flag group such as `(?i)` becomes
 * RegExp flags; sources unicode mode rejects (e.g. `a\-b`) compile in legacy mode.
 *
 * @pure true
 * @returns Left with the engine's message when neither mode accepts the source
 */
export const compilePattern = (
	source: string,
): Either.Either<RegExp, string> => {
	const inline = INLINE_FLAGS.exec(source);
	const flags = inline?.[1] ?? "";
	const body = inline === null ? source : source.slice(inline[0].length);
	return Either.orElse(
		Either.try(() => new RegExp(body, `${flags}u`)),
		() =>
			Either.try({
				try: () => new RegExp(body, flags),
				catch: (e) => (e instanceof Error ? e.message : String(e)),
			}),
	);
};

const compilePatterns = (
	raw: RawRule,
	keywords: ReadonlyArray<string>,
): Converted<ReadonlyArray<RegExp>> =>
	Either.all(
		keywords.map((k) =>
			Either.mapLeft(compilePattern(k), (detail) =>
				invalid(raw, `invalid regex '${k}': ${detail}`),
			),
		),
	);

const isVisibility = (value: string): value is Visibility =>
	value === "public" || value === "all";

const toDocConfig = (
	raw: RawRule,
	language: DocLanguage,
): Converted<ReadonlyMap<string, Visibility>> =>
	Either.gen(function* () {
		const entries = yield* requireField(raw, raw.doc, "doc");
		const known = DOC_ELEMENTS[language];
		const config = new Map<string, Visibility>();
		for (const [element, visibility] of entries) {
			if (!known.includes(element)) {
				return yield* Either.left(
					invalid(raw, `unknown ${language} doc element '${element}'`),
				);
			}
			if (!isVisibility(visibility)) {
				return yield* Either.left(
					invalid(
						raw,
						`invalid visibility '${visibility}' for '${element}' (expected public or all)`,
					),
				);
			}
			config.set(element, visibility);
		}
		if (config.size === 0) {
			return yield* Either.left(
				invalid(
					raw,
					`'doc' config requires at least one element (${known.join(", ")})`,
				),
			);
		}
		return config;
	});

const isCommentLang = (value: string): value is CommentLang =>
	COMMENT_LANGS.some((l) => l === value);

const toCommentSource = (raw: RawRule): Converted<CommentSource> =>
	Either.gen(function* () {
		const comment = yield* requireField(raw, raw.comment, "comment");
		const { lang, custom } = comment;
		if (lang !== undefined && custom !== undefined) {
			return yield* Either.left(
				invalid(raw, "cannot specify both 'lang' and 'custom'"),
			);
		}
		if (lang !== undefined) {
			if (!isCommentLang(lang)) {
				return yield* Either.left(
					invalid(raw, `unknown comment lang '${lang}'`),
				);
			}
			return { _tag: "Lang", lang } satisfies CommentSource;
		}
		if (custom === undefined) {
			return yield* Either.left(
				invalid(raw, "either 'lang' or 'custom' is required"),
			);
		}
		const markers = [
			...custom.lines,
			...custom.blocks.flatMap((b) => [b.start, b.end]),
		];
		if (markers.some((m) => m.length === 0)) {
			return yield* Either.left(
				invalid(raw, "comment markers must not be empty"),
			);
		}
		return {
			_tag: "Custom",
			syntax: { lineMarkers: custom.lines, blockMarkers: custom.blocks },
		} satisfies CommentSource;
	});

const toTestExistenceConfig = (
	raw: RawRule,
	needsDirectory: boolean,
): Converted<TestExistenceConfig> =>
	Either.gen(function* () {
		const test = needsDirectory
			? yield* requireField(raw, raw.test, "test")
			: raw.test;
		const testDirectory = test?.testDirectory;
		if (needsDirectory && testDirectory === undefined) {
			return yield* Either.left(
				invalid(raw, `type '${raw.type}' requires 'test.test_directory'`),
			);
		}
		const require = test?.require ?? "exists";
		if (require !== "exists" && require !== "all_public") {
			return yield* Either.left(
				invalid(
					raw,
					`invalid test requirement '${require}' (expected exists or all_public)`,
				),
			);
		}
		return {
			testDirectory: testDirectory ?? null,
			require,
			testFileSuffix: test?.testFileSuffix ?? "Test",
		};
	});

const ALL_FIELDS: ReadonlyArray<Field> = [
	"keywords",
	"exec",
	"doc",
	"comment",
	"test",
];

const except = (...allowed: ReadonlyArray<Field>): ReadonlyArray<Field> =>
	ALL_FIELDS.filter((f) => !allowed.includes(f));

/**
 * Converts one decoded entry, dispatching on `type`.
 *
 * @pure true
 * @returns Left(InvalidRule) labeled `Rule '<label>': ...` on any invariant violation
 */
export const convertRule = (raw: RawRule): Converted<Rule> => {
	const base = {
		label: raw.label,
		message: raw.message,
		matcher: toMatcher(raw.match),
		extFilter: toExtFilter(raw),
		excludeFilter: toExcludeFilter(raw),
	};

	const testName = (framework: TestFramework): Converted<Rule> =>
		Either.map(forbid(raw, ALL_FIELDS), () => ({
			...base,
			kind: "test_name" as const,
			framework,
		}));

	const testExistence = (
		framework: TestFramework,
		needsDirectory: boolean,
	): Converted<Rule> =>
		Either.gen(function* () {
			yield* forbid(raw, except("test"));
			const config = yield* toTestExistenceConfig(raw, needsDirectory);
			return { ...base, kind: "test_existence" as const, framework, config };
		});

	const doc = (language: DocLanguage): Converted<Rule> =>
		Either.gen(function* () {
			yield* forbid(raw, except("doc"));
			const config = yield* toDocConfig(raw, language);
			return { ...base, kind: "doc" as const, language, config };
		});

	const commentLanguage = (language: "japanese" | "english"): Converted<Rule> =>
		Either.gen(function* () {
			yield* forbid(raw, except("comment"));
			const source = yield* toCommentSource(raw);
			return { ...base, kind: "comment_language" as const, language, source };
		});

	return match<string, Converted<Rule>>(raw.type)
		.with("forbidden_texts", () =>
			Either.gen(function* () {
				const keywords = yield* requireField(raw, raw.keywords, "keywords");
				yield* forbid(raw, except("keywords"));
				return { ...base, kind: "text" as const, keywords };
			}),
		)
		.with("forbidden_patterns", () =>
			Either.gen(function* () {
				const keywords = yield* requireField(raw, raw.keywords, "keywords");
				yield* forbid(raw, except("keywords"));
				const patterns = yield* compilePatterns(raw, keywords);
				return { ...base, kind: "regex" as const, keywords, patterns };
			}),
		)
		.with("custom", () =>
			Either.gen(function* () {
				const exec = yield* requireField(raw, raw.exec, "exec");
				yield* forbid(raw, except("exec"));
				return { ...base, kind: "command" as const, exec };
			}),
		)
		.with("require_java_doc", () => doc("java"))
		.with("require_kotlin_doc", () => doc("kotlin"))
		.with("require_rust_doc", () => doc("rust"))
		.with("require_php_doc", () => doc("php"))
		.with("require_japanese_comment", () => commentLanguage("japanese"))
		.with("require_english_comment", () => commentLanguage("english"))
		.with("require_japanese_phpunit_test_name", () => testName("phpunit"))
		.with("require_japanese_kotest_test_name", () => testName("kotest"))
		.with("require_japanese_rust_test_name", () => testName("rust"))
		.with("require_phpunit_test", () => testExistence("phpunit", true))
		.with("require_kotest_test", () => testExistence("kotest", true))
		.with("require_rust_unit_test", () => testExistence("rust", false))
		.with(P.string, (other) =>
			Either.left(invalid(raw, `unknown type '${other}'`)),
		)
		.exhaustive();
};

const convertGuidance = (raw: RawGuidance): GuidanceItem => ({
	message: raw.message,
	matcher: toMatcher(raw.match),
	extFilter: toExtFilter(raw),
});

/**
 * Converts a decoded RuleFile; the first invalid rule fails the whole file.
 *
 * @pure true
 */
export const convertRuleFile = (raw: RawRuleFile): Converted<RuleFile> =>
	Either.map(Either.all(raw.rule.map(convertRule)), (rules) => ({
		rules,
		guideline: raw.guideline.map(convertGuidance),
		review: raw.review.map(convertGuidance),
	}));

/**
 * Text and regex rules are forbidden-category; every other kind is required.
 *
 * @pure true
 */
export const ruleCategory = (rule: Rule): RuleCategory =>
	match(rule.kind)
		.with(P.union("text", "regex"), (): RuleCategory => "forbidden")
		.with(
			P.union("command", "doc", "comment_language", "test_name", "test_existence"),
			(): RuleCategory => "required",
		)
		.exhaustive();

export const toRootConfig = (raw: RawRootConfig): RootConfig => ({
	includeExtensions: new Set(raw.includeExtensions),
	excludeDirs: new Set(raw.excludeDirs),
});
