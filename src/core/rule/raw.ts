// CHANGE: Structural decoding of parsed rule documents
// WHY: YAML parses to untyped values; guards narrow them before conversion
// REF: src/core/types/rule.ts (target model)
// PURITY: CORE
// INVARIANT: Decoding checks shapes only; per-variant invariants belong to convert.ts
// COMPLEXITY: O(n) where n = document size

import { Either } from "effect";

import type {
	MatchCond,
	MatchPattern,
	PositivePattern,
} from "../types/index.js";

/**
 * Any value a YAML document can produce after `parse`.
 */
export type YamlValue =
	| string
	| number
	| boolean
	| null
	| undefined
	| ReadonlyArray<YamlValue>
	| { readonly [key: string]: YamlValue };

type YamlObject = { readonly [key: string]: YamlValue };

export interface RawMatchItem {
	readonly pattern: MatchPattern;
	readonly keywords: ReadonlyArray<string>;
	readonly cond: MatchCond | undefined;
}

export interface RawExcludeEntry {
	readonly filter: PositivePattern;
	readonly keyword: string;
}

export interface RawBlock {
	readonly start: string;
	readonly end: string;
}

export interface RawComment {
	readonly lang: string | undefined;
	readonly custom:
		| {
				readonly lines: ReadonlyArray<string>;
				readonly blocks: ReadonlyArray<RawBlock>;
		  }
		| undefined;
}

export interface RawTest {
	readonly testDirectory: string | undefined;
	readonly require: string | undefined;
	readonly testFileSuffix: string | undefined;
}

/**
 * Fields every entry may carry for scoping.
 */
export interface RawScope {
	readonly match: ReadonlyArray<RawMatchItem> | undefined;
	readonly includeExts: ReadonlyArray<string> | undefined;
	readonly excludeExts: ReadonlyArray<string> | undefined;
}

export interface RawRule extends RawScope {
	readonly type: string;
	readonly label: string;
	readonly message: string;
	readonly keywords: ReadonlyArray<string> | undefined;
	readonly exec: string | undefined;
	readonly doc: ReadonlyArray<readonly [string, string]> | undefined;
	readonly comment: RawComment | undefined;
	readonly test: RawTest | undefined;
	readonly excludeFiles: ReadonlyArray<RawExcludeEntry> | undefined;
}

export interface RawGuidance extends RawScope {
	readonly message: string;
}

export interface RawRuleFile {
	readonly rule: ReadonlyArray<RawRule>;
	readonly guideline: ReadonlyArray<RawGuidance>;
	readonly review: ReadonlyArray<RawGuidance>;
}

export interface RawRootConfig {
	readonly includeExtensions: ReadonlyArray<string>;
	readonly excludeDirs: ReadonlyArray<string>;
}

type Decoded<A> = Either.Either<A, string>;

const MATCH_PATTERNS: ReadonlyArray<MatchPattern> = [
	"file_starts_with",
	"file_ends_with",
	"path_contains",
	"file_not_starts_with",
	"file_not_ends_with",
	"path_not_contains",
];

const POSITIVE_PATTERNS: ReadonlyArray<PositivePattern> = [
	"file_starts_with",
	"file_ends_with",
	"path_contains",
];

function isObject(value: YamlValue): value is YamlObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isList(value: YamlValue): value is ReadonlyArray<YamlValue> {
	return Array.isArray(value);
}

function isMatchPattern(value: string): value is MatchPattern {
	return MATCH_PATTERNS.some((p) => p === value);
}

function isPositivePattern(value: string): value is PositivePattern {
	return POSITIVE_PATTERNS.some((p) => p === value);
}

const expected = (at: string, what: string): string =>
	`${at}: expected ${what}`;

const objectAt = (value: YamlValue, at: string): Decoded<YamlObject> =>
	isObject(value) ? Either.right(value) : Either.left(expected(at, "a mapping"));

const stringAt = (value: YamlValue, at: string): Decoded<string> =>
	typeof value === "string"
		? Either.right(value)
		: Either.left(expected(at, "a string"));

/**
 * Scalars other than strings are accepted as their text form (`.kt` stays a string,
 * `1` becomes "1").
 */
const scalarTextAt = (value: YamlValue, at: string): Decoded<string> =>
	typeof value === "string" || typeof value === "number" || typeof value === "boolean"
		? Either.right(String(value))
		: Either.left(expected(at, "a string"));

const optional = <A>(
	value: YamlValue,
	decode: (v: YamlValue) => Decoded<A>,
): Decoded<A | undefined> =>
	value === undefined || value === null ? Either.right(undefined) : decode(value);

const listOf =
	<A>(item: (v: YamlValue, at: string) => Decoded<A>) =>
	(value: YamlValue, at: string): Decoded<ReadonlyArray<A>> =>
		isList(value)
			? Either.all(value.map((v, i) => item(v, `${at}[${i}]`)))
			: Either.left(expected(at, "a list"));

const stringsAt = listOf(scalarTextAt);

const optionalStrings = (
	obj: YamlObject,
	key: string,
	at: string,
): Decoded<ReadonlyArray<string> | undefined> =>
	optional(obj[key], (v) => stringsAt(v, `${at}.${key}`));

const decodeMatchItem = (
	value: YamlValue,
	at: string,
): Decoded<RawMatchItem> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const pattern = yield* stringAt(obj.pattern, `${at}.pattern`);
		if (!isMatchPattern(pattern)) {
			return yield* Either.left(`${at}.pattern: unknown pattern '${pattern}'`);
		}
		const keywords = yield* stringsAt(obj.keywords ?? [], `${at}.keywords`);
		const cond = yield* optional(obj.cond, (v) => stringAt(v, `${at}.cond`));
		if (cond !== undefined && cond !== "and" && cond !== "or") {
			return yield* Either.left(`${at}.cond: expected 'and' or 'or'`);
		}
		return { pattern, keywords, cond };
	});

const decodeExcludeEntry = (
	value: YamlValue,
	at: string,
): Decoded<RawExcludeEntry> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const filter = yield* stringAt(obj.filter, `${at}.filter`);
		if (!isPositivePattern(filter)) {
			return yield* Either.left(`${at}.filter: unknown filter '${filter}'`);
		}
		const keyword = yield* scalarTextAt(obj.keyword, `${at}.keyword`);
		return { filter, keyword };
	});

const decodeBlock = (value: YamlValue, at: string): Decoded<RawBlock> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const start = yield* stringAt(obj.start, `${at}.start`);
		const end = yield* stringAt(obj.end, `${at}.end`);
		return { start, end };
	});

const decodeComment = (value: YamlValue, at: string): Decoded<RawComment> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const lang = yield* optional(obj.lang, (v) => stringAt(v, `${at}.lang`));
		const custom = yield* optional(obj.custom, (v) =>
			Either.gen(function* () {
				const c = yield* objectAt(v, `${at}.custom`);
				const lines = yield* stringsAt(c.lines ?? [], `${at}.custom.lines`);
				const blocks = yield* listOf(decodeBlock)(
					c.blocks ?? [],
					`${at}.custom.blocks`,
				);
				return { lines, blocks };
			}),
		);
		return { lang, custom };
	});

const decodeTest = (value: YamlValue, at: string): Decoded<RawTest> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const testDirectory = yield* optional(obj.test_directory, (v) =>
			stringAt(v, `${at}.test_directory`),
		);
		const require = yield* optional(obj.require, (v) =>
			stringAt(v, `${at}.require`),
		);
		const testFileSuffix = yield* optional(obj.test_file_suffix, (v) =>
			stringAt(v, `${at}.test_file_suffix`),
		);
		return { testDirectory, require, testFileSuffix };
	});

const decodeDoc = (
	value: YamlValue,
	at: string,
): Decoded<ReadonlyArray<readonly [string, string]>> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const entries: Array<readonly [string, string]> = [];
		for (const [key, v] of Object.entries(obj)) {
			if (v === null || v === undefined) continue;
			entries.push([key, yield* stringAt(v, `${at}.${key}`)]);
		}
		return entries;
	});

const decodeScope = (obj: YamlObject, at: string): Decoded<RawScope> =>
	Either.gen(function* () {
		const match = yield* optional(obj.match, (v) =>
			listOf(decodeMatchItem)(v, `${at}.match`),
		);
		const includeExts = yield* optionalStrings(obj, "include_exts", at);
		const excludeExts = yield* optionalStrings(obj, "exclude_exts", at);
		return { match, includeExts, excludeExts };
	});

const decodeRule = (value: YamlValue, at: string): Decoded<RawRule> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const type = yield* stringAt(obj.type, `${at}.type`);
		const label = yield* scalarTextAt(obj.label, `${at}.label`);
		const message = yield* scalarTextAt(obj.message, `${at}.message`);
		const scope = yield* decodeScope(obj, at);
		const keywords = yield* optionalStrings(obj, "keywords", at);
		const exec = yield* optional(obj.exec, (v) => stringAt(v, `${at}.exec`));
		const doc = yield* optional(obj.doc, (v) => decodeDoc(v, `${at}.doc`));
		const comment = yield* optional(obj.comment, (v) =>
			decodeComment(v, `${at}.comment`),
		);
		const test = yield* optional(obj.test, (v) => decodeTest(v, `${at}.test`));
		const excludeFiles = yield* optional(obj.exclude_files, (v) =>
			listOf(decodeExcludeEntry)(v, `${at}.exclude_files`),
		);
		return {
			...scope,
			type,
			label,
			message,
			keywords,
			exec,
			doc,
			comment,
			test,
			excludeFiles,
		};
	});

const decodeGuidance = (value: YamlValue, at: string): Decoded<RawGuidance> =>
	Either.gen(function* () {
		const obj = yield* objectAt(value, at);
		const message = yield* scalarTextAt(obj.message, `${at}.message`);
		const scope = yield* decodeScope(obj, at);
		return { ...scope, message };
	});

/**
 * Decodes a parsed RuleFile document. An empty document has no entries.
 *
 * @pure true
 * @returns Left with a located message on the first shape mismatch
 */
export const decodeRuleFile = (doc: YamlValue): Decoded<RawRuleFile> =>
	Either.gen(function* () {
		if (doc === null || doc === undefined) {
			return { rule: [], guideline: [], review: [] };
		}
		const obj = yield* objectAt(doc, "document");
		const rule = yield* optional(obj.rule, (v) => listOf(decodeRule)(v, "rule"));
		const guideline = yield* optional(obj.guideline, (v) =>
			listOf(decodeGuidance)(v, "guideline"),
		);
		const review = yield* optional(obj.review, (v) =>
			listOf(decodeGuidance)(v, "review"),
		);
		return {
			rule: rule ?? [],
			guideline: guideline ?? [],
			review: review ?? [],
		};
	});

/**
 * Decodes a root marker body; empty or comment-only bodies yield defaults.
 *
 * @pure true
 */
export const decodeRootConfig = (doc: YamlValue): Decoded<RawRootConfig> =>
	Either.gen(function* () {
		if (doc === null || doc === undefined) {
			return { includeExtensions: [], excludeDirs: [] };
		}
		const obj = yield* objectAt(doc, "document");
		const includeExtensions = yield* optionalStrings(
			obj,
			"include_extensions",
			"document",
		);
		const excludeDirs = yield* optionalStrings(obj, "exclude_dirs", "document");
		return {
			includeExtensions: includeExtensions ?? [],
			excludeDirs: excludeDirs ?? [],
		};
	});
