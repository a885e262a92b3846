// CHANGE: Validation driver composing CORE checks with SHELL integrations
// WHY: Setup (expansion, resolution) is sequential; per-file checks run concurrently
// PURITY: APP
// EFFECT: Effect<ValidationReport, NoRootFound | InvalidRule>
// INVARIANT: The rule cache is complete before any file is validated and read-only afterwards
// INVARIANT: Output is independent of worker scheduling
// COMPLEXITY: O(|dirs| · depth + |files| · |rules| · |content|)

import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect, Either, pipe } from "effect";
import { match } from "ts-pattern";

import { checkRegex, checkText } from "../core/check/line.js";
import {
	describeError,
	type FileError,
	FileReadError,
	type InvalidRule,
	MissingValidator,
	type NoRootFound,
	RuleFileParseError,
	ValidatorFailed,
} from "../core/errors.js";
import { extAllows, isExcluded } from "../core/filter/filters.js";
import {
	flattenViolations,
	formatViolations,
	type RuleViolations,
} from "../core/format/violations.js";
import { matches } from "../core/matcher/matcher.js";
import type { ValidationReport } from "../core/models.js";
import type {
	CollectedRuleSet,
	Rule,
	RuleCategory,
	SortMode,
	ValidatorRegistry,
	Violation,
} from "../core/types/index.js";
import { defaultRegistry } from "../core/validators/comment-language.js";
import { validatorKey, withDefaults } from "../core/validators/registry.js";
import { runCommand } from "../shell/exec/command.js";
import { expandPaths, rootConfigForPaths } from "../shell/files/expand.js";
import { resolveEffectiveRules } from "../shell/rules/resolver.js";

export interface RunValidateOptions {
	readonly sort?: SortMode;
	/** Extra validators; entries override the built-in comment-language ones. */
	readonly registry?: ValidatorRegistry;
}

const RULE_PHASES: ReadonlyArray<RuleCategory> = ["required", "forbidden"];

const decoder = new TextDecoder("utf-8", { fatal: true });

const reason = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Canonical path and strictly decoded UTF-8 content.
 *
 * @effect Effect<{ canonical, content }, FileReadError>
 */
const readTarget = (
	file: string,
): Effect.Effect<
	{ readonly canonical: string; readonly content: string },
	FileReadError
> =>
	Effect.tryPromise({
		try: async () => {
			const canonical = await fs.realpath(file);
			const bytes = await fs.readFile(canonical);
			return { canonical, content: decoder.decode(bytes) };
		},
		catch: (e) => new FileReadError({ path: file, detail: reason(e) }),
	});

/**
 * Whether the rule's matcher and filters accept the file.
 *
 * @pure true
 */
export const ruleApplies = (rule: Rule, canonical: string): boolean =>
	matches(rule.matcher, canonical) &&
	extAllows(rule.extFilter, path.basename(canonical)) &&
	!isExcluded(rule.excludeFilter, canonical);

const checkRule = (
	rule: Rule,
	canonical: string,
	content: string,
	rootDir: string,
	registry: ValidatorRegistry,
): Effect.Effect<ReadonlyArray<Violation>, FileError> =>
	match(rule)
		.with({ kind: "text" }, (r) => Effect.succeed(checkText(r, content)))
		.with({ kind: "regex" }, (r) => Effect.succeed(checkRegex(r, content)))
		.with({ kind: "command" }, (r) =>
			Effect.map(
				runCommand(r.exec, canonical),
				(v): ReadonlyArray<Violation> => (v === undefined ? [] : [v]),
			),
		)
		.with(
			{ kind: "doc" },
			{ kind: "comment_language" },
			{ kind: "test_name" },
			{ kind: "test_existence" },
			(r) => {
				const key = validatorKey(r);
				const validator = registry.get(key);
				if (validator === undefined) {
					return Effect.fail(new MissingValidator({ key }));
				}
				return Effect.try({
					try: () =>
						validator
							.validate({ filePath: canonical, content, rule: r, rootDir })
							.map((f): Violation => ({ _tag: "Finding", ...f })),
					catch: (e) => new ValidatorFailed({ key, detail: reason(e) }),
				});
			},
		)
		.exhaustive();

/**
 * Applies every rule of the set to one file, `required` before `forbidden`.
 *
 * @effect Effect<RuleViolations[], FileError>
 */
const validateFile = (
	file: string,
	rules: CollectedRuleSet,
	registry: ValidatorRegistry,
): Effect.Effect<ReadonlyArray<RuleViolations>, FileError> =>
	Effect.gen(function* () {
		const { canonical, content } = yield* readTarget(file);
		const out: RuleViolations[] = [];
		for (const phase of RULE_PHASES) {
			for (const { entry: rule } of rules.categories[phase]) {
				if (!ruleApplies(rule, canonical)) continue;
				const violations = yield* checkRule(
					rule,
					canonical,
					content,
					rules.rootDir,
					registry,
				);
				if (violations.length > 0) {
					out.push({
						filePath: canonical,
						rootDir: rules.rootDir,
						message: rule.message,
						violations,
					});
				}
			}
		}
		return out;
	});

const compareText = (a: string, b: string): number =>
	a < b ? -1 : a > b ? 1 : 0;

interface RuleCache {
	readonly rules: ReadonlyMap<string, CollectedRuleSet>;
	readonly errors: ReadonlyArray<string>;
}

/**
 * Resolves every distinct parent directory once, in sorted order.
 *
 * @effect Effect<RuleCache, NoRootFound | InvalidRule>
 */
const cacheRules = (
	files: ReadonlyArray<string>,
): Effect.Effect<RuleCache, NoRootFound | InvalidRule> =>
	Effect.gen(function* () {
		const dirs = [...new Set(files.map((f) => path.dirname(f)))].sort(
			compareText,
		);
		const rules = new Map<string, CollectedRuleSet>();
		const errors: string[] = [];
		for (const dir of dirs) {
			const resolved = yield* pipe(
				resolveEffectiveRules(dir),
				Effect.catchTag("RuleFileParseError", (e) => Effect.succeed(e)),
			);
			if (resolved instanceof RuleFileParseError) {
				errors.push(`${dir}: ${describeError(resolved)}`);
			} else {
				rules.set(dir, resolved);
			}
		}
		return { rules, errors };
	});

/**
 * Files whose directory failed to resolve are skipped; the directory error is reported instead.
 */
const validateCached = (
	file: string,
	cache: RuleCache,
	registry: ValidatorRegistry,
): Effect.Effect<ReadonlyArray<RuleViolations>, FileError> => {
	const rules = cache.rules.get(path.dirname(file));
	return rules === undefined
		? Effect.succeed([])
		: validateFile(file, rules, registry);
};

/**
 * Validates files and directories against their effective rules.
 *
 * @effect Effect<ValidationReport, NoRootFound | InvalidRule>
 * @postcondition report.errors = directory errors, then file errors, each sorted
 * @postcondition report.lines are sorted by `options.sort` (default "rule")
 */
export const runValidate = (
	paths: ReadonlyArray<string>,
	options: RunValidateOptions = {},
): Effect.Effect<ValidationReport, NoRootFound | InvalidRule> =>
	Effect.gen(function* () {
		const sort = options.sort ?? "rule";
		const registry = withDefaults(defaultRegistry, options.registry ?? new Map());

		const rootConfig = yield* rootConfigForPaths(paths);
		const expansion = yield* expandPaths(paths, rootConfig);
		const cache = yield* cacheRules(expansion.files);

		const results = yield* Effect.forEach(
			expansion.files,
			(file) =>
				Effect.map(
					Effect.either(validateCached(file, cache, registry)),
					(result) => ({ file, result }),
				),
			{ concurrency: "unbounded" },
		);

		const dirErrors = [
			...cache.errors,
			...expansion.errors.map((e) => `${e.path}: ${e.detail}`),
		].sort(compareText);
		const fileErrors = results
			.flatMap(({ file, result }) =>
				Either.isLeft(result) ? [`${file}: ${describeError(result.left)}`] : [],
			)
			.sort(compareText);
		const violations = flattenViolations(
			results.flatMap(({ result }) =>
				Either.isRight(result) ? result.right : [],
			),
		);

		return {
			errors: [...dirErrors, ...fileErrors],
			lines: formatViolations(violations, sort),
			violationCount: violations.length,
		};
	});
