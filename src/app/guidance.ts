// CHANGE: Guideline and review listing for a directory or file
// WHY: Auxiliary items share resolution with rules but are never enforced
// PURITY: APP
// EFFECT: Effect<ReadonlyArray<string>, NoRootFound | InvalidRule | RuleFileParseError>
// INVARIANT: Items keep root-to-target declaration order
// COMPLEXITY: O(depth + |items|)

import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect } from "effect";

import type {
	InvalidRule,
	NoRootFound,
	RuleFileParseError,
} from "../core/errors.js";
import { extAllows } from "../core/filter/filters.js";
import { formatGuidance } from "../core/format/guidance.js";
import { matches } from "../core/matcher/matcher.js";
import type {
	GuidanceCategory,
	GuidanceItem,
	Sourced,
} from "../core/types/index.js";
import { canonicalPath } from "../shell/rules/root.js";
import { resolveEffectiveRules } from "../shell/rules/resolver.js";

const isFile = (target: string): Effect.Effect<boolean> =>
	Effect.promise(() =>
		fs.stat(target).then(
			(s) => s.isFile(),
			() => false,
		),
	);

/**
 * @pure true
 */
export const guidanceApplies = (
	item: GuidanceItem,
	canonicalFile: string,
): boolean =>
	matches(item.matcher, canonicalFile) &&
	extAllows(item.extFilter, path.basename(canonicalFile));

/**
 * Lists the guideline or review items effective for `target`.
 * A file target keeps only the items whose matcher and extension filter accept it.
 *
 * @effect Effect<ReadonlyArray<string>, NoRootFound | InvalidRule | RuleFileParseError>
 *
 * @example
 * ```ts
 * const lines = await Effect.runPromise(listGuidance("src/api/user.kt", "review"));
 * // ["review: Check error paths @ src/api"]
 * ```
 */
export const listGuidance = (
	target: string,
	category: GuidanceCategory,
): Effect.Effect<
	ReadonlyArray<string>,
	NoRootFound | InvalidRule | RuleFileParseError
> =>
	Effect.gen(function* () {
		const file = yield* isFile(target);
		const rules = yield* resolveEffectiveRules(
			file ? path.dirname(target) : target,
		);
		const items: ReadonlyArray<Sourced<GuidanceItem>> =
			rules.categories[category];
		if (!file) {
			return items.map((i) => formatGuidance(category, i, rules.rootDir));
		}
		const canonical = yield* canonicalPath(target);
		const scoped = items.filter((i) => guidanceApplies(i.entry, canonical));
		return scoped.map((i) => formatGuidance(category, i, rules.rootDir));
	});
