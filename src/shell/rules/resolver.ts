// CHANGE: Top-down merge of rule files along the ancestor chain
// WHY: A directory's effective rules are its own plus every ancestor's up to the root
// PURITY: SHELL
// EFFECT: Effect<CollectedRuleSet, NoRootFound | InvalidRule | RuleFileParseError>
// INVARIANT: Entries are ordered root-first, then by declaration order
// INVARIANT: A child's rule file never affects its parent's result
// COMPLEXITY: O(depth + |rules|)

import * as path from "node:path";

import { Effect } from "effect";

import {
	type InvalidRule,
	NoRootFound,
	type RuleFileParseError,
} from "../../core/errors.js";
import { ruleCategory } from "../../core/rule/convert.js";
import { ROOT_MARKER_NAME, RULE_FILE_NAME } from "../../core/rule/names.js";
import type {
	CollectedRuleSet,
	GuidanceItem,
	Rule,
	RuleFile,
	Sourced,
} from "../../core/types/index.js";
import { loadRootConfig, loadRuleFile, pathExists } from "./loader.js";
import { ancestorsOf, canonicalPath, isRootDir } from "./root.js";

interface Level {
	readonly dir: string;
	readonly file: RuleFile;
}

const tagged = <A>(
	levels: ReadonlyArray<Level>,
	pick: (file: RuleFile) => ReadonlyArray<A>,
): ReadonlyArray<Sourced<A>> =>
	levels.flatMap((level) =>
		pick(level.file).map((entry) => ({ entry, sourceDir: level.dir })),
	);

/**
 * Collects the effective rule set for `targetDir`.
 *
 * @effect Effect<CollectedRuleSet, NoRootFound | InvalidRule | RuleFileParseError>
 * @postcondition ∀ c: categories[c] = concat over root→target of each level's entries in c
 */
export const resolveEffectiveRules = (
	targetDir: string,
): Effect.Effect<
	CollectedRuleSet,
	NoRootFound | InvalidRule | RuleFileParseError
> =>
	Effect.gen(function* () {
		const start = yield* canonicalPath(targetDir);
		const levels: Level[] = [];

		for (const dir of ancestorsOf(start)) {
			const ruleFile = path.join(dir, RULE_FILE_NAME);
			if (yield* pathExists(ruleFile)) {
				levels.push({ dir, file: yield* loadRuleFile(ruleFile) });
			}
			if (yield* isRootDir(dir)) {
				const rootConfig = yield* loadRootConfig(
					path.join(dir, ROOT_MARKER_NAME),
				);
				const ordered = [...levels].reverse();
				const rules: ReadonlyArray<Sourced<Rule>> = tagged(
					ordered,
					(f) => f.rules,
				);
				const guidance = (
					pick: (f: RuleFile) => ReadonlyArray<GuidanceItem>,
				): ReadonlyArray<Sourced<GuidanceItem>> => tagged(ordered, pick);
				return {
					rootDir: dir,
					rootConfig,
					categories: {
						required: rules.filter((r) => ruleCategory(r.entry) === "required"),
						forbidden: rules.filter(
							(r) => ruleCategory(r.entry) === "forbidden",
						),
						guideline: guidance((f) => f.guideline),
						review: guidance((f) => f.review),
					},
				};
			}
		}

		return yield* Effect.fail(new NoRootFound({ start: targetDir }));
	});
