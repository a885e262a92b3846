// CHANGE: Line-oriented text and regex checks
// WHY: Forbidden texts and patterns report at most one hit per line
// PURITY: CORE
// INVARIANT: Per line, the first keyword in declared order that occurs wins,
//            even when a later keyword occurs earlier in the line
// COMPLEXITY: O(l · k · w) where l = lines, k = keywords, w = line width

import type { LineViolation, RegexRule, TextRule } from "../types/index.js";
import { byteColumn, splitLines } from "../text/lines.js";

/** UTF-16 index of the reported hit, or undefined when the line is clean. */
type Locate = (line: string) => number | undefined;

const scanLines = (
	content: string,
	locate: Locate,
): ReadonlyArray<LineViolation> =>
	splitLines(content).flatMap((text, i): ReadonlyArray<LineViolation> => {
		const index = locate(text);
		return index === undefined
			? []
			: [
					{
						_tag: "Line",
						line: i + 1,
						col: byteColumn(text, index),
						lineText: text,
					},
				];
	});

/**
 * @pure true
 * @example checkText(rule(["alpha", "beta"]), "beta alpha") → [{ line: 1, col: 6, lineText: "beta alpha" }]
 */
export const checkText = (
	rule: TextRule,
	content: string,
): ReadonlyArray<LineViolation> =>
	scanLines(content, (line) => {
		for (const keyword of rule.keywords) {
			const index = line.indexOf(keyword);
			if (index !== -1) return index;
		}
		return undefined;
	});

/**
 * Patterns are non-global, so `exec` starts at index 0 on every call.
 *
 * @pure true
 */
export const checkRegex = (
	rule: RegexRule,
	content: string,
): ReadonlyArray<LineViolation> =>
	scanLines(content, (line) => {
		for (const pattern of rule.patterns) {
			const hit = pattern.exec(line);
			if (hit !== null) return hit.index;
		}
		return undefined;
	});
