// CHANGE: Flattening, total ordering and line formatting of violations
// WHY: Output must be byte-identical across runs regardless of worker scheduling
// PURITY: CORE
// FORMAT THEOREM: ∀ xs, m: sortViolations(sortViolations(xs, m), m) = sortViolations(xs, m)
// INVARIANT: Comparison is by UTF-16 code units, independent of locale
// COMPLEXITY: O(n log n)

import { match } from "ts-pattern";

import type {
	FlatViolation,
	SortMode,
	Violation,
} from "../types/index.js";

/**
 * Violations of one rule against one file.
 */
export interface RuleViolations {
	readonly filePath: string;
	readonly rootDir: string;
	readonly message: string;
	readonly violations: ReadonlyArray<Violation>;
}

/**
 * Path relative to `rootDir`, or unchanged when outside it.
 *
 * @pure true
 * @example relativeTo("/r", "/r/src/a.kt") === "src/a.kt"
 */
export const relativeTo = (rootDir: string, filePath: string): string => {
	const prefix = rootDir.endsWith("/") ? rootDir : `${rootDir}/`;
	return filePath.startsWith(prefix) ? filePath.slice(prefix.length) : filePath;
};

/**
 * @pure true
 * @postcondition text/regex → found = ""; command → line = col = 0; findings → col = 1
 */
export const flattenViolations = (
	groups: ReadonlyArray<RuleViolations>,
): ReadonlyArray<FlatViolation> =>
	groups.flatMap((g) => {
		const file = relativeTo(g.rootDir, g.filePath);
		return g.violations.map(
			(v): FlatViolation =>
				match(v)
					.with({ _tag: "Line" }, (l) => ({
						message: g.message,
						file,
						line: l.line,
						col: l.col,
						found: "",
						output: "",
					}))
					.with({ _tag: "Command" }, (c) => ({
						message: g.message,
						file,
						line: 0,
						col: 0,
						found: "",
						output: c.output,
					}))
					.with({ _tag: "Finding" }, (f) => ({
						message: g.message,
						file,
						line: f.line,
						col: 1,
						found: f.found,
						output: "",
					}))
					.exhaustive(),
		);
	});

const compareText = (a: string, b: string): number =>
	a < b ? -1 : a > b ? 1 : 0;

const compareNumber = (a: number, b: number): number => a - b;

type Key = (a: FlatViolation, b: FlatViolation) => number;

const byMessage: Key = (a, b) => compareText(a.message, b.message);
const byFile: Key = (a, b) => compareText(a.file, b.file);
const byLine: Key = (a, b) => compareNumber(a.line, b.line);
const byCol: Key = (a, b) => compareNumber(a.col, b.col);
const byFound: Key = (a, b) => compareText(a.found, b.found);
const byOutput: Key = (a, b) => compareText(a.output, b.output);

const ORDER: Readonly<Record<SortMode, ReadonlyArray<Key>>> = {
	rule: [byMessage, byFile, byLine, byCol, byFound, byOutput],
	file: [byFile, byLine, byCol, byMessage, byFound, byOutput],
};

/**
 * Total order: `rule` = message, file, line, col; `file` = file, line, col, message.
 * Remaining ties fall to found text, then command output.
 *
 * @pure true
 */
export const sortViolations = (
	violations: ReadonlyArray<FlatViolation>,
	mode: SortMode,
): ReadonlyArray<FlatViolation> => {
	const keys = ORDER[mode];
	return [...violations].sort((a, b) => {
		for (const key of keys) {
			const c = key(a, b);
			if (c !== 0) return c;
		}
		return 0;
	});
};

/**
 * @pure true
 * @example formatViolation({ message: "m", file: "a.kt", line: 2, col: 5, found: "", output: "" }, "file") === "a.kt:2:5: m"
 */
export const formatViolation = (v: FlatViolation, mode: SortMode): string => {
	const suffix = v.found.length > 0 ? ` [ found: ${v.found} ]` : "";
	const position = v.line === 0 ? v.file : `${v.file}:${v.line}:${v.col}`;
	return mode === "rule"
		? `${v.message}: ${position}${suffix}`
		: `${position}: ${v.message}${suffix}`;
};

/**
 * Sorts, then formats; non-empty command output follows its violation line.
 *
 * @pure true
 */
export const formatViolations = (
	violations: ReadonlyArray<FlatViolation>,
	mode: SortMode,
): ReadonlyArray<string> =>
	sortViolations(violations, mode).flatMap((v) =>
		v.output.length > 0
			? [formatViolation(v, mode), v.output]
			: [formatViolation(v, mode)],
	);
