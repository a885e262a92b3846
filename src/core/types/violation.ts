// CHANGE: Violation and finding shapes produced by rule checks
// WHY: Line checks, command checks and validators report through distinct variants
// PURITY: CORE
// INVARIANT: line = 0 ⇔ file-level finding; col ≥ 1 for line violations
// COMPLEXITY: O(1)

/**
 * Hit of a text or regex rule.
 *
 * @property col 1-based UTF-8 byte offset of the match
 * @property lineText The offending line, without its terminator
 */
export interface LineViolation {
	readonly _tag: "Line";
	readonly line: number;
	readonly col: number;
	readonly lineText: string;
}

/**
 * Non-zero exit of a command rule.
 */
export interface CommandViolation {
	readonly _tag: "Command";
	readonly output: string;
}

/**
 * Result item of a validator.
 *
 * @property line 1-based, or 0 for a file-level finding
 */
export interface Finding {
	readonly line: number;
	readonly found: string;
}

export interface FindingViolation extends Finding {
	readonly _tag: "Finding";
}

export type Violation = LineViolation | CommandViolation | FindingViolation;

/**
 * Violation tagged with its file and rule message, ready for sorting.
 *
 * @property file Path relative to the root directory
 * @property found Suffix printed as `[ found: X ]`; empty prints nothing
 * @property output Command output printed on the following line; empty prints nothing
 */
export interface FlatViolation {
	readonly message: string;
	readonly file: string;
	readonly line: number;
	readonly col: number;
	readonly found: string;
	readonly output: string;
}

/**
 * Ordering applied to the final violation list.
 */
export type SortMode = "rule" | "file";
