// CHANGE: Functional Core run-outcome models (pure, immutable)
// WHY: Exit status is derived from values, never from termination side effects
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the validation process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Flags computed from a finished validation run.
 *
 * @remarks
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasViolations: boolean;
	readonly hasErrors: boolean;
}

/**
 * Outcome of `runValidate`.
 *
 * @property errors Directory errors, then file errors, each already formatted
 * @property lines Formatted violation lines (command output on its own line)
 */
export interface ValidationReport {
	readonly errors: ReadonlyArray<string>;
	readonly lines: ReadonlyArray<string>;
	readonly violationCount: number;
}
