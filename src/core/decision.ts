// CHANGE: Pure decision function computing the exit code
// WHY: Centralize termination logic in Functional Core
// FORMAT THEOREM: ∀s ∈ State: (s.hasViolations ∨ s.hasErrors) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode, ValidationReport } from "./models.js";

/**
 * Computes process exit code from run state.
 *
 * @returns 1 if any violation or error was reported; otherwise 0
 *
 * @pure true
 * @postcondition (state.hasViolations ∨ state.hasErrors) → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hasViolations: true, hasErrors: false }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasViolations || s.hasErrors,
		(failed): ExitCode => (failed ? 1 : 0),
	);

/**
 * Decision state of a finished report.
 *
 * @pure true
 */
export const decisionOf = (report: ValidationReport): DecisionState => ({
	hasViolations: report.violationCount > 0,
	hasErrors: report.errors.length > 0,
});
