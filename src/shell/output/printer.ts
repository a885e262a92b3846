// CHANGE: Report printing
// WHY: Console output is confined to SHELL; the exit code is computed in CORE
// PURITY: SHELL
// EFFECT: Effect<ExitCode>
// INVARIANT: Errors go to stderr before violations go to stdout
// COMPLEXITY: O(n) where n = |errors| + |lines|

import { Effect } from "effect";

import { computeExitCode, decisionOf } from "../../core/decision.js";
import type { ExitCode, ValidationReport } from "../../core/models.js";

/**
 * Prints a validation report.
 *
 * @returns 1 when any violation or error was reported
 * @effect Effect<ExitCode>
 */
export const printReport = (report: ValidationReport): Effect.Effect<ExitCode> =>
	Effect.sync(() => {
		for (const error of report.errors) console.error(error);
		for (const line of report.lines) console.log(line);
		return computeExitCode(decisionOf(report));
	});

/**
 * Prints guidance lines, one per item.
 *
 * @effect Effect<void>
 */
export const printLines = (lines: ReadonlyArray<string>): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of lines) console.log(line);
	});
