// CHANGE: Tests for report printing and exit codes
// PURITY: SHELL (console spies)

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { printLines, printReport } from "../../../src/shell/output/printer.js";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("printReport", () => {
	it("writes errors to stderr and lines to stdout", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		const code = await Effect.runPromise(
			printReport({
				errors: ["a.kt: boom"],
				lines: ["m: a.kt", "output"],
				violationCount: 1,
			}),
		);

		expect(code).toBe(1);
		expect(error.mock.calls).toEqual([["a.kt: boom"]]);
		expect(log.mock.calls).toEqual([["m: a.kt"], ["output"]]);
	});

	it("exits 0 for an empty report", async () => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		expect(
			await Effect.runPromise(
				printReport({ errors: [], lines: [], violationCount: 0 }),
			),
		).toBe(0);
	});
});

describe("printLines", () => {
	it("prints one line per item", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		await Effect.runPromise(printLines(["review: Check naming"]));
		expect(log.mock.calls).toEqual([["review: Check naming"]]);
	});
});
