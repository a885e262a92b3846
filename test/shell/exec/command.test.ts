// CHANGE: Tests for command rule execution
// INVARIANT: Exit 0 is silent; any other exit carries trimmed stdout then stderr
// PURITY: SHELL (child processes of the current Node binary)

import * as path from "node:path";

import { Effect } from "effect";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import {
	combineOutput,
	commandArgv,
	runCommand,
} from "../../../src/shell/exec/command.js";
import { createTempTree, type TempTree } from "../../utils/tempTree.js";

describe("commandArgv", () => {
	it("substitutes the file before splitting", () => {
		expect(commandArgv("lint  --strict {file}", "/r/a.kt")).toEqual([
			"lint",
			"--strict",
			"/r/a.kt",
		]);
	});

	it("yields nothing for a blank template", () => {
		expect(commandArgv("   ", "/r/a.kt")).toEqual([]);
	});
});

describe("combineOutput", () => {
	it("puts stdout before stderr and trims", () => {
		expect(combineOutput("out\n", "err\n")).toBe("out\nerr");
	});
});

describe("runCommand", () => {
	let scripts: TempTree;

	beforeAll(() => {
		scripts = createTempTree({
			"fail.cjs":
				'process.stdout.write("out\\n");\nprocess.stderr.write("err\\n");\nprocess.exitCode = 2;\n',
			"pass.cjs": 'process.stdout.write("fine\\n");\n',
			"echo.cjs":
				"process.stdout.write(require('node:path').basename(process.argv[2]));\nprocess.exitCode = 1;\n",
		});
	});

	afterAll(() => {
		scripts.cleanup();
	});

	const node = (script: string, rest = ""): string =>
		`${process.execPath} ${path.join(scripts.root, script)} ${rest}`;

	it("returns the combined output on a non-zero exit", async () => {
		expect(await Effect.runPromise(runCommand(node("fail.cjs"), "/r/a.kt"))).toEqual(
			{ _tag: "Command", output: "out\nerr" },
		);
	});

	it("returns nothing on success", async () => {
		expect(
			await Effect.runPromise(runCommand(node("pass.cjs"), "/r/a.kt")),
		).toBeUndefined();
	});

	it("passes the file path as an argument", async () => {
		expect(
			await Effect.runPromise(runCommand(node("echo.cjs", "{file}"), "/r/Main.kt")),
		).toEqual({ _tag: "Command", output: "Main.kt" });
	});

	it("treats an empty template as passing", async () => {
		expect(await Effect.runPromise(runCommand("", "/r/a.kt"))).toBeUndefined();
	});

	it("fails when the program cannot be spawned", async () => {
		const error = await Effect.runPromise(
			Effect.flip(runCommand("cascade-lint-missing-program {file}", "/r/a.kt")),
		);
		expect(error._tag).toBe("CommandSpawnError");
		expect(error.command).toBe("cascade-lint-missing-program");
	});
});
