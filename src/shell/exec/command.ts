// CHANGE: External command execution for command rules
// WHY: A command rule delegates its verdict to an external program's exit status
// PURITY: SHELL
// EFFECT: Effect<CommandViolation | undefined, CommandSpawnError>
// INVARIANT: No shell is involved; `{file}` is substituted before splitting on whitespace
// COMPLEXITY: O(|output|); no timeout

import { spawn } from "node:child_process";

import { Effect } from "effect";

import { CommandSpawnError } from "../../core/errors.js";
import type { CommandViolation } from "../../core/types/index.js";

/**
 * Program and arguments of a command template.
 *
 * @pure true
 * @example commandArgv("lint --strict {file}", "/r/a.kt") → ["lint", "--strict", "/r/a.kt"]
 */
export const commandArgv = (
	template: string,
	filePath: string,
): ReadonlyArray<string> =>
	template
		.split("{file}")
		.join(filePath)
		.split(/\s+/u)
		.filter((part) => part.length > 0);

/**
 * stdout first, then stderr, trimmed.
 *
 * @pure true
 */
export const combineOutput = (stdout: string, stderr: string): string =>
	`${stdout}${stderr}`.trim();

/**
 * Runs the command against a file.
 *
 * @returns undefined on exit 0 or an empty command; a violation on any other exit or a signal
 * @effect Effect<CommandViolation | undefined, CommandSpawnError>
 */
export const runCommand = (
	template: string,
	filePath: string,
): Effect.Effect<CommandViolation | undefined, CommandSpawnError> => {
	const [program, ...args] = commandArgv(template, filePath);
	if (program === undefined) return Effect.succeed(undefined);

	return Effect.async<CommandViolation | undefined, CommandSpawnError>(
		(resume) => {
			const stdout: Buffer[] = [];
			const stderr: Buffer[] = [];
			let settled = false;
			const settle = (
				result: Effect.Effect<CommandViolation | undefined, CommandSpawnError>,
			): void => {
				if (settled) return;
				settled = true;
				resume(result);
			};
			const child = spawn(program, args, {
				shell: false,
				stdio: ["ignore", "pipe", "pipe"],
			});
			child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
			child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
			// INVARIANT: "error" may be followed by "close"; the first event decides
			child.on("error", (error) => {
				settle(
					Effect.fail(
						new CommandSpawnError({ command: program, detail: error.message }),
					),
				);
			});
			child.on("close", (code) => {
				if (code === 0) {
					settle(Effect.succeed(undefined));
					return;
				}
				const violation: CommandViolation = {
					_tag: "Command",
					output: combineOutput(
						Buffer.concat(stdout).toString("utf8"),
						Buffer.concat(stderr).toString("utf8"),
					),
				};
				settle(Effect.succeed(violation));
			});
		},
	);
};
