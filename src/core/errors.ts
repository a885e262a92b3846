// CHANGE: Typed domain error ADT using Effect.Data
// WHY: Failures are explicit variants in Effect signatures, never thrown across modules
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

import { ROOT_MARKER_NAME } from "./rule/names.js";

/**
 * No root marker in the start directory or any ancestor.
 *
 * @pure true (Data class)
 * @complexity O(1)
 */
export class NoRootFound extends Data.TaggedError("NoRootFound")<{
	readonly start: string;
}> {}

/**
 * Rule entry violating its variant's structural invariants.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InvalidRule extends Data.TaggedError("InvalidRule")<{
	readonly label: string;
	readonly detail: string;
}> {}

/**
 * Rule file or root marker that cannot be read or is not a valid document.
 */
export class RuleFileParseError extends Data.TaggedError("RuleFileParseError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Target file unreadable or not valid UTF-8.
 */
export class FileReadError extends Data.TaggedError("FileReadError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command rule whose program could not be started.
 */
export class CommandSpawnError extends Data.TaggedError("CommandSpawnError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Validator-backed rule with no registered implementation.
 */
export class MissingValidator extends Data.TaggedError("MissingValidator")<{
	readonly key: string;
}> {}

/**
 * Registered validator that threw while checking a file.
 */
export class ValidatorFailed extends Data.TaggedError("ValidatorFailed")<{
	readonly key: string;
	readonly detail: string;
}> {}

/**
 * Fatal configuration errors: abort the whole run.
 */
export type ConfigurationError = NoRootFound | InvalidRule;

/**
 * Errors scoped to a single target file.
 */
export type FileError =
	| FileReadError
	| CommandSpawnError
	| MissingValidator
	| ValidatorFailed;

export type AppError = ConfigurationError | RuleFileParseError | FileError;

/**
 * Human-readable reason, without the path or directory the error is reported under.
 *
 * @pure true
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "NoRootFound" },
			(e) => `No ${ROOT_MARKER_NAME} found from ${e.start}`,
		)
		.with({ _tag: "InvalidRule" }, (e) => `Rule '${e.label}': ${e.detail}`)
		.with({ _tag: "RuleFileParseError" }, (e) => `${e.path}: ${e.detail}`)
		.with({ _tag: "FileReadError" }, (e) => e.detail)
		.with(
			{ _tag: "CommandSpawnError" },
			(e) => `Failed to run '${e.command}': ${e.detail}`,
		)
		.with({ _tag: "MissingValidator" }, (e) => `No validator registered for ${e.key}`)
		.with(
			{ _tag: "ValidatorFailed" },
			(e) => `Validator ${e.key} failed: ${e.detail}`,
		)
		.exhaustive();
