// CHANGE: Reading and decoding of rule files and root markers
// WHY: IO stays in SHELL; decoding and conversion are pure CORE functions
// PURITY: SHELL
// EFFECT: Effect<RuleFile, RuleFileParseError | InvalidRule>
// INVARIANT: A document that fails to parse never yields a partial RuleFile
// COMPLEXITY: O(n) where n = document size

import * as fs from "node:fs/promises";

import { Effect, Either, pipe } from "effect";
import { parse } from "yaml";

import { type InvalidRule, RuleFileParseError } from "../../core/errors.js";
import { convertRuleFile, toRootConfig } from "../../core/rule/convert.js";
import {
	decodeRootConfig,
	decodeRuleFile,
	type YamlValue,
} from "../../core/rule/raw.js";
import type { RootConfig, RuleFile } from "../../core/types/index.js";

const reason = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * True when `path` exists (any file type).
 *
 * @effect Effect<boolean>
 */
export const pathExists = (path: string): Effect.Effect<boolean> =>
	Effect.promise(() =>
		fs.access(path).then(
			() => true,
			() => false,
		),
	);

/**
 * Reads and parses a YAML document.
 *
 * @effect Effect<YamlValue, RuleFileParseError>
 */
export const readYaml = (
	path: string,
): Effect.Effect<YamlValue, RuleFileParseError> =>
	pipe(
		Effect.tryPromise({
			try: () => fs.readFile(path, "utf8"),
			catch: (e) =>
				new RuleFileParseError({
					path,
					detail: `Failed to read config file: ${reason(e)}`,
				}),
		}),
		Effect.flatMap((text) =>
			Effect.try({
				try: (): YamlValue => parse(text),
				catch: (e) =>
					new RuleFileParseError({
						path,
						detail: `Failed to parse YAML: ${reason(e)}`,
					}),
			}),
		),
	);

const decoded = <A>(
	path: string,
	result: Either.Either<A, string>,
): Effect.Effect<A, RuleFileParseError> =>
	Either.match(result, {
		onLeft: (detail) => Effect.fail(new RuleFileParseError({ path, detail })),
		onRight: (value) => Effect.succeed(value),
	});

/**
 * Loads one RuleFile.
 *
 * @effect Effect<RuleFile, RuleFileParseError | InvalidRule>
 * @postcondition rule order equals declaration order
 */
export const loadRuleFile = (
	path: string,
): Effect.Effect<RuleFile, RuleFileParseError | InvalidRule> =>
	Effect.gen(function* () {
		const doc = yield* readYaml(path);
		const raw = yield* decoded(path, decodeRuleFile(doc));
		return yield* convertRuleFile(raw);
	});

/**
 * Loads the root marker body; empty or comment-only bodies give defaults.
 *
 * @effect Effect<RootConfig, RuleFileParseError>
 */
export const loadRootConfig = (
	path: string,
): Effect.Effect<RootConfig, RuleFileParseError> =>
	Effect.gen(function* () {
		const doc = yield* readYaml(path);
		const raw = yield* decoded(path, decodeRootConfig(doc));
		return toRootConfig(raw);
	});
