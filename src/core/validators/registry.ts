// CHANGE: Registry key derivation for validator-backed rules
// PURITY: CORE

import { match } from "ts-pattern";

import type {
	ValidatorKey,
	ValidatorRegistry,
	ValidatorRule,
} from "../types/index.js";

/**
 * @pure true
 * @example validatorKey(docRule) === "doc:kotlin"
 */
export const validatorKey = (rule: ValidatorRule): ValidatorKey =>
	match(rule)
		.with({ kind: "doc" }, (r): ValidatorKey => `doc:${r.language}`)
		.with(
			{ kind: "comment_language" },
			(r): ValidatorKey => `comment_language:${r.language}`,
		)
		.with({ kind: "test_name" }, (r): ValidatorKey => `test_name:${r.framework}`)
		.with(
			{ kind: "test_existence" },
			(r): ValidatorKey => `test_existence:${r.framework}`,
		)
		.exhaustive();

/**
 * Merges caller validators over the defaults; caller entries win.
 *
 * @pure true
 */
export const withDefaults = (
	defaults: ValidatorRegistry,
	extra: ValidatorRegistry,
): ValidatorRegistry => new Map([...defaults, ...extra]);
