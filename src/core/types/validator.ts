// CHANGE: Validator contract for language-specific heuristic checks
// WHY: Doc, test-name and test-existence checkers are plugged in from outside the engine
// PURITY: CORE (contract); implementations may read candidate test paths under rootDir
// INVARIANT: validate is deterministic for a fixed filesystem state
// COMPLEXITY: O(1)

import type { ValidatorRule } from "./rule.js";
import type { Finding } from "./violation.js";

export interface ValidatorInput<R extends ValidatorRule = ValidatorRule> {
	readonly filePath: string;
	readonly content: string;
	readonly rule: R;
	readonly rootDir: string;
}

export interface Validator {
	readonly validate: (input: ValidatorInput) => ReadonlyArray<Finding>;
}

/**
 * Registry key, e.g. `doc:kotlin` or `comment_language:japanese`.
 */
export type ValidatorKey = `${ValidatorRule["kind"]}:${string}`;

export type ValidatorRegistry = ReadonlyMap<ValidatorKey, Validator>;
