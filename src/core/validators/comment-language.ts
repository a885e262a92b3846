// CHANGE: Japanese/English comment validators on top of the generic tokenizer
// WHY: The default registry ships these two; other validator kinds are injected
// PURITY: CORE
// INVARIANT: Decoration-only comments never produce findings
// COMPLEXITY: O(n) over file content

import type {
	Comment,
	CommentLanguage,
	CommentLanguageRule,
	Finding,
	Validator,
	ValidatorInput,
	ValidatorKey,
	ValidatorRegistry,
} from "../types/index.js";
import {
	containsJapanese,
	isDecoration,
	truncateFound,
} from "../comment/language.js";
import { commentsFor } from "../comment/syntax.js";

/**
 * Comment lacking the language the rule requires.
 *
 * @pure true
 */
export const violatesLanguage = (
	language: CommentLanguage,
	comment: Comment,
): boolean => {
	if (isDecoration(comment.text)) return false;
	const japanese = containsJapanese(comment.text);
	return language === "japanese" ? !japanese : japanese;
};

const isCommentLanguageRule = (
	rule: ValidatorInput["rule"],
): rule is CommentLanguageRule => rule.kind === "comment_language";

const commentLanguageValidator = (language: CommentLanguage): Validator => ({
	validate: ({ content, rule }): ReadonlyArray<Finding> => {
		if (!isCommentLanguageRule(rule)) return [];
		return commentsFor(rule.source, content)
			.filter((c) => violatesLanguage(language, c))
			.map((c) => ({ line: c.line, found: truncateFound(c.text) }));
	},
});

export const japaneseCommentValidator = commentLanguageValidator("japanese");
export const englishCommentValidator = commentLanguageValidator("english");

/**
 * Registry used when the caller supplies none.
 */
export const defaultRegistry: ValidatorRegistry = new Map<
	ValidatorKey,
	Validator
>([
	["comment_language:japanese", japaneseCommentValidator],
	["comment_language:english", englishCommentValidator],
]);
