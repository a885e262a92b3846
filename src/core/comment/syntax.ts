// CHANGE: Built-in comment syntaxes
// PURITY: CORE
// INVARIANT: Rust doc comments (`///`, `//!`) never reach comment-language checks

import { match } from "ts-pattern";

import type {
	Comment,
	CommentLang,
	CommentSource,
	CommentSyntax,
} from "../types/index.js";
import { extractComments } from "./tokenizer.js";

const cFamily: CommentSyntax = {
	lineMarkers: ["//"],
	blockMarkers: [{ start: "/*", end: "*/" }],
};

export const builtinSyntaxes: Readonly<Record<CommentLang, CommentSyntax>> = {
	java: cFamily,
	kotlin: cFamily,
	rust: cFamily,
};

/**
 * Doc comments tokenize as `//` followed by text starting with `/` or `!`.
 *
 * @pure true
 */
const isRustDocComment = (comment: Comment): boolean =>
	comment.text.startsWith("/") || comment.text.startsWith("!");

/**
 * Comments of a file according to the rule's comment source.
 *
 * @pure true
 */
export const commentsFor = (
	source: CommentSource,
	content: string,
): ReadonlyArray<Comment> =>
	match(source)
		.with({ _tag: "Custom" }, ({ syntax }) => extractComments(content, syntax))
		.with({ _tag: "Lang", lang: "rust" }, ({ lang }) =>
			extractComments(content, builtinSyntaxes[lang]).filter(
				(c) => !isRustDocComment(c),
			),
		)
		.with({ _tag: "Lang" }, ({ lang }) =>
			extractComments(content, builtinSyntaxes[lang]),
		)
		.exhaustive();
