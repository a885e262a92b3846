// CHANGE: Comment tokenizer type definitions
// WHY: One generic lexer is driven by per-language syntax descriptors
// PURITY: CORE
// INVARIANT: Comments are transient values, never persisted
// COMPLEXITY: O(1)

/**
 * Block comment delimiters.
 */
export interface BlockMarker {
	readonly start: string;
	readonly end: string;
}

/**
 * Syntax descriptor consumed by the tokenizer.
 *
 * @invariant Declaration order breaks ties between markers at the same column
 */
export interface CommentSyntax {
	readonly lineMarkers: ReadonlyArray<string>;
	readonly blockMarkers: ReadonlyArray<BlockMarker>;
}

/**
 * One extracted comment span.
 *
 * @property line 1-based line number
 * @property text Trimmed comment body
 */
export interface Comment {
	readonly line: number;
	readonly text: string;
}

export type CommentLang = "java" | "kotlin" | "rust";

/**
 * Where a comment rule takes its syntax from.
 */
export type CommentSource =
	| { readonly _tag: "Lang"; readonly lang: CommentLang }
	| { readonly _tag: "Custom"; readonly syntax: CommentSyntax };
