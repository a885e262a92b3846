// CHANGE: Line splitting shared by the tokenizer and line checks
// PURITY: CORE
// INVARIANT: A trailing newline does not produce an extra empty line; "\r\n" counts as one break
// COMPLEXITY: O(n)

/**
 * Splits text into lines without terminators.
 *
 * @pure true
 * @example splitLines("a\r\nb\n") → ["a", "b"]
 */
export const splitLines = (content: string): ReadonlyArray<string> => {
	if (content.length === 0) return [];
	const body = content.endsWith("\n") ? content.slice(0, -1) : content;
	return body
		.split("\n")
		.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
};

const encoder = new TextEncoder();

/**
 * 1-based UTF-8 byte column of a UTF-16 index within a line.
 *
 * @pure true
 * @example byteColumn("é=x", 2) === 4
 */
export const byteColumn = (line: string, index: number): number =>
	encoder.encode(line.slice(0, index)).length + 1;
