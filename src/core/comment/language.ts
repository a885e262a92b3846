// CHANGE: Script detection for comment-language checks
// PURITY: CORE
// COMPLEXITY: O(n)

const JAPANESE_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0x3040, 0x309f], // Hiragana
	[0x30a0, 0x30ff], // Katakana
	[0x4e00, 0x9fff], // CJK Unified Ideographs
	[0x31f0, 0x31ff], // Katakana Phonetic Extensions
	[0xff65, 0xff9f], // Halfwidth Katakana
];

/**
 * @pure true
 * @example containsJapanese("日本語 text") === true
 */
export const containsJapanese = (text: string): boolean => {
	for (const ch of text) {
		const code = ch.codePointAt(0) ?? 0;
		if (JAPANESE_RANGES.some(([lo, hi]) => code >= lo && code <= hi)) {
			return true;
		}
	}
	return false;
};

/**
 * Empty text or a lone `*` left over from block comment decoration.
 *
 * @pure true
 */
export const isDecoration = (text: string): boolean => {
	const trimmed = text.trim();
	return trimmed.length === 0 || trimmed === "*";
};

const MAX_FOUND = 40;

/**
 * Truncates to 40 characters, appending `...` when cut.
 *
 * @pure true
 */
export const truncateFound = (text: string): string => {
	const chars = Array.from(text);
	return chars.length > MAX_FOUND
		? `${chars.slice(0, MAX_FOUND).join("")}...`
		: text;
};
