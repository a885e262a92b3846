// CHANGE: Generic lexical comment extraction driven by a syntax descriptor
// WHY: Comment-language and doc validators share one tokenizer across languages
// PURITY: CORE
// INVARIANT: Single forward pass; the only state is the active block end marker
// INVARIANT: Purely lexical; comment markers inside string literals are still matched
// COMPLEXITY: O(n · m) where n = |content|, m = |markers|

import type { BlockMarker, Comment, CommentSyntax } from "../types/index.js";
import { splitLines } from "../text/lines.js";

type Hit =
	| { readonly _tag: "Line"; readonly at: number; readonly marker: string }
	| { readonly _tag: "Block"; readonly at: number; readonly marker: BlockMarker };

/**
 * First index ≥ from where `marker` occurs, skipping a `//` preceded by `:`.
 *
 * @pure true
 * @returns -1 when absent
 */
const findMarker = (line: string, marker: string, from: number): number => {
	let at = line.indexOf(marker, from);
	while (marker === "//" && at > 0 && line[at - 1] === ":") {
		at = line.indexOf(marker, at + marker.length);
	}
	return at;
};

/**
 * Earliest marker on the line; ties go to line markers, then declaration order.
 *
 * @pure true
 */
const earliestHit = (
	line: string,
	from: number,
	syntax: CommentSyntax,
): Hit | undefined => {
	let best: Hit | undefined;
	for (const marker of syntax.lineMarkers) {
		const at = findMarker(line, marker, from);
		if (at !== -1 && (best === undefined || at < best.at)) {
			best = { _tag: "Line", at, marker };
		}
	}
	for (const marker of syntax.blockMarkers) {
		const at = findMarker(line, marker.start, from);
		if (at !== -1 && (best === undefined || at < best.at)) {
			best = { _tag: "Block", at, marker };
		}
	}
	return best;
};

/**
 * Extracts comments line by line.
 *
 * Outside a block the earliest marker wins: a line marker takes the rest of
 * the line; a block closed on the same line yields its body and scanning
 * continues after it; an unclosed block yields its non-empty tail and opens
 * block state. Inside a block every line yields its trimmed text until the
 * end marker, whose preceding text is kept only when non-empty.
 *
 * @pure true
 * @precondition every marker is non-empty
 * @complexity O(n · m)
 */
export const extractComments = (
	content: string,
	syntax: CommentSyntax,
): ReadonlyArray<Comment> => {
	const out: Comment[] = [];
	let openEnd: string | undefined;

	splitLines(content).forEach((text, index) => {
		const line = index + 1;
		let from = 0;

		if (openEnd !== undefined) {
			const close = text.indexOf(openEnd);
			if (close === -1) {
				out.push({ line, text: text.trim() });
				return;
			}
			const before = text.slice(0, close).trim();
			if (before.length > 0) out.push({ line, text: before });
			from = close + openEnd.length;
			openEnd = undefined;
		}

		for (;;) {
			const hit = earliestHit(text, from, syntax);
			if (hit === undefined) return;
			if (hit._tag === "Line") {
				out.push({ line, text: text.slice(hit.at + hit.marker.length).trim() });
				return;
			}
			const bodyStart = hit.at + hit.marker.start.length;
			const close = text.indexOf(hit.marker.end, bodyStart);
			if (close === -1) {
				const tail = text.slice(bodyStart).trim();
				if (tail.length > 0) out.push({ line, text: tail });
				openEnd = hit.marker.end;
				return;
			}
			out.push({ line, text: text.slice(bodyStart, close).trim() });
			from = close + hit.marker.end.length;
		}
	});

	return out;
};
