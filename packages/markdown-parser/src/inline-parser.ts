import { UnclosedDelimiterError } from "./errors";
import {
	imageSpan,
	linkSpan,
	plainSpan,
	type StyledSpanType,
	styledSpan,
	type TextSpan,
} from "./text-span";

/**
 * Delimiter passes, applied in this order after images and links have been extracted.
 */
const DELIMITERS: ReadonlyArray<{ delimiter: string; type: StyledSpanType }> = [
	{ delimiter: "**", type: "bold" },
	{ delimiter: "_", type: "italic" },
	{ delimiter: "`", type: "code" },
];

/**
 * Converts a line of inline markdown into text spans.
 *
 * Images are extracted first, then links, then bold, italic and code in that order. Every pass only looks at plain spans, so styles never nest.
 *
 * @example
 * ```ts
 * tokenize("This is **bold** text");
 * // [
 * //   { type: "plain", text: "This is " },
 * //   { type: "bold", text: "bold" },
 * //   { type: "plain", text: " text" },
 * // ]
 * ```
 * @throws {UnclosedDelimiterError} If a delimiter appears an odd number of times in a plain span.
 */
export function tokenize(text: string): TextSpan[] {
	let spans: TextSpan[] = [plainSpan(text)];
	spans = splitSpansOnImages(spans);
	spans = splitSpansOnLinks(spans);
	for (const { delimiter, type } of DELIMITERS) {
		spans = splitSpansOnDelimiter(spans, delimiter, type);
	}
	return spans;
}

/**
 * Splits every plain span on the given delimiter. The parts alternate plain and styled, starting and ending with plain, so a delimiter at the very start or end of the text leaves an empty plain span behind.
 */
export function splitSpansOnDelimiter(
	spans: ReadonlyArray<TextSpan>,
	delimiter: string,
	type: StyledSpanType,
): TextSpan[] {
	const result: TextSpan[] = [];
	for (const span of spans) {
		if (span.type !== "plain") {
			result.push(span);
			continue;
		}

		const parts = span.text.split(delimiter);
		if (parts.length === 1) {
			result.push(span);
			continue;
		}

		// An even number of parts means an odd number of delimiters, i.e. one was never closed.
		if (parts.length % 2 === 0) throw new UnclosedDelimiterError(delimiter);

		parts.forEach((part, index) => {
			result.push(index % 2 === 0 ? plainSpan(part) : styledSpan(type, part));
		});
	}
	return result;
}

export function splitSpansOnImages(spans: ReadonlyArray<TextSpan>): TextSpan[] {
	return splitSpansOnMatches(spans, findImages, (match) =>
		imageSpan(match.text, match.url),
	);
}

export function splitSpansOnLinks(spans: ReadonlyArray<TextSpan>): TextSpan[] {
	return splitSpansOnMatches(spans, findLinks, (match) =>
		linkSpan(match.text, match.url),
	);
}

/**
 * Returns the `[alt, url]` pairs of every `![alt](url)` in the text.
 */
export function extractImages(text: string): Array<[string, string]> {
	return findImages(text).map((match): [string, string] => [
		match.text,
		match.url,
	]);
}

/**
 * Returns the `[text, url]` pairs of every `[text](url)` in the text that is not an image.
 */
export function extractLinks(text: string): Array<[string, string]> {
	return findLinks(text).map((match): [string, string] => [
		match.text,
		match.url,
	]);
}

interface BracketMatch {
	/** Index of the first character of the match (the `!` for images, the `[` for links). */
	start: number;
	/** Index one past the closing `)`. */
	end: number;
	text: string;
	url: string;
}

/**
 * Replaces the matched regions of each plain span with new spans, keeping the text between and around the matches as plain spans.
 *
 * No empty plain span is emitted for the gaps: a match at the very start or end of the text has no plain neighbour on that side. A span without any match is passed through as the same object.
 */
function splitSpansOnMatches(
	spans: ReadonlyArray<TextSpan>,
	find: (text: string) => BracketMatch[],
	toSpan: (match: BracketMatch) => TextSpan,
): TextSpan[] {
	const result: TextSpan[] = [];
	for (const span of spans) {
		if (span.type !== "plain") {
			result.push(span);
			continue;
		}

		const text = span.text;
		const matches = find(text);
		if (matches.length === 0) {
			result.push(span);
			continue;
		}

		let lastEnd = 0;
		for (const match of matches) {
			const before = text.slice(lastEnd, match.start);
			if (before.length > 0) result.push(plainSpan(before));
			result.push(toSpan(match));
			lastEnd = match.end;
		}
		if (lastEnd < text.length) result.push(plainSpan(text.slice(lastEnd)));
	}
	return result;
}

/**
 * Finds every `![alt](url)`, scanning left to right without overlaps.
 */
function findImages(text: string): BracketMatch[] {
	const matches: BracketMatch[] = [];
	let characterCursor = 0;
	while (characterCursor < text.length) {
		if (
			text.charAt(characterCursor) === "!" &&
			text.charAt(characterCursor + 1) === "["
		) {
			const match = matchBracketAndParens(text, characterCursor + 1);
			if (match !== null) {
				matches.push({ ...match, start: characterCursor });
				characterCursor = match.end;
				continue;
			}
		}
		characterCursor++;
	}
	return matches;
}

/**
 * Finds every `[text](url)` whose opening bracket is not immediately preceded by `!`.
 *
 * The check looks at the character in the text being scanned, so a `!` that was left over from a failed image match still disqualifies the bracket that follows it.
 */
function findLinks(text: string): BracketMatch[] {
	const matches: BracketMatch[] = [];
	let characterCursor = 0;
	while (characterCursor < text.length) {
		if (
			text.charAt(characterCursor) === "[" &&
			(characterCursor === 0 || text.charAt(characterCursor - 1) !== "!")
		) {
			const match = matchBracketAndParens(text, characterCursor);
			if (match !== null) {
				matches.push(match);
				characterCursor = match.end;
				continue;
			}
		}
		characterCursor++;
	}
	return matches;
}

/**
 * Matches `[text](url)` starting at the `[` at `openerIndex`. The text may not contain `[` or `]`, and the url may not contain `(` or `)`.
 *
 * ┌───┬───┬───┬───┬───┬───┬───┬───┐
 * │ 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 |
 * ├───┼───┼───┼───┼───┼───┼───┼───┤
 * │ [ | a | ] | ( | u | r | l | ) |
 * └───┴───┴───┴───┴───┴───┴───┴───┘
 *   ▲       ▲   ▲               ▲
 *   opener  │   │               end - 1
 *           └───┘ must be adjacent
 *
 * @returns The match, or null if the text at `openerIndex` is not a complete bracket/parenthesis pair.
 */
function matchBracketAndParens(
	text: string,
	openerIndex: number,
): BracketMatch | null {
	const labelEnd = scanUntil(text, openerIndex + 1, "]", "[");
	if (labelEnd === -1) return null;

	if (text.charAt(labelEnd + 1) !== "(") return null;

	const urlEnd = scanUntil(text, labelEnd + 2, ")", "(");
	if (urlEnd === -1) return null;

	return {
		start: openerIndex,
		end: urlEnd + 1,
		text: text.slice(openerIndex + 1, labelEnd),
		url: text.slice(labelEnd + 2, urlEnd),
	};
}

/**
 * Returns the index of the first `closer` at or after `startIndex`, or -1 if the text ends or `forbidden` shows up first.
 */
function scanUntil(
	text: string,
	startIndex: number,
	closer: string,
	forbidden: string,
): number {
	for (let i = startIndex; i < text.length; i++) {
		const character = text.charAt(i);
		if (character === closer) return i;
		if (character === forbidden) return -1;
	}
	return -1;
}
