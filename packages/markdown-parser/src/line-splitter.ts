/**
 * Splits text into lines.
 *
 * Supported line endings:
 *   - LF      -> "\n"   (line feed)
 *   - CRLF    -> "\r\n" (carriage return + line feed)
 *   - CR      -> "\r"   (carriage return)
 *
 * A trailing line ending does not produce an empty last line.
 *
 * @example
 * ```ts
 * splitLines("Hello\nWorld\r\nTest\r"); // ["Hello", "World", "Test"]
 * ```
 */
export function splitLines(text: string): string[] {
	const lines: string[] = [];

	let lineStartIndex = 0; // Start index of the current candidate line.

	for (let i = 0; i < text.length; i++) {
		const currentChar = text[i];

		if (currentChar === "\n") {
			lines.push(text.slice(lineStartIndex, i));
			lineStartIndex = i + 1;
		} else if (currentChar === "\r") {
			lines.push(text.slice(lineStartIndex, i));

			// Skip the "\n" of a CRLF sequence so it does not end another (empty) line.
			if (text[i + 1] === "\n") i += 1;
			lineStartIndex = i + 1;
		}
	}

	if (lineStartIndex < text.length) lines.push(text.slice(lineStartIndex));

	return lines;
}

/**
 * Rewrites CRLF line endings as LF. A lone CR is left in place.
 */
export function normalizeLineEndings(text: string): string {
	return text.replaceAll("\r\n", "\n");
}
