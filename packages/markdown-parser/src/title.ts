import { NoHeadingFoundError } from "./errors";
import { splitLines } from "./line-splitter";

const TITLE_MARKER = "# ";

/**
 * Returns the text of the first line that starts with `# ` (a level 1 heading), without surrounding whitespace.
 *
 * @example
 * ```ts
 * extractTitle("# First\n\n## Second\n\n# Another"); // "First"
 * ```
 * @throws {NoHeadingFoundError} If the document has no level 1 heading.
 */
export function extractTitle(markdown: string): string {
	for (const line of splitLines(markdown)) {
		if (line.startsWith(TITLE_MARKER)) {
			return line.slice(TITLE_MARKER.length).trim();
		}
	}
	throw new NoHeadingFoundError();
}
