import { buildDocument, extractTitle } from "@mdsite/markdown-parser";

export const TITLE_PLACEHOLDER = "{{ Title }}";
export const CONTENT_PLACEHOLDER = "{{ Content }}";

/**
 * Replaces every title placeholder, then every content placeholder. The values are inserted literally.
 */
export function fillTemplate(
	template: string,
	page: { title: string; content: string },
): string {
	return template
		.replaceAll(TITLE_PLACEHOLDER, () => page.title)
		.replaceAll(CONTENT_PLACEHOLDER, () => page.content);
}

/**
 * Points root-relative `href="/..."` and `src="/..."` attributes at `basePath`, so a site can be served from a sub-path.
 *
 * @example
 * ```ts
 * rewriteRootRelativeUrls('<a href="/blog">', "/docs/"); // '<a href="/docs/blog">'
 * ```
 */
export function rewriteRootRelativeUrls(html: string, basePath: string): string {
	return html
		.replaceAll('href="/', () => `href="${basePath}`)
		.replaceAll('src="/', () => `src="${basePath}`);
}

/**
 * Renders a markdown document into the template and rewrites its root-relative urls.
 *
 * Errors from the markdown parser, including a missing `# ` title, are not caught.
 */
export function renderPage({
	markdown,
	template,
	basePath = "/",
}: {
	markdown: string;
	template: string;
	basePath?: string;
}): string {
	const content = buildDocument(markdown).render();
	const title = extractTitle(markdown);
	return rewriteRootRelativeUrls(fillTemplate(template, { title, content }), basePath);
}
