import {
	copyFile,
	mkdir,
	readdir,
	readFile,
	rm,
	writeFile,
} from "node:fs/promises";
import { dirname, join, relative } from "node:path";
import type { SiteConfig } from "./config";
import { PageGenerationError } from "./errors";
import { pathExists } from "./fs-utils";
import type { Logger } from "./logger";
import { renderPage } from "./page";

const MARKDOWN_EXTENSION = ".md";
const HTML_EXTENSION = ".html";

/**
 * Replaces `destination` with a recursive copy of `source`. Does nothing if `source` does not exist.
 */
export async function copyDirectory(
	source: string,
	destination: string,
	logger: Logger,
): Promise<void> {
	if (!(await pathExists(source))) return;

	await rm(destination, { recursive: true, force: true });
	await copyDirectoryContents(source, destination, logger);
}

async function copyDirectoryContents(
	source: string,
	destination: string,
	logger: Logger,
): Promise<void> {
	await mkdir(destination, { recursive: true });

	for (const entry of await readSortedDirectory(source)) {
		const from = join(source, entry.name);
		const to = join(destination, entry.name);
		if (entry.isDirectory()) {
			await copyDirectoryContents(from, to, logger);
		} else if (entry.isFile()) {
			await copyFile(from, to);
			logger.info(`Copied ${from} -> ${to}`);
		}
	}
}

export interface GeneratePageOptions {
	sourcePath: string;
	templatePath: string;
	destinationPath: string;
	basePath: string;
}

/**
 * Renders one markdown file into the template and writes the page, creating its directory.
 *
 * @throws {PageGenerationError} If a file cannot be read or written, or the markdown cannot be converted.
 */
export async function generatePage(
	options: GeneratePageOptions,
	logger: Logger,
): Promise<void> {
	const { sourcePath, templatePath, destinationPath, basePath } = options;
	logger.info(
		`Generating page from ${sourcePath} to ${destinationPath} using ${templatePath}`,
	);

	try {
		const [markdown, template] = await Promise.all([
			readFile(sourcePath, "utf8"),
			readFile(templatePath, "utf8"),
		]);
		const html = renderPage({ markdown, template, basePath });
		await mkdir(dirname(destinationPath), { recursive: true });
		await writeFile(destinationPath, html, "utf8");
	} catch (error) {
		throw new PageGenerationError(sourcePath, error);
	}
}

/**
 * Generates a page for every `.md` file under `contentDir`, keeping the directory structure under `outputDir`. Files are processed depth-first in name order and the first failure stops the run.
 *
 * @returns The paths of the written pages.
 */
export async function generatePagesRecursive(
	options: Pick<SiteConfig, "contentDir" | "templatePath" | "outputDir" | "basePath">,
	logger: Logger,
): Promise<string[]> {
	const { contentDir, templatePath, outputDir, basePath } = options;
	if (!(await pathExists(contentDir))) return [];

	const written: string[] = [];
	for (const sourcePath of await findMarkdownFiles(contentDir)) {
		const relativePath = relative(contentDir, sourcePath);
		const destinationPath = join(
			outputDir,
			relativePath.slice(0, -MARKDOWN_EXTENSION.length) + HTML_EXTENSION,
		);
		await generatePage({ sourcePath, templatePath, destinationPath, basePath }, logger);
		written.push(destinationPath);
	}
	return written;
}

/**
 * Copies the static directory into the output directory, then generates every page.
 */
export async function buildSite(
	config: SiteConfig,
	logger: Logger,
): Promise<string[]> {
	await copyDirectory(config.staticDir, config.outputDir, logger);
	const pages = await generatePagesRecursive(config, logger);
	logger.info(`Generated ${pages.length} page(s) in ${config.outputDir}`);
	return pages;
}

async function findMarkdownFiles(directory: string): Promise<string[]> {
	const files: string[] = [];
	for (const entry of await readSortedDirectory(directory)) {
		const path = join(directory, entry.name);
		if (entry.isDirectory()) {
			files.push(...(await findMarkdownFiles(path)));
		} else if (entry.isFile() && entry.name.endsWith(MARKDOWN_EXTENSION)) {
			files.push(path);
		}
	}
	return files;
}

async function readSortedDirectory(directory: string) {
	const entries = await readdir(directory, { withFileTypes: true });
	return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
