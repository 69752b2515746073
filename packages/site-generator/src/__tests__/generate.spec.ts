import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { NoHeadingFoundError } from "@mdsite/markdown-parser";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PageGenerationError } from "../errors";
import { pathExists } from "../fs-utils";
import {
	buildSite,
	copyDirectory,
	generatePage,
	generatePagesRecursive,
} from "../generate";
import { silentLogger } from "../logger";
import {
	createRecordingLogger,
	createTempDir,
	removeTempDir,
	TEMPLATE,
	writeFiles,
} from "./test-helpers";

describe("site generation", () => {
	let root: string;

	beforeEach(async () => {
		root = await createTempDir("generate");
		await writeFiles(root, {
			"content/index.md":
				"# Home\n\nWelcome to **the** site.\n\n![logo](/images/logo.png)",
			"content/blog/first-post.md": "# First post\n\n- one\n- two",
			"content/notes.txt": "not markdown",
			"static/index.css": "body { margin: 0; }",
			"static/images/logo.png": "not really a png",
			"template.html": TEMPLATE,
		});
	});

	afterEach(async () => {
		await removeTempDir(root);
	});

	describe("copyDirectory", () => {
		it("copies files and directories recursively", async () => {
			const logger = createRecordingLogger();
			await copyDirectory(join(root, "static"), join(root, "docs"), logger);

			expect(await readFile(join(root, "docs", "index.css"), "utf8")).toBe(
				"body { margin: 0; }",
			);
			expect(
				await readFile(join(root, "docs", "images", "logo.png"), "utf8"),
			).toBe("not really a png");
			expect(logger.infos).toEqual([
				`Copied ${join(root, "static", "images", "logo.png")} -> ${join(root, "docs", "images", "logo.png")}`,
				`Copied ${join(root, "static", "index.css")} -> ${join(root, "docs", "index.css")}`,
			]);
		});

		it("removes whatever was in the destination", async () => {
			await writeFiles(root, { "docs/stale.html": "old" });
			await copyDirectory(join(root, "static"), join(root, "docs"), silentLogger);
			expect(await pathExists(join(root, "docs", "stale.html"))).toBe(false);
		});

		it("does nothing when the source does not exist", async () => {
			await writeFiles(root, { "docs/kept.html": "kept" });
			await copyDirectory(join(root, "missing"), join(root, "docs"), silentLogger);
			expect(await readFile(join(root, "docs", "kept.html"), "utf8")).toBe(
				"kept",
			);
		});
	});

	describe("generatePage", () => {
		it("writes the rendered page, creating its directory", async () => {
			const logger = createRecordingLogger();
			const options = {
				sourcePath: join(root, "content", "index.md"),
				templatePath: join(root, "template.html"),
				destinationPath: join(root, "docs", "nested", "index.html"),
				basePath: "/site/",
			};
			await generatePage(options, logger);

			expect(await readFile(options.destinationPath, "utf8")).toBe(
				'<html><head><title>Home</title><link href="/site/index.css" rel="stylesheet"></head><body><div><h1>Home</h1><p>Welcome to <b>the</b> site.</p><p><img src="/site/images/logo.png" alt="logo"></p></div></body></html>',
			);
			expect(logger.infos).toEqual([
				`Generating page from ${options.sourcePath} to ${options.destinationPath} using ${options.templatePath}`,
			]);
		});

		it("wraps failures with the source path", async () => {
			await writeFiles(root, { "content/untitled.md": "No title here" });
			const sourcePath = join(root, "content", "untitled.md");

			const result = generatePage(
				{
					sourcePath,
					templatePath: join(root, "template.html"),
					destinationPath: join(root, "docs", "untitled.html"),
					basePath: "/",
				},
				silentLogger,
			);

			await expect(result).rejects.toBeInstanceOf(PageGenerationError);
			await expect(result).rejects.toMatchObject({
				code: "PAGE_GENERATION_FAILED",
				sourcePath,
				cause: expect.any(NoHeadingFoundError),
			});
			expect(await pathExists(join(root, "docs", "untitled.html"))).toBe(false);
		});
	});

	describe("generatePagesRecursive", () => {
		it("generates a page for every markdown file, keeping the structure", async () => {
			const pages = await generatePagesRecursive(
				{
					contentDir: join(root, "content"),
					templatePath: join(root, "template.html"),
					outputDir: join(root, "docs"),
					basePath: "/",
				},
				silentLogger,
			);

			expect(pages).toEqual([
				join(root, "docs", "blog", "first-post.html"),
				join(root, "docs", "index.html"),
			]);
			expect(
				await readFile(join(root, "docs", "blog", "first-post.html"), "utf8"),
			).toBe(
				'<html><head><title>First post</title><link href="/index.css" rel="stylesheet"></head><body><div><h1>First post</h1><ul><li>one</li><li>two</li></ul></div></body></html>',
			);
			expect(await pathExists(join(root, "docs", "notes.html"))).toBe(false);
		});

		it("stops at the first page that fails", async () => {
			await writeFiles(root, { "content/a-broken.md": "# Broken\n\n**open" });

			await expect(
				generatePagesRecursive(
					{
						contentDir: join(root, "content"),
						templatePath: join(root, "template.html"),
						outputDir: join(root, "docs"),
						basePath: "/",
					},
					silentLogger,
				),
			).rejects.toThrow(PageGenerationError);
			expect(await pathExists(join(root, "docs", "index.html"))).toBe(false);
		});

		it("returns no pages when the content directory does not exist", async () => {
			expect(
				await generatePagesRecursive(
					{
						contentDir: join(root, "missing"),
						templatePath: join(root, "template.html"),
						outputDir: join(root, "docs"),
						basePath: "/",
					},
					silentLogger,
				),
			).toEqual([]);
		});
	});

	describe("buildSite", () => {
		it("copies static files and generates every page", async () => {
			const logger = createRecordingLogger();
			const pages = await buildSite(
				{
					contentDir: join(root, "content"),
					staticDir: join(root, "static"),
					templatePath: join(root, "template.html"),
					outputDir: join(root, "docs"),
					basePath: "/",
				},
				logger,
			);

			expect(pages).toHaveLength(2);
			expect(await pathExists(join(root, "docs", "index.css"))).toBe(true);
			expect(await pathExists(join(root, "docs", "index.html"))).toBe(true);
			expect(logger.infos.at(-1)).toBe(
				`Generated 2 page(s) in ${join(root, "docs")}`,
			);
		});
	});
});
