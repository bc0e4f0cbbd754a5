/**
 * Processor Module
 * Converts pages one at a time and writes each page file immediately
 */

import { writeFile } from "fs/promises";
import { join } from "node:path";
import {
  scanDirectives,
  extractCodeFiles,
  outputFilenames,
  renderMarkdown,
  renderPage,
  addTargetBlank,
} from "../utils";
import { loadPageTemplate } from "../templates";
import type { ConversionContext, RenderedPage } from "../types";

/**
 * Processes every page: directives, code extraction, Markdown rendering,
 * page template, write
 *
 * Reads from context:
 * - pages, templates (splitter)
 * - cssLink (styles)
 *
 * Writes to context:
 * - rendered: One entry per written page, for the indexer
 */
export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.pages || !ctx.templates || ctx.cssLink === undefined) {
    throw new Error("Splitter and styles must run before processor");
  }

  const { config, options, pages, tracker, logger, cssLink } = ctx;
  const template = await loadPageTemplate(ctx.templates.page);
  const rendered: RenderedPage[] = [];

  for (const page of pages) {
    // 1. Title and class directives (must precede code-file extraction)
    const { text, title, classes, level } = scanDirectives(
      page.number,
      page.text,
    );

    // 2. Code-file directives and their fenced blocks
    const markdown = await extractCodeFiles(
      text,
      {
        codeDir: options.codeDir,
        imagesDir: options.imagesDir,
        imagesSubdir: options.imagesSubdir,
        imagePrefix: config.code.imagePrefix,
        imageDelay: options.imageDelay,
      },
      { tracker, logger },
    );

    // 3. Markdown to HTML
    const body = addTargetBlank(renderMarkdown(markdown));

    // 4. Page document
    const { filename, prevPage, nextPage } = outputFilenames(
      options.outputName,
      page.number,
      pages.length,
    );
    const html = renderPage(template, {
      number: page.number,
      title,
      body,
      prevPage,
      nextPage,
      cssLink,
      customCss: config.html.customCss,
      classes,
    });

    const outputPath = join(options.outputDir, filename);
    logger.debug(`Writing '${outputPath}'`);
    await writeFile(outputPath, html, "utf-8");
    tracker.incrementWrittenPages();

    rendered.push({ number: page.number, filename, title, level, body });
  }

  ctx.rendered = rendered;
}
