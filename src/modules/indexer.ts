/**
 * Indexer Module
 * Writes the index, one-page and links pages from the rendered pages
 */

import { writeFile } from "fs/promises";
import { join } from "node:path";
import { extractLinks, formatTimestamp } from "../utils";
import {
  loadIndexTemplate,
  loadOnePageTemplate,
  loadLinksTemplate,
} from "../templates";
import { APP_NAME, VERSION } from "../version";
import type { ConversionContext, FooterContext } from "../types";

/**
 * Run the indexer module
 *
 * Reads from context:
 * - rendered (processor)
 * - templates (splitter)
 */
export async function indexer(ctx: ConversionContext): Promise<void> {
  if (!ctx.rendered || !ctx.templates) {
    throw new Error("Processor must run before indexer");
  }

  const { config, options, rendered, templates, tracker, logger } = ctx;

  if (rendered.length === 0) {
    return;
  }

  const footer: FooterContext = {
    appName: APP_NAME,
    version: VERSION,
    created: formatTimestamp(ctx.runDate),
  };

  async function write(filename: string, html: string): Promise<void> {
    const outputPath = join(options.outputDir, filename);
    logger.debug(`Writing '${outputPath}'`);
    await writeFile(outputPath, html, "utf-8");
    tracker.incrementIndexesCreated();
  }

  // index.html: one entry per page, nested by heading level
  const indexTemplate = await loadIndexTemplate(templates.index);
  await write(
    "index.html",
    indexTemplate({
      ...footer,
      customCss: config.html.customCss,
      entries: rendered.map(({ filename, title, level }) => ({
        filename,
        title,
        level,
      })),
    }),
  );

  // one-page.html: all page bodies in order
  const onePageTemplate = await loadOnePageTemplate(templates.onePage);
  await write(
    "one-page.html",
    onePageTemplate({
      ...footer,
      pages: rendered.map((page) => page.body),
    }),
  );

  // links.html: headings and anchor lines of pages that have links
  const linksTemplate = await loadLinksTemplate(templates.links);
  await write(
    "links.html",
    linksTemplate({
      ...footer,
      sections: rendered
        .map((page) => extractLinks(page.body))
        .filter((section): section is string => section !== null),
    }),
  );
}
