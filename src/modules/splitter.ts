/**
 * Splitter Module
 * Reads the source document, splits it into pages and detects template overrides
 */

import { readFile } from "fs/promises";
import { splitPages } from "../utils";
import { detectTemplates } from "../templates";
import type { ConversionContext } from "../types";

/**
 * Splits the source document into pages and populates context
 *
 * Writes to context:
 * - pages: Published pages in source order, numbered from 1
 * - templates: Template overrides found beside the source document
 */
export async function split(ctx: ConversionContext): Promise<void> {
  const { config, options, tracker, logger } = ctx;

  logger.debug(`Reading '${options.sourcePath}'`);
  const text = await readFile(options.sourcePath, "utf-8");

  const { pages, skipped } = splitPages(text, config.split);
  tracker.setTotalPages(pages.length);
  tracker.setSkippedPages(skipped);

  if (skipped > 0) {
    logger.debug(`Skipped ${skipped} unpublished section(s)`);
  }

  ctx.pages = pages;
  ctx.templates = await detectTemplates(options.templatesDir);
}
