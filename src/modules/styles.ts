/**
 * Styles Module
 * Seeds the optional CSS file and decides how pages reference their style
 */

import { writeFile } from "fs/promises";
import { basename } from "node:path";
import { cssLinkTag, fileExists } from "../utils";
import { getDefaultStyle } from "../templates";
import type { ConversionContext } from "../types";

/**
 * Writes to context:
 * - cssLink: <link> tag for the CSS file, or "" to embed the default style
 *
 * An existing CSS file is never overwritten.
 */
export async function styles(ctx: ConversionContext): Promise<void> {
  const { options, logger } = ctx;

  if (!ctx.pages?.length || !options.cssPath) {
    ctx.cssLink = "";
    return;
  }

  if (!(await fileExists(options.cssPath))) {
    logger.debug(`Writing '${options.cssPath}'`);
    await writeFile(options.cssPath, getDefaultStyle(), "utf-8");
  }

  ctx.cssLink = cssLinkTag(basename(options.cssPath));
}
