/**
 * Images Module
 * Copies the images subdirectory next to the pages
 */

import { copyFile } from "fs/promises";
import { join } from "node:path";
import glob from "fast-glob";
import { ensureDirectory } from "../utils";
import type { ConversionContext } from "../types";

/**
 * Copies every file of the source images directory into
 * {outputDir}/{imagesSubdir}, overwriting existing files
 *
 * Runs after the processor so code images produced while it waited are
 * included.
 */
export async function images(ctx: ConversionContext): Promise<void> {
  const { options, tracker, logger } = ctx;
  const { imagesDir, imagesSubdir, outputDir } = options;

  if (!ctx.pages?.length || !imagesDir || !imagesSubdir) {
    return;
  }

  const targetDir = join(outputDir, imagesSubdir);
  await ensureDirectory(targetDir);

  const files = await glob("*", {
    cwd: imagesDir,
    onlyFiles: true,
    dot: true,
  });

  for (const name of files.sort()) {
    const source = join(imagesDir, name);
    const target = join(targetDir, name);
    logger.debug(`Copy '${source}' to '${target}'`);
    await copyFile(source, target);
    tracker.incrementImagesCopied();
  }
}
