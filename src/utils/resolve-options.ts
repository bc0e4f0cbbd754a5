/**
 * Options Resolver
 * Turns CLI flags and configuration into the immutable run options,
 * checking the preconditions the pipeline relies on
 */

import { mkdir } from "fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { ensureDirectory, fileExists } from "./fs";
import { formatDirectoryStamp } from "./string";
import type { Logger } from "./logger";
import type { ConversionConfig, SplitOptions } from "../types";

export const SplitCommandOptionsSchema = z.object({
  outputDir: z.string().min(1).optional(),
  outputName: z.string().min(1).optional(),
  imagesSubdir: z.string().min(1).optional(),
  codeSubdir: z.string().min(1).optional(),
  imgDelay: z.coerce.number().int().nonnegative().optional(),
  cssFile: z.string().min(1).optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type SplitCommandOptions = z.infer<typeof SplitCommandOptionsSchema>;

/**
 * A precondition of the run does not hold (missing input, bad output dir)
 */
export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionsError";
  }
}

/**
 * Resolve run options
 *
 * - The source document must exist
 * - An explicit output directory must exist; the default one
 *   ("{prefix}YYYYMMDD_HHMMSS" beside the document) must not, and is created
 * - Images and code subdirectories are created beside the document if missing
 *
 * @throws OptionsError when a precondition fails
 */
export async function resolveOptions(
  sourcePath: string,
  cli: SplitCommandOptions,
  config: ConversionConfig,
  runDate: Date,
  logger: Logger,
): Promise<SplitOptions> {
  if (!(await fileExists(sourcePath))) {
    throw new OptionsError(`File not found: ${sourcePath}`);
  }
  const sourceDir = dirname(sourcePath);

  let outputDir: string;
  if (cli.outputDir) {
    outputDir = cli.outputDir;
    if (!(await fileExists(outputDir))) {
      throw new OptionsError(`Directory not found: ${outputDir}`);
    }
  } else {
    outputDir = join(
      sourceDir,
      `${config.output.directoryPrefix}${formatDirectoryStamp(runDate)}`,
    );
    if (await fileExists(outputDir)) {
      throw new OptionsError(`Directory already exists: ${outputDir}`);
    }
    await mkdir(outputDir);
  }

  let imagesDir: string | null = null;
  if (cli.imagesSubdir) {
    imagesDir = join(sourceDir, cli.imagesSubdir);
    if (await ensureDirectory(imagesDir)) {
      logger.info(`Creating images subdirectory: ${imagesDir}`);
    }
  }

  let codeDir: string | null = null;
  if (cli.codeSubdir) {
    codeDir = join(sourceDir, cli.codeSubdir);
    if (await ensureDirectory(codeDir)) {
      logger.info(`Creating code subdirectory: ${codeDir}`);
    }
  }

  return {
    sourcePath,
    outputDir,
    outputName: cli.outputName ?? config.output.name,
    imagesSubdir: cli.imagesSubdir ?? null,
    imagesDir,
    codeSubdir: cli.codeSubdir ?? null,
    codeDir,
    cssPath: cli.cssFile ? join(outputDir, cli.cssFile) : null,
    imageDelay: cli.imgDelay ?? config.code.imageDelay,
    templatesDir: sourceDir,
  };
}
