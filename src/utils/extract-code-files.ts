/**
 * Code File Extraction
 * Writes fenced blocks marked with a code-file directive to hash-named files
 * and replaces each block with its code image (or a warning)
 *
 * For a directive `<!-- code-file: hello.py -->` and content hashing to
 * 49c18460 the block becomes:
 * - code file: {codeDir}/hello.49c18460.py
 * - image:     {imagesDir}/codeimg_hello.49c18460.png (produced elsewhere)
 *
 * Filesystem errors are not caught; they abort the run.
 */

import { readdir, unlink, writeFile } from "fs/promises";
import { join, parse } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { contentHash } from "./content-hash";
import { CODE_FILE_DIRECTIVE, matchDirective } from "./directives";
import { fileExists } from "./fs";
import { splitLines } from "./split-lines";
import { escapeRegExp } from "./string";
import type { Logger } from "./logger";
import type { Tracker } from "./tracker";

export interface CodeExtractionOptions {
  codeDir: string | null;
  imagesDir: string | null;
  imagesSubdir: string | null; // Used in the emitted image reference
  imagePrefix: string;
  imageDelay: number; // Seconds
  wait?: (ms: number) => Promise<void>;
}

interface CodeExtractionDeps {
  tracker: Tracker;
  logger: Logger;
}

interface ResolvedDirs {
  codeDir: string;
  imagesDir: string;
  imagesSubdir: string;
}

type ScanState = "normal" | "passthrough" | "capture";

/**
 * Extract directive-marked code blocks from a page
 *
 * Without both a code and an images directory, every fenced block is left
 * for the Markdown renderer; the directive lines are still removed. Fenced
 * blocks without a preceding directive are always passed through verbatim.
 *
 * @returns The page text with directives removed and extracted blocks
 * replaced by an image reference or a warning paragraph
 */
export async function extractCodeFiles(
  text: string,
  options: CodeExtractionOptions,
  deps: CodeExtractionDeps,
): Promise<string> {
  const { codeDir, imagesDir, imagesSubdir } = options;
  const dirs: ResolvedDirs | null =
    codeDir !== null && imagesDir !== null && imagesSubdir !== null
      ? { codeDir, imagesDir, imagesSubdir }
      : null;

  // ==========================================================================
  // Helpers (closure over options and deps)
  // ==========================================================================

  async function replaceCodeBlock(
    directiveFilename: string,
    code: string,
    { codeDir, imagesDir, imagesSubdir }: ResolvedDirs,
  ): Promise<string> {
    const { tracker, logger } = deps;
    const { name: stem, ext } = parse(directiveFilename);

    const codeFilename = `${stem}.${contentHash(code)}${ext}`;
    const codePath = join(codeDir, codeFilename);

    await deleteObsoleteCodeFiles(stem, ext, codeFilename, codeDir, imagesDir);

    // Same content, same name: nothing to write
    if (await fileExists(codePath)) {
      logger.debug(`Not changed: '${codePath}'`);
      tracker.incrementCodeFilesUnchanged();
    } else {
      logger.debug(`Writing code '${codePath}'`);
      await writeFile(codePath, code, "utf-8");
      tracker.incrementCodeFilesWritten();
    }

    const imageFilename =
      `${options.imagePrefix}${parse(codeFilename).name}.png`;
    const imagePath = join(imagesDir, imageFilename);

    if (options.imageDelay > 0 && !(await fileExists(imagePath))) {
      logger.info(
        `Waiting ${options.imageDelay} seconds for '${imageFilename}'`,
      );
      const wait = options.wait ?? ((ms: number) => sleep(ms));
      await wait(options.imageDelay * 1000);
    }

    if (await fileExists(imagePath)) {
      tracker.incrementCodeImagesFound();
      return `\n![${directiveFilename}](${imagesSubdir}/${imageFilename})\n`;
    }

    tracker.trackMissingCodeImage(imagePath, codeFilename);
    return `\n<p style="color: red;">No code image for '${codeFilename}'</p>\n`;
  }

  /**
   * Delete earlier versions of a code file ({stem}.{8 hex}{ext}) and
   * their code images
   */
  async function deleteObsoleteCodeFiles(
    stem: string,
    ext: string,
    current: string,
    codeDir: string,
    imagesDir: string,
  ): Promise<void> {
    const { tracker, logger } = deps;
    const version = new RegExp(
      `^${escapeRegExp(stem)}\\.[0-9a-f]{8}${escapeRegExp(ext)}$`,
    );

    const entries = await readdir(codeDir, { withFileTypes: true });
    const obsolete = entries
      .filter((e) => e.isFile() && e.name !== current && version.test(e.name))
      .map((e) => e.name)
      .sort();

    for (const name of obsolete) {
      logger.debug(`Delete obsolete '${name}'`);
      await unlink(join(codeDir, name));
      tracker.incrementCodeFilesDeleted();

      const imagePath = join(
        imagesDir,
        `${options.imagePrefix}${parse(name).name}.png`,
      );
      if (await fileExists(imagePath)) {
        logger.debug(`Delete obsolete '${parse(imagePath).base}'`);
        await unlink(imagePath);
        tracker.incrementCodeImagesDeleted();
      }
    }
  }

  // ==========================================================================
  // Scan
  // ==========================================================================

  const out: string[] = [];
  let state: ScanState = "normal";
  let pending = "";
  let openingFence = "";
  let content = "";

  for (const line of splitLines(text)) {
    const isFence = line.trim().startsWith("```");

    switch (state) {
      case "passthrough": {
        out.push(line);
        if (isFence) state = "normal";
        break;
      }

      case "capture": {
        if (!isFence) {
          content += line;
          break;
        }
        if (dirs && content) {
          out.push(await replaceCodeBlock(pending, content, dirs));
        } else {
          out.push(openingFence, line);
        }
        pending = "";
        content = "";
        state = "normal";
        break;
      }

      case "normal": {
        const filename = matchDirective(line, CODE_FILE_DIRECTIVE);
        if (filename !== null) {
          pending = filename;
          break;
        }
        if (isFence) {
          if (dirs && pending) {
            openingFence = line;
            state = "capture";
          } else {
            out.push(line);
            pending = "";
            state = "passthrough";
          }
          break;
        }
        out.push(line);
        break;
      }
    }
  }

  // Unclosed fence: keep what was captured
  if (state === "capture") {
    out.push(openingFence, content);
  }

  return out.join("");
}
