import { splitLines } from "./split-lines";
import type { SplitConfig, SplitResult } from "../types";

/**
 * Split a document into pages on delimiter lines
 *
 * A line whose trimmed text equals the delimiter closes the current page.
 * Empty buffers never become pages, so leading or repeated delimiters are
 * harmless. A page containing the no-publish marker anywhere is dropped and
 * counted in `skipped`.
 */
export function splitPages(text: string, config: SplitConfig): SplitResult {
  const texts: string[] = [];
  let skipped = 0;
  let buffer = "";

  const flush = (): void => {
    if (!buffer) return;
    if (buffer.includes(config.noPublishMarker)) {
      skipped++;
    } else {
      texts.push(buffer);
    }
    buffer = "";
  };

  for (const line of splitLines(text)) {
    if (line.trim() === config.delimiter) {
      flush();
    } else {
      buffer += line;
    }
  }
  flush();

  return {
    pages: texts.map((pageText, index) => ({
      number: index + 1,
      text: pageText,
    })),
    skipped,
  };
}
