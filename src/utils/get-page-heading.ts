import { splitLines } from "./split-lines";
import type { PageHeading } from "../types";

const HEADING = /^(#{1,4})\s+(.*)$/;

/**
 * Find the first Markdown heading (levels 1-4) outside fenced code
 * Pages without one are titled "Page {n}" at level 1
 *
 * @example
 * getPageHeading(2, "Intro\n## Setup\n") // { title: "Setup", level: 2 }
 * getPageHeading(3, "No heading\n") // { title: "Page 3", level: 1 }
 */
export function getPageHeading(pageNumber: number, text: string): PageHeading {
  let inFence = false;
  for (const line of splitLines(text)) {
    const s = line.trim();
    if (s.startsWith("```")) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const match = HEADING.exec(s);
    if (match) {
      return { title: match[2].trim(), level: match[1].length };
    }
  }
  return { title: `Page ${pageNumber}`, level: 1 };
}
