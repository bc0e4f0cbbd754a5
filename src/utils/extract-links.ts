import { splitLines } from "./split-lines";

const HEADING = /^<h[1-4][\s>]/i;
const TOP_HEADING = /^<h1[\s>]/i;

/**
 * Pick the lines of a rendered page worth listing on the links page:
 * its first <h1>-<h4> line and every line containing an anchor
 *
 * @returns The picked lines, or null when the page has neither an <h1>
 * first heading nor any anchor
 */
export function extractLinks(html: string): string | null {
  const picked: string[] = [];
  let foundHeading = false;
  let isTopHeading = false;
  let foundLink = false;

  for (const line of splitLines(html)) {
    const s = line.trim();
    const body = line.replace(/\r?\n$/, "");

    const isLink = s.toLowerCase().includes("<a ");
    const isFirstHeading = !foundHeading && HEADING.test(s);

    if (isFirstHeading) {
      foundHeading = true;
      isTopHeading = TOP_HEADING.test(s);
    }
    if (isLink) {
      foundLink = true;
    }
    if (isFirstHeading || isLink) {
      picked.push(body);
    }
  }

  if (!foundLink && !isTopHeading) {
    return null;
  }
  return picked.join("\n");
}
