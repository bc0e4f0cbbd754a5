/**
 * Line directives
 * HTML-comment lines that instruct the converter and never reach the output
 *
 * Supported forms, each on a line of its own:
 *   <!-- title: Custom Title -->
 *   <!-- class: token another -->
 *   <!-- code-file: hello.py -->
 *
 * The prefixes are mutually exclusive, so the title and class directives are
 * applied in one pass. Code-file directives belong to the following fenced
 * block and are consumed by extractCodeFiles, which must run on the text this
 * module returns.
 */

import { splitLines } from "./split-lines";
import { getPageHeading } from "./get-page-heading";
import type { PageDirectives } from "../types";

export interface LineDirective {
  name: "title" | "class" | "code-file";
  prefix: string;
  suffix: string;
}

export const TITLE_DIRECTIVE: LineDirective = {
  name: "title",
  prefix: "<!-- title:",
  suffix: "-->",
};

export const CLASS_DIRECTIVE: LineDirective = {
  name: "class",
  prefix: "<!-- class:",
  suffix: "-->",
};

export const CODE_FILE_DIRECTIVE: LineDirective = {
  name: "code-file",
  prefix: "<!-- code-file:",
  suffix: "-->",
};

/**
 * Match a line against a directive
 *
 * @returns The trimmed text between prefix and suffix, or null when the line
 * is not this directive
 *
 * @example
 * matchDirective("  <!-- title: Intro -->\n", TITLE_DIRECTIVE) // "Intro"
 * matchDirective("Intro\n", TITLE_DIRECTIVE) // null
 */
export function matchDirective(
  line: string,
  directive: LineDirective,
): string | null {
  const s = line.trim();
  if (
    !s.startsWith(directive.prefix) ||
    !s.endsWith(directive.suffix) ||
    s.length < directive.prefix.length + directive.suffix.length
  ) {
    return null;
  }
  return s
    .slice(directive.prefix.length, s.length - directive.suffix.length)
    .trim();
}

/**
 * Remove title and class directives from a page
 *
 * The last title directive wins; an empty or absent one falls back to the
 * page's first heading. Class tokens from every class directive are joined in
 * order. The heading level always comes from the first heading.
 */
export function scanDirectives(
  pageNumber: number,
  text: string,
): PageDirectives {
  let title = "";
  const classes: string[] = [];
  const handlers: Array<[LineDirective, (value: string) => void]> = [
    [TITLE_DIRECTIVE, (value) => (title = value)],
    [
      CLASS_DIRECTIVE,
      (value) => {
        if (value) classes.push(value);
      },
    ],
  ];

  const kept: string[] = [];
  for (const line of splitLines(text)) {
    let consumed = false;
    for (const [directive, handle] of handlers) {
      const value = matchDirective(line, directive);
      if (value !== null) {
        handle(value);
        consumed = true;
        break;
      }
    }
    if (!consumed) kept.push(line);
  }

  const heading = getPageHeading(pageNumber, text);

  return {
    text: kept.join(""),
    title: title || heading.title,
    classes: classes.join(" "),
    level: heading.level,
  };
}
