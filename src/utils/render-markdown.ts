import { Marked } from "marked";

const marked = new Marked({ gfm: true });

/**
 * Render a page's Markdown to an HTML fragment
 */
export function renderMarkdown(markdown: string): string {
  return marked.parse(markdown, { async: false });
}
