import { getDefaultStyle, type Template } from "../templates";
import { padPageNumber } from "./string";
import type { PageTemplateContext } from "../types";

export interface PageRenderInput {
  number: number;
  title: string;
  body: string; // Rendered HTML content
  prevPage: string; // "" leaves out the previous link
  nextPage: string; // "" leaves out the next link
  cssLink: string; // "" embeds the default style
  customCss: string;
  classes: string; // Added to the content div
}

/**
 * Wrap a rendered page body in the page template
 */
export function renderPage(
  template: Template<PageTemplateContext>,
  input: PageRenderInput,
): string {
  return template({
    title: `${input.number}. ${input.title}`,
    pageClass: `page-${padPageNumber(input.number)}`,
    cssLink: input.cssLink,
    defaultStyle: getDefaultStyle(),
    customCss: input.customCss,
    classes: input.classes,
    prevPage: input.prevPage,
    nextPage: input.nextPage,
    content: input.body,
  });
}

/**
 * Stylesheet link for a CSS file in the output directory
 */
export function cssLinkTag(filename: string): string {
  return `<link rel="stylesheet" type="text/css" href="${filename}">`;
}
