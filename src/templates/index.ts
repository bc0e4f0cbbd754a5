/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { join } from "node:path";
import {
  getDefaultStyle,
  getDefaultPageTemplate,
  getDefaultIndexTemplate,
  getDefaultOnePageTemplate,
  getDefaultLinksTemplate,
} from "./defaults";
import { fileExists } from "../utils/fs";
import type {
  TemplateSet,
  PageTemplateContext,
  IndexTemplateContext,
  OnePageTemplateContext,
  LinksTemplateContext,
} from "../types";

// Re-export default template functions for module-level error handling
export {
  getDefaultStyle,
  getDefaultPageTemplate,
  getDefaultIndexTemplate,
  getDefaultOnePageTemplate,
  getDefaultLinksTemplate,
};

export type Template<T> = HandlebarsTemplateDelegate<T>;

/**
 * Detect template files in a directory
 * Returns paths to template files if they exist
 */
export async function detectTemplates(directory: string): Promise<TemplateSet> {
  const pagePath = join(directory, "page.html.hbs");
  const indexPath = join(directory, "index.html.hbs");
  const onePagePath = join(directory, "one-page.html.hbs");
  const linksPath = join(directory, "links.html.hbs");

  return {
    page: (await fileExists(pagePath)) ? pagePath : null,
    index: (await fileExists(indexPath)) ? indexPath : null,
    onePage: (await fileExists(onePagePath)) ? onePagePath : null,
    links: (await fileExists(linksPath)) ? linksPath : null,
  };
}

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<Template<T>> {
  if (templatePath === null) {
    // Use built-in default
    return Handlebars.compile<T>(defaultTemplate);
  }

  // Load custom template - let errors bubble up to module level
  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<T>(templateContent);
}

export function loadPageTemplate(
  templatePath: string | null,
): Promise<Template<PageTemplateContext>> {
  return loadTemplate(templatePath, getDefaultPageTemplate());
}

export function loadIndexTemplate(
  templatePath: string | null,
): Promise<Template<IndexTemplateContext>> {
  return loadTemplate(templatePath, getDefaultIndexTemplate());
}

export function loadOnePageTemplate(
  templatePath: string | null,
): Promise<Template<OnePageTemplateContext>> {
  return loadTemplate(templatePath, getDefaultOnePageTemplate());
}

export function loadLinksTemplate(
  templatePath: string | null,
): Promise<Template<LinksTemplateContext>> {
  return loadTemplate(templatePath, getDefaultLinksTemplate());
}
