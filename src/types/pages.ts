/**
 * Page-related type definitions
 */

export interface Page {
  number: number; // 1-based position among published pages
  text: string; // Raw Markdown, line terminators preserved
}

export interface SplitResult {
  pages: Page[];
  skipped: number; // Sections dropped by the no-publish marker
}

export interface PageHeading {
  title: string;
  level: number; // 1-4
}

export interface PageDirectives {
  text: string; // Page text with title/class lines removed
  title: string; // Title directive, or the first heading
  classes: string; // Class tokens joined by single spaces
  level: number; // Always from the first heading
}

export interface PageFilenames {
  filename: string;
  prevPage: string; // "" on the first page
  nextPage: string; // "" on the last page
}

export interface RenderedPage {
  number: number;
  filename: string;
  title: string;
  level: number;
  body: string; // Rendered Markdown, external links opened in a new tab
}

export interface IndexEntry {
  filename: string;
  title: string;
  level: number;
}

/**
 * Template file paths
 * Null means use built-in default template
 */
export interface TemplateSet {
  page: string | null; // Path to page.html.hbs
  index: string | null; // Path to index.html.hbs
  onePage: string | null; // Path to one-page.html.hbs
  links: string | null; // Path to links.html.hbs
}

// ============================================================================
// Template Context Types
// ============================================================================

/**
 * Context passed to page templates
 */
export interface PageTemplateContext {
  title: string; // "{number}. {title}"
  pageClass: string; // "page-001"
  cssLink: string; // Empty when the default style is embedded
  defaultStyle: string;
  customCss: string;
  classes: string;
  prevPage: string;
  nextPage: string;
  content: string;
}

/**
 * Context shared by the index, one-page and links templates
 */
export interface FooterContext {
  appName: string;
  version: string;
  created: string; // "YYYY-MM-DD HH:MM"
}

export interface IndexTemplateContext extends FooterContext {
  customCss: string;
  entries: IndexEntry[];
}

export interface OnePageTemplateContext extends FooterContext {
  pages: string[]; // One body per page
}

export interface LinksTemplateContext extends FooterContext {
  sections: string[]; // Extracted heading and anchor lines per page
}
