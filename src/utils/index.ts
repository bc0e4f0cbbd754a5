/**
 * Utility exports
 */

// Page utilities
export { splitLines } from "./split-lines";
export { splitPages } from "./split-pages";
export { getPageHeading } from "./get-page-heading";
export {
  scanDirectives,
  matchDirective,
  TITLE_DIRECTIVE,
  CLASS_DIRECTIVE,
  CODE_FILE_DIRECTIVE,
} from "./directives";
export type { LineDirective } from "./directives";
export { outputFilenames } from "./output-filenames";

// Code file utilities
export { contentHash } from "./content-hash";
export { extractCodeFiles } from "./extract-code-files";
export type { CodeExtractionOptions } from "./extract-code-files";

// HTML utilities
export { renderMarkdown } from "./render-markdown";
export { renderPage, cssLinkTag } from "./render-page";
export type { PageRenderInput } from "./render-page";
export { addTargetBlank } from "./add-target-blank";
export { extractLinks } from "./extract-links";

// String utilities
export {
  escapeRegExp,
  padPageNumber,
  formatTimestamp,
  formatDirectoryStamp,
} from "./string";

// Filesystem utilities
export { fileExists, ensureDirectory } from "./fs";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export {
  resolveOptions,
  OptionsError,
  SplitCommandOptionsSchema,
} from "./resolve-options";
export type { SplitCommandOptions } from "./resolve-options";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
