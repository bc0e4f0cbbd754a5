/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  SplitConfig,
  OutputConfig,
  CodeConfig,
  HtmlConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Options
export type { SplitOptions } from "./options";

// Pages
export type {
  Page,
  SplitResult,
  PageHeading,
  PageDirectives,
  PageFilenames,
  RenderedPage,
  IndexEntry,
  TemplateSet,
  PageTemplateContext,
  FooterContext,
  IndexTemplateContext,
  OnePageTemplateContext,
  LinksTemplateContext,
} from "./pages";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  CodeImageIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
