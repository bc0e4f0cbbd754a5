/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { SplitOptions } from "./options";
import type { Page, RenderedPage, TemplateSet } from "./pages";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  CodeImageIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  options: SplitOptions;
  runDate: Date;

  // Unified tracking for stats and warnings
  tracker: Tracker;
  logger: Logger;
  verbose?: boolean;

  pages?: Page[]; // Splitter output, in source order
  templates?: TemplateSet; // Template overrides beside the source document
  cssLink?: string; // Styles module output ("" embeds the default style)
  rendered?: RenderedPage[]; // Processor output, one per written page
}
