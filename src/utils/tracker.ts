/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";

// ============================================================================
// Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own fields
export interface CodeImageIssue {
  type: "code-image";
  path: string; // Expected image path
  codeFile: string; // Hash-suffixed code filename
  message: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = CodeImageIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Page counts
  totalPages: number;
  writtenPages: number;
  skippedPages: number;

  // Code file counts
  writtenCodeFiles: number;
  unchangedCodeFiles: number;
  deletedCodeFiles: number;
  deletedCodeImages: number;

  // Image counts
  foundCodeImages: number;
  missingCodeImages: number;
  copiedImages: number;

  // index.html, one-page.html, links.html
  createdIndexes: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// Tracker
// ============================================================================

export class Tracker {
  private totalPages = 0;
  private writtenPages = 0;
  private skippedPages = 0;
  private writtenCodeFiles = 0;
  private unchangedCodeFiles = 0;
  private deletedCodeFiles = 0;
  private deletedCodeImages = 0;
  private foundCodeImages = 0;
  private missingCodeImages = 0;
  private copiedImages = 0;
  private createdIndexes = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalPages(count: number): void {
    this.totalPages = count;
  }

  setSkippedPages(count: number): void {
    this.skippedPages = count;
  }

  incrementWrittenPages(): void {
    this.writtenPages++;
  }

  incrementCodeFilesWritten(): void {
    this.writtenCodeFiles++;
  }

  incrementCodeFilesUnchanged(): void {
    this.unchangedCodeFiles++;
  }

  incrementCodeFilesDeleted(): void {
    this.deletedCodeFiles++;
  }

  incrementCodeImagesDeleted(): void {
    this.deletedCodeImages++;
  }

  incrementCodeImagesFound(): void {
    this.foundCodeImages++;
  }

  incrementImagesCopied(): void {
    this.copiedImages++;
  }

  incrementIndexesCreated(): void {
    this.createdIndexes++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track a code file whose image has not been produced
   */
  trackMissingCodeImage(path: string, codeFile: string): void {
    this.missingCodeImages++;
    this.issues.push({
      type: "code-image",
      path,
      codeFile,
      message: `No code image for '${codeFile}'`,
    });
  }

  /**
   * Track an issue from a configuration error, auto-detecting the reason
   */
  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  /**
   * Warning lines for the end-of-run summary, in the order they occurred
   */
  getWarnings(): string[] {
    return this.getIssues("code-image").map(
      (issue) => `WARNING: ${issue.message}`,
    );
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalPages: this.totalPages,
      writtenPages: this.writtenPages,
      skippedPages: this.skippedPages,
      writtenCodeFiles: this.writtenCodeFiles,
      unchangedCodeFiles: this.unchangedCodeFiles,
      deletedCodeFiles: this.deletedCodeFiles,
      deletedCodeImages: this.deletedCodeImages,
      foundCodeImages: this.foundCodeImages,
      missingCodeImages: this.missingCodeImages,
      copiedImages: this.copiedImages,
      createdIndexes: this.createdIndexes,
      issues: this.issues,
      duration,
    };
  }
}
