/**
 * Stats Module
 * Displays processing statistics, warnings and configuration issues
 */

import chalk from "chalk";
import type { Tracker, ProcessingStats, ConversionContext } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics and every collected warning
 */
export function stats(ctx: ConversionContext): void {
  const { tracker, options, verbose } = ctx;

  const stats = tracker.getStats();
  const hasWarnings = stats.missingCodeImages > 0;
  const hasErrors = tracker.getIssues("resource").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Split Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );
  console.log(`    ${chalk.dim(options.outputDir)}`);

  displayPagesSection(stats);
  displayCodeSection(stats);
  displayImagesSection(stats);
  displayWarningsSection(tracker);
  displayConfigSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Pages"));

  console.log(
    statRow(chalk.green("◉"), "Written", stats.writtenPages, chalk.green),
  );

  if (stats.skippedPages > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Not published", stats.skippedPages, chalk.yellow),
    );
  }

  if (stats.createdIndexes > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Indexes", stats.createdIndexes, chalk.cyan),
    );
  }
}

function displayCodeSection(stats: ProcessingStats): void {
  const total = stats.writtenCodeFiles + stats.unchangedCodeFiles;
  if (total === 0 && stats.deletedCodeFiles === 0) {
    return; // Skip if no code files
  }

  console.log(sectionHeader("Code files"));

  if (stats.writtenCodeFiles > 0) {
    console.log(
      statRow(chalk.green("◉"), "Written", stats.writtenCodeFiles, chalk.green),
    );
  }

  if (stats.unchangedCodeFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Not changed", stats.unchangedCodeFiles, chalk.cyan),
    );
  }

  if (stats.deletedCodeFiles > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Obsolete deleted",
        stats.deletedCodeFiles,
        chalk.yellow,
      ),
    );
  }
}

function displayImagesSection(stats: ProcessingStats): void {
  const totalCodeImages = stats.foundCodeImages + stats.missingCodeImages;
  if (totalCodeImages === 0 && stats.copiedImages === 0) {
    return; // Skip if no images
  }

  console.log(sectionHeader("Images"));

  if (stats.foundCodeImages > 0) {
    console.log(
      statRow(chalk.green("◉"), "Code images", stats.foundCodeImages, chalk.green),
    );
  }

  if (stats.missingCodeImages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Missing", stats.missingCodeImages, chalk.red),
    );
  }

  if (stats.copiedImages > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Copied", stats.copiedImages, chalk.cyan),
    );
  }
}

function displayWarningsSection(tracker: Tracker): void {
  const warnings = tracker.getWarnings();
  if (warnings.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Warnings")));
  for (const warning of warnings) {
    console.log(`   ${chalk.yellow("◆")} ${warning}`);
  }
}

function displayConfigSection(tracker: Tracker, verbose?: boolean): void {
  const resourceIssues = tracker.getIssues("resource");
  if (resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));
  console.log(
    statRow(
      chalk.red("✖"),
      "Config ignored",
      resourceIssues.length,
      chalk.red,
    ),
  );

  for (const issue of resourceIssues) {
    console.log(`      ${chalk.dim("·")} ${issue.path} (${issue.reason})`);
    if (verbose && issue.details) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
}
