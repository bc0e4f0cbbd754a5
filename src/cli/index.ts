#!/usr/bin/env node

/**
 * CLI entry point for marksplit
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { splitCommand } from "./commands/split";
import { configCommand } from "./commands/config";
import { APP_NAME, VERSION } from "../version";

const program = new Command();

program
  .name(APP_NAME)
  .description("Split a Markdown file into linked HTML pages.")
  .version(VERSION);

// Main split command (default action)
program
  .argument("<markdown_file>", "Path to the Markdown file to split")
  .option("-o, --output-dir <dir>", "Path to an existing output directory")
  .option("-n, --output-name <name>", "Base name for the output HTML files")
  .option(
    "-i, --images-subdir <dir>",
    "Images subdirectory beside the Markdown file, copied to the output directory",
  )
  .option(
    "-d, --code-subdir <dir>",
    "Subdirectory beside the Markdown file for extracted code files",
  )
  .option(
    "--img-delay <seconds>",
    "Seconds to wait for a missing code-file image",
  )
  .option(
    "-c, --css-file <name>",
    "CSS file in the output directory (created with the default style if missing)",
  )
  .option("--config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(splitCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
