/**
 * Split command - Resolves options and runs the conversion pipeline
 */

import ora from "ora";
import { Converter, type PipelineStep } from "../../converter";
import * as modules from "../../modules";
import {
  loadConfig,
  resolveOptions,
  OptionsError,
  SplitCommandOptionsSchema,
  Tracker,
  Logger,
} from "../../utils";
import type { ConversionContext } from "../../types";

const STEP_TEXT: Record<PipelineStep, string> = {
  split: "Splitting pages...",
  styles: "Preparing styles...",
  process: "Processing pages...",
  images: "Copying images...",
  index: "Writing index pages...",
};

export async function splitCommand(
  markdownFile: string,
  opts: unknown,
): Promise<void> {
  const runDate = new Date();
  const tracker = new Tracker();

  let ctx: ConversionContext;
  try {
    // Validate CLI options
    const cli = SplitCommandOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(cli.config);
    if (cli.verbose) {
      config.logging.level = "debug";
    }

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const logger = new Logger(config.logging.level);
    const options = await resolveOptions(
      markdownFile,
      cli,
      config,
      runDate,
      logger,
    );

    ctx = { config, options, runDate, tracker, logger, verbose: cli.verbose };
  } catch (error) {
    if (error instanceof OptionsError) {
      process.stderr.write(`\n${error.message}\n`);
    } else {
      console.error(error);
    }
    process.exit(1);
  }

  // No spinner in verbose mode
  const spinner = ora({
    text: "Reading...",
    indent: 2,
    isEnabled: !ctx.verbose,
  }).start();

  try {
    const converter = new Converter(ctx, (step) => {
      spinner.text = STEP_TEXT[step];
    });
    await converter.run();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(ctx);
  } catch (error) {
    spinner.fail("Split failed");
    console.error(error);
    process.exit(1);
  }
}
