/**
 * Converter - Pipeline orchestrator
 * Coordinates the conversion pipeline with zero business logic
 */

import type { ConversionContext, ProcessingStats } from "./types";
import * as modules from "./modules";

export type PipelineStep = "split" | "styles" | "process" | "images" | "index";

export class Converter {
  constructor(
    private ctx: ConversionContext,
    private onStep?: (step: PipelineStep) => void,
  ) {}

  /**
   * Run the conversion pipeline
   * Pure orchestration - just calls modules in sequence
   */
  async run(): Promise<ProcessingStats> {
    const { ctx } = this;

    this.onStep?.("split");
    await modules.split(ctx);

    this.onStep?.("styles");
    await modules.styles(ctx);

    this.onStep?.("process");
    await modules.process(ctx);

    this.onStep?.("images");
    await modules.images(ctx);

    this.onStep?.("index");
    await modules.indexer(ctx);

    return ctx.tracker.getStats();
  }
}
