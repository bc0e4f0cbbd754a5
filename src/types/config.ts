/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SplitConfigSchema = z.object({
  // A line equal to this (after trimming) separates two pages
  delimiter: z.string().min(1),
  // Sections containing this text anywhere are never published
  noPublishMarker: z.string().min(1),
});

export const OutputConfigSchema = z.object({
  name: z.string().min(1), // Base name of page files: "{name}-001.html"
  directoryPrefix: z.string(), // Default output directory: "{prefix}YYYYMMDD_HHMMSS"
});

export const CodeConfigSchema = z.object({
  imagePrefix: z.string(), // Code images are "{prefix}{stem}.{hash}.png"
  imageDelay: z.number().int().nonnegative(), // In seconds
});

export const HtmlConfigSchema = z.object({
  // Linked from every page after the main stylesheet
  customCss: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  split: SplitConfigSchema,
  output: OutputConfigSchema,
  code: CodeConfigSchema,
  html: HtmlConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  split: SplitConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  code: CodeConfigSchema.partial().optional(),
  html: HtmlConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SplitConfig = z.infer<typeof SplitConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type CodeConfig = z.infer<typeof CodeConfigSchema>;
export type HtmlConfig = z.infer<typeof HtmlConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
