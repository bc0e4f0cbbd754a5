/**
 * Run options resolved once from CLI flags and configuration
 */

export interface SplitOptions {
  readonly sourcePath: string; // Markdown document to split
  readonly outputDir: string; // Existing (or freshly created) output directory
  readonly outputName: string; // Base name of page files
  readonly imagesSubdir: string | null; // Name used in image references
  readonly imagesDir: string | null; // Beside the source document
  readonly codeSubdir: string | null;
  readonly codeDir: string | null; // Beside the source document
  readonly cssPath: string | null; // Inside the output directory
  readonly imageDelay: number; // Seconds to wait for a missing code image
  readonly templatesDir: string; // Directory searched for *.html.hbs overrides
}
