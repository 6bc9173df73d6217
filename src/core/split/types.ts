/**
 * Types for chapter materialization and split results.
 */

import type { Chapter, DetectionResult, SourceFormat } from '../chapters/types.js';
import type { WrittenFile } from '../errors.js';

export type OutputFormat = SourceFormat;

export const OUTPUT_EXTENSIONS: Record<OutputFormat, '.pdf' | '.epub'> = {
  pdf: '.pdf',
  epub: '.epub',
};

/** One chapter rendered to bytes, ready to be saved. */
export interface MaterializedChapter {
  bytes: Uint8Array;
  /** References the chapter makes that the source does not contain. */
  unresolved: string[];
}

/** Produces a standalone output document for one chapter. */
export interface ChapterMaterializer {
  readonly format: OutputFormat;
  materialize(chapter: Chapter): Promise<MaterializedChapter>;
}

export interface MaterializeOptions {
  /** Carry the source metadata over (title becomes the chapter title). */
  preserveMetadata: boolean;
}

export interface SplitOptions extends MaterializeOptions {
  outputDir: string;
  /** File name pattern; the output extension is enforced. */
  pattern: string;
  /** Defaults to the source format. */
  outputFormat?: OutputFormat;
  /** Called after each chapter file is written. */
  onChapterWritten?: (file: SplitFile, total: number) => void;
}

/** A chapter file written by a split. */
export interface SplitFile extends WrittenFile {
  title: string;
  fileName: string;
  chapter: Chapter;
  unresolved: string[];
}

export interface SplitResult {
  outputDir: string;
  format: OutputFormat;
  files: SplitFile[];
}

/** Detection plus the files produced from it. */
export interface SplitRun {
  detection: DetectionResult;
  split: SplitResult;
}
