/**
 * Materializer selection by source and output format.
 *
 *   pdf  → pdf   page-range copy
 *   epub → epub  fragment extraction + resource closure
 *   epub → pdf   plain-text reflow
 */

import type { SourceFormat } from '../chapters/types.js';
import { ConfigError } from '../errors.js';
import type { EpubArchive } from '../epub/archive.js';
import { EpubChapterMaterializer, EpubTextPdfMaterializer } from '../epub/split.js';
import { PdfPageMaterializer } from '../pdf/split.js';
import type { PDFDocument } from 'pdf-lib';
import type { ChapterMaterializer, MaterializeOptions, OutputFormat } from './types.js';

export type MaterializerSource =
  | { format: 'pdf'; document: PDFDocument }
  | { format: 'epub'; archive: EpubArchive };

/** @throws ConfigError for a conversion that is not supported (pdf → epub). */
export function checkConversion(sourceFormat: SourceFormat, outputFormat: OutputFormat): void {
  if (sourceFormat === 'pdf' && outputFormat !== 'pdf') {
    throw new ConfigError('Converting PDF to EPUB is not supported — only EPUB can be converted (to PDF)');
  }
}

/** @throws ConfigError for a conversion that is not supported. */
export function createMaterializer(
  source: MaterializerSource,
  outputFormat: OutputFormat,
  options: MaterializeOptions,
): ChapterMaterializer {
  checkConversion(source.format, outputFormat);
  if (source.format === 'pdf') {
    return new PdfPageMaterializer(source.document, options);
  }
  return outputFormat === 'pdf'
    ? new EpubTextPdfMaterializer(source.archive, options)
    : new EpubChapterMaterializer(source.archive, options);
}
