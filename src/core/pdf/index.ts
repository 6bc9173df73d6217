/**
 * PDF support: detection source (pdfjs-dist) and page-range output (pdf-lib).
 *
 * Usage:
 *   import { openPdfSource, extractPageRange, renderTextPdf } from '../core/pdf/index.js';
 */

export { openPdfSource, groupLines } from './source.js';
export { loadPdf, readPdfMetadata, applyPdfMetadata, extractPageRange, PdfPageMaterializer } from './split.js';
export { renderTextPdf, wrapText, toRenderableText, CHARS_PER_LINE } from './render.js';
export type { PdfSource, PositionedRun } from './source.js';
export type { PdfMetadata } from './split.js';
