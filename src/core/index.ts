/**
 * Chapter detection and splitting for PDF and EPUB documents.
 *
 * Usage:
 *   import { splitDocument } from 'chapter-splitter';
 *   const { detection, split } = await splitDocument('book.epub', { strategy: 'hybrid' }, {
 *     outputDir: 'book_chapters',
 *     pattern: '{index:02d}_{title}',
 *     preserveMetadata: true,
 *   });
 *
 * Or step by step: openDocument → detectChapters → writeChapters → close.
 */

export { detectChapters, wholeDocumentChapter, FALLBACK_TITLE } from './chapters/detect.js';
export { extractOutline, flattenOutline } from './chapters/outline.js';
export { analyzePages, analyzeMarkup, scoreHeading, SENSITIVITY_PRESETS } from './chapters/heuristic.js';
export { manifestChapters, titleFromHref } from './chapters/manifest.js';
export { resolveRanges } from './chapters/ranges.js';
export {
  FilenameGenerator,
  sanitizeFilename,
  DEFAULT_PATTERN,
  DEFAULT_MAX_TITLE_LENGTH,
} from './chapters/filename.js';
export { DEFAULT_DETECT_OPTIONS, pageCount, describePosition } from './chapters/types.js';
export { openDocument, formatOf } from './split/document.js';
export { createMaterializer, checkConversion } from './split/materialize.js';
export { writeChapters, splitDocument, DEFAULT_SPLIT_OPTIONS } from './split/split.js';
export { OUTPUT_EXTENSIONS } from './split/types.js';
export * from './pdf/index.js';
export * from './epub/index.js';
export {
  SplitterError,
  MalformedSourceError,
  UnitParseError,
  OutputWriteError,
  ConfigError,
  errorMessage,
} from './errors.js';

export type {
  ArchiveSource,
  Chapter,
  ChapterCandidate,
  ChapterPosition,
  DetectOptions,
  DetectionMethod,
  DetectionResult,
  DetectionSource,
  DetectionStrategy,
  OutlineNode,
  PaginatedSource,
  Sensitivity,
  SourceFormat,
  StartPosition,
} from './chapters/types.js';
export type { SensitivityPreset } from './chapters/heuristic.js';
export type { OpenDocument } from './split/document.js';
export type {
  ChapterMaterializer,
  MaterializeOptions,
  OutputFormat,
  SplitFile,
  SplitOptions,
  SplitResult,
  SplitRun,
} from './split/types.js';
export type { SplitterErrorCode, WrittenFile } from './errors.js';
