/**
 * EPUB support: archive reader, chapter extraction and the minimal writer.
 *
 * Usage:
 *   import { EpubArchive, resolveResources, writeEpub } from '../core/epub/index.js';
 */

export { EpubArchive, decodeHref, resolveRelative } from './archive.js';
export { extractFragment, extractParagraphs, xhtmlShell } from './extract.js';
export { resolveResources, resolveReference, markupReferences, cssReferences } from './resources.js';
export { chapterUnits, EpubChapterMaterializer, EpubTextPdfMaterializer } from './split.js';
export { writeEpub } from './writer.js';
export type { ManifestItem, MetadataEntry } from './archive.js';
export type { ExtractedUnit } from './extract.js';
export type { ResourceClosure } from './resources.js';
export type { EpubPackage, EpubResource, EpubUnit } from './writer.js';
