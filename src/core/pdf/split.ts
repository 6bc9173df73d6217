/**
 * PDF page-range extraction via pdf-lib.
 *
 * Each chapter becomes a fresh document holding a verbatim copy of its
 * pages, optionally carrying the source metadata with the chapter title.
 */

import { PDFDocument } from 'pdf-lib';
import type { Chapter } from '../chapters/types.js';
import { MalformedSourceError, errorMessage } from '../errors.js';
import type { ChapterMaterializer, MaterializeOptions, MaterializedChapter } from '../split/types.js';

/** Document information fields carried into chapter files. */
export interface PdfMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  creator?: string;
  producer?: string;
  creationDate?: Date;
  modificationDate?: Date;
}

/**
 * Load PDF bytes for page copying.
 * @throws MalformedSourceError if the file cannot be parsed.
 */
export async function loadPdf(bytes: Uint8Array, name = 'document.pdf'): Promise<PDFDocument> {
  try {
    // updateMetadata: false keeps the source producer and dates intact
    return await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (err) {
    throw new MalformedSourceError(`Cannot open ${name} as PDF: ${errorMessage(err)}`);
  }
}

export function readPdfMetadata(doc: PDFDocument): PdfMetadata {
  return {
    title: doc.getTitle(),
    author: doc.getAuthor(),
    subject: doc.getSubject(),
    keywords: doc.getKeywords(),
    creator: doc.getCreator(),
    producer: doc.getProducer(),
    creationDate: doc.getCreationDate(),
    modificationDate: doc.getModificationDate(),
  };
}

/** Write metadata onto a new document; absent fields stay unset. */
export function applyPdfMetadata(doc: PDFDocument, metadata: PdfMetadata): void {
  if (metadata.title !== undefined) doc.setTitle(metadata.title);
  if (metadata.author !== undefined) doc.setAuthor(metadata.author);
  if (metadata.subject !== undefined) doc.setSubject(metadata.subject);
  if (metadata.keywords !== undefined) doc.setKeywords([metadata.keywords]);
  if (metadata.creator !== undefined) doc.setCreator(metadata.creator);
  if (metadata.producer !== undefined) doc.setProducer(metadata.producer);
  if (metadata.creationDate !== undefined) doc.setCreationDate(metadata.creationDate);
  if (metadata.modificationDate !== undefined) doc.setModificationDate(metadata.modificationDate);
}

/**
 * Copy the inclusive 1-based page range into a new document.
 *
 * @param metadata  When given, set on the output (title already overridden by the caller).
 */
export async function extractPageRange(
  source: PDFDocument,
  startPage: number,
  endPage: number,
  metadata?: PdfMetadata,
): Promise<Uint8Array> {
  const total = source.getPageCount();
  if (startPage < 1 || endPage > total || startPage > endPage) {
    throw new RangeError(`Invalid page range ${startPage}-${endPage} for a ${total}-page PDF`);
  }

  const out = await PDFDocument.create({ updateMetadata: metadata !== undefined });
  const indices = Array.from({ length: endPage - startPage + 1 }, (_, i) => startPage - 1 + i);
  const pages = await out.copyPages(source, indices);
  for (const page of pages) out.addPage(page);

  if (metadata) applyPdfMetadata(out, metadata);
  return out.save();
}

/** Materializes page-range chapters of one source PDF. */
export class PdfPageMaterializer implements ChapterMaterializer {
  readonly format = 'pdf' as const;
  private readonly metadata: PdfMetadata | undefined;

  constructor(
    private readonly source: PDFDocument,
    options: MaterializeOptions,
  ) {
    this.metadata = options.preserveMetadata ? readPdfMetadata(source) : undefined;
  }

  async materialize(chapter: Chapter): Promise<MaterializedChapter> {
    const pos = chapter.position;
    if (pos.kind !== 'pages') {
      throw new TypeError(`PDF chapters need a page range, got ${pos.kind}`);
    }
    const metadata = this.metadata ? { ...this.metadata, title: chapter.title } : undefined;
    const bytes = await extractPageRange(this.source, pos.startPage, pos.endPage, metadata);
    return { bytes, unresolved: [] };
  }
}
