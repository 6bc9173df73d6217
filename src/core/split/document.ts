/**
 * Open a PDF or EPUB file once for both detection and materialization.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { DetectionSource, SourceFormat } from '../chapters/types.js';
import { MalformedSourceError, errorMessage } from '../errors.js';
import { EpubArchive } from '../epub/archive.js';
import { openPdfSource } from '../pdf/source.js';
import { loadPdf } from '../pdf/split.js';
import { checkConversion, createMaterializer } from './materialize.js';
import type { ChapterMaterializer, MaterializeOptions, OutputFormat } from './types.js';

const FORMATS: Record<string, SourceFormat> = {
  '.pdf': 'pdf',
  '.epub': 'epub',
};

export interface OpenDocument {
  path: string;
  format: SourceFormat;
  source: DetectionSource;
  createMaterializer(outputFormat: OutputFormat, options: MaterializeOptions): Promise<ChapterMaterializer>;
  close(): Promise<void>;
}

/** Source format from the file extension. */
export function formatOf(path: string): SourceFormat {
  const format = FORMATS[extname(path).toLowerCase()];
  if (!format) {
    throw new MalformedSourceError(
      `Unsupported file type "${extname(path) || basename(path)}". Supported: ${Object.keys(FORMATS).join(', ')}`,
    );
  }
  return format;
}

/**
 * Read and open a document. The caller must `close()` it.
 *
 * @throws MalformedSourceError for unreadable, unsupported or corrupt files.
 */
export async function openDocument(path: string): Promise<OpenDocument> {
  const format = formatOf(path);
  const name = basename(path);

  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new MalformedSourceError(`Cannot read ${path}: ${errorMessage(err)}`);
  }

  if (format === 'epub') {
    const archive = await EpubArchive.open(bytes, name);
    return {
      path,
      format,
      source: archive,
      createMaterializer: async (outputFormat, options) =>
        createMaterializer({ format, archive }, outputFormat, options),
      close: () => Promise.resolve(),
    };
  }

  const source = await openPdfSource(bytes, name);
  return {
    path,
    format,
    source,
    // pdf-lib loads lazily: detection alone never needs it
    createMaterializer: async (outputFormat, options) => {
      checkConversion(format, outputFormat);
      return createMaterializer({ format, document: await loadPdf(bytes, name) }, outputFormat, options);
    },
    close: () => source.close(),
  };
}
