/**
 * Write detected chapters to disk, one file per chapter, in order.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { detectChapters } from '../chapters/detect.js';
import { DEFAULT_PATTERN, FilenameGenerator } from '../chapters/filename.js';
import type { Chapter, DetectOptions } from '../chapters/types.js';
import { OutputWriteError } from '../errors.js';
import { openDocument } from './document.js';
import type { OpenDocument } from './document.js';
import { OUTPUT_EXTENSIONS } from './types.js';
import type { SplitFile, SplitOptions, SplitResult, SplitRun } from './types.js';

export const DEFAULT_SPLIT_OPTIONS: Omit<SplitOptions, 'outputDir'> = {
  pattern: DEFAULT_PATTERN,
  preserveMetadata: true,
};

/**
 * Materialize and save every chapter.
 *
 * The output directory is created once up front. The first chapter that
 * fails aborts the run with an OutputWriteError listing what was written.
 *
 * @throws ConfigError for a bad pattern or conversion pair (before anything is written).
 * @throws OutputWriteError
 */
export async function writeChapters(
  doc: OpenDocument,
  chapters: readonly Chapter[],
  options: SplitOptions,
): Promise<SplitResult> {
  const format = options.outputFormat ?? doc.format;
  const names = new FilenameGenerator(options.pattern, doc.format, OUTPUT_EXTENSIONS[format]);
  const materializer = await doc.createMaterializer(format, { preserveMetadata: options.preserveMetadata });

  await mkdir(options.outputDir, { recursive: true });

  const files: SplitFile[] = [];
  for (let i = 0; i < chapters.length; i++) {
    const chapter = chapters[i];
    const index = i + 1;
    const fileName = names.generate(chapter, index);
    const path = join(options.outputDir, fileName);

    try {
      const { bytes, unresolved } = await materializer.materialize(chapter);
      await writeFile(path, bytes);
      const file: SplitFile = { index, path, fileName, title: chapter.title, chapter, unresolved };
      files.push(file);
      options.onChapterWritten?.(file, chapters.length);
    } catch (err) {
      throw new OutputWriteError(index, path, files.map(({ index: n, path: p }) => ({ index: n, path: p })), err);
    }
  }

  return { outputDir: options.outputDir, format, files };
}

/**
 * Open, detect and split in one call. The document is closed afterwards,
 * whether or not the split succeeded.
 */
export async function splitDocument(
  path: string,
  detectOptions: Partial<DetectOptions>,
  splitOptions: SplitOptions,
): Promise<SplitRun> {
  const doc = await openDocument(path);
  try {
    const detection = await detectChapters(doc.source, doc.format, detectOptions);
    const split = await writeChapters(doc, detection.chapters, splitOptions);
    return { detection, split };
  } finally {
    await doc.close();
  }
}
