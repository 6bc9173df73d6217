/**
 * EPUB chapter materializers: chapter → standalone EPUB, or chapter → text PDF.
 */

import type { Chapter } from '../chapters/types.js';
import { titleFromHref } from '../chapters/manifest.js';
import { renderTextPdf } from '../pdf/render.js';
import type { PdfMetadata } from '../pdf/split.js';
import type { ChapterMaterializer, MaterializeOptions, MaterializedChapter } from '../split/types.js';
import type { EpubArchive } from './archive.js';
import { extractFragment, extractParagraphs } from './extract.js';
import { resolveResources } from './resources.js';
import { writeEpub } from './writer.js';
import type { EpubResource, EpubUnit } from './writer.js';

/** Content units making up a chapter, narrowed to its fragment where it has one. */
export async function chapterUnits(archive: EpubArchive, chapter: Chapter): Promise<EpubUnit[]> {
  const pos = chapter.position;
  if (pos.kind === 'pages') {
    throw new TypeError('EPUB chapters cannot be addressed by page range');
  }

  if (pos.kind === 'unit') {
    const markup = await archive.readUnit(pos.href);
    const extracted = extractFragment(markup, pos.href, pos.fragment, chapter.title);
    return [{ href: pos.href, title: chapter.title, markup: extracted.markup }];
  }

  const units: EpubUnit[] = [];
  for (const unit of archive.spine) {
    units.push({
      href: unit.href,
      title: unit.index === 0 ? chapter.title : titleFromHref(unit.href),
      markup: await archive.readUnit(unit.href),
    });
  }
  return units;
}

function metadataValue(archive: EpubArchive, name: string): string | undefined {
  return archive.metadata.find((m) => m.name.replace(/^.*:/, '') === name)?.value || undefined;
}

/** Materializes chapters of an EPUB as standalone EPUBs. */
export class EpubChapterMaterializer implements ChapterMaterializer {
  readonly format = 'epub' as const;

  constructor(
    private readonly archive: EpubArchive,
    private readonly options: MaterializeOptions,
  ) {}

  async materialize(chapter: Chapter): Promise<MaterializedChapter> {
    const units = await chapterUnits(this.archive, chapter);

    const resources: EpubResource[] = [];
    const unresolved: string[] = [];
    const copied = new Set<string>();

    for (const unit of units) {
      const closure = await resolveResources(this.archive, unit.href, unit.markup);
      unresolved.push(...closure.unresolved.filter((ref) => !unresolved.includes(ref)));

      for (const href of closure.resources) {
        if (copied.has(href)) continue;
        copied.add(href);
        const item = this.archive.item(href);
        resources.push({
          href,
          mediaType: item?.mediaType ?? 'application/octet-stream',
          bytes: await this.archive.readItem(href),
        });
      }
    }

    const bytes = await writeEpub({
      packagePath: this.archive.packagePath,
      title: chapter.title,
      language: this.archive.language,
      identifier: metadataValue(this.archive, 'identifier') ?? `urn:chapter:${chapter.title}`,
      metadata: this.options.preserveMetadata ? this.archive.metadata : null,
      units,
      resources,
    });
    return { bytes, unresolved };
  }
}

/** Materializes chapters of an EPUB as plain-text PDFs. */
export class EpubTextPdfMaterializer implements ChapterMaterializer {
  readonly format = 'pdf' as const;

  constructor(
    private readonly archive: EpubArchive,
    private readonly options: MaterializeOptions,
  ) {}

  async materialize(chapter: Chapter): Promise<MaterializedChapter> {
    const units = await chapterUnits(this.archive, chapter);
    const paragraphs = units.flatMap((unit) => extractParagraphs(unit.markup, unit.href));

    const metadata: PdfMetadata | undefined = this.options.preserveMetadata
      ? {
        title: chapter.title,
        author: metadataValue(this.archive, 'creator'),
        subject: metadataValue(this.archive, 'subject'),
      }
      : undefined;
    const bytes = await renderTextPdf(chapter.title, paragraphs, metadata);
    return { bytes, unresolved: [] };
  }
}
