import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { PDFDocument } from 'pdf-lib';
import { EpubArchive } from '../archive.js';
import { EpubChapterMaterializer, EpubTextPdfMaterializer } from '../split.js';
import type { Chapter, ChapterPosition } from '../../chapters/types.js';
import { buildEpub, sampleEpub } from '../../__tests__/fixtures.js';

function chapter(title: string, position: ChapterPosition): Chapter {
  return { title, position, level: 1, detectionMethod: 'native', confidence: 1 };
}

const interlude = chapter('Interlude', { kind: 'unit', href: 'Text/ch02.xhtml', fragment: 's2', unitIndex: 1 });

describe('EpubChapterMaterializer', () => {
  it('writes a standalone EPUB holding only the chapter and its resources', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const { bytes, unresolved } = await new EpubChapterMaterializer(source, { preserveMetadata: true }).materialize(interlude);
    expect(unresolved).toEqual([]);

    const zip = await JSZip.loadAsync(bytes);
    expect(Object.keys(zip.files)[0]).toBe('mimetype');

    const out = await EpubArchive.open(bytes);
    expect(out.spine).toEqual([{ href: 'Text/ch02.xhtml', index: 0 }]);
    expect(out.title).toBe('Interlude');
    expect(out.items.map((i) => i.href).sort()).toEqual(
      ['Fonts/body.ttf', 'Styles/main.css', 'Text/ch02.xhtml', 'nav.xhtml', 'toc.ncx'],
    );

    const content = await out.readUnit('Text/ch02.xhtml');
    expect(content).toContain('Beta text.');
    expect(content).not.toContain('Alpha text.');

    expect(await out.outline()).toEqual([
      { kind: 'leaf', title: 'Interlude', dest: { kind: 'href', href: 'Text/ch02.xhtml' } },
    ]);
  });

  it('carries the source metadata except the title', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const { bytes } = await new EpubChapterMaterializer(source, { preserveMetadata: true }).materialize(interlude);
    const out = await EpubArchive.open(bytes);
    expect(out.metadata.map((m) => [m.name, m.value])).toEqual([
      ['dc:identifier', 'urn:test:book-1'],
      ['dc:title', 'Interlude'],
      ['dc:language', 'en'],
      ['dc:creator', 'Test Author'],
    ]);
  });

  it('writes only title, language and identifier without metadata preservation', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const { bytes } = await new EpubChapterMaterializer(source, { preserveMetadata: false }).materialize(interlude);
    const out = await EpubArchive.open(bytes);
    expect(out.metadata.map((m) => m.name)).toEqual(['dc:identifier', 'dc:title', 'dc:language']);
  });

  it('copies every unit for a whole-archive chapter', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const whole = chapter('Complete Document', { kind: 'archive', unitCount: 3 });
    const { bytes } = await new EpubChapterMaterializer(source, { preserveMetadata: true }).materialize(whole);
    const out = await EpubArchive.open(bytes);
    expect(out.spine.map((u) => u.href)).toEqual(['Text/ch01.xhtml', 'Text/ch02.xhtml', 'Text/ch03.xhtml']);
    expect(out.item('Images/cover.png')?.mediaType).toBe('image/png');
  });

  it('refuses page-range chapters', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const paged = chapter('Pages', { kind: 'pages', startPage: 1, endPage: 2 });
    await expect(new EpubChapterMaterializer(source, { preserveMetadata: true }).materialize(paged))
      .rejects.toThrow(TypeError);
  });
});

describe('EpubTextPdfMaterializer', () => {
  it('renders the chapter text to a PDF with the chapter title', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const { bytes } = await new EpubTextPdfMaterializer(source, { preserveMetadata: true }).materialize(interlude);

    const pdf = await PDFDocument.load(bytes, { updateMetadata: false });
    expect(pdf.getPageCount()).toBe(1);
    expect(pdf.getTitle()).toBe('Interlude');
    expect(pdf.getAuthor()).toBe('Test Author');
  });

  it('leaves metadata out when asked', async () => {
    const source = await EpubArchive.open(await buildEpub(sampleEpub()));
    const { bytes } = await new EpubTextPdfMaterializer(source, { preserveMetadata: false }).materialize(interlude);
    const pdf = await PDFDocument.load(bytes, { updateMetadata: false });
    expect(pdf.getTitle()).toBeUndefined();
  });
});
