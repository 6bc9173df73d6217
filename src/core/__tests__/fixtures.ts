/**
 * In-memory documents for tests: fake detection sources, EPUBs assembled
 * with JSZip and PDFs generated with pdf-lib.
 */

import JSZip from 'jszip';
import { PDFDocument, PDFHexString, PDFName, PDFNumber, StandardFonts } from 'pdf-lib';
import type { PDFObject, PDFRef } from 'pdf-lib';
import type {
  ArchiveSource,
  OutlineNode,
  PageFailure,
  PageText,
  PaginatedSource,
  TextRun,
} from '../chapters/types.js';

// ── Fake sources ─────────────────────────────────────────────

export interface FakePaginatedInit {
  pageCount: number;
  outline?: OutlineNode[] | null;
  /** Lines per page number; pages not listed have no text. */
  pages?: Record<number, TextRun[][]>;
  failing?: number[];
}

export function fakePaginated(init: FakePaginatedInit): PaginatedSource {
  return {
    kind: 'paginated',
    pageCount: init.pageCount,
    outline: async () => init.outline ?? null,
    pages: async function* (): AsyncGenerator<PageText | PageFailure> {
      for (let pageNumber = 1; pageNumber <= init.pageCount; pageNumber++) {
        if (init.failing?.includes(pageNumber)) {
          yield { pageNumber, error: 'corrupt content stream' };
          continue;
        }
        yield { pageNumber, lines: init.pages?.[pageNumber] ?? [] };
      }
    },
  };
}

/** A line of body text: `words` words at `size` points. */
export function body(size = 10, words = 12): TextRun[] {
  return [{ text: Array.from({ length: words }, (_, i) => `word${i}`).join(' '), size }];
}

export interface FakeArchiveInit {
  /** href → markup, in spine order. */
  units: Record<string, string>;
  outline?: OutlineNode[] | null;
}

export function fakeArchive(init: FakeArchiveInit): ArchiveSource {
  const hrefs = Object.keys(init.units);
  return {
    kind: 'archive',
    spine: hrefs.map((href, index) => ({ href, index })),
    outline: async () => init.outline ?? null,
    readUnit: async (href) => {
      const markup = init.units[href];
      if (markup === undefined) throw new Error(`${href} is not in the archive`);
      return markup;
    },
  };
}

export function xhtml(title: string, bodyMarkup: string, head = ''): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml"><head><title>${title}</title>${head}</head><body>${bodyMarkup}</body></html>`;
}

// ── EPUB builder ─────────────────────────────────────────────

export interface EpubFixture {
  /** Archive paths below OEBPS/ → content. */
  files: Record<string, string | Uint8Array>;
  /** [id, href, media-type, properties?] */
  manifest: Array<[string, string, string, string?]>;
  spine: string[];
  metadata?: string;
  /** Id of the NCX item, set as spine@toc. */
  toc?: string;
}

export const DEFAULT_METADATA = [
  '<dc:identifier id="uid">urn:test:book-1</dc:identifier>',
  '<dc:title>Test Book</dc:title>',
  '<dc:language>en</dc:language>',
  '<dc:creator>Test Author</dc:creator>',
].join('');

export async function buildEpub(fixture: EpubFixture): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' });
  zip.file('META-INF/container.xml', `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>
</container>`);

  const items = fixture.manifest.map(([id, href, type, props]) =>
    `<item id="${id}" href="${href}" media-type="${type}"${props ? ` properties="${props}"` : ''}/>`);
  const spine = fixture.spine.map((id) => `<itemref idref="${id}"/>`);
  zip.file('OEBPS/content.opf', `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="uid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">${fixture.metadata ?? DEFAULT_METADATA}</metadata>
  <manifest>${items.join('')}</manifest>
  <spine${fixture.toc ? ` toc="${fixture.toc}"` : ''}>${spine.join('')}</spine>
</package>`);

  for (const [path, content] of Object.entries(fixture.files)) {
    zip.file(`OEBPS/${path}`, content);
  }
  return zip.generateAsync({ type: 'uint8array' });
}

/** Three chapters, a stylesheet with a font and an image, an EPUB 3 nav. */
export function sampleEpub(): EpubFixture {
  return {
    files: {
      'Text/ch01.xhtml': xhtml('One', '<h1 id="c1">Chapter One</h1><p>First words.</p><img src="../Images/cover.png"/>',
        '<link rel="stylesheet" type="text/css" href="../Styles/main.css"/>'),
      'Text/ch02.xhtml': xhtml('Two',
        '<section id="s1"><h1>Chapter Two</h1><p>Alpha text.</p></section><section id="s2"><h2>Interlude</h2><p>Beta text.</p></section>',
        '<link rel="stylesheet" type="text/css" href="../Styles/main.css"/>'),
      'Text/ch03.xhtml': xhtml('Three', '<h1>Chapter Three</h1><p>Last words.</p>'),
      'Styles/main.css': '@font-face { font-family: "Body"; src: url("../Fonts/body.ttf"); }\nbody { font-family: "Body"; }',
      'Fonts/body.ttf': new Uint8Array([0, 1, 0, 0]),
      'Images/cover.png': new Uint8Array([137, 80, 78, 71]),
      'nav.xhtml': `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops"><head><title>Contents</title></head><body>
<nav epub:type="toc"><ol>
  <li><a href="Text/ch01.xhtml">Chapter One</a></li>
  <li><a href="Text/ch02.xhtml#s1">Chapter Two</a><ol><li><a href="Text/ch02.xhtml#s2">Interlude</a></li></ol></li>
  <li><a href="Text/ch03.xhtml">Chapter Three</a></li>
</ol></nav></body></html>`,
    },
    manifest: [
      ['nav', 'nav.xhtml', 'application/xhtml+xml', 'nav'],
      ['ch01', 'Text/ch01.xhtml', 'application/xhtml+xml'],
      ['ch02', 'Text/ch02.xhtml', 'application/xhtml+xml'],
      ['ch03', 'Text/ch03.xhtml', 'application/xhtml+xml'],
      ['css', 'Styles/main.css', 'text/css'],
      ['font', 'Fonts/body.ttf', 'font/ttf'],
      ['cover', 'Images/cover.png', 'image/png'],
    ],
    spine: ['ch01', 'ch02', 'ch03'],
  };
}

// ── PDF builder ──────────────────────────────────────────────

export interface PdfOutlineEntry {
  title: string;
  page: number;
  /** Point at the page through this named destination instead of directly. */
  named?: string;
  children?: PdfOutlineEntry[];
}

/** Write an /Outlines tree (and a /Dests dictionary for named entries) into the catalog. */
function addOutline(pdf: PDFDocument, entries: PdfOutlineEntry[]): void {
  const { context } = pdf;
  const pageRefs = pdf.getPages().map((page) => page.ref);
  const dests = context.obj({});
  let hasNamed = false;

  const writeItems = (items: PdfOutlineEntry[], parent: PDFRef): { first: PDFRef; last: PDFRef } => {
    const refs = items.map(() => context.nextRef());
    items.forEach((item, i) => {
      const target = context.obj([pageRefs[item.page - 1], 'Fit']);
      let dest: PDFObject = target;
      if (item.named) {
        dests.set(PDFName.of(item.named), target);
        dest = PDFName.of(item.named);
        hasNamed = true;
      }

      const dict = context.obj({ Title: PDFHexString.fromText(item.title), Parent: parent, Dest: dest });
      if (i > 0) dict.set(PDFName.of('Prev'), refs[i - 1]);
      if (i < items.length - 1) dict.set(PDFName.of('Next'), refs[i + 1]);
      if (item.children && item.children.length > 0) {
        const kids = writeItems(item.children, refs[i]);
        dict.set(PDFName.of('First'), kids.first);
        dict.set(PDFName.of('Last'), kids.last);
        dict.set(PDFName.of('Count'), PDFNumber.of(item.children.length));
      }
      context.assign(refs[i], dict);
    });
    return { first: refs[0], last: refs[refs.length - 1] };
  };

  const rootRef = context.nextRef();
  const top = writeItems(entries, rootRef);
  context.assign(rootRef, context.obj({
    Type: 'Outlines',
    First: top.first,
    Last: top.last,
    Count: entries.length,
  }));
  pdf.catalog.set(PDFName.of('Outlines'), rootRef);
  if (hasNamed) pdf.catalog.set(PDFName.of('Dests'), context.register(dests));
}

/** A PDF whose page N shows "Page N", optionally with bookmarks. */
export async function buildPdf(pageCount: number, title?: string, outline?: PdfOutlineEntry[]): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const font = await pdf.embedFont(StandardFonts.Helvetica);
  for (let i = 1; i <= pageCount; i++) {
    const page = pdf.addPage([300, 400]);
    page.drawText(`Page ${i}`, { x: 40, y: 340, size: 12, font });
  }
  if (title) pdf.setTitle(title);
  pdf.setAuthor('Test Author');
  if (outline && outline.length > 0) addOutline(pdf, outline);
  return pdf.save();
}
