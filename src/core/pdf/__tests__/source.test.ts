import { describe, it, expect } from 'vitest';
import { MalformedSourceError } from '../../errors.js';
import { detectChapters } from '../../chapters/detect.js';
import { groupLines, openPdfSource } from '../source.js';
import type { PageFailure, PageText } from '../../chapters/types.js';
import { buildPdf } from '../../__tests__/fixtures.js';
import type { PdfOutlineEntry } from '../../__tests__/fixtures.js';

describe('groupLines', () => {
  it('splits on explicit line ends and baseline changes', () => {
    const lines = groupLines([
      { text: 'Chapter', size: 18, y: 700, endOfLine: false },
      { text: ' 1', size: 18, y: 700.4, endOfLine: true },
      { text: 'Body', size: 10, y: 680, endOfLine: false },
      { text: 'more', size: 10, y: 660.5, endOfLine: false },
      { text: '  ', size: 10, y: 640, endOfLine: false },
    ]);
    expect(lines).toEqual([
      [{ text: 'Chapter', size: 18 }, { text: ' 1', size: 18 }],
      [{ text: 'Body', size: 10 }],
      [{ text: 'more', size: 10 }],
    ]);
  });
});

describe('openPdfSource', () => {
  it('reads page count, text runs and the missing outline', async () => {
    const source = await openPdfSource(await buildPdf(3));
    try {
      expect(source.pageCount).toBe(3);
      expect(await source.outline()).toBeNull();

      const pages: Array<PageText | PageFailure> = [];
      for await (const page of source.pages()) pages.push(page);
      expect(pages.map((p) => p.pageNumber)).toEqual([1, 2, 3]);

      const second = pages[1];
      if ('error' in second) throw new Error(second.error);
      const runs = second.lines.flat();
      expect(runs.map((r) => r.text).join('')).toBe('Page 2');
      expect(runs[0].size).toBeCloseTo(12);
    } finally {
      await source.close();
    }
  });

  const bookmarks: PdfOutlineEntry[] = [
    { title: 'Part One', page: 1, children: [{ title: 'Opening', page: 1 }] },
    { title: 'Middle', page: 10, named: 'middle' },
    { title: 'End', page: 25 },
  ];

  it('reads nested bookmarks with explicit and named destinations as 1-based pages', async () => {
    const source = await openPdfSource(await buildPdf(30, 'Book', bookmarks));
    try {
      expect(await source.outline()).toEqual([
        {
          kind: 'section',
          title: 'Part One',
          dest: { kind: 'page', page: 1 },
          children: [{ kind: 'leaf', title: 'Opening', dest: { kind: 'page', page: 1 } }],
        },
        { kind: 'leaf', title: 'Middle', dest: { kind: 'page', page: 10 } },
        { kind: 'leaf', title: 'End', dest: { kind: 'page', page: 25 } },
      ]);
    } finally {
      await source.close();
    }
  });

  it('splits a bookmarked PDF into consecutive page ranges', async () => {
    const source = await openPdfSource(await buildPdf(30, 'Book', bookmarks));
    try {
      const result = await detectChapters(source, 'pdf');
      expect(result.strategyUsed).toBe('native');
      expect(result.hasNativeStructure).toBe(true);
      expect(result.chapters.map((c) => [c.title, c.position])).toEqual([
        ['Part One', { kind: 'pages', startPage: 1, endPage: 9 }],
        ['Middle', { kind: 'pages', startPage: 10, endPage: 24 }],
        ['End', { kind: 'pages', startPage: 25, endPage: 30 }],
      ]);
    } finally {
      await source.close();
    }
  });

  it('rejects bytes that are not a PDF', async () => {
    await expect(openPdfSource(new TextEncoder().encode('plain text'), 'notes.pdf')).rejects.toThrow(MalformedSourceError);
  });
});
