import { describe, it, expect } from 'vitest';
import { extractOutline, flattenOutline, splitHref } from '../outline.js';
import type { OutlineNode } from '../types.js';
import { fakeArchive, fakePaginated, xhtml } from '../../__tests__/fixtures.js';

const page = (n: number) => ({ kind: 'page' as const, page: n });

const tree: OutlineNode[] = [
  { kind: 'leaf', title: 'Intro', dest: page(1) },
  {
    kind: 'section',
    title: 'Part One',
    dest: page(2),
    children: [
      { kind: 'leaf', title: 'Ch 1', dest: page(2) },
      { kind: 'section', title: 'Ch 2', dest: page(5), children: [{ kind: 'leaf', title: '2.1', dest: page(6) }] },
    ],
  },
  { kind: 'leaf', title: 'Appendix', dest: page(9) },
];

describe('flattenOutline', () => {
  it('lists nodes in document order with their depth', () => {
    expect(flattenOutline(tree).map((e) => [e.title, e.level])).toEqual([
      ['Intro', 1],
      ['Part One', 1],
      ['Ch 1', 2],
      ['Ch 2', 2],
      ['2.1', 3],
      ['Appendix', 1],
    ]);
  });

  it('returns nothing for an empty outline', () => {
    expect(flattenOutline([])).toEqual([]);
  });
});

describe('splitHref', () => {
  it('splits on the first hash', () => {
    expect(splitHref('Text/a.xhtml#s1')).toEqual({ href: 'Text/a.xhtml', fragment: 's1' });
    expect(splitHref('Text/a.xhtml')).toEqual({ href: 'Text/a.xhtml', fragment: null });
    expect(splitHref('Text/a.xhtml#')).toEqual({ href: 'Text/a.xhtml', fragment: null });
  });
});

describe('extractOutline', () => {
  const source = fakePaginated({ pageCount: 12, outline: tree });

  it('keeps only the requested level', async () => {
    const top = await extractOutline(source, 1);
    expect(top.hasOutline).toBe(true);
    expect(top.chapters.map((c) => [c.title, c.start])).toEqual([
      ['Intro', page(1)],
      ['Part One', page(2)],
      ['Appendix', page(9)],
    ]);

    const second = await extractOutline(source, 2);
    expect(second.chapters.map((c) => c.title)).toEqual(['Ch 1', 'Ch 2']);
    expect(second.chapters.every((c) => c.level === 2)).toBe(true);
  });

  it('keeps every level at level 0', async () => {
    const all = await extractOutline(source, 0);
    expect(all.chapters).toHaveLength(6);
    expect(all.chapters.every((c) => c.detectionMethod === 'native' && c.confidence === 1)).toBe(true);
  });

  it('skips entries without a destination and names untitled ones', async () => {
    const result = await extractOutline(fakePaginated({
      pageCount: 5,
      outline: [
        { kind: 'leaf', title: 'Broken', dest: null },
        { kind: 'leaf', title: '  ', dest: page(4) },
      ],
    }), 1);
    expect(result.chapters.map((c) => c.title)).toEqual(['Page 4']);
    expect(result.warnings).toEqual(['Outline entry "Broken" has no resolvable destination — skipped']);
  });

  it('reports a document without an outline', async () => {
    const result = await extractOutline(fakePaginated({ pageCount: 3 }), 1);
    expect(result).toEqual({ chapters: [], hasOutline: false, warnings: [] });
  });

  it('turns an unreadable outline into a warning', async () => {
    const broken = { ...fakePaginated({ pageCount: 3 }), outline: () => Promise.reject(new Error('bad xref')) };
    const result = await extractOutline(broken, 1);
    expect(result).toEqual({ chapters: [], hasOutline: false, warnings: ['Outline could not be read: bad xref'] });
  });

  it('maps archive destinations onto spine units', async () => {
    const archive = fakeArchive({
      units: { 'Text/one.xhtml': xhtml('1', ''), 'Text/two_part.xhtml': xhtml('2', '') },
      outline: [
        { kind: 'leaf', title: 'One', dest: { kind: 'href', href: 'Text/one.xhtml' } },
        { kind: 'leaf', title: '', dest: { kind: 'href', href: 'Text/two_part.xhtml#s2' } },
        { kind: 'leaf', title: 'Notes', dest: { kind: 'href', href: 'Text/notes.xhtml' } },
      ],
    });
    const result = await extractOutline(archive, 1);
    expect(result.chapters.map((c) => [c.title, c.start])).toEqual([
      ['One', { kind: 'unit', href: 'Text/one.xhtml', fragment: null, unitIndex: 0 }],
      ['Two Part', { kind: 'unit', href: 'Text/two_part.xhtml', fragment: 's2', unitIndex: 1 }],
    ]);
    expect(result.warnings).toEqual([
      'Outline entry "Notes" points outside the reading order (Text/notes.xhtml) — skipped',
    ]);
  });
});
