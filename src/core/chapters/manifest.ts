/**
 * Manifest fallback: every content unit in reading order becomes a chapter.
 */

import { posix } from 'node:path';
import { firstDescendant, parseMarkup, textOf } from '../epub/markup.js';
import type { ArchiveSource, ChapterCandidate } from './types.js';

const MANIFEST_CONFIDENCE = 0.6;

/** "Text/chapter_one.xhtml" → "Chapter One". */
export function titleFromHref(href: string): string {
  const stem = posix.basename(href).replace(/\.[^.]+$/, '');
  const words = stem.replace(/[_-]+/g, ' ').trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return 'Untitled';
  return words
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

/** First <title>, else first <h1>, else first <h2>; empty when none has text. */
export function titleFromMarkup(doc: Document): string {
  for (const name of ['title', 'h1', 'h2']) {
    const el = firstDescendant(doc, name);
    const text = el ? textOf(el) : '';
    if (text) return text;
  }
  return '';
}

export async function manifestChapters(
  source: ArchiveSource,
): Promise<{ chapters: ChapterCandidate[]; warnings: string[] }> {
  const chapters: ChapterCandidate[] = [];
  const warnings: string[] = [];

  for (const unit of source.spine) {
    let title = '';
    try {
      const doc = parseMarkup(await source.readUnit(unit.href), unit.href);
      title = titleFromMarkup(doc);
    } catch (err) {
      warnings.push(`${err instanceof Error ? err.message : String(err)} — title taken from file name`);
    }

    chapters.push({
      title: title || titleFromHref(unit.href),
      start: { kind: 'unit', href: unit.href, fragment: null, unitIndex: unit.index },
      level: 1,
      detectionMethod: 'manifest',
      confidence: MANIFEST_CONFIDENCE,
    });
  }

  return { chapters, warnings };
}
