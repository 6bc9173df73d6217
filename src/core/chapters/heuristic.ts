/**
 * Heuristic heading detection for documents without an outline.
 *
 * Paginated sources are scored on text patterns and relative font size;
 * archive sources on heading tags (h1–h3, depth set by sensitivity).
 *
 * Confidence for a text run (base 0.5, clamped to [0, 1]):
 *   chapter pattern        +0.4
 *   size >= 16pt           +0.1
 *   size in [14, 16)       +0.05
 *   more than 10 words     -0.2
 *   7–10 words             -0.1
 */

import { attrValue, descendantElements, localName, parseMarkup, textOf } from '../epub/markup.js';
import type { ArchiveSource, ChapterCandidate, PaginatedSource, Sensitivity, TextRun } from './types.js';

// ── Sensitivity presets ──────────────────────────────────────

export interface SensitivityPreset {
  /** Size multiple of the page average that qualifies a run by size alone. */
  fontSizeRatio: number;
  /** Candidates scoring below this are discarded. */
  minConfidence: number;
  /** Heading depths (h1 = 1) considered in markup. */
  headingDepths: readonly number[];
}

export const SENSITIVITY_PRESETS: Readonly<Record<Sensitivity, SensitivityPreset>> = {
  low: { fontSizeRatio: 1.5, minConfidence: 0.8, headingDepths: [1] },
  medium: { fontSizeRatio: 1.3, minConfidence: 0.6, headingDepths: [1, 2] },
  high: { fontSizeRatio: 1.2, minConfidence: 0.4, headingDepths: [1, 2, 3] },
};

/** Fixed confidence per heading depth in markup. */
const HEADING_CONFIDENCE: Record<number, number> = { 1: 1.0, 2: 0.7, 3: 0.5 };

// ── Scoring constants ────────────────────────────────────────

const BASE_CONFIDENCE = 0.5;
const SCORE_PATTERN = 0.4;
const SCORE_LARGE_FONT = 0.1;
const SCORE_MEDIUM_FONT = 0.05;
const PENALTY_LONG = 0.2;
const PENALTY_WORDY = 0.1;

const LARGE_FONT_PT = 16;
const MEDIUM_FONT_PT = 14;
/** Runs longer than this never qualify by size alone. */
const MAX_HEADING_WORDS = 10;
const WORDY_HEADING_WORDS = 6;

/** Ordinal heading patterns, matched at the start of the run. */
const CHAPTER_PATTERNS: RegExp[] = [
  /^chapter\s+(\d+|[ivxlcdm]+)\b/i,
  /^part\s+(\d+|[ivxlcdm]+)\b/i,
  /^\d+\.\s+\S/,
];

export function matchesChapterPattern(text: string): boolean {
  return CHAPTER_PATTERNS.some((p) => p.test(text));
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Score a heading candidate from its text and size in points. */
export function scoreHeading(text: string, fontSize: number): number {
  let confidence = BASE_CONFIDENCE;

  if (matchesChapterPattern(text)) confidence += SCORE_PATTERN;

  if (fontSize >= LARGE_FONT_PT) {
    confidence += SCORE_LARGE_FONT;
  } else if (fontSize >= MEDIUM_FONT_PT) {
    confidence += SCORE_MEDIUM_FONT;
  }

  const words = wordCount(text);
  if (words > MAX_HEADING_WORDS) {
    confidence -= PENALTY_LONG;
  } else if (words > WORDY_HEADING_WORDS) {
    confidence -= PENALTY_WORDY;
  }

  // Round away float noise (0.5 + 0.4 + 0.1 must be exactly 1)
  return Math.min(1, Math.max(0, Math.round(confidence * 1000) / 1000));
}

/** Mean size of all runs with a positive size; 0 when there are none. */
export function averageFontSize(lines: readonly TextRun[][]): number {
  let total = 0;
  let count = 0;
  for (const line of lines) {
    for (const run of line) {
      if (run.size > 0) {
        total += run.size;
        count++;
      }
    }
  }
  return count > 0 ? total / count : 0;
}

/** Whether a run looks like a heading, by pattern or by size relative to the page. */
export function isPotentialHeading(
  text: string,
  fontSize: number,
  averageSize: number,
  preset: SensitivityPreset,
): boolean {
  if (matchesChapterPattern(text)) return true;
  return averageSize > 0
    && fontSize >= averageSize * preset.fontSizeRatio
    && wordCount(text) <= MAX_HEADING_WORDS;
}

// ── Paginated analysis ───────────────────────────────────────

export interface HeuristicScan {
  chapters: ChapterCandidate[];
  warnings: string[];
}

/**
 * Scan every page for heading runs. The first qualifying run of each line
 * is scored; accepted runs become structural chapter candidates.
 */
export async function analyzePages(source: PaginatedSource, sensitivity: Sensitivity): Promise<HeuristicScan> {
  const preset = SENSITIVITY_PRESETS[sensitivity];
  const chapters: ChapterCandidate[] = [];
  const warnings: string[] = [];

  for await (const page of source.pages()) {
    if ('error' in page) {
      warnings.push(`Page ${page.pageNumber} skipped: ${page.error}`);
      continue;
    }

    const average = averageFontSize(page.lines);
    for (const line of page.lines) {
      for (const run of line) {
        const text = run.text.trim();
        if (!text || !isPotentialHeading(text, run.size, average, preset)) continue;

        const confidence = scoreHeading(text, run.size);
        if (confidence >= preset.minConfidence) {
          chapters.push({
            title: text,
            start: { kind: 'page', page: page.pageNumber },
            level: 1,
            detectionMethod: 'structural',
            confidence,
          });
        }
        break;
      }
    }
  }

  return { chapters, warnings };
}

// ── Archive analysis ─────────────────────────────────────────

const HEADING_TAG = /^h([1-6])$/;

/**
 * Walk every spine unit's headings in document order, keeping the depths
 * allowed by the sensitivity preset. Units that fail to parse are skipped.
 */
export async function analyzeMarkup(source: ArchiveSource, sensitivity: Sensitivity): Promise<HeuristicScan> {
  const depths = new Set(SENSITIVITY_PRESETS[sensitivity].headingDepths);
  const chapters: ChapterCandidate[] = [];
  const warnings: string[] = [];

  for (const unit of source.spine) {
    let doc: Document;
    try {
      doc = parseMarkup(await source.readUnit(unit.href), unit.href);
    } catch (err) {
      warnings.push(`${err instanceof Error ? err.message : String(err)} — unit skipped`);
      continue;
    }

    for (const heading of descendantElements(doc, ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'])) {
      const match = HEADING_TAG.exec(localName(heading));
      if (!match) continue;
      const depth = parseInt(match[1], 10);
      if (!depths.has(depth)) continue;

      const title = textOf(heading);
      if (!title) continue;

      chapters.push({
        title,
        start: {
          kind: 'unit',
          href: unit.href,
          fragment: attrValue(heading, 'id') || null,
          unitIndex: unit.index,
        },
        level: depth,
        detectionMethod: 'structural',
        confidence: HEADING_CONFIDENCE[depth] ?? HEADING_CONFIDENCE[3],
      });
    }
  }

  return { chapters, warnings };
}
