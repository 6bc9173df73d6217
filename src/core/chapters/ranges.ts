/**
 * Range resolution: ordered chapter starts → closed, non-overlapping chapters.
 */

import type { Chapter, ChapterCandidate, StartPosition } from './types.js';

export interface ResolvedRanges {
  chapters: Chapter[];
  warnings: string[];
}

/** Sort key of a start position; equal keys share a page or unit. */
function orderKey(start: StartPosition): number {
  return start.kind === 'page' ? start.page : start.unitIndex;
}

function samePosition(a: StartPosition, b: StartPosition): boolean {
  if (a.kind === 'page' || b.kind === 'page') {
    return a.kind === b.kind && orderKey(a) === orderKey(b);
  }
  return a.href === b.href && a.fragment === b.fragment;
}

/**
 * Turn candidates (document order) into chapters.
 *
 * Candidates that start before an earlier kept candidate (a malformed,
 * non-monotonic outline) are dropped with a warning. Pages then end one
 * page before the next start, the last at `totalPages`; a candidate whose
 * range would be empty because the next one starts on the same page is
 * dropped, so the later entry wins. Archive units carry no arithmetic: the
 * chapter is its unit, and exact duplicates collapse the same way. A unit
 * that has a whole-unit entry keeps only that one; its anchored entries
 * lie inside it and are dropped with a warning.
 */
export function resolveRanges(candidates: readonly ChapterCandidate[], totalPages: number): ResolvedRanges {
  const warnings: string[] = [];
  const ordered: ChapterCandidate[] = [];
  const wholeUnits = new Map<string, string>();
  for (const { title, start } of candidates) {
    if (start.kind === 'unit' && start.fragment === null && !wholeUnits.has(start.href)) {
      wholeUnits.set(start.href, title);
    }
  }

  for (const candidate of candidates) {
    const { start } = candidate;
    if (start.kind === 'unit' && start.fragment !== null) {
      const container = wholeUnits.get(start.href);
      if (container !== undefined) {
        warnings.push(`"${candidate.title}" lies inside "${container}" (${start.href}) — dropped`);
        continue;
      }
    }

    const prev = ordered[ordered.length - 1];
    if (prev && orderKey(candidate.start) < orderKey(prev.start)) {
      warnings.push(
        `"${candidate.title}" starts before "${prev.title}" — out-of-order entry dropped`,
      );
      continue;
    }
    if (candidate.start.kind === 'page' && (candidate.start.page < 1 || candidate.start.page > totalPages)) {
      warnings.push(`"${candidate.title}" points to page ${candidate.start.page} outside 1-${totalPages} — dropped`);
      continue;
    }
    ordered.push(candidate);
  }

  const chapters: Chapter[] = [];
  for (let i = 0; i < ordered.length; i++) {
    const { title, start, level, detectionMethod, confidence } = ordered[i];
    const next = ordered[i + 1];

    if (start.kind === 'unit') {
      if (next && samePosition(start, next.start)) continue;
      chapters.push({ title, position: start, level, detectionMethod, confidence });
      continue;
    }

    const startPage = start.page;
    const endPage = next ? orderKey(next.start) - 1 : totalPages;
    if (startPage > endPage) continue;

    chapters.push({
      title,
      position: { kind: 'pages', startPage, endPage },
      level,
      detectionMethod,
      confidence,
    });
  }

  return { chapters, warnings };
}
