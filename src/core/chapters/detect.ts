/**
 * Chapter detection orchestrator.
 *
 * Strategies run in a fixed precedence chain:
 *   native      document outline (bookmarks / table of contents)
 *   structural  heading heuristics (typography or heading tags)
 *   manifest    one chapter per content unit (archives only)
 *
 * `hybrid` walks the chain and stops at the first strategy that yields
 * chapters; the others run alone. When nothing is found, one chapter covering
 * the whole document is synthesized; the result is never empty.
 */

import { analyzeMarkup, analyzePages } from './heuristic.js';
import { manifestChapters } from './manifest.js';
import { extractOutline } from './outline.js';
import { resolveRanges } from './ranges.js';
import type {
  Chapter,
  ChapterCandidate,
  DetectOptions,
  DetectionResult,
  DetectionSource,
  DetectionStrategy,
  SourceFormat,
} from './types.js';
import { DEFAULT_DETECT_OPTIONS } from './types.js';

export const FALLBACK_TITLE = 'Complete Document';

type StageName = Exclude<DetectionStrategy, 'hybrid'>;

interface StageOutcome {
  chapters: ChapterCandidate[];
  warnings: string[];
}

type Stage = (source: DetectionSource, options: DetectOptions) => Promise<StageOutcome>;

/** Precedence chain; hybrid tries these in order. */
const STAGES: ReadonlyArray<readonly [StageName, Stage]> = [
  ['native', (source, options) => extractOutline(source, options.level)],
  ['structural', (source, options) => source.kind === 'paginated'
    ? analyzePages(source, options.sensitivity)
    : analyzeMarkup(source, options.sensitivity)],
  ['manifest', async (source) => source.kind === 'archive'
    ? manifestChapters(source)
    : { chapters: [], warnings: [] }],
];

/**
 * Detect chapters in an opened document.
 *
 * @param format  Recorded in the result for the materializer and display.
 */
export async function detectChapters(
  source: DetectionSource,
  format: SourceFormat,
  options: Partial<DetectOptions> = {},
): Promise<DetectionResult> {
  const opts: DetectOptions = { ...DEFAULT_DETECT_OPTIONS, ...options };
  const totalUnits = source.kind === 'paginated' ? source.pageCount : source.spine.length;
  const totalPages = source.kind === 'paginated' ? source.pageCount : 0;
  const warnings: string[] = [];

  const stages = opts.strategy === 'hybrid'
    ? STAGES
    : STAGES.filter(([name]) => name === opts.strategy);

  let chapters: Chapter[] = [];
  let strategyUsed = 'fallback';

  for (let i = 0; i < stages.length; i++) {
    const [name, run] = stages[i];
    const outcome = await run(source, opts);
    warnings.push(...outcome.warnings);

    const resolved = resolveRanges(outcome.chapters, totalPages);
    warnings.push(...resolved.warnings);

    if (resolved.chapters.length > 0) {
      chapters = resolved.chapters;
      strategyUsed = i > 0 ? `${name} (fallback)` : name;
      break;
    }
  }

  const usedFallback = chapters.length === 0;
  if (usedFallback) {
    chapters = [wholeDocumentChapter(source)];
  }

  return {
    format,
    chapters,
    strategyUsed,
    totalUnits,
    hasNativeStructure: await hasOutline(source),
    usedFallback,
    warnings,
  };
}

/** The single chapter used when no strategy finds anything. */
export function wholeDocumentChapter(source: DetectionSource): Chapter {
  return {
    title: FALLBACK_TITLE,
    position: source.kind === 'paginated'
      ? { kind: 'pages', startPage: 1, endPage: source.pageCount }
      : { kind: 'archive', unitCount: source.spine.length },
    level: 1,
    detectionMethod: 'fallback',
    confidence: 1.0,
  };
}

async function hasOutline(source: DetectionSource): Promise<boolean> {
  try {
    const nodes = await source.outline();
    return nodes !== null && nodes.length > 0;
  } catch {
    return false; // unreadable outline counts as none
  }
}
