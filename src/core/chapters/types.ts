/**
 * Types for chapter detection across paginated (PDF) and archive (EPUB) documents.
 */

// ── Positions ────────────────────────────────────────────────

/** A 1-based page in a paginated document. */
export interface PagePosition {
  kind: 'page';
  page: number;
}

/** A content unit (XHTML file) in an archive, optionally narrowed to an anchor. */
export interface UnitPosition {
  kind: 'unit';
  /** Unit path relative to the package document, e.g. "Text/ch01.xhtml". */
  href: string;
  /** Element id inside the unit, or null for the whole unit. */
  fragment: string | null;
  /** Spine index of the unit; orders chapters across units. */
  unitIndex: number;
}

/** Where a chapter starts, before ranges are resolved. */
export type StartPosition = PagePosition | UnitPosition;

/** Inclusive 1-based page range. */
export interface PageSpan {
  kind: 'pages';
  startPage: number;
  endPage: number;
}

/** Every content unit of an archive, in reading order. */
export interface WholeArchive {
  kind: 'archive';
  unitCount: number;
}

/** Resolved location of a chapter. */
export type ChapterPosition = PageSpan | UnitPosition | WholeArchive;

// ── Chapters ─────────────────────────────────────────────────

export type DetectionMethod = 'native' | 'structural' | 'manifest' | 'fallback';

/** A chapter start found by one of the strategies. */
export interface ChapterCandidate {
  readonly title: string;
  readonly start: StartPosition;
  readonly level: number;
  readonly detectionMethod: DetectionMethod;
  readonly confidence: number;
}

export interface Chapter {
  readonly title: string;
  readonly position: ChapterPosition;
  /** Hierarchy depth, 1 = top level. */
  readonly level: number;
  readonly detectionMethod: DetectionMethod;
  /** Score in [0, 1]. */
  readonly confidence: number;
}

// ── Detection options ────────────────────────────────────────

export type DetectionStrategy = 'native' | 'structural' | 'manifest' | 'hybrid';

export type Sensitivity = 'low' | 'medium' | 'high';

export type SourceFormat = 'pdf' | 'epub';

export interface DetectOptions {
  strategy: DetectionStrategy;
  sensitivity: Sensitivity;
  /** Outline level to split by. Zero or less keeps every level. */
  level: number;
}

export const DEFAULT_DETECT_OPTIONS: DetectOptions = {
  strategy: 'hybrid',
  sensitivity: 'medium',
  level: 1,
};

export interface DetectionResult {
  readonly format: SourceFormat;
  /** Never empty. */
  readonly chapters: readonly Chapter[];
  /** Stage that produced the chapters, e.g. "native" or "structural (fallback)". */
  readonly strategyUsed: string;
  /** Total pages, or total content files for archives. */
  readonly totalUnits: number;
  readonly hasNativeStructure: boolean;
  /** True when the whole-document chapter was synthesized. */
  readonly usedFallback: boolean;
  /** Non-fatal problems met during detection (skipped units, dropped entries). */
  readonly warnings: readonly string[];
}

// ── Source object model ──────────────────────────────────────

/** Destination of an outline node, already resolved by the document adapter. */
export type OutlineDestination =
  | { kind: 'page'; page: number }
  | { kind: 'href'; href: string }
  | null;

export interface OutlineLeaf {
  kind: 'leaf';
  title: string;
  dest: OutlineDestination;
}

export interface OutlineSection {
  kind: 'section';
  title: string;
  dest: OutlineDestination;
  children: OutlineNode[];
}

/** A node of a document's native table of contents. */
export type OutlineNode = OutlineLeaf | OutlineSection;

/** One run of text with its rendered size in points. */
export interface TextRun {
  text: string;
  size: number;
}

/** Text of one page, as lines of runs in reading order. */
export interface PageText {
  /** 1-based. */
  pageNumber: number;
  lines: TextRun[][];
}

/** A page whose text could not be extracted. */
export interface PageFailure {
  pageNumber: number;
  error: string;
}

/** A content file listed in an archive's spine. */
export interface SpineUnit {
  href: string;
  index: number;
}

/** Paginated document as seen by the detection engine. */
export interface PaginatedSource {
  kind: 'paginated';
  pageCount: number;
  /** Null when the document has no outline. */
  outline(): Promise<OutlineNode[] | null>;
  pages(): AsyncIterable<PageText | PageFailure>;
}

/** Archive document as seen by the detection engine. */
export interface ArchiveSource {
  kind: 'archive';
  spine: readonly SpineUnit[];
  /** Null when the archive has no table of contents. */
  outline(): Promise<OutlineNode[] | null>;
  readUnit(href: string): Promise<string>;
}

export type DetectionSource = PaginatedSource | ArchiveSource;

/** Number of pages (or archive units) a chapter covers. */
export function pageCount(chapter: Chapter): number {
  const pos = chapter.position;
  if (pos.kind === 'pages') return pos.endPage - pos.startPage + 1;
  return pos.kind === 'archive' ? pos.unitCount : 1;
}

/** Human-readable location, e.g. "3-9" or "Text/ch01.xhtml#s2". */
export function describePosition(position: ChapterPosition): string {
  if (position.kind === 'pages') {
    return position.startPage === position.endPage
      ? `${position.startPage}`
      : `${position.startPage}-${position.endPage}`;
  }
  if (position.kind === 'archive') return `all ${position.unitCount} units`;
  return position.fragment ? `${position.href}#${position.fragment}` : position.href;
}
