/**
 * Native outline extraction: bookmarks (PDF) or table of contents (EPUB).
 */

import { titleFromHref } from './manifest.js';
import type {
  ChapterCandidate,
  DetectionSource,
  OutlineDestination,
  OutlineNode,
  StartPosition,
} from './types.js';

export interface FlatOutlineEntry {
  title: string;
  dest: OutlineDestination;
  level: number;
}

export interface OutlineExtraction {
  chapters: ChapterCandidate[];
  /** False when the document has no outline or it could not be read. */
  hasOutline: boolean;
  warnings: string[];
}

/**
 * Flatten an outline tree into document order.
 * Roots are level 1; children are one deeper than their parent.
 */
export function flattenOutline(nodes: readonly OutlineNode[]): FlatOutlineEntry[] {
  const out: FlatOutlineEntry[] = [];
  const stack: Array<{ node: OutlineNode; level: number }> = [];
  for (let i = nodes.length - 1; i >= 0; i--) {
    stack.push({ node: nodes[i], level: 1 });
  }

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const { node, level } = next;
    out.push({ title: node.title, dest: node.dest, level });

    if (node.kind === 'section') {
      // Reverse push keeps children in order when popped
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ node: node.children[i], level: level + 1 });
      }
    }
  }
  return out;
}

/** Split "unit#fragment" on the first "#". An empty fragment counts as none. */
export function splitHref(href: string): { href: string; fragment: string | null } {
  const hash = href.indexOf('#');
  if (hash < 0) return { href, fragment: null };
  const fragment = href.slice(hash + 1);
  return { href: href.slice(0, hash), fragment: fragment || null };
}

/**
 * Read the source's outline and turn every node into a native chapter candidate.
 *
 * @param level  Keep only entries at this depth; zero or less keeps all.
 */
export async function extractOutline(source: DetectionSource, level: number): Promise<OutlineExtraction> {
  let nodes: OutlineNode[] | null;
  try {
    nodes = await source.outline();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { chapters: [], hasOutline: false, warnings: [`Outline could not be read: ${msg}`] };
  }
  if (!nodes || nodes.length === 0) {
    return { chapters: [], hasOutline: false, warnings: [] };
  }

  const unitIndex = source.kind === 'archive'
    ? new Map(source.spine.map((u) => [u.href, u.index]))
    : null;
  const warnings: string[] = [];
  const chapters: ChapterCandidate[] = [];

  for (const entry of flattenOutline(nodes)) {
    if (level > 0 && entry.level !== level) continue;

    const start = resolveDestination(entry, unitIndex, warnings);
    if (!start) continue;

    chapters.push({
      title: entry.title.trim() || fallbackTitle(start),
      start,
      level: entry.level,
      detectionMethod: 'native',
      confidence: 1.0,
    });
  }

  return { chapters, hasOutline: true, warnings };
}

function resolveDestination(
  entry: FlatOutlineEntry,
  unitIndex: Map<string, number> | null,
  warnings: string[],
): StartPosition | null {
  const dest = entry.dest;
  if (!dest) {
    warnings.push(`Outline entry "${entry.title}" has no resolvable destination — skipped`);
    return null;
  }

  if (dest.kind === 'page') {
    return { kind: 'page', page: dest.page };
  }

  const { href, fragment } = splitHref(dest.href);
  const index = unitIndex?.get(href);
  if (index === undefined) {
    warnings.push(`Outline entry "${entry.title}" points outside the reading order (${href}) — skipped`);
    return null;
  }
  return { kind: 'unit', href, fragment, unitIndex: index };
}

function fallbackTitle(start: StartPosition): string {
  return start.kind === 'page' ? `Page ${start.page}` : titleFromHref(start.href);
}
