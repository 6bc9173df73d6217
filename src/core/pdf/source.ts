/**
 * PDF reader for chapter detection: outline tree and per-page text runs.
 *
 * Uses pdfjs-dist (pure JS, no canvas) for text extraction + outline access.
 */

// pdfjs-dist legacy build for Node.js (no canvas requirement)
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { MalformedSourceError, errorMessage } from '../errors.js';
import type {
  OutlineDestination,
  OutlineNode,
  PageFailure,
  PageText,
  PaginatedSource,
  TextRun,
} from '../chapters/types.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

/** Runs whose baselines differ by more than this (points) start a new line. */
const LINE_TOLERANCE = 1;

/** An opened PDF. Call `close()` when done. */
export interface PdfSource extends PaginatedSource {
  close(): Promise<void>;
}

/**
 * Open PDF bytes for detection.
 *
 * @throws MalformedSourceError when pdfjs cannot parse the file.
 */
export async function openPdfSource(bytes: Uint8Array, name = 'document.pdf'): Promise<PdfSource> {
  let doc: PdfDocument;
  try {
    doc = await getDocument({
      // a plain copy: pdfjs rejects Buffers and may detach what it is given
      data: new Uint8Array(bytes),
      isEvalSupported: false, // Security: no code generation from strings
      verbosity: 0,           // Suppress warnings
    }).promise;
  } catch (err) {
    throw new MalformedSourceError(`Cannot open ${name} as PDF: ${errorMessage(err)}`);
  }

  let outlineCache: Promise<OutlineNode[] | null> | null = null;

  return {
    kind: 'paginated',
    pageCount: doc.numPages,
    outline: () => {
      outlineCache ??= readOutline(doc);
      return outlineCache;
    },
    pages: () => readPages(doc),
    close: () => doc.destroy(),
  };
}

// ── Outline ──────────────────────────────────────────────────

interface RawOutlineItem {
  title: string;
  dest: string | unknown[] | null;
  items: RawOutlineItem[];
}

function isRawOutlineItem(value: unknown): value is RawOutlineItem {
  if (typeof value !== 'object' || value === null) return false;
  return 'title' in value && typeof value.title === 'string'
    && 'items' in value && Array.isArray(value.items)
    && 'dest' in value && (value.dest === null || typeof value.dest === 'string' || Array.isArray(value.dest));
}

function isRef(value: unknown): value is { num: number; gen: number } {
  return typeof value === 'object' && value !== null
    && 'num' in value && typeof value.num === 'number'
    && 'gen' in value && typeof value.gen === 'number';
}

/** Read the outline as a tree of leaves and sections with resolved 1-based pages. */
async function readOutline(doc: PdfDocument): Promise<OutlineNode[] | null> {
  const raw: unknown[] | null = await doc.getOutline();
  if (!raw || raw.length === 0) return null;

  const roots: OutlineNode[] = [];
  const stack: Array<{ items: unknown[]; into: OutlineNode[] }> = [{ items: raw, into: roots }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    for (const item of frame.items) {
      if (!isRawOutlineItem(item)) continue;
      const dest = await resolveDestination(doc, item.dest);

      if (item.items.length > 0) {
        const children: OutlineNode[] = [];
        frame.into.push({ kind: 'section', title: item.title, dest, children });
        stack.push({ items: item.items, into: children });
      } else {
        frame.into.push({ kind: 'leaf', title: item.title, dest });
      }
    }
  }
  return roots;
}

/** Resolve a named or explicit destination to a 1-based page; null when unresolvable. */
async function resolveDestination(doc: PdfDocument, dest: RawOutlineItem['dest']): Promise<OutlineDestination> {
  if (!dest) return null;
  try {
    const explicit = typeof dest === 'string' ? await doc.getDestination(dest) : dest;
    if (!Array.isArray(explicit) || explicit.length === 0) return null;

    const target: unknown = explicit[0];
    if (typeof target === 'number') {
      return { kind: 'page', page: target + 1 };
    }
    if (isRef(target)) {
      const pageIndex = await doc.getPageIndex(target);
      return { kind: 'page', page: pageIndex + 1 };
    }
    return null;
  } catch {
    return null; // broken destination, reported by the outline extractor
  }
}

// ── Page text ────────────────────────────────────────────────

export interface PositionedRun extends TextRun {
  y: number;
  endOfLine: boolean;
}

async function* readPages(doc: PdfDocument): AsyncGenerator<PageText | PageFailure> {
  for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
    let runs: PositionedRun[];
    try {
      const page = await doc.getPage(pageNumber);
      const textContent = await page.getTextContent();
      runs = [];
      for (const item of textContent.items) {
        if (!('str' in item)) continue;
        // transform[0] is scaleX ~ font size, transform[5] the baseline Y
        runs.push({
          text: item.str,
          size: Math.abs(Number(item.transform[0])),
          y: Number(item.transform[5]),
          endOfLine: item.hasEOL,
        });
      }
    } catch (err) {
      yield { pageNumber, error: errorMessage(err) };
      continue;
    }
    yield { pageNumber, lines: groupLines(runs) };
  }
}

/** Group runs into lines on explicit line ends or baseline changes; blank runs are dropped. */
export function groupLines(runs: readonly PositionedRun[]): TextRun[][] {
  const lines: TextRun[][] = [];
  let line: TextRun[] = [];
  let lastY: number | null = null;

  for (const run of runs) {
    if (lastY !== null && Math.abs(run.y - lastY) > LINE_TOLERANCE && line.length > 0) {
      lines.push(line);
      line = [];
    }
    if (run.text.trim()) line.push({ text: run.text, size: run.size });
    lastY = run.y;

    if (run.endOfLine && line.length > 0) {
      lines.push(line);
      line = [];
    }
  }
  if (line.length > 0) lines.push(line);
  return lines;
}
