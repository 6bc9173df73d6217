/**
 * Plain-text PDF renderer: flows paragraphs onto fixed-size pages.
 *
 * Naive layout: a fixed character budget per line and a fixed line height,
 * Helvetica only. Good enough to read a chapter; not a typesetter.
 */

import { PDFDocument, StandardFonts } from 'pdf-lib';
import { applyPdfMetadata } from './split.js';
import type { PdfMetadata } from './split.js';

/** US Letter, points. */
const PAGE_SIZE: [number, number] = [612, 792];
const MARGIN = 72;
const FONT_SIZE = 11;
const LINE_HEIGHT = 14;
const TITLE_SIZE = 16;
const TITLE_GAP = 24;
export const CHARS_PER_LINE = 90;

/** Typographic characters mapped to ASCII for the standard font. */
const ASCII_FALLBACKS: Record<string, string> = {
  '\u2018': "'",
  '\u2019': "'",
  '\u201C': '"',
  '\u201D': '"',
  '\u2013': '-',
  '\u2014': '-',
  '\u2026': '...',
  '\u2022': '*',
};

/** Collapse whitespace and replace characters the standard font cannot encode. */
export function toRenderableText(value: string): string {
  return value
    .replace(/\s+/g, ' ')
    .replace(/[\u2018\u2019\u201C\u201D\u2013\u2014\u2026\u2022]/g, (ch) => ASCII_FALLBACKS[ch] ?? ' ')
    .replace(/[^\x20-\x7E\xA1-\xFF]/g, '?');
}

/**
 * Wrap text at `width` characters on word boundaries.
 * Words longer than a line are hard-split.
 */
export function wrapText(text: string, width = CHARS_PER_LINE): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const out: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= width) {
      current = candidate;
      continue;
    }
    if (current) out.push(current);

    let rest = word;
    while (rest.length > width) {
      out.push(rest.slice(0, width));
      rest = rest.slice(width);
    }
    current = rest;
  }
  if (current) out.push(current);
  return out;
}

/**
 * Render a titled chapter as a paginated PDF.
 *
 * @param paragraphs  Plain-text paragraphs; a blank line separates each.
 */
export async function renderTextPdf(
  title: string,
  paragraphs: readonly string[],
  metadata?: PdfMetadata,
): Promise<Uint8Array> {
  const pdf = await PDFDocument.create({ updateMetadata: metadata !== undefined });
  const font = await pdf.embedFont(StandardFonts.Helvetica);
  const bold = await pdf.embedFont(StandardFonts.HelveticaBold);

  let page = pdf.addPage(PAGE_SIZE);
  let y = PAGE_SIZE[1] - MARGIN;

  for (const line of wrapText(toRenderableText(title), Math.floor(CHARS_PER_LINE * FONT_SIZE / TITLE_SIZE))) {
    page.drawText(line, { x: MARGIN, y: y - TITLE_SIZE, size: TITLE_SIZE, font: bold });
    y -= TITLE_SIZE + 4;
  }
  y -= TITLE_GAP;

  for (const paragraph of paragraphs) {
    const lines = wrapText(toRenderableText(paragraph));
    for (const line of lines) {
      if (y - LINE_HEIGHT < MARGIN) {
        page = pdf.addPage(PAGE_SIZE);
        y = PAGE_SIZE[1] - MARGIN;
      }
      page.drawText(line, { x: MARGIN, y: y - FONT_SIZE, size: FONT_SIZE, font });
      y -= LINE_HEIGHT;
    }
    if (lines.length > 0) y -= LINE_HEIGHT;
  }

  if (metadata) applyPdfMetadata(pdf, metadata);
  return pdf.save();
}
