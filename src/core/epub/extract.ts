/**
 * Chapter content extraction from a content unit.
 */

import {
  attrValue,
  descendantElements,
  escapeXml,
  findById,
  firstDescendant,
  isElement,
  localName,
  parseMarkup,
  serializeNode,
  stripTags,
} from './markup.js';

const XHTML_NS = 'http://www.w3.org/1999/xhtml';

const BLOCK_TAGS = new Set([
  'p', 'div', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'li', 'blockquote', 'pre',
  'section', 'article', 'header', 'footer', 'aside', 'figcaption', 'dt', 'dd', 'tr', 'td', 'th',
]);

export interface ExtractedUnit {
  markup: string;
  /** False when the whole unit was kept because the anchor was missing or the unit unparseable. */
  narrowed: boolean;
}

/**
 * Markup for a chapter: the element with id `fragment` spliced into a fresh
 * XHTML shell, or the unit unchanged when there is no fragment, the id is
 * absent or the unit cannot be parsed.
 */
export function extractFragment(
  markup: string,
  unitHref: string,
  fragment: string | null,
  title: string,
): ExtractedUnit {
  if (!fragment) return { markup, narrowed: false };

  let doc: Document;
  try {
    doc = parseMarkup(markup, unitHref);
  } catch {
    return { markup, narrowed: false }; // keep the unit as-is when it does not parse
  }
  const target = findById(doc, fragment);
  if (!target) return { markup, narrowed: false };

  return { markup: xhtmlShell(title, serializeNode(target), headStyles(doc)), narrowed: true };
}

/** Stylesheet links and style blocks of the source head, serialized. */
function headStyles(doc: Document): string {
  const head = firstDescendant(doc, 'head');
  if (!head) return '';
  return descendantElements(head, ['link', 'style'])
    .filter((el) => localName(el) === 'style' || attrValue(el, 'rel').toLowerCase().split(/\s+/).includes('stylesheet'))
    .map((el) => serializeNode(el))
    .join('');
}

export function xhtmlShell(title: string, body: string, head = ''): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<!DOCTYPE html>',
    `<html xmlns="${XHTML_NS}">`,
    `<head><title>${escapeXml(title)}</title>${head}</head>`,
    `<body>${body}</body>`,
    '</html>',
    '',
  ].join('\n');
}

/**
 * Plain-text paragraphs of a unit: one per block element with text.
 * Falls back to lossy tag stripping (a single paragraph) when the markup
 * does not parse.
 */
export function extractParagraphs(markup: string, unitHref: string): string[] {
  let doc: Document;
  try {
    doc = parseMarkup(markup, unitHref);
  } catch {
    const text = stripTags(markup);
    return text ? [text] : [];
  }

  const body = firstDescendant(doc, 'body') ?? doc.documentElement;
  const paragraphs: string[] = [];
  let pending = '';

  const flush = (): void => {
    const text = pending.replace(/\s+/g, ' ').trim();
    if (text) paragraphs.push(text);
    pending = '';
  };

  // Iterative walk; a block boundary on entry and on exit ends a paragraph
  const stack: Array<{ node: Node; exit: boolean }> = [{ node: body, exit: false }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, exit } = frame;

    if (!isElement(node)) {
      if (node.nodeType === 3 || node.nodeType === 4) pending += node.nodeValue ?? '';
      continue;
    }

    const name = localName(node);
    if (name === 'script' || name === 'style' || name === 'head') continue;
    const block = BLOCK_TAGS.has(name);

    if (exit) {
      if (block) flush();
      continue;
    }
    if (block) flush();
    if (name === 'br') pending += ' ';

    stack.push({ node, exit: true });
    const kids = node.childNodes;
    for (let i = kids.length - 1; i >= 0; i--) {
      const kid = kids[i];
      if (kid) stack.push({ node: kid, exit: false });
    }
  }
  flush();
  return paragraphs;
}
