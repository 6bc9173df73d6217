/**
 * XHTML / XML helpers over @xmldom/xmldom.
 *
 * Walks by local name so prefixed (opf:item, dc:title) and unprefixed
 * markup are handled alike.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { UnitParseError } from '../errors.js';

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * How a document is parsed: `xml` knows only the five XML entities
 * (package, NCX and container documents); `html` also decodes the HTML
 * named entities (`&nbsp;`, `&rsquo;`) that XHTML content documents use.
 */
export type MarkupMode = 'xml' | 'html';

const MIME_TYPES: Record<MarkupMode, string> = {
  xml: 'application/xml',
  html: 'text/html',
};

/**
 * Parse an XML or XHTML document.
 *
 * Recoverable diagnostics (unknown entities, mismatched end tags) leave a
 * usable tree and are ignored; a fatal error or a missing root element fails.
 *
 * @throws UnitParseError
 */
export function parseMarkup(content: string, unit: string, mode: MarkupMode = 'html'): Document {
  const fatal: string[] = [];
  const recoverable: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => { recoverable.push(String(msg)); },
      error: (msg: unknown) => { recoverable.push(String(msg)); },
      fatalError: (msg: unknown) => { fatal.push(String(msg)); },
    },
  });

  const doc = parser.parseFromString(content, MIME_TYPES[mode]);
  if (fatal.length > 0) {
    throw new UnitParseError(unit, fatal[0]);
  }
  if (!doc || !doc.documentElement) {
    throw new UnitParseError(unit, recoverable[0] ?? 'no root element');
  }
  return doc;
}

export function serializeNode(node: Node): string {
  return new XMLSerializer().serializeToString(node);
}

export function localName(el: Element): string {
  return String(el.localName || el.nodeName || '').replace(/^.*:/, '').toLowerCase();
}

export function childElements(node: Node, name?: string): Element[] {
  const out: Element[] = [];
  const wanted = name ? name.toLowerCase() : '';
  const list = node.childNodes;
  if (!list) return out;
  for (let i = 0; i < list.length; i += 1) {
    const child = list[i];
    if (!child || !isElement(child)) continue;
    if (!wanted || localName(child) === wanted) out.push(child);
  }
  return out;
}

/** All descendant elements in document order, optionally filtered by local name. */
export function descendantElements(node: Node, names?: readonly string[]): Element[] {
  const out: Element[] = [];
  const wanted = names ? new Set(names.map((n) => n.toLowerCase())) : null;
  const stack: Element[] = childElements(node).reverse();
  while (stack.length > 0) {
    const el = stack.pop();
    if (!el) break;
    if (!wanted || wanted.has(localName(el))) out.push(el);
    const kids = childElements(el);
    for (let i = kids.length - 1; i >= 0; i--) stack.push(kids[i]);
  }
  return out;
}

export function firstDescendant(node: Node, name: string): Element | null {
  return descendantElements(node, [name])[0] ?? null;
}

/** Attribute value by qualified or local name ("href" also matches "xlink:href"). */
export function attrValue(el: Element, attrName: string): string {
  const attrs = el.attributes;
  if (!attrs) return '';
  for (let i = 0; i < attrs.length; i += 1) {
    const attr = attrs[i];
    if (!attr) continue;
    const raw = String(attr.name || '');
    const local = raw.replace(/^.*:/, '');
    if (raw === attrName || local === attrName) return String(attr.value || '');
  }
  return '';
}

/** Text content with whitespace collapsed and trimmed. */
export function textOf(node: Node): string {
  return String(node.textContent ?? '').replace(/\s+/g, ' ').trim();
}

/** Find the element carrying the given id. */
export function findById(doc: Document, id: string): Element | null {
  for (const el of descendantElements(doc)) {
    if (attrValue(el, 'id') === id) return el;
  }
  return null;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const ENTITY = /&(#x[0-9a-f]+|#\d+|[a-z][a-z0-9]*);/gi;
const decodedEntities = new Map<string, string>();

/** Decode one entity reference with the parser's HTML entity table; unknown names stay as written. */
function decodeEntity(reference: string): string {
  const cached = decodedEntities.get(reference);
  if (cached !== undefined) return cached;
  const doc = parseMarkup(`<e>${reference}</e>`, 'entity');
  const decoded = String(doc.documentElement.textContent ?? reference);
  decodedEntities.set(reference, decoded);
  return decoded;
}

/**
 * Lossy markup-to-text: drops head/script/style blocks and tags, decodes
 * entities. Used when a unit cannot be parsed.
 */
export function stripTags(markup: string): string {
  return markup
    .replace(/<head[\s>][\s\S]*?<\/head>/gi, ' ')
    .replace(/<(script|style)[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]*>/g, ' ')
    .replace(ENTITY, (reference: string) => decodeEntity(reference))
    .replace(/\s+/g, ' ')
    .trim();
}
