/**
 * Resource closure for an extracted chapter: stylesheets, images and the
 * fonts or images those stylesheets pull in.
 */

import { descendantElements, attrValue, localName, parseMarkup } from './markup.js';
import { decodeHref, resolveRelative } from './archive.js';
import type { EpubArchive } from './archive.js';
import { errorMessage } from '../errors.js';

const CSS_URL = /url\(\s*(['"]?)([^'")]+)\1\s*\)/gi;
const CSS_IMPORT = /@import\s+(['"])([^'"]+)\1/gi;
const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

export interface ResourceClosure {
  /** Archive hrefs of every resource to copy, in discovery order. */
  resources: string[];
  /** References that matched no archive item. */
  unresolved: string[];
}

/** Raw references made by a chapter's markup. */
export function markupReferences(doc: Document): string[] {
  const refs: string[] = [];
  for (const el of descendantElements(doc, ['link', 'img', 'image', 'style'])) {
    switch (localName(el)) {
      case 'link':
        if (attrValue(el, 'rel').toLowerCase().split(/\s+/).includes('stylesheet')) {
          refs.push(attrValue(el, 'href'));
        }
        break;
      case 'img':
        refs.push(attrValue(el, 'src'));
        break;
      case 'image':
        refs.push(attrValue(el, 'href'));
        break;
      case 'style':
        refs.push(...cssReferences(el.textContent ?? ''));
        break;
    }
  }
  return refs.filter(Boolean);
}

/** url(...) and @import targets in a stylesheet. */
export function cssReferences(css: string): string[] {
  const refs: string[] = [];
  for (const match of css.matchAll(CSS_URL)) refs.push(match[2].trim());
  for (const match of css.matchAll(CSS_IMPORT)) refs.push(match[2].trim());
  return refs;
}

/**
 * Map a reference to an archive item: direct lookup first, then relative
 * to the referencing file. Returns null for external, data and missing targets.
 */
export function resolveReference(archive: EpubArchive, fromHref: string, ref: string): string | null {
  if (SCHEME.test(ref)) return null; // http:, data:, mailto: …
  const path = decodeHref(ref.split('#')[0]);
  if (!path) return null;

  if (archive.item(path)) return path;
  const relative = resolveRelative(fromHref, path);
  return relative !== null && archive.item(relative) ? relative : null;
}

/**
 * Collect every resource the unit needs, following stylesheets into their
 * own url() and @import references. Each archive path is visited once.
 */
export async function resolveResources(
  archive: EpubArchive,
  unitHref: string,
  markup: string,
): Promise<ResourceClosure> {
  let refs: string[];
  try {
    refs = markupReferences(parseMarkup(markup, unitHref));
  } catch {
    refs = scanRawReferences(markup); // unparseable unit, fall back to a regex scan
  }

  const seen = new Set<string>([unitHref]);
  const resources: string[] = [];
  const unresolved: string[] = [];
  const queue: Array<{ from: string; ref: string }> = refs.map((ref) => ({ from: unitHref, ref }));

  for (let next = queue.shift(); next; next = queue.shift()) {
    if (SCHEME.test(next.ref) || next.ref.startsWith('#')) continue;
    const path = resolveReference(archive, next.from, next.ref);
    if (path === null) {
      if (!unresolved.includes(next.ref)) unresolved.push(next.ref);
      continue;
    }
    if (seen.has(path)) continue;
    seen.add(path);
    resources.push(path);

    const item = archive.item(path);
    if (item?.mediaType === 'text/css') {
      let css: string;
      try {
        css = await archive.readUnit(path);
      } catch (err) {
        unresolved.push(`${path} (${errorMessage(err)})`);
        continue;
      }
      for (const ref of cssReferences(css)) queue.push({ from: path, ref });
    }
  }

  return { resources, unresolved };
}

function scanRawReferences(markup: string): string[] {
  const refs: string[] = [];
  for (const match of markup.matchAll(/<(?:link|img|image)\b[^>]*?\s(?:href|src|xlink:href)=(['"])([^'"]+)\1/gi)) {
    refs.push(match[2]);
  }
  return [...refs, ...cssReferences(markup)];
}
