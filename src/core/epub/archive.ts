/**
 * EPUB archive reader over JSZip.
 *
 * Resolves META-INF/container.xml to the package document, reads its
 * metadata, manifest and spine, and exposes the table of contents (EPUB 3
 * nav document, else EPUB 2 NCX) as outline nodes. Every href handed out
 * is decoded and relative to the package document's directory.
 */

import { posix } from 'node:path';
import JSZip from 'jszip';
import { MalformedSourceError, errorMessage } from '../errors.js';
import type { ArchiveSource, OutlineDestination, OutlineNode, SpineUnit } from '../chapters/types.js';
import { attrValue, childElements, descendantElements, firstDescendant, localName, parseMarkup, textOf } from './markup.js';

const CONTAINER_PATH = 'META-INF/container.xml';

export interface ManifestItem {
  id: string;
  /** Relative to the package document's directory. */
  href: string;
  mediaType: string;
  properties: string[];
}

/** One <metadata> child as written in the package document. */
export interface MetadataEntry {
  /** Qualified name, e.g. "dc:title" or "meta". */
  name: string;
  value: string;
  attributes: Array<[string, string]>;
}

/** Decode percent-escapes; malformed escapes are kept as written. */
export function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch {
    return href; // not valid percent-encoding, use the literal name
  }
}

/** Resolve `ref` against the directory of `base`; null when it climbs out of the root. */
export function resolveRelative(base: string, ref: string): string | null {
  const joined = posix.normalize(posix.join(posix.dirname(base), ref));
  if (joined.startsWith('../') || joined === '..') return null;
  return joined.replace(/^\.\//, '');
}

export class EpubArchive implements ArchiveSource {
  readonly kind = 'archive' as const;
  readonly spine: readonly SpineUnit[];

  private readonly byHref: Map<string, ManifestItem>;
  private outlineCache: Promise<OutlineNode[] | null> | null = null;

  private constructor(
    private readonly zip: JSZip,
    /** Archive path of the package document, e.g. "OEBPS/content.opf". */
    readonly packagePath: string,
    readonly version: string,
    readonly language: string,
    readonly metadata: readonly MetadataEntry[],
    readonly items: readonly ManifestItem[],
    spineHrefs: readonly string[],
    private readonly navHref: string | null,
    private readonly ncxHref: string | null,
  ) {
    this.byHref = new Map(items.map((item) => [item.href, item]));
    this.spine = spineHrefs.map((href, index) => ({ href, index }));
  }

  /**
   * Open EPUB bytes.
   * @throws MalformedSourceError when the zip, container or package document is unusable.
   */
  static async open(bytes: Uint8Array, name = 'book.epub'): Promise<EpubArchive> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(bytes);
    } catch (err) {
      throw new MalformedSourceError(`Cannot open ${name} as EPUB: ${errorMessage(err)}`);
    }

    const containerXml = await readZipText(zip, CONTAINER_PATH);
    if (containerXml === null) {
      throw new MalformedSourceError(`${name} has no ${CONTAINER_PATH}`);
    }
    const packagePath = parseOrFail(containerXml, CONTAINER_PATH, name, (doc) => {
      const rootfile = firstDescendant(doc, 'rootfile');
      return rootfile ? attrValue(rootfile, 'full-path') : '';
    });
    if (!packagePath) {
      throw new MalformedSourceError(`${name}: ${CONTAINER_PATH} names no package document`);
    }

    const opfXml = await readZipText(zip, packagePath);
    if (opfXml === null) {
      throw new MalformedSourceError(`${name}: package document ${packagePath} is missing`);
    }
    const pkg = parseOrFail(opfXml, packagePath, name, (doc) => readPackage(doc));
    if (pkg.spine.length === 0) {
      throw new MalformedSourceError(`${name}: the spine lists no content documents`);
    }

    return new EpubArchive(
      zip, packagePath, pkg.version, pkg.language, pkg.metadata, pkg.items, pkg.spine, pkg.navHref, pkg.ncxHref,
    );
  }

  /** Directory of the package document inside the zip ("" at the root). */
  get packageDir(): string {
    const dir = posix.dirname(this.packagePath);
    return dir === '.' ? '' : dir;
  }

  item(href: string): ManifestItem | undefined {
    return this.byHref.get(href);
  }

  /** Title from dc:title, or "" when the package has none. */
  get title(): string {
    return this.metadata.find((m) => m.name.replace(/^.*:/, '') === 'title')?.value ?? '';
  }

  async readUnit(href: string): Promise<string> {
    const text = await readZipText(this.zip, this.zipPath(href));
    if (text === null) throw new Error(`${href} is not in the archive`);
    return text;
  }

  async readItem(href: string): Promise<Uint8Array> {
    const file = this.zip.file(this.zipPath(href));
    if (!file) throw new Error(`${href} is not in the archive`);
    return file.async('uint8array');
  }

  outline(): Promise<OutlineNode[] | null> {
    this.outlineCache ??= this.readOutline();
    return this.outlineCache;
  }

  private zipPath(href: string): string {
    return this.packageDir ? `${this.packageDir}/${href}` : href;
  }

  /**
   * The nav document when it parses and lists entries, else the NCX. A nav
   * that fails to parse is only reported when there is no NCX to fall back on.
   */
  private async readOutline(): Promise<OutlineNode[] | null> {
    let navError: unknown = null;
    if (this.navHref) {
      try {
        const nodes = readNav(parseMarkup(await this.readUnit(this.navHref), this.navHref), this.navHref);
        if (nodes.length > 0) return nodes;
      } catch (err) {
        navError = err;
      }
    }
    if (this.ncxHref) {
      const nodes = readNcx(parseMarkup(await this.readUnit(this.ncxHref), this.ncxHref, 'xml'), this.ncxHref);
      if (nodes.length > 0) return nodes;
    }
    if (navError !== null) throw navError;
    return null;
  }
}

// ── Package document ─────────────────────────────────────────

interface PackageInfo {
  version: string;
  language: string;
  metadata: MetadataEntry[];
  items: ManifestItem[];
  spine: string[];
  navHref: string | null;
  ncxHref: string | null;
}

function readPackage(doc: Document): PackageInfo {
  const root = doc.documentElement;
  if (!root || localName(root) !== 'package') {
    throw new Error('root element is not <package>');
  }

  const metadataEl = childElements(root, 'metadata')[0];
  const metadata: MetadataEntry[] = metadataEl
    ? childElements(metadataEl).map((el) => ({
      name: el.nodeName,
      value: textOf(el),
      attributes: attributePairs(el),
    }))
    : [];
  const language = metadata.find((m) => m.name.replace(/^.*:/, '') === 'language')?.value ?? '';

  const manifestEl = childElements(root, 'manifest')[0];
  const items: ManifestItem[] = (manifestEl ? childElements(manifestEl, 'item') : []).map((el) => ({
    id: attrValue(el, 'id'),
    href: decodeHref(attrValue(el, 'href')),
    mediaType: attrValue(el, 'media-type'),
    properties: attrValue(el, 'properties').split(/\s+/).filter(Boolean),
  }));
  const byId = new Map(items.map((item) => [item.id, item]));

  const spineEl = childElements(root, 'spine')[0];
  const spine: string[] = [];
  for (const ref of spineEl ? childElements(spineEl, 'itemref') : []) {
    const item = byId.get(attrValue(ref, 'idref'));
    if (item && !spine.includes(item.href)) spine.push(item.href);
  }

  const tocId = spineEl ? attrValue(spineEl, 'toc') : '';
  const ncx = byId.get(tocId) ?? items.find((i) => i.mediaType === 'application/x-dtbncx+xml');
  const nav = items.find((i) => i.properties.includes('nav'));

  return {
    version: attrValue(root, 'version') || '3.0',
    language,
    metadata,
    items,
    spine,
    navHref: nav?.href ?? null,
    ncxHref: ncx?.href ?? null,
  };
}

function attributePairs(el: Element): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  const attrs = el.attributes;
  for (let i = 0; i < attrs.length; i += 1) {
    const attr = attrs[i];
    if (attr) pairs.push([attr.name, attr.value]);
  }
  return pairs;
}

// ── Table of contents ────────────────────────────────────────

function destination(tocHref: string, target: string): OutlineDestination {
  if (!target) return null;
  const hash = target.indexOf('#');
  const path = hash < 0 ? target : target.slice(0, hash);
  const fragment = hash < 0 ? '' : target.slice(hash);

  // "#id" alone points into the toc document itself
  const resolved = path ? resolveRelative(tocHref, decodeHref(path)) : tocHref;
  return resolved === null ? null : { kind: 'href', href: `${resolved}${fragment}` };
}

/** EPUB 3: <nav epub:type="toc"><ol><li><a href>…</a><ol>…</ol></li></ol></nav>. */
function readNav(doc: Document, navHref: string): OutlineNode[] {
  const navs = descendantElements(doc, ['nav']);
  const toc = navs.find((el) => attrValue(el, 'type').split(/\s+/).includes('toc')) ?? navs[0];
  const list = toc ? childElements(toc, 'ol')[0] : undefined;
  return list ? readNavList(list, navHref) : [];
}

function readNavList(list: Element, navHref: string): OutlineNode[] {
  const nodes: OutlineNode[] = [];
  for (const li of childElements(list, 'li')) {
    const label = childElements(li).find((el) => ['a', 'span'].includes(localName(el)));
    const title = label ? textOf(label) : '';
    const dest = label && localName(label) === 'a' ? destination(navHref, attrValue(label, 'href')) : null;

    const sub = childElements(li, 'ol')[0];
    const children = sub ? readNavList(sub, navHref) : [];
    nodes.push(children.length > 0
      ? { kind: 'section', title, dest, children }
      : { kind: 'leaf', title, dest });
  }
  return nodes;
}

/** EPUB 2: <navMap><navPoint><navLabel><text/></navLabel><content src/>…</navPoint></navMap>. */
function readNcx(doc: Document, ncxHref: string): OutlineNode[] {
  const navMap = firstDescendant(doc, 'navMap');
  return navMap ? readNavPoints(navMap, ncxHref) : [];
}

function readNavPoints(parent: Element, ncxHref: string): OutlineNode[] {
  return childElements(parent, 'navPoint').map((point): OutlineNode => {
    const label = childElements(point, 'navLabel')[0];
    const text = label ? childElements(label, 'text')[0] : undefined;
    const content = childElements(point, 'content')[0];
    const title = text ? textOf(text) : '';
    const dest = content ? destination(ncxHref, attrValue(content, 'src')) : null;

    const children = readNavPoints(point, ncxHref);
    return children.length > 0
      ? { kind: 'section', title, dest, children }
      : { kind: 'leaf', title, dest };
  });
}

// ── Zip helpers ──────────────────────────────────────────────

async function readZipText(zip: JSZip, path: string): Promise<string | null> {
  const file = zip.file(path);
  return file ? file.async('string') : null;
}

function parseOrFail<T>(xml: string, path: string, name: string, read: (doc: Document) => T): T {
  try {
    return read(parseMarkup(xml, path, 'xml'));
  } catch (err) {
    throw new MalformedSourceError(`${name}: ${errorMessage(err)}`);
  }
}
