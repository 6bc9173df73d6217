/**
 * Minimal EPUB writer: one package document, an EPUB 3 nav document and an
 * EPUB 2 NCX, the chapter's content units and the resources they need.
 */

import { posix } from 'node:path';
import JSZip from 'jszip';
import { escapeXml } from './markup.js';
import type { MetadataEntry } from './archive.js';

const CONTAINER_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">',
  '  <rootfiles>',
  '    <rootfile full-path="{path}" media-type="application/oebps-package+xml"/>',
  '  </rootfiles>',
  '</container>',
  '',
].join('\n');

export interface EpubUnit {
  /** Relative to the package document. */
  href: string;
  title: string;
  markup: string;
}

export interface EpubResource {
  href: string;
  mediaType: string;
  bytes: Uint8Array;
}

export interface EpubPackage {
  /** Archive path of the package document, e.g. "OEBPS/content.opf". */
  packagePath: string;
  title: string;
  language: string;
  identifier: string;
  /** Source metadata to carry over verbatim (dc:title excepted); null writes only title, language and identifier. */
  metadata: readonly MetadataEntry[] | null;
  units: readonly EpubUnit[];
  resources: readonly EpubResource[];
}

/** Serialize a package to EPUB bytes. `mimetype` is stored first and uncompressed. */
export async function writeEpub(pkg: EpubPackage): Promise<Uint8Array> {
  const dir = posix.dirname(pkg.packagePath);
  const at = (href: string): string => (dir === '.' ? href : `${dir}/${href}`);

  const taken = new Set([...pkg.units.map((u) => u.href), ...pkg.resources.map((r) => r.href)]);
  const navHref = freeName('nav.xhtml', taken);
  const ncxHref = freeName('toc.ncx', taken);

  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' });
  zip.file('META-INF/container.xml', CONTAINER_XML.replace('{path}', escapeXml(pkg.packagePath)));
  zip.file(pkg.packagePath, packageDocument(pkg, navHref, ncxHref));
  zip.file(at(navHref), navDocument(pkg));
  zip.file(at(ncxHref), ncxDocument(pkg));

  for (const unit of pkg.units) zip.file(at(unit.href), unit.markup);
  for (const resource of pkg.resources) zip.file(at(resource.href), resource.bytes);

  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE', mimeType: 'application/epub+zip' });
}

function freeName(name: string, taken: Set<string>): string {
  const ext = posix.extname(name);
  const stem = name.slice(0, name.length - ext.length);
  let candidate = name;
  for (let n = 2; taken.has(candidate); n++) candidate = `${stem}-${n}${ext}`;
  taken.add(candidate);
  return candidate;
}

// ── Package document ─────────────────────────────────────────

function packageDocument(pkg: EpubPackage, navHref: string, ncxHref: string): string {
  const manifest = [
    `    <item id="nav" href="${escapeXml(navHref)}" media-type="application/xhtml+xml" properties="nav"/>`,
    `    <item id="ncx" href="${escapeXml(ncxHref)}" media-type="application/x-dtbncx+xml"/>`,
    ...pkg.units.map((u, i) =>
      `    <item id="chapter${i + 1}" href="${escapeXml(u.href)}" media-type="application/xhtml+xml"/>`),
    ...pkg.resources.map((r, i) =>
      `    <item id="res${i + 1}" href="${escapeXml(r.href)}" media-type="${escapeXml(r.mediaType)}"/>`),
  ];
  const spine = pkg.units.map((_, i) => `    <itemref idref="chapter${i + 1}"/>`);

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="bookid">',
    '  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf">',
    ...metadataLines(pkg),
    '  </metadata>',
    '  <manifest>',
    ...manifest,
    '  </manifest>',
    '  <spine toc="ncx">',
    ...spine,
    '  </spine>',
    '</package>',
    '',
  ].join('\n');
}

function metadataLines(pkg: EpubPackage): string[] {
  const lines = [
    `    <dc:identifier id="bookid">${escapeXml(pkg.identifier)}</dc:identifier>`,
    `    <dc:title>${escapeXml(pkg.title)}</dc:title>`,
    `    <dc:language>${escapeXml(pkg.language || 'en')}</dc:language>`,
  ];
  if (!pkg.metadata) return lines;

  for (const entry of pkg.metadata) {
    const local = entry.name.replace(/^.*:/, '');
    // title, language and the package identifier are written above
    if (local === 'title' || local === 'language') continue;
    if (local === 'identifier' && entry.value === pkg.identifier) continue;

    const attrs = entry.attributes
      .filter(([name]) => name !== 'id' || local !== 'identifier')
      .map(([name, value]) => ` ${name}="${escapeXml(value)}"`)
      .join('');
    lines.push(entry.value
      ? `    <${entry.name}${attrs}>${escapeXml(entry.value)}</${entry.name}>`
      : `    <${entry.name}${attrs}/>`);
  }
  return lines;
}

// ── Navigation ───────────────────────────────────────────────

function navDocument(pkg: EpubPackage): string {
  const items = pkg.units.map((u) =>
    `      <li><a href="${escapeXml(u.href)}">${escapeXml(u.title)}</a></li>`);
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE html>',
    '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">',
    `<head><title>${escapeXml(pkg.title)}</title></head>`,
    '<body>',
    '  <nav epub:type="toc" id="toc">',
    `    <h1>${escapeXml(pkg.title)}</h1>`,
    '    <ol>',
    ...items,
    '    </ol>',
    '  </nav>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function ncxDocument(pkg: EpubPackage): string {
  const points = pkg.units.map((u, i) => [
    `    <navPoint id="navpoint-${i + 1}" playOrder="${i + 1}">`,
    `      <navLabel><text>${escapeXml(u.title)}</text></navLabel>`,
    `      <content src="${escapeXml(u.href)}"/>`,
    '    </navPoint>',
  ].join('\n'));
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">',
    '  <head>',
    `    <meta name="dtb:uid" content="${escapeXml(pkg.identifier)}"/>`,
    '    <meta name="dtb:depth" content="1"/>',
    '  </head>',
    `  <docTitle><text>${escapeXml(pkg.title)}</text></docTitle>`,
    '  <navMap>',
    ...points,
    '  </navMap>',
    '</ncx>',
    '',
  ].join('\n');
}
