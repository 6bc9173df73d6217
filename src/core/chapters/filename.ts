/**
 * Output file naming from a pattern such as "{index:02d}_{title}.pdf".
 *
 * Placeholders: {index} and {title} always; {start}, {end}, {pages} for
 * PDF sources; {file} (content unit stem) for EPUB sources. Integer
 * placeholders take a zero-pad spec, e.g. {index:03d}.
 */

import { posix } from 'node:path';
import { ConfigError } from '../errors.js';
import type { Chapter, SourceFormat } from './types.js';

export const DEFAULT_PATTERN = '{index:02d}_{title}';
export const DEFAULT_MAX_TITLE_LENGTH = 100;

const UNTITLED = 'untitled';

const INVALID_CHARS = /[<>:"/\\|?*]/g;
const KNOWN_EXTENSIONS = /\.(pdf|epub)$/i;
const PLACEHOLDER = /\{([a-z]+)(?::([^}]*))?\}/gi;
const INT_SPEC = /^(0?)(\d*)d$/;

const COMMON_FIELDS = ['index', 'title'];
const SOURCE_FIELDS: Record<SourceFormat, string[]> = {
  pdf: ['start', 'end', 'pages'],
  epub: ['file'],
};

/**
 * Make a title safe as a file name: invalid characters become "_", runs of
 * whitespace/underscores collapse to one "_", edges are trimmed, and the
 * result is cut to `maxLength` code points. Empty results become "untitled",
 * cut the same way.
 */
export function sanitizeFilename(title: string, maxLength = DEFAULT_MAX_TITLE_LENGTH): string {
  let safe = title
    .replace(INVALID_CHARS, '_')
    .replace(/[\s_]+/g, '_')
    .replace(/^_+|_+$/g, '');

  const chars = Array.from(safe);
  if (chars.length > maxLength) {
    safe = chars.slice(0, maxLength).join('').replace(/_+$/, '');
  }
  return safe || Array.from(UNTITLED).slice(0, Math.max(1, maxLength)).join('');
}

type FieldValues = Record<string, string | number>;

function chapterFields(chapter: Chapter, index: number, maxTitleLength: number): FieldValues {
  const fields: FieldValues = { index, title: sanitizeFilename(chapter.title, maxTitleLength) };
  const pos = chapter.position;
  if (pos.kind === 'pages') {
    fields.start = pos.startPage;
    fields.end = pos.endPage;
    fields.pages = pos.endPage - pos.startPage + 1;
  } else if (pos.kind === 'unit') {
    fields.file = posix.basename(pos.href).replace(/\.[^.]+$/, '');
  } else {
    fields.file = 'complete';
  }
  return fields;
}

const NUMERIC_FIELDS = new Set(['index', 'start', 'end', 'pages']);

function unsupportedSpec(name: string, spec: string): ConfigError {
  return new ConfigError(`Unsupported format "{${name}:${spec}}" — use e.g. {${name}:02d} on numeric fields`);
}

function formatField(name: string, value: string | number, spec: string | undefined): string {
  if (spec === undefined || spec === '') return String(value);
  const match = INT_SPEC.exec(spec);
  if (!match || typeof value !== 'number') throw unsupportedSpec(name, spec);
  const width = match[2] ? parseInt(match[2], 10) : 0;
  return String(value).padStart(width, match[1] === '0' ? '0' : ' ');
}

/**
 * Generates one file name per chapter. Names repeated within a run get a
 * numeric suffix ("_2", "_3", ...) so no chapter overwrites another.
 */
export class FilenameGenerator {
  private readonly used = new Set<string>();
  private readonly extension: string;

  constructor(
    private readonly pattern: string,
    sourceFormat: SourceFormat,
    outputExtension: '.pdf' | '.epub',
    private readonly maxTitleLength = DEFAULT_MAX_TITLE_LENGTH,
  ) {
    this.extension = outputExtension;
    const allowed = new Set([...COMMON_FIELDS, ...SOURCE_FIELDS[sourceFormat]]);
    for (const [, name, spec] of pattern.matchAll(PLACEHOLDER)) {
      if (!allowed.has(name)) {
        throw new ConfigError(
          `Unknown placeholder {${name}} for ${sourceFormat} files — available: ${[...allowed].map((f) => `{${f}}`).join(', ')}`,
        );
      }
      if (spec && !(NUMERIC_FIELDS.has(name) && INT_SPEC.test(spec))) throw unsupportedSpec(name, spec);
    }
  }

  /** File name (no directory) for the chapter at 1-based `index`. */
  generate(chapter: Chapter, index: number): string {
    const fields = chapterFields(chapter, index, this.maxTitleLength);
    const stem = this.pattern
      .replace(PLACEHOLDER, (_whole: string, name: string, spec: string | undefined) =>
        formatField(name, fields[name] ?? '', spec))
      .replace(KNOWN_EXTENSIONS, '');

    let name = `${stem}${this.extension}`;
    for (let n = 2; this.used.has(name.toLowerCase()); n++) {
      name = `${stem}_${n}${this.extension}`;
    }
    this.used.add(name.toLowerCase());
    return name;
  }
}
