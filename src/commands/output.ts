import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { basename } from 'node:path';
import type { Chapter, DetectionResult } from '../core/chapters/types.js';
import { describePosition, pageCount } from '../core/chapters/types.js';
import { OutputWriteError, SplitterError, errorMessage } from '../core/errors.js';

/** Detections below this confidence ask before writing. */
export const LOW_CONFIDENCE = 0.5;

/** Display cap for human (non-JSON) chapter tables. */
const DISPLAY_CAP = 200;

export function needsConfirmation(result: DetectionResult): boolean {
  return result.usedFallback || result.chapters.some((c) => c.confidence < LOW_CONFIDENCE);
}

// ── JSON ─────────────────────────────────────────────────────

export function chapterJson(chapter: Chapter, index: number): Record<string, unknown> {
  const pos = chapter.position;
  return {
    index,
    title: chapter.title,
    level: chapter.level,
    detectionMethod: chapter.detectionMethod,
    confidence: chapter.confidence,
    ...(pos.kind === 'pages'
      ? { startPage: pos.startPage, endPage: pos.endPage, pageCount: pageCount(chapter) }
      : pos.kind === 'unit'
        ? { href: pos.href, fragment: pos.fragment }
        : { unitCount: pos.unitCount }),
  };
}

export function detectionJson(file: string, result: DetectionResult): Record<string, unknown> {
  return {
    file: basename(file),
    format: result.format,
    strategyUsed: result.strategyUsed,
    totalUnits: result.totalUnits,
    hasNativeStructure: result.hasNativeStructure,
    usedFallback: result.usedFallback,
    warnings: result.warnings,
    chapters: result.chapters.map((c, i) => chapterJson(c, i + 1)),
  };
}

// ── Human output ─────────────────────────────────────────────

function confidenceLabel(confidence: number): string {
  const text = confidence.toFixed(2);
  return confidence >= 0.8 ? chalk.green(text)
    : confidence >= LOW_CONFIDENCE ? chalk.yellow(text)
    : chalk.red(text);
}

/** Summary header, chapter table and warnings. */
export function printDetection(file: string, result: DetectionResult): void {
  const unit = result.format === 'pdf' ? 'pages' : 'content files';
  console.log(chalk.bold(`Chapter Detection — ${basename(file)}`));
  const row = (label: string, value: string): void => console.log(`  ${`${label}:`.padEnd(12)}${value}`);
  row('Format', `${result.format.toUpperCase()} (${result.totalUnits} ${unit})`);
  row('Strategy', result.strategyUsed);
  row(result.format === 'pdf' ? 'Bookmarks' : 'TOC', result.hasNativeStructure ? chalk.green('yes') : chalk.dim('no'));
  row('Chapters', `${result.chapters.length}\n`);

  const shown = result.chapters.slice(0, DISPLAY_CAP);
  shown.forEach((chapter, i) => {
    const indent = '  '.repeat(Math.max(0, chapter.level - 1));
    const where = chapter.position.kind === 'pages'
      ? `pages ${describePosition(chapter.position).replace('-', '–')}`
      : describePosition(chapter.position);
    console.log(`  ${String(i + 1).padStart(3)}. ${indent}${chapter.title}  ${chalk.dim(where)}  (${confidenceLabel(chapter.confidence)})`);
  });
  const overflow = result.chapters.length - shown.length;
  if (overflow > 0) console.log(chalk.dim(`  ... and ${overflow} more (use --json for full output)`));

  if (result.warnings.length > 0) {
    console.log('');
    for (const warning of result.warnings) console.log(chalk.yellow(`  ! ${warning}`));
  }
  if (result.usedFallback) {
    console.log(chalk.yellow('\n  No chapters detected — the whole document will be written as one file.'));
  }
}

// ── Errors ───────────────────────────────────────────────────

/** Print an error the way the command's output mode expects and set exit code 1. */
export function reportError(err: unknown, json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify({
      error: {
        code: err instanceof SplitterError ? err.code : 'UNEXPECTED',
        message: errorMessage(err),
        ...(err instanceof OutputWriteError ? { chapterIndex: err.chapterIndex, written: err.written } : {}),
      },
    }, null, 2));
  } else {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    if (err instanceof OutputWriteError && err.written.length > 0) {
      console.error(chalk.dim(`  ${err.written.length} chapter file(s) were written before the failure.`));
    }
  }
  process.exitCode = 1;
}

/**
 * Wrap a command action: known errors are reported (JSON or red text) and
 * the process exits non-zero. Commander's own argument errors pass through.
 */
export function commandAction<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
  isJson: (...args: A) => boolean | undefined,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof InvalidArgumentError) throw err;
      reportError(err, isJson(...args));
    }
  };
}
