import chalk from 'chalk';
import { Command, Option } from 'commander';
import prompts from 'prompts';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { detectChapters } from '../core/chapters/detect.js';
import { DEFAULT_PATTERN } from '../core/chapters/filename.js';
import type { DetectOptions, DetectionResult, DetectionStrategy, Sensitivity } from '../core/chapters/types.js';
import { DEFAULT_DETECT_OPTIONS } from '../core/chapters/types.js';
import { openDocument } from '../core/split/document.js';
import { writeChapters } from '../core/split/split.js';
import type { OutputFormat, SplitFile } from '../core/split/types.js';
import { chapterJson, commandAction, detectionJson, needsConfirmation, printDetection } from './output.js';
import { VALID_STRATEGIES, parseLevel, parseOutputFormat, parseSensitivity, parseStrategy } from './parsers.js';

interface DetectCommandOpts {
  strategy: DetectionStrategy;
  sensitivity: Sensitivity;
  level?: number;
  tocLevel?: number;
  bookmarkLevel?: number;
  json?: boolean;
}

interface SplitCommandOpts extends DetectCommandOpts {
  outputDir?: string;
  pattern: string;
  to?: OutputFormat;
  metadata: boolean;
  yes?: boolean;
}

/** Detection options shared by `split` and `preview`. */
function withDetectOptions(cmd: Command): Command {
  return cmd
    .option('--strategy <name>', `Detection strategy: ${VALID_STRATEGIES}`, parseStrategy, DEFAULT_DETECT_OPTIONS.strategy)
    .option('--sensitivity <level>', 'Heading detection sensitivity: low, medium, high', parseSensitivity, DEFAULT_DETECT_OPTIONS.sensitivity)
    .option('--level <n>', 'Bookmark / TOC level to split by (1 = top level, 0 = every level)', parseLevel)
    .addOption(new Option('--toc-level <n>', 'Alias of --level').argParser(parseLevel).hideHelp())
    .addOption(new Option('--bookmark-level <n>', 'Alias of --level').argParser(parseLevel).hideHelp())
    .option('--json', 'Output as JSON');
}

function detectOptions(opts: DetectCommandOpts): DetectOptions {
  return {
    strategy: opts.strategy,
    sensitivity: opts.sensitivity,
    level: opts.level ?? opts.tocLevel ?? opts.bookmarkLevel ?? DEFAULT_DETECT_OPTIONS.level,
  };
}

/** "<dir>/book.pdf" → "<dir>/book_chapters". */
export function defaultOutputDir(filePath: string): string {
  return join(dirname(filePath), `${basename(filePath, extname(filePath))}_chapters`);
}

function printNoBookmarksTip(result: DetectionResult): void {
  if (result.format !== 'pdf' || result.hasNativeStructure) return;
  console.log(chalk.dim('\n  Tip: this PDF has no bookmarks, so chapters come from heading typography.'));
  console.log(chalk.dim('  Try --sensitivity high to catch smaller headings, or low for fewer false positives.'));
}

export function registerSplitCommand(program: Command): void {
  // ── chapter-split split ───────────────────────────────────────
  withDetectOptions(
    program
      .command('split')
      .description(
        'Split a PDF or EPUB into one file per chapter.\n' +
        'Chapters come from bookmarks / the table of contents, else heading heuristics,\n' +
        'else (EPUB) one chapter per content file.',
      )
      .argument('<file>', 'PDF or EPUB file to split')
      .option('-o, --output-dir <dir>', 'Output directory (default: <name>_chapters beside the input)')
      .option('--pattern <pattern>', 'File name pattern: {index}, {title}, {start}, {end}, {pages} (PDF), {file} (EPUB)', DEFAULT_PATTERN)
      .option('--to <format>', 'Output format (pdf, epub). Only EPUB → PDF conversion is supported', parseOutputFormat)
      .option('--no-metadata', 'Do not copy document metadata into chapter files')
      .option('-y, --yes', 'Skip the confirmation for low-confidence detections'),
  ).action(commandAction(async (file: string, opts: SplitCommandOpts) => {
    const filePath = resolve(file);
    const doc = await openDocument(filePath);

    try {
      const detection = await detectChapters(doc.source, doc.format, detectOptions(opts));
      if (!opts.json) {
        printDetection(filePath, detection);
        console.log('');
      }

      // ── Confirm weak detections ──
      if (needsConfirmation(detection) && !opts.yes && !opts.json) {
        const { proceed } = await prompts({
          type: 'confirm',
          name: 'proceed',
          message: detection.usedFallback
            ? 'No chapters found. Write the whole document as a single file?'
            : 'Some chapters have low confidence. Split anyway?',
          initial: true,
        });
        if (!proceed) {
          console.log(chalk.dim('Aborted. Try another --strategy or --sensitivity.'));
          return;
        }
      }

      // ── Split ──
      const outputDir = opts.outputDir ? resolve(opts.outputDir) : defaultOutputDir(filePath);
      const result = await writeChapters(doc, detection.chapters, {
        outputDir,
        pattern: opts.pattern,
        outputFormat: opts.to,
        preserveMetadata: opts.metadata,
        onChapterWritten: opts.json ? undefined : (f: SplitFile, total: number) => {
          const missing = f.unresolved.length > 0 ? chalk.dim(`  (${f.unresolved.length} missing resources)`) : '';
          console.log(chalk.green(`  ✓ [${f.index}/${total}] ${f.title} → ${f.fileName}`) + missing);
        },
      });

      // ── Summary ──
      if (opts.json) {
        console.log(JSON.stringify({
          ...detectionJson(filePath, detection),
          outputDir: result.outputDir,
          outputFormat: result.format,
          files: result.files.map((f) => ({
            ...chapterJson(f.chapter, f.index),
            fileName: f.fileName,
            path: f.path,
            missingResources: f.unresolved,
          })),
        }, null, 2));
      } else {
        console.log(`\n  ${result.files.length} chapter file(s) written to ${result.outputDir}`);
      }
    } finally {
      await doc.close();
    }
  }, (_file, opts) => opts.json));
}

export function registerPreviewCommand(program: Command): void {
  // ── chapter-split preview ─────────────────────────────────────
  withDetectOptions(
    program
      .command('preview')
      .description('Show the chapters that would be produced, without writing anything')
      .argument('<file>', 'PDF or EPUB file to inspect'),
  ).action(commandAction(async (file: string, opts: DetectCommandOpts) => {
    const filePath = resolve(file);
    const doc = await openDocument(filePath);

    try {
      const detection = await detectChapters(doc.source, doc.format, detectOptions(opts));
      if (opts.json) {
        console.log(JSON.stringify(detectionJson(filePath, detection), null, 2));
        return;
      }
      printDetection(filePath, detection);
      printNoBookmarksTip(detection);
    } finally {
      await doc.close();
    }
  }, (_file, opts) => opts.json));
}
