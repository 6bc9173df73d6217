#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { registerPreviewCommand, registerSplitCommand } from './commands/split.js';

const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

const program = new Command();

program
  .name('chapter-split')
  .description('Detect chapters in PDF and EPUB books and split them into one file per chapter')
  .version(version);

registerSplitCommand(program);
registerPreviewCommand(program);

await program.parseAsync();
