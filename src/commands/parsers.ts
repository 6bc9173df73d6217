/**
 * Commander option parsers. Each validates one value and converts it,
 * raising InvalidArgumentError so commander reports the bad option.
 */

import { InvalidArgumentError } from 'commander';
import type { DetectionStrategy, Sensitivity } from '../core/chapters/types.js';
import type { OutputFormat } from '../core/split/types.js';

const STRATEGY_ALIASES: Record<string, DetectionStrategy> = {
  hybrid: 'hybrid',
  native: 'native',
  structural: 'structural',
  manifest: 'manifest',
  bookmarks: 'native',
  toc: 'native',
  heuristic: 'structural',
};

const SENSITIVITIES: readonly Sensitivity[] = ['low', 'medium', 'high'];
const OUTPUT_FORMATS: readonly OutputFormat[] = ['pdf', 'epub'];

export const VALID_STRATEGIES = 'hybrid, native (bookmarks, toc), structural (heuristic), manifest';

export function parseStrategy(value: string): DetectionStrategy {
  const strategy = STRATEGY_ALIASES[value.trim().toLowerCase()];
  if (!strategy) {
    throw new InvalidArgumentError(`Invalid strategy "${value}". Valid: ${VALID_STRATEGIES}`);
  }
  return strategy;
}

export function parseSensitivity(value: string): Sensitivity {
  const normalized = value.trim().toLowerCase();
  const match = SENSITIVITIES.find((s) => s === normalized);
  if (!match) {
    throw new InvalidArgumentError(`Invalid sensitivity "${value}". Valid: ${SENSITIVITIES.join(', ')}`);
  }
  return match;
}

/** Outline level; 0 keeps every level. */
export function parseLevel(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
  }
  return n;
}

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase().replace(/^\./, '');
  const match = OUTPUT_FORMATS.find((f) => f === normalized);
  if (!match) {
    throw new InvalidArgumentError(`Invalid output format "${value}". Valid: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return match;
}
