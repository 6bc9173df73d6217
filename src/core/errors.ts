/**
 * Error types raised by detection and splitting.
 *
 * Only MalformedSourceError, OutputWriteError and ConfigError reach callers;
 * UnitParseError is caught where a single unit fails and becomes a warning.
 */

export type SplitterErrorCode =
  | 'MALFORMED_SOURCE'
  | 'UNIT_PARSE_FAILURE'
  | 'OUTPUT_WRITE_FAILURE'
  | 'INVALID_OPTION';

export class SplitterError extends Error {
  constructor(
    message: string,
    readonly code: SplitterErrorCode,
  ) {
    super(message);
    this.name = 'SplitterError';
  }
}

/** The input cannot be opened or parsed at all. */
export class MalformedSourceError extends SplitterError {
  constructor(message: string) {
    super(message, 'MALFORMED_SOURCE');
    this.name = 'MalformedSourceError';
  }
}

/** One content unit of an otherwise valid document failed to parse. */
export class UnitParseError extends SplitterError {
  constructor(
    readonly unit: string,
    reason: string,
  ) {
    super(`Cannot parse ${unit}: ${reason}`, 'UNIT_PARSE_FAILURE');
    this.name = 'UnitParseError';
  }
}

/** A file that was written before a split aborted. */
export interface WrittenFile {
  index: number;
  path: string;
}

/**
 * Saving one chapter failed. Remaining chapters are not attempted;
 * `written` lists the files that were saved before the failure.
 */
export class OutputWriteError extends SplitterError {
  constructor(
    readonly chapterIndex: number,
    readonly outputPath: string,
    readonly written: WrittenFile[],
    cause: unknown,
  ) {
    super(
      `Failed to write chapter ${chapterIndex} to ${outputPath}: ${errorMessage(cause)}`,
      'OUTPUT_WRITE_FAILURE',
    );
    this.name = 'OutputWriteError';
  }
}

/** An option value the splitter cannot work with. */
export class ConfigError extends SplitterError {
  constructor(message: string) {
    super(message, 'INVALID_OPTION');
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
