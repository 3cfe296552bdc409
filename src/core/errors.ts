/**
 * RPS Export - Errors
 * ===================
 * Error kinds surfaced by an export run
 */

export type ExportErrorKind = 'config' | 'filesystem' | 'decode' | 'schema';

export abstract class ExportError extends Error {
  abstract readonly kind: ExportErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Configuration failed validation before the run started
 */
export class ConfigError extends ExportError {
  readonly kind = 'config';
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

/**
 * Input could not be read, or the output or log file could not be written
 */
export class FileSystemError extends ExportError {
  readonly kind = 'filesystem';
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.path = path;
  }
}

/**
 * File content is not valid JSON
 */
export class DecodeError extends ExportError {
  readonly kind = 'decode';
  readonly fileName: string;

  constructor(fileName: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Invalid JSON in ${fileName}${detail}`, { cause });
    this.fileName = fileName;
  }
}

/**
 * A required key is missing or holds the wrong kind of value
 */
export class SchemaError extends ExportError {
  readonly kind = 'schema';
  readonly fileName: string;
  readonly key: string;
  /** Position in the rounds array, null for session-level keys */
  readonly roundPosition: number | null;

  constructor(fileName: string, key: string, reason: string, roundPosition: number | null = null) {
    const where = roundPosition === null ? 'session' : `round ${roundPosition}`;
    super(`${fileName}: ${where}: ${reason}`);
    this.fileName = fileName;
    this.key = key;
    this.roundPosition = roundPosition;
  }
}

export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}

/** Process exit code for each error kind */
export const EXIT_CODES: Record<ExportErrorKind, number> = {
  config: 2,
  filesystem: 3,
  decode: 4,
  schema: 5,
};
