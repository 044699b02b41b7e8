/**
 * Error taxonomy for a run.
 *
 * FatalError   — aborts the run; the CLI exits non-zero with the message.
 * ConfigError  — the configuration file is missing or invalid (exit code 2).
 * Row-level problems are not thrown at all: they become RowWarning records.
 */

export class FatalError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FatalError';
  }
}

export class ConfigError extends FatalError {
  override readonly exitCode: number = 2;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export interface RowWarning {
  /** 1-based spreadsheet row, counting the header as row 1 */
  rowNumber: number;
  imageFilename: string;
  reason: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  return err instanceof FatalError ? err.exitCode : 1;
}
