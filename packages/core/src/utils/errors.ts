// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Integration misuse of the scan pipeline: stages out of order, re-entrant
 * stage calls, finalize before preparing or after cancellation.
 */
export class ScanStateError extends Error {
  constructor(
    message: string,
    public readonly stage?: string,
  ) {
    super(message);
    this.name = 'ScanStateError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Message of an Error, or the stringified value of anything else thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
