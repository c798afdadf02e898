// src/errors.ts
import type { PurgeReport } from './purge/types.js';

/** Credentials could not be loaded, refreshed or granted. Fatal, raised before any listing. */
export class AuthError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * The collection could not be enumerated. Fatal: the run stops and `report`
 * holds what was decided on the pages processed so far.
 */
export class TransportError extends Error {
  readonly report: PurgeReport;

  constructor(message: string, report: PurgeReport, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
    this.report = report;
  }
}

/** A single item could not be deleted. Recorded as `deleteFailed`, never aborts a run. */
export class DeleteError extends Error {
  readonly itemId: string;

  constructor(itemId: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeleteError';
    this.itemId = itemId;
  }

  static from(itemId: string, err: unknown): DeleteError {
    if (err instanceof DeleteError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new DeleteError(itemId, message, { cause: err });
  }
}

export class ConfigError extends Error {
  readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(message: string, fieldErrors: Record<string, string[] | undefined> = {}) {
    super(message);
    this.name = 'ConfigError';
    this.fieldErrors = fieldErrors;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
