/**
 * Application errors. The global error handler in app.ts maps these to
 * `{ detail }` responses with `statusCode`.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller input violates a domain rule. Nothing was written. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

/** The persistence medium failed, timed out, or could not commit. */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'STORAGE_ERROR', { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
