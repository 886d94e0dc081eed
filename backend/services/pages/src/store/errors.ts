// backend/services/pages/src/store/errors.ts

/**
 * Typed failures raised by the page store and repository.
 * `statusCode`/`code`/`title` are read by the HTTP error formatters.
 */
export abstract class PageStoreError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  abstract readonly title: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Backing file cannot be opened, locked, read or written. */
export class StorageUnavailableError extends PageStoreError {
  readonly code = "STORAGE_UNAVAILABLE";
  readonly statusCode = 503;
  readonly title = "Storage Unavailable";
}

/** Caller input rejected; nothing was written. */
export class ValidationError extends PageStoreError {
  readonly code: string = "VALIDATION_ERROR";
  readonly statusCode = 400;
  readonly title = "Validation Error";
}

export class NameEmptyError extends ValidationError {
  override readonly code = "NAME_EMPTY";

  constructor() {
    super("name is empty");
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
