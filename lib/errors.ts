export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
  }
}

/**
 * A single call record carried a timestamp that is not ISO-8601.
 * Recovered per record: the record is skipped and the run continues.
 */
export class ParseError extends SyncError {
  constructor(message: string, public value?: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * The call-log API answered with a non-2xx status or a body that is not a page of calls.
 * Aborts the run before anything is written for the destination.
 */
export class TransportError extends SyncError {
  constructor(message: string, public status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class PaginationLimitError extends TransportError {
  constructor(public maxPages: number) {
    super(`Pagination did not finish within ${maxPages} pages`);
    this.name = 'PaginationLimitError';
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string, public variables: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UsageError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
