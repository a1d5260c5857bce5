/**
 * Error taxonomy for the downloader.
 *
 * Start-up errors (locator, credentials) abort the process. Per-track errors are
 * caught by the orchestrator and turned into failed outcomes.
 */

export type ErrorCategory =
  | 'InvalidLocator'
  | 'CredentialsMissing'
  | 'InvalidTrackKind'
  | 'NoMatch'
  | 'FetchError'
  | 'TagError'
  | 'ArtworkUnavailable'
  | 'LedgerNotFound';

interface ErrorOptions {
  readonly cause?: unknown;
  /** Search query of the track being processed, when there is one. */
  readonly query?: string;
}

export class DownloaderError extends Error {
  readonly category: ErrorCategory;
  readonly query: string | null;

  constructor(message: string, category: ErrorCategory, options: ErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = `${category}Error`;
    this.category = category;
    this.query = options.query ?? null;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * One-line message for the console, without a stack.
   */
  toUserMessage(): string {
    const subject = this.query ? ` [${this.query}]` : '';
    return `${this.category}${subject}: ${this.message}`;
  }
}

export class InvalidLocatorError extends DownloaderError {
  constructor(locator: string) {
    super(`Invalid Spotify playlist reference: "${locator}"`, 'InvalidLocator');
  }
}

export class CredentialsMissingError extends DownloaderError {
  constructor(missing: readonly string[]) {
    super(`Missing Spotify credentials: ${missing.join(', ')}`, 'CredentialsMissing');
  }
}

export class InvalidTrackKindError extends DownloaderError {
  constructor(message: string) {
    super(message, 'InvalidTrackKind');
  }
}

export class NoMatchError extends DownloaderError {
  constructor(query: string, options: Omit<ErrorOptions, 'query'> = {}) {
    super('No search results', 'NoMatch', { ...options, query });
  }
}

export class FetchError extends DownloaderError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, 'FetchError', options);
  }
}

export class TagError extends DownloaderError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, 'TagError', options);
  }
}

export class ArtworkUnavailableError extends DownloaderError {
  constructor(url: string, options: ErrorOptions = {}) {
    super(`Could not fetch artwork from ${url}`, 'ArtworkUnavailable', options);
  }
}

export class LedgerNotFoundError extends DownloaderError {
  readonly ledgerPath: string;

  constructor(ledgerPath: string) {
    super(`No retry ledger at ${ledgerPath}`, 'LedgerNotFound');
    this.ledgerPath = ledgerPath;
  }
}

export const isDownloaderError = (error: unknown): error is DownloaderError =>
  error instanceof DownloaderError;

/**
 * Extracts a printable message from anything thrown.
 */
export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
