/** Base class for failures while loading a page. All of them are retryable. */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly pageUrl: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

/** Navigation or render wait exceeded its bound */
export class TimeoutError extends FetchError {
  constructor(pageUrl: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Timed out after ${timeoutMs}ms loading ${pageUrl}`, pageUrl, options);
    this.name = "TimeoutError";
  }
}

/** Network, DNS or HTTP-level failure */
export class NavigationError extends FetchError {
  constructor(
    message: string,
    pageUrl: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, pageUrl, options);
    this.name = "NavigationError";
  }
}

/** The site served a bot interstitial instead of the listing */
export class BlockedError extends FetchError {
  constructor(pageUrl: string, readonly marker: string) {
    super(`Bot challenge detected on ${pageUrl} (marker: ${marker})`, pageUrl);
    this.name = "BlockedError";
  }
}

/** A card lacked a required field; the card is skipped */
export class ParseFieldError extends Error {
  constructor(readonly field: string, readonly cardIndex: number) {
    super(`Card ${cardIndex} is missing required field "${field}"`);
    this.name = "ParseFieldError";
  }
}

/** Retries for a page ran out. Aborts the run. */
export class RetryExhaustedError extends Error {
  constructor(
    readonly pageIndex: number,
    readonly attempts: number,
    readonly lastError: FetchError
  ) {
    super(`Page ${pageIndex} failed after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
  }
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}
