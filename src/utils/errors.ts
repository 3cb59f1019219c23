/**
 * Error classes shared across the crawler
 */

/**
 * Raised by the HTTP client for any non-2xx response
 */
export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
  ) {
    super(statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`);
    this.name = "HttpError";
  }
}

/**
 * Raised before the first comic is processed when the run cannot start
 * (output directory unusable, latest comic unknown). Aborts the whole run.
 */
export class CrawlSetupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CrawlSetupError";
  }
}
