/**
 * Error taxonomy for the crawler.
 *
 * Fatal errors (fetch, extraction or merge failures on the entry page or a
 * next-page continuation) abort one resolution chain. The same errors raised
 * while fetching a source page are logged and contained by the engine.
 */

export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends CrawlerError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`Failed to fetch ${url}: ${message}`, { cause: options.cause });
    this.url = url;
    this.status = options.status;
  }
}

export class OffsiteRequestError extends CrawlerError {
  readonly url: string;

  constructor(url: string, allowedDomains: readonly string[]) {
    super(`Refusing offsite request to ${url} (allowed: ${allowedDomains.join(', ')})`);
    this.url = url;
  }
}

export class ExtractionError extends CrawlerError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to extract content from ${url}: ${message}`, options);
    this.url = url;
  }
}

export class MergeError extends CrawlerError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to merge ${url}: ${message}`, options);
    this.url = url;
  }
}

export class InvalidURLError extends CrawlerError {
  readonly href: string;

  constructor(href: string, message = 'invalid URL', options?: { cause?: unknown }) {
    super(`${message}: "${href}"`, options);
    this.href = href;
  }
}

export class InvalidConfigurationError extends CrawlerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.issues = issues;
  }
}

export class NoRouteError extends CrawlerError {
  readonly url: string;

  constructor(url: string) {
    super(`No route matches URL: ${url}`);
    this.url = url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
