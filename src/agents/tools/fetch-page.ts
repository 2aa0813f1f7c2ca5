/**
 * HTTP transport for crawlers
 * Fetches HTML pages with a timeout and retries, and parses them with cheerio
 */

import * as cheerio from 'cheerio';
import pRetry, { AbortError } from 'p-retry';
import { DEFAULT_USER_AGENT } from '../../config/environment';
import { FetchError, errorMessage } from '../../utils/errors';
import { logger as rootLogger, type Logger } from '../../utils/logger';
import type { FetchPage, Page } from '../../types/article';

export interface HttpFetcherOptions {
  timeoutMs?: number;
  retries?: number;
  retryMinTimeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export function createPage(url: string, text: string, status = 200): Page {
  return {
    url,
    text,
    status,
    $: cheerio.load(text)
  };
}

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

async function fetchOnce(url: string, timeoutMs: number, userAgent: string): Promise<Page> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  let text: string;
  try {
    response = await fetch(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'ja,en-US;q=0.7,en;q=0.5'
      }
    });
    text = await response.text();
  } catch (error) {
    const message = error instanceof Error && error.name === 'AbortError'
      ? 'Request timeout'
      : errorMessage(error);
    throw new FetchError(url, message, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    const error = new FetchError(url, `HTTP ${response.status}`, { status: response.status });
    if (!isRetryableStatus(response.status)) {
      throw new AbortError(error);
    }
    throw error;
  }

  return createPage(response.url || url, text, response.status);
}

/**
 * Build the fetch capability consumed by the resolution engine. Every
 * failure, after retries, surfaces as a FetchError.
 */
export function createHttpFetcher(options: HttpFetcherOptions = {}): FetchPage {
  const timeoutMs = options.timeoutMs ?? 10000;
  const retries = options.retries ?? 2;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const log = (options.logger ?? rootLogger).child('HTTP');

  return async (url: string): Promise<Page> => {
    log.debug(`GET ${url}`);
    try {
      return await pRetry(() => fetchOnce(url, timeoutMs, userAgent), {
        retries,
        factor: 2,
        minTimeout: options.retryMinTimeoutMs ?? 500,
        maxTimeout: 5000,
        onFailedAttempt: error => {
          log.warn(`Attempt ${error.attemptNumber} failed for ${url}: ${error.message}`, {
            retriesLeft: error.retriesLeft
          });
        }
      });
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(url, errorMessage(error), { cause: error });
    }
  };
}
