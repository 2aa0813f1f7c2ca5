/**
 * Read-more crawler
 * Resolves each configured summary URL into one article, several chains at a
 * time, and emits the items in input order.
 */

import pLimit from 'p-limit';
import { ResolutionEngine } from './resolution-engine';
import { ArticleAssembler } from './tools/article-assembler';
import { parseConfig, readMoreConfigSchema, type ReadMoreConfig } from '../config/crawler-config';
import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { allowedDomainsFor } from '../utils/url';
import type { ArticleItem, FetchPage, MetadataExtractor } from '../types/article';

export const DEFAULT_CONCURRENCY = 4;

export interface CrawlerOptions {
  fetchPage: FetchPage;
  concurrency?: number;
  logger?: Logger;
  extract?: MetadataExtractor;
  now?: () => Date;
}

export type ChainOutcome =
  | { status: 'resolved'; url: string; item: ArticleItem }
  | { status: 'failed'; url: string; error: Error };

export interface CrawlFailure {
  url: string;
  error: Error;
}

export interface CrawlStats {
  chains: number;
  emittedItems: number;
  droppedItems: number;
  failedChains: number;
  sourcesAttached: number;
  startTime: number;
  endTime?: number;
}

export interface CrawlResult {
  success: boolean;
  items: ArticleItem[];
  failures: CrawlFailure[];
  stats: CrawlStats;
}

// A discovered chain entry, or a failure met while discovering entries
export type CrawlTarget = string | CrawlFailure;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Items without a body carry nothing worth keeping.
 */
export function hasBody(item: ArticleItem): boolean {
  return item.body.trim() !== '' && item.character_count > 0;
}

export abstract class Crawler<TConfig extends ReadMoreConfig> {
  readonly config: TConfig;
  // Owned by this instance; never shared between crawlers
  readonly allowedDomains: readonly string[];
  protected readonly fetchPage: FetchPage;
  protected readonly engine: ResolutionEngine;
  protected readonly log: Logger;
  private readonly concurrency: number;

  protected constructor(name: string, config: TConfig, options: CrawlerOptions) {
    this.config = config;
    this.allowedDomains = allowedDomainsFor(config.urls);
    this.fetchPage = options.fetchPage;
    this.log = (options.logger ?? rootLogger).child(name);
    // A crawl's own limit wins over the process-wide one
    this.concurrency = config.concurrency ?? options.concurrency ?? DEFAULT_CONCURRENCY;
    this.engine = new ResolutionEngine({
      fetchPage: options.fetchPage,
      locators: config,
      assembler: new ArticleAssembler({ extract: options.extract, langHint: config.lang, now: options.now }),
      allowedDomains: this.allowedDomains,
      logger: this.log
    });
  }

  /**
   * The URLs that start a chain, in emission order.
   */
  protected abstract targets(): AsyncIterable<CrawlTarget>;

  protected abstract resolveTarget(url: string): Promise<ArticleItem>;

  /**
   * Settle every chain, in target order. Chains run concurrently up to the
   * configured limit; a failing chain never affects another.
   */
  async *outcomes(): AsyncGenerator<ChainOutcome> {
    const limit = pLimit(this.concurrency);
    const pending: Promise<ChainOutcome>[] = [];

    try {
      for await (const target of this.targets()) {
        if (typeof target === 'string') {
          pending.push(limit(() => this.settle(target)));
        } else {
          pending.push(Promise.resolve<ChainOutcome>({ status: 'failed', url: target.url, error: target.error }));
        }
      }
      for (const outcome of pending) {
        yield await outcome;
      }
    } finally {
      limit.clearQueue();
    }
  }

  /**
   * Lazily emit resolved articles in target order. Failed chains and items
   * without a body are logged and skipped.
   */
  async *crawl(): AsyncGenerator<ArticleItem> {
    for await (const outcome of this.outcomes()) {
      if (outcome.status === 'resolved' && hasBody(outcome.item)) {
        yield outcome.item;
      }
    }
  }

  async run(): Promise<CrawlResult> {
    const stats: CrawlStats = {
      chains: 0,
      emittedItems: 0,
      droppedItems: 0,
      failedChains: 0,
      sourcesAttached: 0,
      startTime: Date.now()
    };
    const items: ArticleItem[] = [];
    const failures: CrawlFailure[] = [];

    this.log.info(`Starting crawl of ${this.config.urls.length} URL(s)`, { concurrency: this.concurrency });

    for await (const outcome of this.outcomes()) {
      stats.chains++;
      if (outcome.status === 'failed') {
        stats.failedChains++;
        failures.push({ url: outcome.url, error: outcome.error });
      } else if (hasBody(outcome.item)) {
        stats.emittedItems++;
        stats.sourcesAttached += outcome.item.sources.length;
        items.push(outcome.item);
      } else {
        stats.droppedItems++;
      }
    }

    stats.endTime = Date.now();
    this.log.info(`Crawl finished in ${stats.endTime - stats.startTime}ms`, {
      emitted: stats.emittedItems,
      failed: stats.failedChains,
      dropped: stats.droppedItems
    });

    return { success: stats.failedChains === 0, items, failures, stats };
  }

  private async settle(url: string): Promise<ChainOutcome> {
    try {
      const item = await this.resolveTarget(url);
      if (!hasBody(item)) {
        this.log.warn(`Dropping item without body: ${item.url}`);
      }
      return { status: 'resolved', url, item };
    } catch (error) {
      this.log.error(`Chain failed for ${url}: ${errorMessage(error)}`, error);
      return { status: 'failed', url, error: toError(error) };
    }
  }
}

export class ReadMoreCrawler extends Crawler<ReadMoreConfig> {
  /**
   * @throws InvalidConfigurationError when the options are invalid
   */
  constructor(input: unknown, options: CrawlerOptions) {
    super('ReadMore', parseConfig(readMoreConfigSchema, input), options);
  }

  protected async *targets(): AsyncIterable<CrawlTarget> {
    yield* this.config.urls;
  }

  protected resolveTarget(url: string): Promise<ArticleItem> {
    return this.engine.resolve(url);
  }
}
