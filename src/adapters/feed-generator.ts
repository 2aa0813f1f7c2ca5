/**
 * Feed generator
 * Scrapes entry links from listing pages and renders them as Atom or RSS.
 */

import { Feed } from 'feed';
import { parseConfig, feedConfigSchema, type FeedPageConfig } from '../config/crawler-config';
import { InvalidURLError, errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { absolute } from '../utils/url';
import type { FeedItem, FetchPage, Page } from '../types/article';

export interface FeedEntry {
  id: string;
  title: string;
  link: string;
}

export interface FeedGeneratorOptions {
  fetchPage: FetchPage;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Pair selected titles with selected hrefs, in document order. Extra titles
 * or hrefs without a partner are ignored, and so are pairs whose href cannot
 * be resolved.
 */
export function scrapeEntries(page: Page, config: FeedPageConfig, log?: Logger): FeedEntry[] {
  const { $ } = page;
  const titles = $.root().find(config.titleSelector).toArray().map(element => $(element).text().trim());
  const hrefs = $.root().find(config.hrefSelector).toArray().map(element => $(element).attr('href') ?? '');

  const entries: FeedEntry[] = [];
  for (let i = 0; i < Math.min(titles.length, hrefs.length); i++) {
    let link: string;
    try {
      link = absolute(page.url, hrefs[i]);
    } catch (error) {
      if (!(error instanceof InvalidURLError)) throw error;
      log?.debug(`Skipping unresolvable entry href on ${page.url}: ${error.message}`);
      continue;
    }
    entries.push({ id: link, title: titles[i], link });
  }
  return entries;
}

export function renderFeed(
  url: string,
  page: Page,
  config: FeedPageConfig,
  updated: Date,
  log?: Logger
): string {
  const { $ } = page;
  const feed = new Feed({
    id: url,
    link: url,
    title: $('title').first().text().trim() || `Feed for ${url}`,
    language: $('html').attr('lang')?.trim() || 'en',
    copyright: '',
    updated,
    generator: 'article-crawler'
  });

  for (const entry of scrapeEntries(page, config, log)) {
    feed.addItem({
      id: entry.id,
      title: entry.title,
      link: entry.link,
      date: updated
    });
  }

  return config.feedType === 'rss' ? feed.rss2() : feed.atom1();
}

export class FeedGenerator {
  private readonly fetchPage: FetchPage;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: FeedGeneratorOptions) {
    this.fetchPage = options.fetchPage;
    this.log = (options.logger ?? rootLogger).child('Feed');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Generate one feed per configured page, in configuration order. Pages
   * that cannot be fetched or scraped are logged and skipped.
   * @throws InvalidConfigurationError when the configuration is invalid
   */
  async *generate(input: unknown): AsyncGenerator<FeedItem> {
    const { feedConfig } = parseConfig(feedConfigSchema, input);

    for (const [url, config] of Object.entries(feedConfig)) {
      try {
        const page = await this.fetchPage(url);
        const generatedAt = this.now();
        const content = renderFeed(url, page, config, generatedAt, this.log);
        this.log.info(`Generated ${config.feedType} feed ${config.fileName} for ${url}`);
        yield {
          url,
          file_name: config.fileName,
          content,
          generated_at: generatedAt.toISOString()
        };
      } catch (error) {
        this.log.error(`Failed to generate feed for ${url}: ${errorMessage(error)}`, error);
      }
    }
  }
}
