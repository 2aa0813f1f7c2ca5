/**
 * Archive crawler
 * Walks paginated archive index pages and resolves every article they link to.
 */

import { Crawler, type CrawlTarget, type CrawlerOptions } from '../agents/read-more-crawler';
import { archiveConfigSchema, parseConfig, type ArchiveConfig } from '../config/crawler-config';
import { FetchError, errorMessage } from '../utils/errors';
import { absolute, isAllowedUrl, withoutFragment } from '../utils/url';
import type { ArticleItem, Page } from '../types/article';

function hrefsOf(page: Page, selector: string): string[] {
  const { $ } = page;
  return $.root()
    .find(selector)
    .toArray()
    .map(element => ($(element).attr('href') ?? '').trim())
    .filter(href => href !== '');
}

export class ArchiveCrawler extends Crawler<ArchiveConfig> {
  /**
   * @throws InvalidConfigurationError when the options are invalid
   */
  constructor(input: unknown, options: CrawlerOptions) {
    super('Archive', parseConfig(archiveConfigSchema, input), options);
  }

  /**
   * Article URLs in index order, index pages in "next" order. Each index
   * page and each article is visited once per crawl.
   */
  protected async *targets(): AsyncIterable<CrawlTarget> {
    const seenIndexes = new Set<string>();
    const seenArticles = new Set<string>();

    for (const start of this.config.urls) {
      let indexUrl: string | undefined = start;

      while (indexUrl !== undefined && !seenIndexes.has(withoutFragment(indexUrl))) {
        seenIndexes.add(withoutFragment(indexUrl));

        let page: Page;
        try {
          page = await this.fetchPage(indexUrl);
        } catch (error) {
          this.log.error(`Failed to fetch archive index ${indexUrl}: ${errorMessage(error)}`, error);
          yield {
            url: indexUrl,
            error: error instanceof FetchError ? error : new FetchError(indexUrl, errorMessage(error), { cause: error })
          };
          break;
        }

        for (const href of hrefsOf(page, this.config.archiveArticleSelector)) {
          const articleUrl = this.follow(page, href);
          if (articleUrl === undefined || seenArticles.has(articleUrl)) continue;
          seenArticles.add(articleUrl);
          this.log.debug(`Found article ${articleUrl}`);
          yield articleUrl;
        }

        const [nextHref] = hrefsOf(page, this.config.archiveNextSelector);
        indexUrl = nextHref === undefined ? undefined : this.follow(page, nextHref);
      }
    }
  }

  protected resolveTarget(url: string): Promise<ArticleItem> {
    return this.engine.resolveArticle(url);
  }

  private follow(page: Page, href: string): string | undefined {
    let url: string;
    try {
      url = withoutFragment(absolute(page.url, href));
    } catch (error) {
      this.log.debug(`Skipping unresolvable href on ${page.url}: ${errorMessage(error)}`);
      return undefined;
    }
    if (!isAllowedUrl(url, this.allowedDomains)) {
      this.log.debug(`Skipping offsite link ${url}`);
      return undefined;
    }
    return url;
  }
}
