/**
 * Tests for the read-more crawler: ordering, concurrency and failure isolation
 */

import { ReadMoreCrawler, type CrawlerOptions } from '../read-more-crawler';
import { createPage } from '../tools/fetch-page';
import { FetchError, InvalidConfigurationError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { FIXED_NOW, fakeExtract, fakeFetcher, html } from '../../__tests__/fixtures';
import type { ArticleItem, Page } from '../../types/article';

const article = (text: string) => html(`<article><p>${text}</p></article>`);

function options(fetchPage: CrawlerOptions['fetchPage'], extra: Partial<CrawlerOptions> = {}): CrawlerOptions {
  return {
    fetchPage,
    extract: fakeExtract,
    now: () => FIXED_NOW,
    logger: new Logger({ level: 'error' }),
    ...extra
  };
}

async function collect(items: AsyncIterable<ArticleItem>): Promise<ArticleItem[]> {
  const result: ArticleItem[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

describe('ReadMoreCrawler', () => {
  it('rejects invalid options at construction', () => {
    expect(
      () =>
        new ReadMoreCrawler(
          { urls: 'https://example.org/', sourceContains: 'a', sourceParentContains: 'b' },
          options(fakeFetcher({}))
        )
    ).toThrow(InvalidConfigurationError);
  });

  it('derives its own allowed domains from its URLs', () => {
    const first = new ReadMoreCrawler({ urls: 'https://例え.テスト/a, https://www.example.org/b' }, options(fakeFetcher({})));
    const second = new ReadMoreCrawler({ urls: 'https://example.net/' }, options(fakeFetcher({})));

    expect(first.allowedDomains).toEqual(['xn--r8jz45g.xn--zckzah', 'www.example.org']);
    expect(second.allowedDomains).toEqual(['example.net']);
  });

  it('emits items in input order even when later chains finish first', async () => {
    const pages = fakeFetcher({
      'https://example.org/slow': article('slow'),
      'https://example.org/fast': article('fast')
    });
    const fetchPage = vi.fn(async (url: string): Promise<Page> => {
      if (url === 'https://example.org/slow') {
        await new Promise(resolve => setTimeout(resolve, 20));
      }
      return pages(url);
    });
    const crawler = new ReadMoreCrawler(
      { urls: 'https://example.org/slow,https://example.org/fast' },
      options(fetchPage)
    );

    const items = await collect(crawler.crawl());

    expect(items.map(item => item.url)).toEqual(['https://example.org/slow', 'https://example.org/fast']);
  });

  it('runs no more chains at once than the concurrency limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchPage = vi.fn(async (url: string): Promise<Page> => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return createPage(url, article(url));
    });
    const urls = [1, 2, 3, 4, 5].map(n => `https://example.org/articles/${n}`);
    const crawler = new ReadMoreCrawler({ urls }, options(fetchPage, { concurrency: 2 }));

    const result = await crawler.run();

    expect(result.items).toHaveLength(5);
    expect(maxInFlight).toBe(2);
  });

  it('prefers the crawl-level concurrency over the process-wide limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchPage = vi.fn(async (url: string): Promise<Page> => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return createPage(url, article(url));
    });
    const urls = [1, 2, 3, 4, 5].map(n => `https://example.org/articles/${n}`);
    const crawler = new ReadMoreCrawler({ urls, concurrency: '1' }, options(fetchPage, { concurrency: 4 }));

    const result = await crawler.run();

    expect(result.items).toHaveLength(5);
    expect(maxInFlight).toBe(1);
  });

  it('isolates failing chains and reports them', async () => {
    const crawler = new ReadMoreCrawler(
      { urls: ['https://example.org/a', 'https://example.org/missing', 'https://example.org/c'] },
      options(
        fakeFetcher({
          'https://example.org/a': article('a'),
          'https://example.org/c': article('c')
        })
      )
    );

    const result = await crawler.run();

    expect(result.success).toBe(false);
    expect(result.items.map(item => item.url)).toEqual(['https://example.org/a', 'https://example.org/c']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].url).toBe('https://example.org/missing');
    expect(result.failures[0].error).toBeInstanceOf(FetchError);
    expect(result.stats).toMatchObject({ chains: 3, emittedItems: 2, failedChains: 1, droppedItems: 0 });
  });

  it('emits exactly one item without sources for a plain page', async () => {
    const crawler = new ReadMoreCrawler(
      { urls: 'https://example.org/plain' },
      options(fakeFetcher({ 'https://example.org/plain': article('plain') }))
    );

    const result = await crawler.run();

    expect(result.success).toBe(true);
    expect(result.items).toHaveLength(1);
    expect(result.items[0].sources).toEqual([]);
  });

  it('counts attached sources', async () => {
    const crawler = new ReadMoreCrawler(
      { urls: 'https://example.org/entry', sourceContains: '出典' },
      options(
        fakeFetcher({
          'https://example.org/entry': html('<article><p>main</p></article><a href="/s/1">出典</a>'),
          'https://example.org/s/1': article('source')
        })
      )
    );

    const result = await crawler.run();

    expect(result.stats.sourcesAttached).toBe(1);
  });

  it('drops items whose body has no text', async () => {
    const crawler = new ReadMoreCrawler(
      { urls: 'https://example.org/blank' },
      options(fakeFetcher({ 'https://example.org/blank': article('x') }), {
        extract: (_text, url) => ({ url, lang: 'ja', body_xml: '<main><p> </p></main>' })
      })
    );

    const result = await crawler.run();

    expect(result.items).toEqual([]);
    expect(result.stats.droppedItems).toBe(1);
    await expect(collect(crawler.crawl())).resolves.toEqual([]);
  });
});
