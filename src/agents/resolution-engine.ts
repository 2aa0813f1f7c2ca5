/**
 * Article resolution engine
 *
 * Drives one chain per entry URL: follow the "read more" pointer, merge every
 * continuation page into a single item, then attach each source article.
 * The chain's progress is an explicit state value; nothing about a chain is
 * kept on the engine, so one engine can run many chains at once.
 */

import { ArticleAssembler } from './tools/article-assembler';
import { findNextPageLink, findReadMoreLink, findSourceLinks, type LinkLocatorOptions } from './tools/link-locators';
import { FetchError, OffsiteRequestError, errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { absolute, isAllowedUrl, withoutFragment } from '../utils/url';
import type { ArticleItem, FetchPage, Page } from '../types/article';

export type ResolutionState =
  | { kind: 'awaiting-pointer-decision'; page: Page }
  | { kind: 'awaiting-next-page'; page: Page; item?: ArticleItem; visited: readonly string[] }
  | { kind: 'awaiting-source'; item: ArticleItem; queue: readonly string[] }
  | { kind: 'done'; item: ArticleItem };

export interface ResolutionEngineOptions {
  fetchPage: FetchPage;
  locators: LinkLocatorOptions;
  assembler?: ArticleAssembler;
  // Hosts that pointer and next-page links may lead to; empty allows all
  allowedDomains?: readonly string[];
  logger?: Logger;
}

export class ResolutionEngine {
  private readonly fetchPage: FetchPage;
  private readonly locators: LinkLocatorOptions;
  private readonly assembler: ArticleAssembler;
  private readonly allowedDomains: readonly string[];
  private readonly log: Logger;

  constructor(options: ResolutionEngineOptions) {
    this.fetchPage = options.fetchPage;
    this.locators = options.locators;
    this.assembler = options.assembler ?? new ArticleAssembler();
    this.allowedDomains = options.allowedDomains ?? [];
    this.log = options.logger ?? rootLogger.child('Resolver');
  }

  /**
   * Resolve a summary page URL into one article.
   * @throws FetchError, ExtractionError, MergeError or OffsiteRequestError
   * when the chain cannot produce an item
   */
  async resolve(url: string): Promise<ArticleItem> {
    const page = await this.fetch(url);
    return this.run({ kind: 'awaiting-pointer-decision', page });
  }

  /**
   * Resolve a URL already known to be the first page of an article; no
   * pointer link is looked for.
   */
  async resolveArticle(url: string): Promise<ArticleItem> {
    const page = await this.fetch(url);
    return this.run({ kind: 'awaiting-next-page', page, visited: [withoutFragment(page.url)] });
  }

  async run(initial: ResolutionState): Promise<ArticleItem> {
    let state = initial;
    while (state.kind !== 'done') {
      state = await this.step(state);
    }
    this.log.debug(`Resolved ${state.item.url}`, {
      characterCount: state.item.character_count,
      sources: state.item.sources.length
    });
    return state.item;
  }

  /**
   * Advance a chain by one transition. At most one page is fetched per step.
   */
  async step(state: ResolutionState): Promise<ResolutionState> {
    switch (state.kind) {
      case 'awaiting-pointer-decision':
        return this.decidePointer(state.page);
      case 'awaiting-next-page':
        return this.consumePage(state.page, state.item, state.visited);
      case 'awaiting-source':
        return this.attachNextSource(state.item, state.queue);
      case 'done':
        return state;
      default: {
        const unreachable: never = state;
        throw new Error(`Unknown resolution state: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async decidePointer(page: Page): Promise<ResolutionState> {
    const href = findReadMoreLink(page, this.locators);
    if (href === undefined) {
      return { kind: 'awaiting-next-page', page, visited: [withoutFragment(page.url)] };
    }

    const target = await this.fetchWithinDomains(absolute(page.url, href));
    this.log.debug(`Followed read-more link ${page.url} -> ${target.url}`);
    return { kind: 'awaiting-next-page', page: target, visited: [withoutFragment(target.url)] };
  }

  private async consumePage(
    page: Page,
    item: ArticleItem | undefined,
    visited: readonly string[]
  ): Promise<ResolutionState> {
    const current = item ? this.assembler.merge(item, page) : this.assembler.assemble(page);

    const href = findNextPageLink(page, this.locators);
    if (href !== undefined) {
      const nextUrl = absolute(page.url, href);
      if (visited.includes(withoutFragment(nextUrl))) {
        this.log.warn(`Next-page link on ${page.url} leads back to ${nextUrl}; stopping pagination`);
      } else {
        const next = await this.fetchWithinDomains(nextUrl);
        return {
          kind: 'awaiting-next-page',
          page: next,
          item: current,
          visited: [...visited, withoutFragment(nextUrl), withoutFragment(next.url)]
        };
      }
    }

    return { kind: 'awaiting-source', item: current, queue: findSourceLinks(page, this.locators, this.log) };
  }

  private async attachNextSource(item: ArticleItem, queue: readonly string[]): Promise<ResolutionState> {
    if (queue.length === 0) {
      return { kind: 'done', item };
    }

    const [url, ...rest] = queue;
    try {
      const page = await this.fetch(url);
      item.sources.push(this.assembler.assemble(page));
    } catch (error) {
      this.log.warn(`Skipping source ${url} of ${item.url}: ${errorMessage(error)}`, {
        url,
        cause: error instanceof Error ? error.cause : undefined
      });
    }
    return { kind: 'awaiting-source', item, queue: rest };
  }

  private async fetchWithinDomains(url: string): Promise<Page> {
    if (!isAllowedUrl(url, this.allowedDomains)) {
      throw new OffsiteRequestError(url, this.allowedDomains);
    }
    return this.fetch(url);
  }

  private async fetch(url: string): Promise<Page> {
    try {
      return await this.fetchPage(url);
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(url, errorMessage(error), { cause: error });
    }
  }
}
