/**
 * Crawler routing
 * Maps article URLs to the crawler (and its options) that can resolve them.
 */

import { z } from 'zod';
import { ArchiveCrawler } from '../adapters/archive';
import { ReadMoreCrawler, type Crawler, type CrawlerOptions } from './read-more-crawler';
import { parseConfig, routeSchema, type CrawlerName, type ReadMoreConfig, type Route } from '../config/crawler-config';
import { NoRouteError } from '../utils/errors';

export interface ResolvedRoute {
  crawler: CrawlerName;
  args: Record<string, string>;
}

export interface RouteGroup extends ResolvedRoute {
  urls: string[];
}

function matches(route: Route, url: string): boolean {
  return route.patterns.some(pattern => new RegExp(pattern).test(url));
}

export class CrawlerResolver {
  readonly routes: readonly Route[];

  /**
   * @throws InvalidConfigurationError when a route is invalid
   */
  constructor(routes: unknown) {
    this.routes = parseConfig(z.array(routeSchema), routes);
  }

  /**
   * The first route with a pattern found in `url` wins.
   * @throws NoRouteError when no route matches
   */
  resolve(url: string): ResolvedRoute {
    const route = this.routes.find(candidate => matches(candidate, url));
    if (!route) {
      throw new NoRouteError(url);
    }
    return { crawler: route.crawler, args: route.args };
  }

  /**
   * Group URLs by the first route that matches each of them. URLs no route
   * matches are dropped; groups are ordered by their first URL.
   */
  groupUrlsByRoute(urls: readonly string[]): RouteGroup[] {
    const grouped = new Map<number, string[]>();
    for (const url of urls) {
      const index = this.routes.findIndex(route => matches(route, url));
      if (index === -1) continue;
      grouped.set(index, [...(grouped.get(index) ?? []), url]);
    }

    return [...grouped.entries()].map(([index, groupUrls]) => ({
      crawler: this.routes[index].crawler,
      args: this.routes[index].args,
      urls: groupUrls
    }));
  }
}

/**
 * Construct the named crawler.
 * @throws InvalidConfigurationError when the options are invalid
 */
export function createCrawler(name: CrawlerName, input: unknown, options: CrawlerOptions): Crawler<ReadMoreConfig> {
  switch (name) {
    case 'read-more':
      return new ReadMoreCrawler(input, options);
    case 'archive':
      return new ArchiveCrawler(input, options);
  }
}
