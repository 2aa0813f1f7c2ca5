import Parser from 'rss-parser';
import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';

export type ParsedFeed = Parser.Output<Parser.Item>;

export interface RssEntriesOptions {
  // Defaults to rss-parser's own HTTP loader
  fetchFeed?: (url: string) => Promise<ParsedFeed>;
  logger?: Logger;
}

/**
 * Entry links of the given feeds, first occurrence kept, in feed order.
 * A feed that cannot be read is logged and skipped.
 */
export async function readEntryLinks(feedUrls: readonly string[], options: RssEntriesOptions = {}): Promise<string[]> {
  const log = (options.logger ?? rootLogger).child('RSS');
  const parser = new Parser();
  const fetchFeed = options.fetchFeed ?? ((url: string) => parser.parseURL(url));

  const links: string[] = [];
  for (const feedUrl of feedUrls) {
    let feed: ParsedFeed;
    try {
      feed = await fetchFeed(feedUrl);
    } catch (error) {
      log.error(`Failed to read feed ${feedUrl}: ${errorMessage(error)}`, error);
      continue;
    }

    let added = 0;
    for (const item of feed.items) {
      const link = item.link?.trim();
      if (link && !links.includes(link)) {
        links.push(link);
        added++;
      }
    }
    log.info(`Found ${added} new entries in ${feedUrl}`);
  }
  return links;
}
