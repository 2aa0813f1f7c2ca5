#!/usr/bin/env tsx

/**
 * Read RSS feeds once, route every entry link to a crawler, and write the
 * resolved articles as JSON lines (one file per route group)
 *
 * Usage:
 *   tsx scripts/feeds/run-feed-reader.ts [--config=rss.json5] [--output=rss.jsonl]
 */

import { appendFile } from 'node:fs/promises';
import { filenameWithTimestamp, setupRuntime } from '../tools/runtime';
import { parseFlags } from '../../src/config/cli-args';
import { loadConfigFile } from '../../src/config/config-file';
import { feedReaderConfigSchema } from '../../src/config/crawler-config';
import { readEntryLinks } from '../../src/adapters/rss-entries';
import { CrawlerResolver, createCrawler } from '../../src/agents/crawler-resolver';
import { errorMessage } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';

async function main() {
  const { flags } = parseFlags(process.argv.slice(2));
  const configPath = flags.config ?? 'rss.json5';
  const output = flags.output ?? 'rss.jsonl';

  try {
    const { config, fetchPage } = setupRuntime();
    const readerConfig = await loadConfigFile(configPath, feedReaderConfigSchema);
    const resolver = new CrawlerResolver(readerConfig.routes);

    const links = await readEntryLinks(readerConfig.feedUrls, { logger });
    logger.info(`Found ${links.length} entries in ${readerConfig.feedUrls.length} feed(s)`);

    let failedGroups = 0;
    for (const [index, group] of resolver.groupUrlsByRoute(links).entries()) {
      const file = filenameWithTimestamp(output, `${index + 1}-${group.crawler}`);
      try {
        const crawler = createCrawler(group.crawler, { ...group.args, urls: group.urls }, {
          fetchPage,
          concurrency: config.crawl.concurrencyLimit,
          logger
        });
        const result = await crawler.run();
        for (const item of result.items) {
          await appendFile(file, `${JSON.stringify(item)}\n`, 'utf8');
        }
        logger.info(`Wrote ${result.items.length} article(s) to ${file}`, result.stats);
      } catch (error) {
        failedGroups++;
        logger.error(`Crawler ${group.crawler} failed: ${errorMessage(error)}`, error);
      }
    }

    process.exit(failedGroups === 0 ? 0 : 1);
  } catch (error) {
    logger.error('Feed reader failed', error);
    process.exit(1);
  }
}

void main();
