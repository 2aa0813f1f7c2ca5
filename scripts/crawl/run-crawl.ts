#!/usr/bin/env tsx

/**
 * Run one crawler and write its articles as JSON lines
 *
 * Usage:
 *   tsx scripts/crawl/run-crawl.ts read-more urls=https://example.org/a,https://example.org/b [--output=articles.jsonl]
 *   tsx scripts/crawl/run-crawl.ts archive urls=https://example.org/archive read_next_contains=Next
 */

import { appendFile } from 'node:fs/promises';
import { setupRuntime } from '../tools/runtime';
import { parseCrawlCommand, parseFlags } from '../../src/config/cli-args';
import { createCrawler } from '../../src/agents/crawler-resolver';
import { logger } from '../../src/utils/logger';

async function main() {
  const { flags, rest } = parseFlags(process.argv.slice(2));
  const output = flags.output ?? 'articles.jsonl';

  try {
    const { config, fetchPage } = setupRuntime();
    const command = parseCrawlCommand(rest);
    const crawler = createCrawler(command.crawler, command.options, {
      fetchPage,
      concurrency: config.crawl.concurrencyLimit,
      logger
    });

    let written = 0;
    for await (const item of crawler.crawl()) {
      await appendFile(output, `${JSON.stringify(item)}\n`, 'utf8');
      written++;
    }

    logger.info(`Wrote ${written} article(s) to ${output}`);
    process.exit(0);
  } catch (error) {
    logger.error('Crawl failed', error);
    process.exit(1);
  }
}

void main();
