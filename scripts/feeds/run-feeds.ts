#!/usr/bin/env tsx

/**
 * Generate Atom/RSS files for the listing pages in a JSON5 config
 *
 * Usage:
 *   tsx scripts/feeds/run-feeds.ts [--config=feeds.json5] [--output-dir=feeds]
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { setupRuntime } from '../tools/runtime';
import { parseFlags } from '../../src/config/cli-args';
import { loadConfigFile } from '../../src/config/config-file';
import { feedConfigSchema } from '../../src/config/crawler-config';
import { FeedGenerator } from '../../src/adapters/feed-generator';
import { logger } from '../../src/utils/logger';

async function main() {
  const { flags } = parseFlags(process.argv.slice(2));
  const configPath = flags.config ?? 'feeds.json5';
  const outputDir = flags.outputDir ?? 'feeds';

  try {
    const { fetchPage } = setupRuntime();
    const feedConfig = await loadConfigFile(configPath, feedConfigSchema);
    const generator = new FeedGenerator({ fetchPage, logger });

    await mkdir(outputDir, { recursive: true });
    let written = 0;
    for await (const feed of generator.generate(feedConfig)) {
      // Overwrites the previous feed for the same page
      await writeFile(path.join(outputDir, feed.file_name), feed.content, 'utf8');
      written++;
    }

    logger.info(`Wrote ${written} feed(s) to ${outputDir}`);
    process.exit(0);
  } catch (error) {
    logger.error('Feed generation failed', error);
    process.exit(1);
  }
}

void main();
