/**
 * Shared setup for the runner scripts
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../../src/config/environment';
import { createHttpFetcher } from '../../src/agents/tools/fetch-page';
import { logger } from '../../src/utils/logger';
import type { FetchPage } from '../../src/types/article';

// Find project root (go up two levels from scripts/tools directory)
export const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

export interface Runtime {
  config: EnvironmentConfig;
  fetchPage: FetchPage;
}

/**
 * Load .env.local then .env, validate the environment and build the HTTP
 * fetcher.
 */
export function setupRuntime(): Runtime {
  dotenv.config({ path: path.join(projectRoot, '.env.local') });
  dotenv.config({ path: path.join(projectRoot, '.env') });

  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  return {
    config,
    fetchPage: createHttpFetcher({ ...config.fetch, logger })
  };
}

/**
 * `out.jsonl` becomes `out-<label>-<unix seconds>.jsonl`. The label keeps
 * files written within the same second apart.
 */
export function filenameWithTimestamp(file: string, label?: string, now = new Date()): string {
  const { dir, name, ext } = path.parse(file);
  const stem = label ? `${name}-${label}` : name;
  return path.join(dir, `${stem}-${Math.floor(now.getTime() / 1000)}${ext}`);
}
