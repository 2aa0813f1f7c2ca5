/**
 * Command-line arguments for the crawl runner: `<crawler> key=value ...`
 */

import { crawlerNameSchema, type CrawlerName } from './crawler-config';
import { InvalidConfigurationError } from '../utils/errors';

export interface CrawlCommand {
  crawler: CrawlerName;
  options: Record<string, string>;
}

/**
 * `read_more_selector` and `read-more-selector` both become
 * `readMoreSelector`.
 */
export function toOptionKey(key: string): string {
  return key.trim().replace(/[-_]+([a-zA-Z0-9])/g, (_, char: string) => char.toUpperCase());
}

/**
 * Parse `key=value` pairs. Only the first `=` separates key from value.
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, string> {
  const options: Record<string, string> = {};
  const issues: string[] = [];

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      issues.push(`expected key=value, got "${pair}"`);
      continue;
    }
    options[toOptionKey(pair.slice(0, separator))] = pair.slice(separator + 1);
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
  return options;
}

export function parseCrawlCommand(argv: readonly string[]): CrawlCommand {
  const [name, ...pairs] = argv;
  const crawler = crawlerNameSchema.safeParse(name);
  if (!crawler.success) {
    throw new InvalidConfigurationError([
      `crawler must be one of ${crawlerNameSchema.options.join(', ')}, got "${name ?? ''}"`
    ]);
  }
  return { crawler: crawler.data, options: parseKeyValuePairs(pairs) };
}

/**
 * Split `--name=value` flags from the remaining arguments.
 */
export function parseFlags(argv: readonly string[]): { flags: Record<string, string>; rest: string[] } {
  const flags: Record<string, string> = {};
  const rest: string[] = [];
  for (const arg of argv) {
    const match = /^--([^=]+)=(.*)$/s.exec(arg);
    if (match) {
      flags[toOptionKey(match[1])] = match[2];
    } else {
      rest.push(arg);
    }
  }
  return { flags, rest };
}
