/**
 * Environment configuration for crawlers and the HTTP transport
 * Loads and validates optional environment variables
 */

import { InvalidConfigurationError } from '../utils/errors';
import { isLogLevel, type LogLevel } from '../utils/logger';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; ArticleCrawler/1.0)';

export interface EnvironmentConfig {
  fetch: {
    timeoutMs: number;
    retries: number;
    userAgent: string;
  };
  crawl: {
    concurrencyLimit: number;
  };
  logging: {
    level: LogLevel;
  };
}

function parseInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  issues: string[]
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    issues.push(`${name} must be an integer >= ${min}, got "${raw}"`);
    return fallback;
  }
  return value;
}

/**
 * Load and validate environment configuration
 * @throws InvalidConfigurationError if a variable is set to an invalid value
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const issues: string[] = [];

  const timeoutMs = parseInteger(env, 'FETCH_TIMEOUT_MS', 10000, 1, issues);
  const retries = parseInteger(env, 'FETCH_RETRIES', 2, 0, issues);
  const concurrencyLimit = parseInteger(env, 'CONCURRENCY_LIMIT', 4, 1, issues);

  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(level)) {
    issues.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${env.LOG_LEVEL}"`);
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  return {
    fetch: {
      timeoutMs,
      retries,
      userAgent: env.USER_AGENT || DEFAULT_USER_AGENT
    },
    crawl: {
      concurrencyLimit
    },
    logging: {
      level: isLogLevel(level) ? level : 'info'
    }
  };
}
