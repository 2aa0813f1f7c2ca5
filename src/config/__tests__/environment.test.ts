/**
 * Tests for environment configuration loading
 */

import { DEFAULT_USER_AGENT, loadEnvironmentConfig } from '../environment';
import { InvalidConfigurationError } from '../../utils/errors';
import { catchError } from '../../__tests__/fixtures';

describe('loadEnvironmentConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadEnvironmentConfig({})).toEqual({
      fetch: { timeoutMs: 10000, retries: 2, userAgent: DEFAULT_USER_AGENT },
      crawl: { concurrencyLimit: 4 },
      logging: { level: 'info' }
    });
  });

  it('reads every variable', () => {
    const config = loadEnvironmentConfig({
      FETCH_TIMEOUT_MS: '2500',
      FETCH_RETRIES: '0',
      USER_AGENT: 'test-agent',
      CONCURRENCY_LIMIT: '8',
      LOG_LEVEL: 'WARN'
    });

    expect(config).toEqual({
      fetch: { timeoutMs: 2500, retries: 0, userAgent: 'test-agent' },
      crawl: { concurrencyLimit: 8 },
      logging: { level: 'warn' }
    });
  });

  it('reports every invalid variable at once', () => {
    const error = catchError(
      () => loadEnvironmentConfig({ FETCH_TIMEOUT_MS: '0', CONCURRENCY_LIMIT: 'two', LOG_LEVEL: 'loud' }),
      InvalidConfigurationError
    );

    expect(error.issues).toEqual([
      'FETCH_TIMEOUT_MS must be an integer >= 1, got "0"',
      'CONCURRENCY_LIMIT must be an integer >= 1, got "two"',
      'LOG_LEVEL must be one of debug, info, warn, error, got "loud"'
    ]);
  });
});
