import { ConfigError } from '../common/errors';
import { loadEnv, logLevelsFor } from './env';
import { buildTrackerConfig, trackerConfig } from './tracker.config';

describe('loadEnv', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadEnv({})).toEqual({ LOG_LEVEL: 'log' });
  });

  it('coerces the request timeout', () => {
    expect(loadEnv({ REQUEST_TIMEOUT_MS: '2500' }).REQUEST_TIMEOUT_MS).toBe(2500);
  });

  it('rejects malformed values', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadEnv({ MARKETPLACE_SEARCH_URL: 'not a url' })).toThrow(
      /MARKETPLACE_SEARCH_URL/,
    );
  });
});

describe('logLevelsFor', () => {
  it('includes every level up to the threshold', () => {
    expect(logLevelsFor('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(logLevelsFor('verbose')).toHaveLength(6);
  });
});

describe('buildTrackerConfig', () => {
  it('overrides the search url and timeout from the environment', () => {
    const config = buildTrackerConfig({
      LOG_LEVEL: 'log',
      MARKETPLACE_SEARCH_URL: 'https://www.ebay.co.uk/sch/i.html',
      REQUEST_TIMEOUT_MS: 3000,
    });

    expect(config.marketplace.searchUrl).toBe('https://www.ebay.co.uk/sch/i.html');
    expect(config.http.timeoutMs).toBe(3000);
    expect(config.tracking).toEqual(trackerConfig.tracking);
  });
});
