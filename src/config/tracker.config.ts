import { Env } from './env';

export const TRACKER_CONFIG = Symbol('TRACKER_CONFIG');

export interface TrackerConfig {
  marketplace: {
    name: string;
    searchUrl: string;
    queryParam: string;
    extraParams: Record<string, string>;
  };
  http: {
    timeoutMs: number;
    headers: Record<string, string>;
  };
  tracking: {
    defaultResultLimit: number;
    delayMinMs: number;
    delayMaxMs: number;
    intervalMinutes: number;
  };
  files: {
    productsFile: string;
    historyFile: string;
    chartFile: string;
  };
}

export const trackerConfig: TrackerConfig = {
  marketplace: {
    name: 'eBay',
    searchUrl: 'https://www.ebay.com/sch/i.html',
    queryParam: '_nkw',
    extraParams: { _sop: '15' }, // lowest price + shipping first
  },
  http: {
    timeoutMs: 15000,
    headers: {
      'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'Cache-Control': 'no-cache',
    },
  },
  tracking: {
    defaultResultLimit: 1,
    delayMinMs: 5000,
    delayMaxMs: 15000,
    intervalMinutes: 60,
  },
  files: {
    productsFile: 'products.csv',
    historyFile: 'historical_products.csv',
    chartFile: 'price-history.svg',
  },
};

/**
 * Applies environment overrides on top of the static defaults.
 */
export function buildTrackerConfig(env: Env, base: TrackerConfig = trackerConfig): TrackerConfig {
  return {
    ...base,
    marketplace: {
      ...base.marketplace,
      searchUrl: env.MARKETPLACE_SEARCH_URL ?? base.marketplace.searchUrl,
    },
    http: {
      ...base.http,
      timeoutMs: env.REQUEST_TIMEOUT_MS ?? base.http.timeoutMs,
    },
  };
}
