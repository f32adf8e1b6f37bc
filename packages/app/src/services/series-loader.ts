/**
 * Daily series loading through an optional cache
 */

import type { DailyBarsProvider, PriceSeries } from '@riskband/contracts';
import type { Logger } from '@riskband/logger';
import type { CacheService } from './cache/types.js';

export interface SeriesLoaderConfig {
  provider: DailyBarsProvider;
  logger: Logger;
  cache?: CacheService<PriceSeries>;
  /** Cache lifetime in milliseconds, defaults to the cache's own */
  ttl?: number;
}

/**
 * Loads daily history per ticker, memoizing by ticker and lookback.
 */
export class SeriesLoader {
  private readonly provider: DailyBarsProvider;
  private readonly logger: Logger;
  private readonly cache: CacheService<PriceSeries> | undefined;
  private readonly ttl: number | undefined;

  constructor(config: SeriesLoaderConfig) {
    this.provider = config.provider;
    this.logger = config.logger;
    this.cache = config.cache;
    this.ttl = config.ttl;
  }

  static cacheKey(symbol: string, years: number): string {
    return `bars:${symbol}:${years}y`;
  }

  async load(symbol: string, years: number): Promise<PriceSeries> {
    const key = SeriesLoader.cacheKey(symbol, years);

    if (this.cache) {
      const cached = await this.cache.get(key);
      if (cached) {
        this.logger.debug('Cache hit for daily series', { ticker: symbol, years, bars: cached.length });
        return cached;
      }
    }

    const series = await this.provider.getDailyBars({ symbol, years });

    if (this.cache) {
      await this.cache.set(key, series, this.ttl);
    }

    return series;
  }
}
