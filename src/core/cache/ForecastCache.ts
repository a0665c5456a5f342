import type { UnitSystem } from '../units/unitConverter.js';
import { ConfigError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export const DEFAULT_FORECAST_TTL_MS = 20 * 60 * 1000;
const COORDINATE_DECIMALS = 3;

export interface ForecastCacheOptions {
  ttlMs?: number;
  /** Millisecond clock; injectable so freshness can be tested without waiting. */
  now?: () => number;
}

interface CacheEntry<TBundle> {
  bundle: TBundle;
  fetchedAt: number;
}

function roundCoordinate(value: number): number {
  // `+ 0` turns a rounded -0 into 0.
  return Number(value.toFixed(COORDINATE_DECIMALS)) + 0;
}

/**
 * Time-boxed store of forecast bundles keyed by rounded coordinates and unit
 * system. Staleness is checked lazily on read; nothing is evicted in the
 * background. A failed fetch never writes, so an older entry stays in place
 * for the next attempt.
 */
export class ForecastCache<TBundle> {
  private readonly logger = createLogger({ service: 'ForecastCache' });
  private readonly entries = new Map<string, CacheEntry<TBundle>>();
  private readonly inFlight = new Map<string, Promise<TBundle | undefined>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ForecastCacheOptions = {}) {
    const ttlMs = options.ttlMs ?? DEFAULT_FORECAST_TTL_MS;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new ConfigError('ttlMs must be a positive number');
    }
    this.ttlMs = ttlMs;
    this.now = options.now ?? Date.now;
  }

  static keyFor(latitude: number, longitude: number, units: UnitSystem): string {
    return `${roundCoordinate(latitude)},${roundCoordinate(longitude)},${units}`;
  }

  /**
   * Returns the cached bundle while fresh, otherwise calls `fetch`. Resolves to
   * undefined when the fetch rejects or yields nothing. Concurrent misses for
   * one key share a single fetch.
   */
  async getOrFetch(
    latitude: number,
    longitude: number,
    units: UnitSystem,
    fetch: () => Promise<TBundle | undefined>
  ): Promise<TBundle | undefined> {
    const key = ForecastCache.keyFor(latitude, longitude, units);
    const logger = this.logger.child({ key });

    const fresh = this.getFresh(key);
    if (fresh !== undefined) {
      logger.debug('Forecast cache hit');
      return fresh;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug('Joining in-flight forecast fetch');
      return pending;
    }

    logger.debug('Forecast cache miss');
    const request = this.fetchAndStore(key, fetch).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  /** Stored entry regardless of age, with its fetch time. */
  peek(key: string): { bundle: TBundle; fetchedAt: number } | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  private getFresh(key: string): TBundle | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    return this.now() - entry.fetchedAt < this.ttlMs ? entry.bundle : undefined;
  }

  private async fetchAndStore(
    key: string,
    fetch: () => Promise<TBundle | undefined>
  ): Promise<TBundle | undefined> {
    let bundle: TBundle | undefined;
    try {
      bundle = await fetch();
    } catch (error) {
      this.logger.warn({ key, error }, 'Forecast fetch failed; cache left unchanged');
      return undefined;
    }

    if (bundle === undefined) {
      this.logger.warn({ key }, 'Forecast fetch returned no data; cache left unchanged');
      return undefined;
    }

    this.entries.set(key, { bundle, fetchedAt: this.now() });
    return bundle;
  }
}
