import NodeCache = require('node-cache');
import { Logger } from '@nestjs/common';

interface CacheConfig {
  stdTTL: number;
  checkperiod: number;
  useClones: boolean;
  maxKeys: number;
}

export type MarketDataKind = 'ticker' | 'multiple' | 'fundamentals';

export class CacheManager {
  private readonly logger = new Logger(CacheManager.name);
  private readonly cache: NodeCache;
  private readonly defaultTTL: number;
  private readonly ttls: Record<MarketDataKind, number> = {
    ticker: 86400,
    multiple: 3600,
    fundamentals: 3600,
  };

  constructor(config?: Partial<CacheConfig>) {
    this.defaultTTL = config?.stdTTL || 300;

    this.cache = new NodeCache({
      stdTTL: this.defaultTTL,
      checkperiod: config?.checkperiod ?? 60,
      useClones: config?.useClones ?? true,
      maxKeys: config?.maxKeys || 1000,
    });
  }

  /**
   * Identifiers are upper-cased so "acme corp" and "ACME Corp" share an entry
   */
  generateKey(identifier: string, kind: MarketDataKind): string {
    return `${kind}:${identifier.trim().toUpperCase()}`;
  }

  get<T>(key: string): T | null {
    const value = this.cache.get<T>(key);
    if (value === undefined) {
      return null;
    }
    this.logger.debug(`Cache hit for key: ${key}`);
    return value;
  }

  set<T>(key: string, value: T, kind?: MarketDataKind): boolean {
    const ttl = kind ? this.ttls[kind] : this.defaultTTL;
    try {
      return this.cache.set(key, value, ttl);
    } catch (error) {
      // node-cache throws once maxKeys is reached
      this.logger.warn(
        `Could not cache ${key}: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }

  close(): void {
    this.cache.close();
  }

  getStats() {
    const stats = this.cache.getStats();
    return {
      keys: stats.keys,
      hits: stats.hits,
      misses: stats.misses,
      hitRate: stats.hits / (stats.hits + stats.misses) || 0,
    };
  }
}
