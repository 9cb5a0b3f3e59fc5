import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { CompanyFundamentals } from '@special-sits/shared/types';
import { CacheManager } from '@special-sits/shared/utils';
import { MARKET_DATA_PROVIDER, MarketDataProvider } from '@special-sits/memo/integrations';

const emptyFundamentals = (ticker: string): CompanyFundamentals => ({
  ticker,
  marketCap: 0,
  totalDebt: 0,
  cashAndEquivalents: 0,
  ebitda: 0,
});

/**
 * Fail-soft, cached market-data lookups. A failed lookup logs a warning and
 * yields a sentinel ('' or 0); sentinels are never cached.
 */
@Injectable()
export class MarketDataService implements OnModuleDestroy {
  private readonly logger = new Logger(MarketDataService.name);

  constructor(
    @Inject(MARKET_DATA_PROVIDER) private readonly provider: MarketDataProvider,
    private readonly cache: CacheManager
  ) {}

  onModuleDestroy() {
    this.cache.close();
  }

  async resolveTicker(name: string): Promise<string> {
    const query = name.trim();
    if (!query) return '';

    const key = this.cache.generateKey(query, 'ticker');
    const cached = this.cache.get<string>(key);
    if (cached !== null) return cached;

    try {
      const ticker = (await this.provider.searchTicker(query)) ?? '';
      if (ticker) {
        this.cache.set(key, ticker, 'ticker');
      } else {
        this.logger.warn(`No ticker found for "${query}"`);
      }
      return ticker;
    } catch (error) {
      this.logger.warn(`Ticker lookup failed for "${query}": ${this.describe(error)}`);
      return '';
    }
  }

  async getEvToEbitda(ticker: string): Promise<number> {
    if (!ticker.trim()) return 0;

    const key = this.cache.generateKey(ticker, 'multiple');
    const cached = this.cache.get<number>(key);
    if (cached !== null) return cached;

    try {
      const multiple = (await this.provider.getEvToEbitda(ticker.trim())) ?? 0;
      if (multiple > 0) {
        this.cache.set(key, multiple, 'multiple');
      }
      return multiple;
    } catch (error) {
      this.logger.warn(`EV/EBITDA lookup failed for ${ticker}: ${this.describe(error)}`);
      return 0;
    }
  }

  async getFundamentals(ticker: string): Promise<CompanyFundamentals> {
    const symbol = ticker.trim().toUpperCase();
    if (!symbol) return emptyFundamentals(symbol);

    const key = this.cache.generateKey(symbol, 'fundamentals');
    const cached = this.cache.get<CompanyFundamentals>(key);
    if (cached !== null) return cached;

    try {
      const fundamentals = await this.provider.getFundamentals(symbol);
      this.cache.set(key, fundamentals, 'fundamentals');
      return fundamentals;
    } catch (error) {
      this.logger.warn(`Fundamentals lookup failed for ${symbol}: ${this.describe(error)}`);
      return emptyFundamentals(symbol);
    }
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
