import { CompanyFundamentals } from '@special-sits/shared/types';

/**
 * Injection token for MarketDataProvider
 */
export const MARKET_DATA_PROVIDER = 'MARKET_DATA_PROVIDER';

/**
 * Raw market-data lookups. Implementations throw on transport or API
 * errors; fail-soft handling belongs to the caller.
 */
export interface MarketDataProvider {
  /** Best ticker match for a company name, or null when nothing matches */
  searchTicker(query: string): Promise<string | null>;
  /** Trailing EV/EBITDA, or null when the provider has no figure */
  getEvToEbitda(ticker: string): Promise<number | null>;
  getFundamentals(ticker: string): Promise<CompanyFundamentals>;
}
