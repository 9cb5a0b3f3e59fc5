import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { CompanyFundamentals } from '@special-sits/shared/types';
import { MarketDataProvider } from './market-data-provider.interface';

export const FMP_API_URL = 'https://financialmodelingprep.com/api/v3';

export interface FMPOptions {
  apiKey: string;
  baseURL?: string;
  /** Custom transport; defaults to axios' own */
  adapter?: AxiosAdapter;
}

interface SearchResult {
  symbol: string;
  name?: string;
}

interface KeyMetricsTTM {
  enterpriseValueOverEBITDATTM?: number | null;
}

interface ProfileEntry {
  mktCap?: number | null;
}

interface BalanceSheetEntry {
  totalDebt?: number | null;
  cashAndCashEquivalents?: number | null;
}

interface IncomeStatementEntry {
  ebitda?: number | null;
}

const toNumber = (value: number | null | undefined): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0;

export class FMPAdapter implements MarketDataProvider {
  private client: AxiosInstance;

  constructor(options: FMPOptions) {
    if (!options.apiKey) {
      throw new Error('FMP API key is required');
    }

    const apiKey = options.apiKey;

    this.client = axios.create({
      baseURL: options.baseURL ?? FMP_API_URL,
      timeout: 30000,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    this.client.interceptors.request.use((config) => {
      config.params = {
        ...config.params,
        apikey: apiKey,
      };
      return config;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error) && error.response) {
          const { status } = error.response;
          if (status === 429) {
            throw new Error('Rate limit exceeded. Please try again later.');
          } else if (status === 401) {
            throw new Error('Invalid API key. Please check your FMP_API_KEY environment variable.');
          } else if (status === 403) {
            throw new Error('Access forbidden. Your FMP API key may be invalid, expired, or over its plan limits.');
          } else if (status === 404) {
            throw new Error('Data not found for the requested ticker');
          }
          throw new Error(`API error: ${status}`);
        }
        throw error;
      }
    );
  }

  async searchTicker(query: string): Promise<string | null> {
    const trimmed = query.trim();
    if (!trimmed) return null;

    const response = await this.client.get<SearchResult[]>('/search', {
      params: { query: trimmed, limit: 1 },
    });

    return response.data?.[0]?.symbol ?? null;
  }

  async getEvToEbitda(ticker: string): Promise<number | null> {
    const response = await this.client.get<KeyMetricsTTM[]>(`/key-metrics-ttm/${ticker.toUpperCase()}`);
    const multiple = response.data?.[0]?.enterpriseValueOverEBITDATTM;

    return typeof multiple === 'number' && Number.isFinite(multiple) ? multiple : null;
  }

  async getFundamentals(ticker: string): Promise<CompanyFundamentals> {
    const symbol = ticker.toUpperCase();

    const [profile, balanceSheets, incomeStatements] = await Promise.all([
      this.client.get<ProfileEntry[]>(`/profile/${symbol}`),
      this.client.get<BalanceSheetEntry[]>(`/balance-sheet-statement/${symbol}`, {
        params: { limit: 1, period: 'annual' },
      }),
      this.client.get<IncomeStatementEntry[]>(`/income-statement/${symbol}`, {
        params: { limit: 1, period: 'annual' },
      }),
    ]);

    const balanceSheet = balanceSheets.data?.[0];

    return {
      ticker: symbol,
      marketCap: toNumber(profile.data?.[0]?.mktCap),
      totalDebt: toNumber(balanceSheet?.totalDebt),
      cashAndEquivalents: toNumber(balanceSheet?.cashAndCashEquivalents),
      ebitda: toNumber(incomeStatements.data?.[0]?.ebitda),
    };
  }
}
