import { Injectable, Logger } from '@nestjs/common';
import {
  CompanyFundamentals,
  ImpliedValuation,
  PeerGroupValuation,
  PeerMultiple,
  PeerValuationEvidence,
} from '@special-sits/shared/types';
import { MarketDataService } from './market-data.service';

export interface PeerValuationRequest {
  /** Looked up as the target when no ticker is given */
  companyName?: string;
  targetTicker?: string;
  parentPeers: string[];
  spincoPeers: string[];
}

/**
 * Arithmetic mean of the usable multiples; unresolved (null), zero and
 * negative entries are left out. Null when nothing is usable.
 */
export function averageMultiples(multiples: Array<number | null>): number | null {
  const usable = multiples.filter(
    (multiple): multiple is number => multiple !== null && Number.isFinite(multiple) && multiple > 0
  );
  if (usable.length === 0) return null;
  return usable.reduce((sum, multiple) => sum + multiple, 0) / usable.length;
}

export function computeImpliedValuation(
  averageMultiple: number | null,
  fundamentals: CompanyFundamentals
): ImpliedValuation {
  const enterpriseValue = (averageMultiple ?? 0) * fundamentals.ebitda;
  const netDebt = fundamentals.totalDebt - fundamentals.cashAndEquivalents;
  const equityValue = enterpriseValue - netDebt;
  const upsidePercent =
    fundamentals.marketCap > 0 ? (equityValue / fundamentals.marketCap - 1) * 100 : null;

  return {
    ticker: fundamentals.ticker,
    averageMultiple,
    ebitda: fundamentals.ebitda,
    netDebt,
    enterpriseValue,
    equityValue,
    marketCap: fundamentals.marketCap,
    upsidePercent,
  };
}

@Injectable()
export class PeerValuationService {
  private readonly logger = new Logger(PeerValuationService.name);

  constructor(private readonly marketData: MarketDataService) {}

  /**
   * Resolves each peer to a ticker and its EV/EBITDA. Peers are looked up
   * concurrently; one peer's failure only removes that peer from the average.
   */
  async evaluatePeers(names: string[]): Promise<PeerGroupValuation> {
    const peers = await Promise.all(names.map((name) => this.evaluatePeer(name)));
    const averageMultiple = averageMultiples(peers.map((peer) => peer.multiple));

    const resolved = peers.filter((peer) => peer.multiple !== null).length;
    this.logger.log(`Resolved ${resolved}/${peers.length} peer multiples`);

    return { peers, averageMultiple };
  }

  async evaluate(request: PeerValuationRequest): Promise<PeerValuationEvidence> {
    const [parent, spinco] = await Promise.all([
      this.evaluatePeers(request.parentPeers),
      this.evaluatePeers(request.spincoPeers),
    ]);

    const targetTicker = await this.resolveTarget(request);
    if (!targetTicker) {
      return { parent, spinco };
    }

    const fundamentals = await this.marketData.getFundamentals(targetTicker);
    return { parent, spinco, target: computeImpliedValuation(parent.averageMultiple, fundamentals) };
  }

  private async resolveTarget(request: PeerValuationRequest): Promise<string> {
    const explicit = request.targetTicker?.trim();
    if (explicit) {
      return explicit;
    }

    const companyName = request.companyName?.trim();
    if (!companyName) {
      return '';
    }

    const ticker = await this.marketData.resolveTicker(companyName);
    if (!ticker) {
      this.logger.warn(`No ticker found for ${companyName}; skipping target valuation`);
    }
    return ticker;
  }

  private async evaluatePeer(name: string): Promise<PeerMultiple> {
    const ticker = await this.marketData.resolveTicker(name);
    if (!ticker) {
      return { name, ticker: '', multiple: null };
    }

    const multiple = await this.marketData.getEvToEbitda(ticker);
    return { name, ticker, multiple: multiple > 0 ? multiple : null };
  }
}
