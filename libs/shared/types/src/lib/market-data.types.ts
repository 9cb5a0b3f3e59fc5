/**
 * Market Data Types
 * Structures for the peer-multiple valuation enrichment path
 */

export interface CompanyFundamentals {
  ticker: string;
  marketCap: number;
  totalDebt: number;
  cashAndEquivalents: number;
  ebitda: number;
}

export interface PeerMultiple {
  name: string;
  /** Empty when the name could not be resolved */
  ticker: string;
  /** EV/EBITDA; null when unresolved or zero */
  multiple: number | null;
}

export interface PeerGroupValuation {
  peers: PeerMultiple[];
  averageMultiple: number | null;
}

export interface ImpliedValuation {
  ticker: string;
  averageMultiple: number | null;
  ebitda: number;
  netDebt: number;
  enterpriseValue: number;
  equityValue: number;
  marketCap: number;
  /** null when market cap is zero or unavailable */
  upsidePercent: number | null;
}

export interface PeerValuationEvidence {
  parent: PeerGroupValuation;
  spinco: PeerGroupValuation;
  target?: ImpliedValuation;
}
