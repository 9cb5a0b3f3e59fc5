import {
  ImpliedValuation,
  PeerGroupValuation,
  PeerValuationEvidence,
} from '@special-sits/shared/types';
import { MARKET_DATA_REFERENCE_HEADER } from './memo-prompts';

const NOT_AVAILABLE = 'N/A';

export function formatMultiple(multiple: number | null): string {
  return multiple === null ? NOT_AVAILABLE : `${multiple.toFixed(1)}x`;
}

export function formatUpside(upsidePercent: number | null): string {
  if (upsidePercent === null) return NOT_AVAILABLE;
  const sign = upsidePercent >= 0 ? '+' : '';
  return `${sign}${upsidePercent.toFixed(1)}%`;
}

/** Compact currency: 1_250_000_000 -> "$1.25B" */
export function formatAmount(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';
  if (abs >= 1e12) return `${sign}$${(abs / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${sign}$${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}$${(abs / 1e6).toFixed(2)}M`;
  return `${sign}$${abs.toFixed(0)}`;
}

function formatGroup(label: string, group: PeerGroupValuation): string[] {
  const lines = [`${label} peers (EV/EBITDA):`];
  for (const peer of group.peers) {
    const ticker = peer.ticker || 'unresolved';
    lines.push(`  - ${peer.name} (${ticker}): ${formatMultiple(peer.multiple)}`);
  }
  lines.push(`  Average: ${formatMultiple(group.averageMultiple)}`);
  return lines;
}

function formatTarget(target: ImpliedValuation): string[] {
  return [
    `Implied valuation for ${target.ticker} at the ParentCo peer average:`,
    `  - LTM EBITDA: ${formatAmount(target.ebitda)}`,
    `  - Net debt: ${formatAmount(target.netDebt)}`,
    `  - Implied enterprise value: ${formatAmount(target.enterpriseValue)}`,
    `  - Implied equity value: ${formatAmount(target.equityValue)}`,
    `  - Current market cap: ${target.marketCap > 0 ? formatAmount(target.marketCap) : NOT_AVAILABLE}`,
    `  - Implied upside: ${formatUpside(target.upsidePercent)}`,
  ];
}

export function formatMarketEvidence(evidence: PeerValuationEvidence): string {
  const lines = [
    MARKET_DATA_REFERENCE_HEADER,
    ...formatGroup('ParentCo', evidence.parent),
    ...formatGroup('SpinCo', evidence.spinco),
  ];
  if (evidence.target) {
    lines.push(...formatTarget(evidence.target));
  }
  return lines.join('\n');
}
