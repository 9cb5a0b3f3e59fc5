import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_SOURCE_CHAR_LIMIT,
  Outline,
  PeerLists,
  PeerValuationEvidence,
  ValuationMode,
} from '@special-sits/shared/types';
import { getOutline } from '../outlines/outline-registry';
import {
  AI_PEERS_VALUATION_PROMPT,
  buildMemoIntro,
  buildSourceBlock,
  buildStructureBlock,
  buildUserPeersValuationPrompt,
} from './memo-prompts';
import { formatMarketEvidence } from './market-evidence';

export interface AssemblePromptParams {
  companyName: string;
  situationType: string;
  combinedText: string;
  valuationMode?: ValuationMode;
  peers?: PeerLists;
  /** Figures resolved through the market-data enrichment path */
  marketEvidence?: PeerValuationEvidence;
}

/**
 * Prefix cut with no regard for sentence or page boundaries
 */
export function truncateSource(text: string, limit: number): string {
  return text.slice(0, Math.max(0, limit));
}

/**
 * "ACME, Foo Corp ,, BAR" -> ["ACME", "Foo Corp", "BAR"]
 */
export function parsePeerList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((peer) => peer.trim())
    .filter((peer) => peer.length > 0);
}

@Injectable()
export class PromptAssembler {
  private readonly logger = new Logger(PromptAssembler.name);
  private readonly sourceCharLimit: number;

  constructor(config: ConfigService) {
    this.sourceCharLimit =
      config.get<number>('memo.sourceCharLimit') ?? DEFAULT_SOURCE_CHAR_LIMIT;
  }

  assemble(params: AssemblePromptParams): string {
    const outline = getOutline(params.situationType);
    const source = truncateSource(params.combinedText, this.sourceCharLimit);

    if (source.length < params.combinedText.length) {
      this.logger.debug(
        `Source text for ${params.companyName} truncated from ${params.combinedText.length} to ${source.length} chars`
      );
    }

    const valuationSection = this.buildValuationSection(outline, params);

    const prompt = [
      buildMemoIntro(params.companyName, outline.situationType),
      buildSourceBlock(source),
      valuationSection,
      buildStructureBlock(outline.structure),
    ]
      .filter((block) => block.length > 0)
      .join('\n\n');

    this.logger.log(
      `Built ${outline.situationType} prompt for ${params.companyName}: ${prompt.length} chars` +
        (valuationSection ? ` (valuation: ${params.valuationMode})` : '')
    );

    return prompt;
  }

  private buildValuationSection(outline: Outline, params: AssemblePromptParams): string {
    if (!outline.requiresValuation || !params.valuationMode) {
      return '';
    }

    switch (params.valuationMode) {
      case ValuationMode.USER_PEERS: {
        const peers = params.peers ?? { parentPeers: [], spincoPeers: [] };
        const prompt = buildUserPeersValuationPrompt(peers.parentPeers, peers.spincoPeers);
        return params.marketEvidence
          ? `${prompt}\n\n${formatMarketEvidence(params.marketEvidence)}`
          : prompt;
      }
      case ValuationMode.AI_PEERS:
        return AI_PEERS_VALUATION_PROMPT;
    }
  }
}
