/**
 * Memo Pipeline Types
 * Data structures shared by generation, rendering and re-extraction
 */

import { SituationType, SourceDocumentKind, ValuationMode, ArtifactKind } from './enums';

export interface OutlineEntry {
  /** Heading line as written in the template, e.g. "Buyback Analysis (if applicable)" */
  heading: string;
  /** Canonical title used for matching, e.g. "Buyback Analysis" */
  title: string;
  /** Sub-bullet descriptions; prompt hints only, never section boundaries */
  hints: string[];
}

export interface Outline {
  situationType: SituationType;
  entries: OutlineEntry[];
  titles: string[];
  requiresValuation: boolean;
  /** Heading + hint lines, as embedded in the generation prompt */
  structure: string;
}

/**
 * Canonical section title -> content. Paragraphs inside content are separated
 * by a blank line. Insertion order is the order sections were discovered.
 */
export type SectionMap = Record<string, string>;

export interface SourceDocument {
  fileName: string;
  content: Buffer;
}

export interface ExtractedText {
  fileName: string;
  kind: SourceDocumentKind;
  text: string;
  /** True when text is an inline error/unsupported marker */
  failed: boolean;
}

export interface PeerLists {
  parentPeers: string[];
  spincoPeers: string[];
}

export interface SectionSummary {
  title: string;
  bullets: string[];
  failed: boolean;
}

export interface StoredArtifact {
  kind: ArtifactKind;
  fileName: string;
  path: string;
  contentType: string;
  size: number;
  createdAt: Date;
}

export interface MemoRequest {
  companyName: string;
  situationType: string;
  documents: SourceDocument[];
  valuationMode?: ValuationMode;
  peers?: PeerLists;
  targetTicker?: string;
  enrichWithMarketData?: boolean;
}

export interface InfographicRequest {
  companyName?: string;
  situationType?: string;
  memo?: Buffer;
}
