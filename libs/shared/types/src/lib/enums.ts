/**
 * Shared enums and constants used across the memo pipeline.
 * Registry, prompts, pipelines and the API all reference these.
 */

// ============================================================================
// Situation Types
// ============================================================================

/**
 * Corporate event a memo addresses. Values double as display labels and are
 * what API clients send.
 */
export enum SituationType {
  SPIN_OFF = 'Spin-Off or Split-Up',
  MERGERS_ACQUISITIONS = 'Mergers & Acquisitions',
  RESTRUCTURING = 'Bankruptcy / Distressed / Restructuring',
  ACTIVIST_CAMPAIGN = 'Activist Campaign',
  REGULATORY_CATALYST = 'Regulatory or Legal Catalyst',
  ASSET_SALE = 'Asset Sales or Carve-Outs',
  CAPITAL_RAISE = 'Capital Raising or Buyback Catalyst',
}

// ============================================================================
// Valuation Modes
// ============================================================================

export enum ValuationMode {
  /** User supplies peer identifiers for ParentCo and SpinCo */
  USER_PEERS = 'user_peers',
  /** Model proposes 3-5 peers per side */
  AI_PEERS = 'ai_peers',
}

// ============================================================================
// Source Documents
// ============================================================================

export enum SourceDocumentKind {
  PDF = 'pdf',
  DOCX = 'docx',
  UNSUPPORTED = 'unsupported',
}

// ============================================================================
// Artifacts
// ============================================================================

export enum ArtifactKind {
  MEMO = 'memo',
  INFOGRAPHIC = 'infographic',
}

export const ArtifactContentType: Record<ArtifactKind, string> = {
  [ArtifactKind.MEMO]:
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  [ArtifactKind.INFOGRAPHIC]: 'text/html; charset=utf-8',
};

// ============================================================================
// Pipeline Constants
// ============================================================================

export const DEFAULT_COMPLETION_MODEL = 'deepseek-chat';
export const DEFAULT_COMPLETION_TEMPERATURE = 0.3;
export const DEFAULT_SOURCE_CHAR_LIMIT = 7000;

/** Key used when no outline heading could be matched in a memo */
export const FALLBACK_SECTION_KEY = 'Memo';

export const TimeConstants = {
  SESSION_TTL: 60 * 60 * 1000, // 1 hour
  SESSION_CLEANUP_INTERVAL: 5 * 60 * 1000, // 5 minutes
} as const;

export const SESSION_ID_HEADER = 'x-session-id';

export const isSituationType = (value: unknown): value is SituationType =>
  Object.values(SituationType).some((situationType) => situationType === value);
