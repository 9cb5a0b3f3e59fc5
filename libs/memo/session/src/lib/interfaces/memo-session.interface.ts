/**
 * Memo session context
 * What one user's memo step leaves behind for the infographic step
 */

import { SituationType, StoredArtifact } from '@special-sits/shared/types';

export interface MemoSessionContext {
  sessionId: string;

  // Set by the last successful memo generation
  companyName?: string;
  situationType?: SituationType;
  memoArtifact?: StoredArtifact;

  // Set by the last successful infographic generation
  infographicArtifact?: StoredArtifact;

  // Timestamps
  createdAt: Date;
  lastActivity: Date;
  expiresAt: Date;
}

export interface RecordedMemo {
  companyName: string;
  situationType: SituationType;
  artifact: StoredArtifact;
}
