import { ArtifactContentType, ArtifactKind, StoredArtifact } from '@special-sits/shared/types';
import { MemoSessionContext } from '@special-sits/memo/session';

export const sessionContext = (overrides: Partial<MemoSessionContext> = {}): MemoSessionContext => ({
  sessionId: 'session-1',
  createdAt: new Date('2025-03-01T09:00:00Z'),
  lastActivity: new Date('2025-03-01T09:00:00Z'),
  expiresAt: new Date('2025-03-01T10:00:00Z'),
  ...overrides,
});

/** In-memory ArtifactStore stand-in */
export const fakeArtifactStore = () => ({
  save: jest.fn(
    async (kind: ArtifactKind, fileName: string, content: Buffer): Promise<StoredArtifact> => ({
      kind,
      fileName,
      path: `/artifacts/${fileName}`,
      contentType: ArtifactContentType[kind],
      size: content.length,
      createdAt: new Date(),
    })
  ),
  read: jest.fn<Promise<Buffer>, [StoredArtifact]>(),
});
