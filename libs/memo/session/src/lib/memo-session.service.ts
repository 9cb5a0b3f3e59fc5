/**
 * MemoSessionService
 * Keeps per-session memo context between the memo and infographic steps
 */

import { Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { randomUUID } from 'node:crypto';
import { StoredArtifact, TimeConstants } from '@special-sits/shared/types';
import { ArtifactStore } from '@special-sits/memo/documents';
import { MemoSessionContext, RecordedMemo } from './interfaces/memo-session.interface';

@Injectable()
export class MemoSessionService {
  private readonly logger = new Logger(MemoSessionService.name);
  private readonly sessions = new Map<string, MemoSessionContext>();
  // Artifacts a session no longer points at, deleted when it expires
  private readonly retired = new Map<string, StoredArtifact[]>();

  constructor(private readonly artifacts: ArtifactStore) {}

  /**
   * Returns the live session for `sessionId`, or starts a new one (under the
   * given id when there is one). Every call extends the session's expiry.
   */
  getOrCreate(sessionId?: string): MemoSessionContext {
    const existing = sessionId ? this.get(sessionId) : null;
    if (existing) {
      return this.touch(existing);
    }

    const stale = sessionId ? this.sessions.get(sessionId) : undefined;
    if (stale) {
      this.retire(stale.sessionId, stale.memoArtifact, stale.infographicArtifact);
    }

    const now = new Date();
    const session: MemoSessionContext = {
      sessionId: sessionId || randomUUID(),
      createdAt: now,
      lastActivity: now,
      expiresAt: new Date(now.getTime() + TimeConstants.SESSION_TTL),
    };

    this.sessions.set(session.sessionId, session);
    this.logger.log(`Created session ${session.sessionId}`);
    return session;
  }

  /**
   * Get a session that has not expired
   */
  get(sessionId: string): MemoSessionContext | null {
    const session = this.sessions.get(sessionId);
    if (!session || session.expiresAt <= new Date()) {
      return null;
    }
    return session;
  }

  recordMemo(sessionId: string, memo: RecordedMemo): MemoSessionContext {
    const session = this.require(sessionId);
    this.retire(sessionId, session.memoArtifact, session.infographicArtifact);

    session.companyName = memo.companyName;
    session.situationType = memo.situationType;
    session.memoArtifact = memo.artifact;
    // A new memo supersedes the infographic built from the previous one
    session.infographicArtifact = undefined;

    this.logger.log(`[${sessionId}] Recorded memo ${memo.artifact.fileName}`);
    return this.touch(session);
  }

  recordInfographic(sessionId: string, artifact: StoredArtifact): MemoSessionContext {
    const session = this.require(sessionId);
    this.retire(sessionId, session.infographicArtifact);

    session.infographicArtifact = artifact;

    this.logger.log(`[${sessionId}] Recorded infographic ${artifact.fileName}`);
    return this.touch(session);
  }

  /**
   * Drop sessions whose expiry has passed, together with their artifacts
   */
  @Interval(TimeConstants.SESSION_CLEANUP_INTERVAL)
  async cleanupExpiredSessions(): Promise<void> {
    const now = new Date();
    const expired: StoredArtifact[] = [];
    let cleaned = 0;

    for (const [sessionId, session] of this.sessions.entries()) {
      if (session.expiresAt <= now) {
        this.sessions.delete(sessionId);
        expired.push(...this.takeArtifacts(session));
        cleaned++;
      }
    }

    await Promise.all(expired.map((artifact) => this.removeArtifact(artifact)));

    if (cleaned > 0) {
      this.logger.log(`Cleaned up ${cleaned} expired sessions and ${expired.length} artifacts`);
    }
  }

  private require(sessionId: string): MemoSessionContext {
    const session = this.get(sessionId);
    if (!session) {
      throw new Error(`No active session ${sessionId}`);
    }
    return session;
  }

  private retire(sessionId: string, ...artifacts: Array<StoredArtifact | undefined>): void {
    const superseded = artifacts.filter((artifact): artifact is StoredArtifact => artifact !== undefined);
    if (superseded.length === 0) {
      return;
    }
    this.retired.set(sessionId, [...(this.retired.get(sessionId) ?? []), ...superseded]);
  }

  private takeArtifacts(session: MemoSessionContext): StoredArtifact[] {
    const artifacts = this.retired.get(session.sessionId) ?? [];
    this.retired.delete(session.sessionId);
    if (session.memoArtifact) artifacts.push(session.memoArtifact);
    if (session.infographicArtifact) artifacts.push(session.infographicArtifact);
    return artifacts;
  }

  private async removeArtifact(artifact: StoredArtifact): Promise<void> {
    try {
      await this.artifacts.remove(artifact);
    } catch (error) {
      this.logger.warn(
        `Could not remove ${artifact.path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private touch(session: MemoSessionContext): MemoSessionContext {
    const now = new Date();
    session.lastActivity = now;
    session.expiresAt = new Date(now.getTime() + TimeConstants.SESSION_TTL);
    return session;
  }
}
