import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { ArtifactContentType, ArtifactKind, StoredArtifact } from '@special-sits/shared/types';

/** Replaces characters that are unsafe in file names with `_` */
export const toSafeFileName = (name: string): string =>
  name.replace(/[^A-Za-z0-9._-]+/g, '_');

export const memoFileName = (companyName: string, situationType: string): string =>
  toSafeFileName(`${companyName}_${situationType}_Memo.docx`);

export const infographicFileName = (companyName: string): string =>
  toSafeFileName(`${companyName}_Infographic.html`);

/**
 * Writes generated artifacts to disk, one directory per artifact so that
 * equal file names from different sessions never collide.
 */
@Injectable()
export class ArtifactStore {
  private readonly logger = new Logger(ArtifactStore.name);
  readonly rootDir: string;

  constructor(config: ConfigService) {
    this.rootDir = resolve(config.get<string>('memo.artifactDir') ?? join(tmpdir(), 'special-sits-artifacts'));
  }

  async save(kind: ArtifactKind, fileName: string, content: Buffer): Promise<StoredArtifact> {
    const dir = join(this.rootDir, randomUUID());
    await mkdir(dir, { recursive: true });

    const path = join(dir, fileName);
    await writeFile(path, content);

    this.logger.log(`Stored ${kind} artifact ${fileName} (${content.length} bytes)`);

    return {
      kind,
      fileName,
      path,
      contentType: ArtifactContentType[kind],
      size: content.length,
      createdAt: new Date(),
    };
  }

  async read(artifact: StoredArtifact): Promise<Buffer> {
    return readFile(artifact.path);
  }

  /**
   * Deletes the artifact together with its directory. Paths that were not
   * written by this store are left untouched.
   */
  async remove(artifact: StoredArtifact): Promise<void> {
    const dir = dirname(resolve(artifact.path));
    if (dirname(dir) !== this.rootDir) {
      this.logger.warn(`Not removing ${artifact.path}: outside ${this.rootDir}`);
      return;
    }

    await rm(dir, { recursive: true, force: true });
    this.logger.debug(`Removed ${artifact.kind} artifact ${artifact.fileName}`);
  }
}
