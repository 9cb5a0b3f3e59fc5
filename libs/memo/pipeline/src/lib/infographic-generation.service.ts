import { Injectable, Logger } from '@nestjs/common';
import {
  ArtifactKind,
  InfographicRequest,
  SectionSummary,
  SituationType,
  StoredArtifact,
} from '@special-sits/shared/types';
import {
  DocumentSectionExtractor,
  InvalidMemoRequestError,
  NoSectionsExtractedError,
  SectionSummarizerService,
  SummarizationFailure,
  getOutline,
} from '@special-sits/memo/core';
import {
  ArtifactStore,
  DocxParagraphReader,
  InfographicComposer,
  infographicFileName,
} from '@special-sits/memo/documents';
import { MemoSessionContext } from '@special-sits/memo/session';

export interface GeneratedInfographic {
  companyName: string;
  situationType: SituationType;
  summaries: SectionSummary[];
  html: string;
  artifact: StoredArtifact;
}

/**
 * Rendered memo in, HTML infographic out. Fields the request leaves out are
 * taken from the session's last memo.
 */
@Injectable()
export class InfographicGenerationService {
  private readonly logger = new Logger(InfographicGenerationService.name);

  constructor(
    private readonly reader: DocxParagraphReader,
    private readonly extractor: DocumentSectionExtractor,
    private readonly summarizer: SectionSummarizerService,
    private readonly composer: InfographicComposer,
    private readonly artifacts: ArtifactStore
  ) {}

  async generate(context: MemoSessionContext, request: InfographicRequest): Promise<GeneratedInfographic> {
    const tag = `[${context.sessionId}]`;

    const companyName = request.companyName?.trim() || context.companyName;
    if (!companyName) {
      throw new InvalidMemoRequestError('companyName is required when the session has no memo');
    }

    const situationType = request.situationType?.trim() || context.situationType;
    if (!situationType) {
      throw new InvalidMemoRequestError('situationType is required when the session has no memo');
    }
    const outline = getOutline(situationType);

    const memo = await this.loadMemo(context, request);
    const paragraphs = await this.reader.readParagraphs(memo).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidMemoRequestError(`Could not read the memo document: ${reason}`);
    });

    const sections = this.extractor.extract(paragraphs, outline);
    // A heading without content gets no card
    const filled = Object.entries(sections).filter(([, content]) => content.trim().length > 0);
    if (filled.length === 0) {
      throw new NoSectionsExtractedError(outline.situationType);
    }

    const skipped = Object.keys(sections).length - filled.length;
    this.logger.log(
      `${tag} Summarizing ${filled.length} sections for ${companyName}` +
        (skipped > 0 ? ` (${skipped} empty skipped)` : '')
    );

    // One section at a time; a failed section gets a placeholder card
    const summaries: SectionSummary[] = [];
    for (const [title, content] of filled) {
      summaries.push(await this.summarize(tag, title, content));
    }

    const html = this.composer.compose(companyName, summaries);
    const artifact = await this.artifacts.save(
      ArtifactKind.INFOGRAPHIC,
      infographicFileName(companyName),
      Buffer.from(html, 'utf8')
    );

    return { companyName, situationType: outline.situationType, summaries, html, artifact };
  }

  private async loadMemo(context: MemoSessionContext, request: InfographicRequest): Promise<Buffer> {
    if (request.memo && request.memo.length > 0) {
      return request.memo;
    }
    if (context.memoArtifact) {
      return this.artifacts.read(context.memoArtifact);
    }
    throw new InvalidMemoRequestError('Upload a memo document or generate one in this session first');
  }

  private async summarize(tag: string, title: string, content: string): Promise<SectionSummary> {
    try {
      const bullets = await this.summarizer.summarize(title, content);
      return { title, bullets, failed: false };
    } catch (error) {
      const reason =
        error instanceof SummarizationFailure
          ? error.reason
          : error instanceof Error
            ? error.message
            : String(error);
      this.logger.warn(`${tag} Could not summarize section: '${title}'`);
      return { title, bullets: [`Error generating summary: ${reason}`], failed: true };
    }
  }
}
