import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ArtifactKind,
  MemoRequest,
  Outline,
  PeerValuationEvidence,
  SectionMap,
  SituationType,
  StoredArtifact,
  ValuationMode,
} from '@special-sits/shared/types';
import {
  COMPLETION_CLIENT,
  CompletionClient,
  PromptAssembler,
  TextSectionSplitter,
  getOutline,
  normalizeMarkdown,
} from '@special-sits/memo/core';
import {
  ArtifactStore,
  MemoDocumentRenderer,
  TextExtractionService,
  memoFileName,
} from '@special-sits/memo/documents';
import { PeerValuationService } from '@special-sits/memo/valuation';
import { MemoSessionContext } from '@special-sits/memo/session';

export interface GeneratedMemo {
  companyName: string;
  situationType: SituationType;
  sections: SectionMap;
  artifact: StoredArtifact;
  buffer: Buffer;
}

/**
 * Filings in, rendered memo out:
 * extract -> (enrich) -> prompt -> complete -> normalize -> split -> render -> store
 */
@Injectable()
export class MemoGenerationService {
  private readonly logger = new Logger(MemoGenerationService.name);

  constructor(
    @Inject(COMPLETION_CLIENT) private readonly completionClient: CompletionClient,
    private readonly extraction: TextExtractionService,
    private readonly assembler: PromptAssembler,
    private readonly splitter: TextSectionSplitter,
    private readonly renderer: MemoDocumentRenderer,
    private readonly artifacts: ArtifactStore,
    private readonly peerValuation: PeerValuationService
  ) {}

  async generate(context: MemoSessionContext, request: MemoRequest): Promise<GeneratedMemo> {
    const tag = `[${context.sessionId}]`;
    // Unknown situation types fail here, before any file is read or service called
    const outline = getOutline(request.situationType);
    const companyName = request.companyName.trim();

    this.logger.log(`${tag} Generating ${outline.situationType} memo for ${companyName} from ${request.documents.length} files`);

    const extracted = await this.extraction.extractAll(request.documents);
    const failed = extracted.filter((text) => text.failed);
    if (failed.length > 0) {
      this.logger.warn(`${tag} ${failed.length} file(s) could not be read: ${failed.map((text) => text.fileName).join(', ')}`);
    }

    const marketEvidence = await this.enrich(tag, outline, request);

    const prompt = this.assembler.assemble({
      companyName,
      situationType: outline.situationType,
      combinedText: this.extraction.combine(extracted),
      valuationMode: request.valuationMode,
      peers: request.peers,
      marketEvidence,
    });

    const completion = await this.completionClient.complete(prompt);
    const sections = this.splitter.extract(normalizeMarkdown(completion), outline);
    this.logger.log(`${tag} Memo split into ${Object.keys(sections).length} sections`);

    const buffer = await this.renderer.renderToBuffer(sections, companyName, outline.situationType);
    const artifact = await this.artifacts.save(
      ArtifactKind.MEMO,
      memoFileName(companyName, outline.situationType),
      buffer
    );

    return { companyName, situationType: outline.situationType, sections, artifact, buffer };
  }

  /**
   * Market-data evidence for user-supplied peers; only when asked for and
   * only for outlines that carry a valuation section.
   */
  private async enrich(
    tag: string,
    outline: Outline,
    request: MemoRequest
  ): Promise<PeerValuationEvidence | undefined> {
    if (
      !request.enrichWithMarketData ||
      !outline.requiresValuation ||
      request.valuationMode !== ValuationMode.USER_PEERS ||
      !request.peers
    ) {
      return undefined;
    }

    const evidence = await this.peerValuation.evaluate({
      companyName: request.companyName.trim(),
      targetTicker: request.targetTicker,
      parentPeers: request.peers.parentPeers,
      spincoPeers: request.peers.spincoPeers,
    });
    this.logger.log(
      `${tag} Market data: ParentCo avg ${evidence.parent.averageMultiple ?? 'N/A'}, SpinCo avg ${evidence.spinco.averageMultiple ?? 'N/A'}`
    );
    return evidence;
  }
}
