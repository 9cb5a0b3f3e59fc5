import {
  Body,
  Controller,
  Get,
  Headers,
  Logger,
  NotFoundException,
  Param,
  Post,
  Res,
  StreamableFile,
  UploadedFile,
  UploadedFiles,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor, FilesInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import {
  ArtifactKind,
  SESSION_ID_HEADER,
  SituationType,
  StoredArtifact,
  ValuationMode,
} from '@special-sits/shared/types';
import { InvalidMemoRequestError, listOutlines } from '@special-sits/memo/core';
import { InfographicGenerationService, MemoGenerationService } from '@special-sits/memo/pipeline';
import { MemoSessionContext, MemoSessionService } from '@special-sits/memo/session';
import {
  infographicRequestSchema,
  memoRequestSchema,
  parseRequest,
  sessionIdSchema,
} from './dto/memo-request.dto';
import { MemoErrorFilter } from './memo-error.filter';

export const MAX_UPLOAD_FILES = 20;

export interface SituationView {
  situationType: SituationType;
  titles: string[];
  requiresValuation: boolean;
}

export interface ArtifactView {
  kind: ArtifactKind;
  fileName: string;
  size: number;
  createdAt: string;
}

export interface SessionView {
  sessionId: string;
  companyName?: string;
  situationType?: SituationType;
  memo?: ArtifactView;
  infographic?: ArtifactView;
  expiresAt: string;
}

/** The only part of the response the controller touches itself */
type HeaderSink = Pick<Response, 'setHeader'>;

const toArtifactView = (artifact: StoredArtifact): ArtifactView => ({
  kind: artifact.kind,
  fileName: artifact.fileName,
  size: artifact.size,
  createdAt: artifact.createdAt.toISOString(),
});

/**
 * Memo Controller
 *
 * Two-step flow per session:
 * 1. POST /api/memo uploads filings and downloads the generated .docx memo
 * 2. POST /api/infographic turns that memo (re-uploaded, or the session's
 *    last one) into an HTML infographic
 *
 * The session id travels in the x-session-id header both ways. Session state
 * only changes after a step succeeds.
 */
@Controller('api')
@UseFilters(MemoErrorFilter)
export class MemoController {
  private readonly logger = new Logger(MemoController.name);

  constructor(
    private readonly memoGeneration: MemoGenerationService,
    private readonly infographicGeneration: InfographicGenerationService,
    private readonly sessions: MemoSessionService
  ) {}

  /**
   * Route: GET /api/situations
   */
  @Get('situations')
  listSituations(): SituationView[] {
    return listOutlines().map((outline) => ({
      situationType: outline.situationType,
      titles: outline.titles,
      requiresValuation: outline.requiresValuation,
    }));
  }

  /**
   * Route: POST /api/memo (multipart/form-data)
   *
   * Fields: files (1..20 PDF/DOCX), companyName, situationType,
   * valuationMode?, parentPeers?, spincoPeers? (comma-separated),
   * targetTicker?, enrichWithMarketData?
   */
  @Post('memo')
  @UseInterceptors(FilesInterceptor('files', MAX_UPLOAD_FILES))
  async generateMemo(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Body() body: unknown,
    @Headers(SESSION_ID_HEADER) sessionHeader: string | undefined,
    @Res({ passthrough: true }) res: HeaderSink
  ): Promise<StreamableFile> {
    const sessionId = parseRequest(sessionIdSchema, sessionHeader);
    const dto = parseRequest(memoRequestSchema, body);
    if (!files || files.length === 0) {
      throw new InvalidMemoRequestError('Upload at least one PDF or DOCX file');
    }

    const session = this.sessions.getOrCreate(sessionId);
    this.logger.log(`[${session.sessionId}] Memo requested for ${dto.companyName} (${files.length} files)`);

    const usesPeers = dto.valuationMode === ValuationMode.USER_PEERS;
    const memo = await this.memoGeneration.generate(session, {
      companyName: dto.companyName,
      situationType: dto.situationType,
      documents: files.map((file) => ({ fileName: file.originalname, content: file.buffer })),
      valuationMode: dto.valuationMode,
      peers: usesPeers ? { parentPeers: dto.parentPeers, spincoPeers: dto.spincoPeers } : undefined,
      targetTicker: dto.targetTicker,
      enrichWithMarketData: dto.enrichWithMarketData,
    });

    this.sessions.recordMemo(session.sessionId, {
      companyName: memo.companyName,
      situationType: memo.situationType,
      artifact: memo.artifact,
    });

    return this.download(res, session, memo.artifact, memo.buffer);
  }

  /**
   * Route: POST /api/infographic (multipart/form-data)
   *
   * Fields: memo? (.docx), companyName?, situationType?; anything left out
   * comes from the session's last memo.
   */
  @Post('infographic')
  @UseInterceptors(FileInterceptor('memo'))
  async generateInfographic(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: unknown,
    @Headers(SESSION_ID_HEADER) sessionHeader: string | undefined,
    @Res({ passthrough: true }) res: HeaderSink
  ): Promise<StreamableFile> {
    const sessionId = parseRequest(sessionIdSchema, sessionHeader);
    const dto = parseRequest(infographicRequestSchema, body);

    const session = this.sessions.getOrCreate(sessionId);
    this.logger.log(`[${session.sessionId}] Infographic requested (${file ? 'uploaded memo' : 'session memo'})`);

    const infographic = await this.infographicGeneration.generate(session, {
      companyName: dto.companyName,
      situationType: dto.situationType,
      memo: file?.buffer,
    });

    this.sessions.recordInfographic(session.sessionId, infographic.artifact);

    return this.download(res, session, infographic.artifact, Buffer.from(infographic.html, 'utf8'));
  }

  /**
   * Route: GET /api/sessions/:sessionId
   */
  @Get('sessions/:sessionId')
  getSession(@Param('sessionId') sessionId: string): SessionView {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundException(`Session ${sessionId} not found or expired`);
    }

    return {
      sessionId: session.sessionId,
      companyName: session.companyName,
      situationType: session.situationType,
      memo: session.memoArtifact && toArtifactView(session.memoArtifact),
      infographic: session.infographicArtifact && toArtifactView(session.infographicArtifact),
      expiresAt: session.expiresAt.toISOString(),
    };
  }

  private download(
    res: HeaderSink,
    session: MemoSessionContext,
    artifact: StoredArtifact,
    content: Buffer
  ): StreamableFile {
    res.setHeader(SESSION_ID_HEADER, session.sessionId);
    return new StreamableFile(content, {
      type: artifact.contentType,
      disposition: `attachment; filename="${artifact.fileName}"`,
      length: content.length,
    });
  }
}
