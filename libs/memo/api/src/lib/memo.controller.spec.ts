import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException, StreamableFile } from '@nestjs/common';
import { Readable } from 'node:stream';
import {
  ArtifactContentType,
  ArtifactKind,
  SituationType,
  StoredArtifact,
  ValuationMode,
} from '@special-sits/shared/types';
import { CompletionServiceError, InvalidMemoRequestError } from '@special-sits/memo/core';
import { ArtifactStore } from '@special-sits/memo/documents';
import { InfographicGenerationService, MemoGenerationService } from '@special-sits/memo/pipeline';
import { MemoSessionService } from '@special-sits/memo/session';
import { MemoController } from './memo.controller';

const upload = (originalname: string, content: string): Express.Multer.File => ({
  fieldname: 'files',
  originalname,
  encoding: '7bit',
  mimetype: 'application/octet-stream',
  size: content.length,
  buffer: Buffer.from(content),
  stream: Readable.from([]),
  destination: '',
  filename: '',
  path: '',
});

const storedArtifact = (kind: ArtifactKind, fileName: string, size: number): StoredArtifact => ({
  kind,
  fileName,
  path: `/artifacts/${fileName}`,
  contentType: ArtifactContentType[kind],
  size,
  createdAt: new Date('2025-03-01T09:00:00Z'),
});

describe('MemoController', () => {
  let controller: MemoController;
  let sessions: MemoSessionService;
  let memoGeneration: { generate: jest.Mock };
  let infographicGeneration: { generate: jest.Mock };
  let res: { setHeader: jest.Mock };

  const memoBody = {
    companyName: 'Acme Corp',
    situationType: SituationType.SPIN_OFF,
    valuationMode: 'user_peers',
    parentPeers: 'Alpha Inc, Beta Co',
    spincoPeers: 'Gamma Ltd',
    enrichWithMarketData: 'true',
  };

  beforeEach(async () => {
    memoGeneration = { generate: jest.fn() };
    infographicGeneration = { generate: jest.fn() };
    res = { setHeader: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [MemoController],
      providers: [
        MemoSessionService,
        { provide: ArtifactStore, useValue: { remove: jest.fn() } },
        { provide: MemoGenerationService, useValue: memoGeneration },
        { provide: InfographicGenerationService, useValue: infographicGeneration },
      ],
    }).compile();

    controller = module.get<MemoController>(MemoController);
    sessions = module.get<MemoSessionService>(MemoSessionService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('GET /api/situations', () => {
    it('should list every situation with its titles', () => {
      const situations = controller.listSituations();

      expect(situations.map((situation) => situation.situationType)).toEqual(Object.values(SituationType));
      expect(situations.find((situation) => situation.requiresValuation)?.situationType).toBe(SituationType.SPIN_OFF);
      expect(situations[1].titles[0]).toBe('Deal Summary');
    });
  });

  describe('POST /api/memo', () => {
    const memoBuffer = Buffer.from('PK-docx');

    beforeEach(() => {
      memoGeneration.generate.mockResolvedValue({
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        sections: { 'Transaction Overview': 'text' },
        artifact: storedArtifact(ArtifactKind.MEMO, 'Acme_Corp_Spin-Off_or_Split-Up_Memo.docx', memoBuffer.length),
        buffer: memoBuffer,
      });
    });

    it('should generate the memo and return it as a download', async () => {
      const file = await controller.generateMemo([upload('form10.pdf', 'pdf')], memoBody, 'client-1', res);

      expect(file).toBeInstanceOf(StreamableFile);
      expect(file.getHeaders()).toEqual({
        type: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
        disposition: 'attachment; filename="Acme_Corp_Spin-Off_or_Split-Up_Memo.docx"',
        length: memoBuffer.length,
      });
      expect(res.setHeader).toHaveBeenCalledWith('x-session-id', 'client-1');
    });

    it('should pass parsed fields and uploaded files to the pipeline', async () => {
      await controller.generateMemo([upload('form10.pdf', 'pdf'), upload('deck.docx', 'docx')], memoBody, undefined, res);

      const [context, request] = memoGeneration.generate.mock.calls[0];
      expect(context.sessionId).toEqual(expect.any(String));
      expect(request).toEqual({
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        documents: [
          { fileName: 'form10.pdf', content: Buffer.from('pdf') },
          { fileName: 'deck.docx', content: Buffer.from('docx') },
        ],
        valuationMode: ValuationMode.USER_PEERS,
        peers: { parentPeers: ['Alpha Inc', 'Beta Co'], spincoPeers: ['Gamma Ltd'] },
        targetTicker: undefined,
        enrichWithMarketData: true,
      });
    });

    it('should omit peers unless the user supplies them', async () => {
      await controller.generateMemo(
        [upload('form10.pdf', 'pdf')],
        { ...memoBody, valuationMode: 'ai_peers' },
        undefined,
        res
      );

      expect(memoGeneration.generate.mock.calls[0][1].peers).toBeUndefined();
    });

    it('should remember the memo in the session', async () => {
      await controller.generateMemo([upload('form10.pdf', 'pdf')], memoBody, 'client-1', res);

      expect(sessions.get('client-1')).toMatchObject({
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        memoArtifact: { fileName: 'Acme_Corp_Spin-Off_or_Split-Up_Memo.docx' },
      });
    });

    it('should reject a request without files', async () => {
      await expect(controller.generateMemo([], memoBody, undefined, res)).rejects.toThrow(
        new InvalidMemoRequestError('Upload at least one PDF or DOCX file')
      );
      expect(memoGeneration.generate).not.toHaveBeenCalled();
    });

    it('should reject invalid fields before generating', async () => {
      await expect(
        controller.generateMemo([upload('a.pdf', 'x')], { situationType: 'Activist Campaign' }, undefined, res)
      ).rejects.toBeInstanceOf(InvalidMemoRequestError);
      expect(memoGeneration.generate).not.toHaveBeenCalled();
    });

    it('should leave the session untouched when generation fails', async () => {
      sessions.getOrCreate('client-1');
      memoGeneration.generate.mockRejectedValue(new CompletionServiceError('Completion service error: 500', 500));

      await expect(
        controller.generateMemo([upload('form10.pdf', 'pdf')], memoBody, 'client-1', res)
      ).rejects.toBeInstanceOf(CompletionServiceError);

      expect(sessions.get('client-1')?.memoArtifact).toBeUndefined();
      expect(res.setHeader).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/infographic', () => {
    const html = '<!DOCTYPE html><html></html>';

    beforeEach(() => {
      infographicGeneration.generate.mockResolvedValue({
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        summaries: [],
        html,
        artifact: storedArtifact(ArtifactKind.INFOGRAPHIC, 'Acme_Corp_Infographic.html', html.length),
      });
    });

    it('should pass the uploaded memo and fields through', async () => {
      const memo = upload('memo.docx', 'docx-bytes');

      const file = await controller.generateInfographic(
        memo,
        { companyName: 'Acme Corp', situationType: SituationType.SPIN_OFF },
        'client-2',
        res
      );

      expect(infographicGeneration.generate).toHaveBeenCalledWith(expect.objectContaining({ sessionId: 'client-2' }), {
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        memo: Buffer.from('docx-bytes'),
      });
      expect(file.getHeaders()).toEqual({
        type: 'text/html; charset=utf-8',
        disposition: 'attachment; filename="Acme_Corp_Infographic.html"',
        length: html.length,
      });
      expect(sessions.get('client-2')?.infographicArtifact?.fileName).toBe('Acme_Corp_Infographic.html');
    });

    it('should let the pipeline fall back to the session when fields are omitted', async () => {
      await controller.generateInfographic(undefined, {}, 'client-2', res);

      expect(infographicGeneration.generate).toHaveBeenCalledWith(expect.objectContaining({ sessionId: 'client-2' }), {
        companyName: undefined,
        situationType: undefined,
        memo: undefined,
      });
    });
  });

  describe('GET /api/sessions/:sessionId', () => {
    it('should describe a live session', () => {
      sessions.getOrCreate('client-3');
      sessions.recordMemo('client-3', {
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        artifact: storedArtifact(ArtifactKind.MEMO, 'memo.docx', 42),
      });

      expect(controller.getSession('client-3')).toEqual({
        sessionId: 'client-3',
        companyName: 'Acme Corp',
        situationType: SituationType.SPIN_OFF,
        memo: { kind: ArtifactKind.MEMO, fileName: 'memo.docx', size: 42, createdAt: '2025-03-01T09:00:00.000Z' },
        infographic: undefined,
        expiresAt: expect.any(String),
      });
    });

    it('should return 404 for an unknown session', () => {
      expect(() => controller.getSession('missing')).toThrow(NotFoundException);
    });
  });
});
