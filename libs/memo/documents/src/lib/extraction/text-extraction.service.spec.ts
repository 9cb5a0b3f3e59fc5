import { Test, TestingModule } from '@nestjs/testing';
import pdfParse from 'pdf-parse';
import { SourceDocumentKind } from '@special-sits/shared/types';
import { TextExtractionService, classifyDocument } from './text-extraction.service';
import { DocxParagraphReader } from '../docx/docx-paragraph-reader';
import { buildDocxFixture, textParagraph } from '../../test-utils/docx-fixture';

jest.mock('pdf-parse', () => jest.fn());

const mockedPdfParse = jest.mocked(pdfParse);

const pdfResult = (text: string) => ({
  numpages: 1,
  numrender: 1,
  info: {},
  metadata: null,
  version: 'default' as const,
  text,
});

describe('TextExtractionService', () => {
  let service: TextExtractionService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TextExtractionService, DocxParagraphReader],
    }).compile();

    service = module.get<TextExtractionService>(TextExtractionService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('classifyDocument', () => {
    it('should classify by case-insensitive extension', () => {
      expect(classifyDocument('10-K.PDF')).toBe(SourceDocumentKind.PDF);
      expect(classifyDocument('deck.Docx')).toBe(SourceDocumentKind.DOCX);
      expect(classifyDocument('notes.txt')).toBe(SourceDocumentKind.UNSUPPORTED);
      expect(classifyDocument('archive.docx.zip')).toBe(SourceDocumentKind.UNSUPPORTED);
    });
  });

  describe('extract', () => {
    it('should return PDF text', async () => {
      mockedPdfParse.mockResolvedValue(pdfResult('Form 10 text'));
      const content = Buffer.from('%PDF-1.4');

      await expect(service.extract({ fileName: 'form10.pdf', content })).resolves.toEqual({
        fileName: 'form10.pdf',
        kind: SourceDocumentKind.PDF,
        text: 'Form 10 text',
        failed: false,
      });
      expect(mockedPdfParse).toHaveBeenCalledWith(content);
    });

    it('should turn a PDF failure into an inline marker', async () => {
      mockedPdfParse.mockRejectedValue(new Error('Invalid PDF structure'));

      await expect(service.extract({ fileName: 'broken.pdf', content: Buffer.from('x') })).resolves.toEqual({
        fileName: 'broken.pdf',
        kind: SourceDocumentKind.PDF,
        text: '[ERROR extracting PDF: Invalid PDF structure]',
        failed: true,
      });
    });

    it('should join non-blank DOCX paragraphs with newlines', async () => {
      const content = await buildDocxFixture([
        textParagraph('Investor letter'),
        '<w:p/>',
        textParagraph('   '),
        textParagraph('Board seats: 2'),
      ]);

      const result = await service.extract({ fileName: 'letter.docx', content });

      expect(result.text).toBe('Investor letter\nBoard seats: 2');
      expect(result.failed).toBe(false);
    });

    it('should turn a DOCX failure into an inline marker', async () => {
      const result = await service.extract({ fileName: 'bad.docx', content: Buffer.from('not a zip') });

      expect(result.kind).toBe(SourceDocumentKind.DOCX);
      expect(result.failed).toBe(true);
      expect(result.text.startsWith('[ERROR extracting DOCX: ')).toBe(true);
      expect(result.text.endsWith(']')).toBe(true);
    });

    it('should mark unsupported files without reading them', async () => {
      await expect(service.extract({ fileName: 'model.xlsx', content: Buffer.from('x') })).resolves.toEqual({
        fileName: 'model.xlsx',
        kind: SourceDocumentKind.UNSUPPORTED,
        text: '[Unsupported file: model.xlsx]',
        failed: true,
      });
      expect(mockedPdfParse).not.toHaveBeenCalled();
    });
  });

  describe('extractAll and combine', () => {
    it('should keep upload order and terminate each text with a newline', async () => {
      mockedPdfParse.mockResolvedValue(pdfResult('pdf body'));

      const texts = await service.extractAll([
        { fileName: 'a.pdf', content: Buffer.from('a') },
        { fileName: 'b.csv', content: Buffer.from('b') },
      ]);

      expect(service.combine(texts)).toBe('pdf body\n[Unsupported file: b.csv]\n');
    });

    it('should combine nothing into an empty string', () => {
      expect(service.combine([])).toBe('');
    });
  });
});
