import { Injectable, Logger } from '@nestjs/common';
import pdfParse from 'pdf-parse';
import { ExtractedText, SourceDocument, SourceDocumentKind } from '@special-sits/shared/types';
import { DocxParagraphReader } from '../docx/docx-paragraph-reader';

export function classifyDocument(fileName: string): SourceDocumentKind {
  const name = fileName.toLowerCase();
  if (name.endsWith('.pdf')) return SourceDocumentKind.PDF;
  if (name.endsWith('.docx')) return SourceDocumentKind.DOCX;
  return SourceDocumentKind.UNSUPPORTED;
}

/**
 * Raw text out of uploaded filings. Never throws: a file that cannot be read
 * yields an inline marker that flows into the prompt as ordinary text.
 */
@Injectable()
export class TextExtractionService {
  private readonly logger = new Logger(TextExtractionService.name);

  constructor(private readonly docxReader: DocxParagraphReader) {}

  async extract(document: SourceDocument): Promise<ExtractedText> {
    const kind = classifyDocument(document.fileName);

    switch (kind) {
      case SourceDocumentKind.PDF:
        return this.extractWith(document, kind, 'PDF', async () => (await pdfParse(document.content)).text);
      case SourceDocumentKind.DOCX:
        return this.extractWith(document, kind, 'DOCX', async () => {
          const paragraphs = await this.docxReader.readParagraphs(document.content);
          return paragraphs.filter((paragraph) => paragraph.trim()).join('\n');
        });
      case SourceDocumentKind.UNSUPPORTED:
        this.logger.warn(`Skipping unsupported file ${document.fileName}`);
        return {
          fileName: document.fileName,
          kind,
          text: `[Unsupported file: ${document.fileName}]`,
          failed: true,
        };
    }
  }

  /** Extracts every document in upload order */
  async extractAll(documents: SourceDocument[]): Promise<ExtractedText[]> {
    const results: ExtractedText[] = [];
    for (const document of documents) {
      results.push(await this.extract(document));
    }
    return results;
  }

  /** Each text followed by a newline, in upload order */
  combine(texts: ExtractedText[]): string {
    return texts.map((extracted) => `${extracted.text}\n`).join('');
  }

  private async extractWith(
    document: SourceDocument,
    kind: SourceDocumentKind,
    label: string,
    read: () => Promise<string>
  ): Promise<ExtractedText> {
    try {
      const text = await read();
      this.logger.debug(`Extracted ${text.length} chars from ${document.fileName}`);
      return { fileName: document.fileName, kind, text, failed: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to extract ${document.fileName}: ${message}`);
      return { fileName: document.fileName, kind, text: `[ERROR extracting ${label}: ${message}]`, failed: true };
    }
  }
}
