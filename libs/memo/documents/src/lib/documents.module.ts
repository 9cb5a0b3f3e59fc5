import { Module } from '@nestjs/common';
import { DocxParagraphReader } from './docx/docx-paragraph-reader';
import { MemoDocumentRenderer } from './docx/memo-document-renderer';
import { TextExtractionService } from './extraction/text-extraction.service';
import { InfographicComposer } from './infographic/infographic-composer';
import { ArtifactStore } from './artifacts/artifact-store';

@Module({
  providers: [DocxParagraphReader, MemoDocumentRenderer, TextExtractionService, InfographicComposer, ArtifactStore],
  exports: [DocxParagraphReader, MemoDocumentRenderer, TextExtractionService, InfographicComposer, ArtifactStore],
})
export class DocumentsModule {}
