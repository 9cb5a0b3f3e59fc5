import { Module } from '@nestjs/common';
import { PromptAssembler } from './prompts/prompt-assembler';
import { TextSectionSplitter } from './sections/text-section-splitter';
import { DocumentSectionExtractor } from './sections/document-section-extractor';

/**
 * Pure memo building blocks. SectionSummarizerService is not listed here: it
 * needs COMPLETION_CLIENT and is provided next to the module that binds it.
 */
@Module({
  providers: [PromptAssembler, TextSectionSplitter, DocumentSectionExtractor],
  exports: [PromptAssembler, TextSectionSplitter, DocumentSectionExtractor],
})
export class MemoCoreModule {}
