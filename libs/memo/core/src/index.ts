export * from './lib/memo-core.module';
export * from './lib/errors/memo-errors';
export * from './lib/completion/completion-client';
export * from './lib/outlines/outline-registry';
export * from './lib/markdown/markdown-normalizer';
export * from './lib/prompts/memo-prompts';
export * from './lib/prompts/market-evidence';
export * from './lib/prompts/prompt-assembler';
export * from './lib/sections/section-extractor.interface';
export * from './lib/sections/text-section-splitter';
export * from './lib/sections/document-section-extractor';
export * from './lib/summarizer/section-summarizer.service';
