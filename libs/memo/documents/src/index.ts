export * from './lib/documents.module';
export * from './lib/docx/docx-paragraph-reader';
export * from './lib/docx/memo-document-renderer';
export * from './lib/extraction/text-extraction.service';
export * from './lib/infographic/infographic-composer';
export * from './lib/infographic/infographic-palette';
export * from './lib/artifacts/artifact-store';
