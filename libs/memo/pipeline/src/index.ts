export * from './lib/pipeline.module';
export * from './lib/memo-generation.service';
export * from './lib/infographic-generation.service';
