export * from './lib/integrations.module';
export * from './lib/deepseek/deepseek.adapter';
export * from './lib/fmp/fmp.adapter';
export * from './lib/fmp/market-data-provider.interface';
