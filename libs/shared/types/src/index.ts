export * from './lib/enums';
export * from './lib/memo.types';
export * from './lib/market-data.types';
