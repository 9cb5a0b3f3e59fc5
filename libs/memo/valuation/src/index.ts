export * from './lib/valuation.module';
export * from './lib/market-data.service';
export * from './lib/peer-valuation.service';
