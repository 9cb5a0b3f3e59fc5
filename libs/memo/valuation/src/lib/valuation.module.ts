import { Module } from '@nestjs/common';
import { CacheManager } from '@special-sits/shared/utils';
import { IntegrationsModule } from '@special-sits/memo/integrations';
import { MarketDataService } from './market-data.service';
import { PeerValuationService } from './peer-valuation.service';

@Module({
  imports: [IntegrationsModule],
  providers: [
    {
      provide: CacheManager,
      useFactory: () => new CacheManager(),
    },
    MarketDataService,
    PeerValuationService,
  ],
  exports: [MarketDataService, PeerValuationService],
})
export class ValuationModule {}
