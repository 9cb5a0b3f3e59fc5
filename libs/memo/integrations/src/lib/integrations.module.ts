import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { COMPLETION_CLIENT } from '@special-sits/memo/core';
import { DeepSeekAdapter } from './deepseek/deepseek.adapter';
import { FMPAdapter } from './fmp/fmp.adapter';
import { MARKET_DATA_PROVIDER } from './fmp/market-data-provider.interface';

@Module({
  providers: [
    {
      provide: COMPLETION_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new DeepSeekAdapter({
          apiKey: config.getOrThrow<string>('memo.deepseek.apiKey'),
          baseURL: config.get<string>('memo.deepseek.apiUrl'),
          model: config.get<string>('memo.deepseek.model'),
          temperature: config.get<number>('memo.deepseek.temperature'),
        }),
    },
    {
      provide: MARKET_DATA_PROVIDER,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new FMPAdapter({ apiKey: config.getOrThrow<string>('memo.fmp.apiKey') }),
    },
  ],
  exports: [COMPLETION_CLIENT, MARKET_DATA_PROVIDER],
})
export class IntegrationsModule {}
