import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApiModule } from '@special-sits/memo/api';
import memoConfig, { validateEnvironment } from '../environment';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [memoConfig],
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    ApiModule,
  ],
})
export class AppModule {}
