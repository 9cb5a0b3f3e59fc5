import { Module } from '@nestjs/common';
import { PipelineModule } from '@special-sits/memo/pipeline';
import { MemoSessionModule } from '@special-sits/memo/session';
import { MemoController } from './memo.controller';

@Module({
  imports: [PipelineModule, MemoSessionModule],
  controllers: [MemoController],
})
export class ApiModule {}
