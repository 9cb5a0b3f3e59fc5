import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { DocumentsModule } from '@special-sits/memo/documents';
import { MemoSessionService } from './memo-session.service';

@Module({
  imports: [ScheduleModule.forRoot(), DocumentsModule],
  providers: [MemoSessionService],
  exports: [MemoSessionService],
})
export class MemoSessionModule {}
