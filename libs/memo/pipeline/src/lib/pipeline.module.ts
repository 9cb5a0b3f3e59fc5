import { Module } from '@nestjs/common';
import { MemoCoreModule, SectionSummarizerService } from '@special-sits/memo/core';
import { IntegrationsModule } from '@special-sits/memo/integrations';
import { DocumentsModule } from '@special-sits/memo/documents';
import { ValuationModule } from '@special-sits/memo/valuation';
import { MemoGenerationService } from './memo-generation.service';
import { InfographicGenerationService } from './infographic-generation.service';

@Module({
  imports: [MemoCoreModule, IntegrationsModule, DocumentsModule, ValuationModule],
  providers: [SectionSummarizerService, MemoGenerationService, InfographicGenerationService],
  exports: [MemoGenerationService, InfographicGenerationService],
})
export class PipelineModule {}
