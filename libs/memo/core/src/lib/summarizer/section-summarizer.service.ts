import { Inject, Injectable, Logger } from '@nestjs/common';
import { COMPLETION_CLIENT, CompletionClient } from '../completion/completion-client';
import { SummarizationFailure } from '../errors/memo-errors';
import { buildSectionSummaryPrompt } from '../prompts/memo-prompts';

const LEADING_BULLET = /^[•*\-\s]+/;

/**
 * Cleans a bullet-list completion into plain sentences: drops bold markers
 * and heading hashes, strips leading bullet glyphs/dashes, skips blank lines.
 */
export function parseSummaryBullets(completion: string): string[] {
  return completion
    .replace(/\*\*/g, '')
    .replace(/#+/g, '')
    .split('\n')
    .map((line) => line.replace(LEADING_BULLET, '').trim())
    .filter((line) => line.length > 0);
}

@Injectable()
export class SectionSummarizerService {
  private readonly logger = new Logger(SectionSummarizerService.name);

  constructor(@Inject(COMPLETION_CLIENT) private readonly completionClient: CompletionClient) {}

  /**
   * @throws SummarizationFailure when the completion service fails
   */
  async summarize(title: string, content: string): Promise<string[]> {
    let completion: string;
    try {
      completion = await this.completionClient.complete(buildSectionSummaryPrompt(title, content));
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      throw new SummarizationFailure(title, reason);
    }

    const bullets = parseSummaryBullets(completion);
    this.logger.debug(`Summarized "${title}" into ${bullets.length} bullets`);
    return bullets;
  }
}
