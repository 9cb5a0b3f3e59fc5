/**
 * Domain errors raised by the memo pipeline.
 *
 * Boundary failures (text extraction, market-data lookups) never surface as
 * errors; they degrade to inline markers or zero sentinels. Everything here
 * aborts the action that raised it and nothing else.
 */

export type MemoErrorCode =
  | 'UNSUPPORTED_SITUATION'
  | 'COMPLETION_SERVICE_FAILURE'
  | 'SUMMARIZATION_FAILURE'
  | 'NO_SECTIONS_EXTRACTED'
  | 'INVALID_REQUEST';

export abstract class MemoError extends Error {
  abstract readonly code: MemoErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedSituationError extends MemoError {
  readonly code = 'UNSUPPORTED_SITUATION';

  constructor(readonly situationType: string) {
    super(`Unsupported situation type: ${situationType}`);
  }
}

export class CompletionServiceError extends MemoError {
  readonly code = 'COMPLETION_SERVICE_FAILURE';

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

export class SummarizationFailure extends MemoError {
  readonly code = 'SUMMARIZATION_FAILURE';

  constructor(readonly sectionTitle: string, readonly reason: string) {
    super(`Could not summarize section '${sectionTitle}': ${reason}`);
  }
}

export class NoSectionsExtractedError extends MemoError {
  readonly code = 'NO_SECTIONS_EXTRACTED';

  constructor(readonly situationType: string) {
    super(
      `No matching headings found for "${situationType}". ` +
        'Check that the memo was generated for the same situation type.'
    );
  }
}

export class InvalidMemoRequestError extends MemoError {
  readonly code = 'INVALID_REQUEST';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}
