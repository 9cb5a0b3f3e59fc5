/**
 * Injection token for CompletionClient
 * Use this token when injecting the client via @Inject()
 */
export const COMPLETION_CLIENT = 'COMPLETION_CLIENT';

export interface CompletionOptions {
  temperature?: number;
}

/**
 * Prompt in, completion text out. Implementations raise
 * CompletionServiceError on transport or HTTP failure and never retry.
 */
export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
