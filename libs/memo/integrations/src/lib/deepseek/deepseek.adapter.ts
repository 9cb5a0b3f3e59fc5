import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import {
  CompletionClient,
  CompletionOptions,
  CompletionServiceError,
} from '@special-sits/memo/core';
import { DEFAULT_COMPLETION_MODEL, DEFAULT_COMPLETION_TEMPERATURE } from '@special-sits/shared/types';

export const DEEPSEEK_API_URL = 'https://api.deepseek.com/v1';

export interface DeepSeekOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  /** Custom transport; defaults to axios' own */
  adapter?: AxiosAdapter;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { role: string; content?: string | null };
  }>;
}

export function toCompletionServiceError(error: unknown): CompletionServiceError {
  if (error instanceof CompletionServiceError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status } = error.response;
      if (status === 401) {
        return new CompletionServiceError(
          'Invalid completion API key. Please check your DEEPSEEK_API_KEY environment variable.',
          status
        );
      }
      if (status === 429) {
        return new CompletionServiceError('Completion rate limit exceeded. Please try again later.', status);
      }
      return new CompletionServiceError(`Completion service error: ${status}`, status);
    }
    return new CompletionServiceError(`Completion service unreachable: ${error.message}`);
  }
  return new CompletionServiceError(error instanceof Error ? error.message : 'Unknown completion error');
}

/**
 * Chat-completion client for the DeepSeek API. One user message per call,
 * no retry; every failure surfaces as CompletionServiceError.
 */
export class DeepSeekAdapter implements CompletionClient {
  private readonly model: string;
  private readonly temperature: number;
  private readonly client: AxiosInstance;

  constructor(options: DeepSeekOptions) {
    if (!options.apiKey) {
      throw new Error('DeepSeek API key is required');
    }

    this.model = options.model ?? DEFAULT_COMPLETION_MODEL;
    this.temperature = options.temperature ?? DEFAULT_COMPLETION_TEMPERATURE;

    this.client = axios.create({
      baseURL: options.baseURL ?? DEEPSEEK_API_URL,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw toCompletionServiceError(error);
      }
    );
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const response = await this.client.post<ChatCompletionResponse>('/chat/completions', {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: options.temperature ?? this.temperature,
    });

    const content = response.data.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new CompletionServiceError('Completion service returned an empty completion', response.status);
    }
    return content;
  }
}
