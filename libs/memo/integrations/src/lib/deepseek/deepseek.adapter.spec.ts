import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { CompletionServiceError } from '@special-sits/memo/core';
import { DeepSeekAdapter, toCompletionServiceError } from './deepseek.adapter';

const respond =
  (status: number, data: unknown): AxiosAdapter =>
  async (config: InternalAxiosRequestConfig) => {
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };

const completion = (content: string | null) => ({
  choices: [{ message: { role: 'assistant', content } }],
});

describe('DeepSeekAdapter', () => {
  it('should require an API key', () => {
    expect(() => new DeepSeekAdapter({ apiKey: '' })).toThrow('DeepSeek API key is required');
  });

  it('should post a single user message with model and temperature', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async (config) => {
      requests.push(config);
      return respond(200, completion('Memo body'))(config);
    };
    const client = new DeepSeekAdapter({ apiKey: 'test-secret', adapter });

    await expect(client.complete('Write a memo')).resolves.toBe('Memo body');

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request.method).toBe('post');
    expect(request.baseURL).toBe('https://api.deepseek.com/v1');
    expect(request.url).toBe('/chat/completions');
    expect(request.headers.get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(request.data))).toEqual({
      model: 'deepseek-chat',
      messages: [{ role: 'user', content: 'Write a memo' }],
      temperature: 0.3,
    });
  });

  it('should honour configured model and per-call temperature', async () => {
    let body: unknown;
    const adapter: AxiosAdapter = async (config) => {
      body = JSON.parse(String(config.data));
      return respond(200, completion('ok'))(config);
    };
    const client = new DeepSeekAdapter({
      apiKey: 'test-secret',
      model: 'deepseek-reasoner',
      temperature: 0.5,
      adapter,
    });

    await client.complete('p', { temperature: 0 });

    expect(body).toEqual({
      model: 'deepseek-reasoner',
      messages: [{ role: 'user', content: 'p' }],
      temperature: 0,
    });
  });

  it('should trim the completion text', async () => {
    const client = new DeepSeekAdapter({
      apiKey: 'test-secret',
      adapter: respond(200, completion('\n  - point one\n')),
    });

    await expect(client.complete('p')).resolves.toBe('- point one');
  });

  it('should raise CompletionServiceError with the HTTP status', async () => {
    const client = new DeepSeekAdapter({ apiKey: 'test-secret', adapter: respond(503, {}) });

    const attempt = client.complete('p');

    await expect(attempt).rejects.toBeInstanceOf(CompletionServiceError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Completion service error: 503',
      status: 503,
    });
  });

  it('should raise CompletionServiceError for an empty completion', async () => {
    const client = new DeepSeekAdapter({ apiKey: 'test-secret', adapter: respond(200, completion(null)) });

    await expect(client.complete('p')).rejects.toThrow('Completion service returned an empty completion');
  });

  it('should raise CompletionServiceError when the response has no choices', async () => {
    const client = new DeepSeekAdapter({ apiKey: 'test-secret', adapter: respond(200, { choices: [] }) });

    await expect(client.complete('p')).rejects.toBeInstanceOf(CompletionServiceError);
  });

  describe('toCompletionServiceError', () => {
    it('should describe transport failures without a status', () => {
      const error = toCompletionServiceError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

      expect(error.message).toBe('Completion service unreachable: connect ECONNREFUSED');
      expect(error.status).toBeUndefined();
    });

    it('should explain authentication failures', async () => {
      const client = new DeepSeekAdapter({ apiKey: 'test-secret', adapter: respond(401, {}) });

      await expect(client.complete('p')).rejects.toMatchObject({
        status: 401,
        message: 'Invalid completion API key. Please check your DEEPSEEK_API_KEY environment variable.',
      });
    });

    it('should pass CompletionServiceError through unchanged', () => {
      const original = new CompletionServiceError('already mapped', 500);

      expect(toCompletionServiceError(original)).toBe(original);
    });

    it('should wrap plain errors', () => {
      expect(toCompletionServiceError(new Error('boom')).message).toBe('boom');
    });
  });
});
