import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmClient } from '../client.js';
import { StaticCredentialProvider } from '../credentials.js';
import { LlmError } from '../../shared/errors.js';
import { ConfigSchema, type Config } from '../../shared/config.js';

function makeClient(overrides: Partial<Config['llm']> = {}): LlmClient {
  const config = ConfigSchema.parse({});
  return new LlmClient({ ...config.llm, ...overrides }, new StaticCredentialProvider('test-secret'));
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LlmClient', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('posts a chat completion request', async () => {
    const mockFetch = vi.fn().mockResolvedValue(
      jsonResponse({
        choices: [{ message: { content: '# Brief' } }],
        model: 'test-model-2024',
        usage: { total_tokens: 321 },
      }),
    );
    globalThis.fetch = mockFetch;

    const client = makeClient({ base_url: 'http://localhost:8080/v1/', model: 'test-model' });
    const result = await client.complete('system text', 'user text');

    expect(result).toEqual({ content: '# Brief', model: 'test-model-2024', token_count: 321 });

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('http://localhost:8080/v1/chat/completions');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer test-secret' },
    });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
      max_tokens: 8000,
      temperature: 0.3,
    });
  });

  it('defaults to the OpenAI endpoint', async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));
    globalThis.fetch = mockFetch;

    const result = await makeClient().complete('s', 'u');

    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(result.model).toBe('gpt-4.1-mini');
    expect(result.token_count).toBe(0);
  });

  it('throws LlmError on a non-ok status', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('rate limited', { status: 429, statusText: 'Too Many Requests' }),
    );

    await expect(makeClient().complete('s', 'u')).rejects.toThrow('LLM API error: 429 Too Many Requests');
  });

  it('throws LlmError on empty content', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({ choices: [] }));

    await expect(makeClient().complete('s', 'u')).rejects.toThrow('LLM returned empty content');
  });

  it('throws LlmError on a body that is not JSON', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(makeClient().complete('s', 'u')).rejects.toThrow('LLM response is not valid JSON');
  });

  it('throws LlmError when the request fails', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    await expect(makeClient().complete('s', 'u')).rejects.toThrow(LlmError);
  });

  it('times out', async () => {
    globalThis.fetch = vi.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const err = new Error('This operation was aborted');
            err.name = 'AbortError';
            reject(err);
          });
        }),
    );

    await expect(makeClient({ timeout_ms: 20 }).complete('s', 'u')).rejects.toThrow(
      'LLM request timed out after 20ms',
    );
  });
});
