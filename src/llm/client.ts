import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { Config } from '../shared/config.js';
import type { CredentialProvider } from './credentials.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

/**
 * The text-generation collaborator the brief generator depends on.
 */
export interface TextGenerator {
  readonly model: string;
  complete(systemPrompt: string, userPrompt: string): Promise<LlmResponse>;
}

// OpenAI-compatible chat completions API response shape (partial)
const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

export class LlmClient implements TextGenerator {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(
    config: Config['llm'],
    private readonly credentials: CredentialProvider,
  ) {
    this.baseUrl = config.base_url || 'https://api.openai.com/v1';
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
  }

  complete(systemPrompt: string, userPrompt: string): Promise<LlmResponse> {
    return this.chat([
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userPrompt },
    ]);
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.credentials.getApiKey()}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        }),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url, model: this.model });
      }
      throw new LlmError(`LLM request failed: ${errorMessage(err)}`, { url, model: this.model });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }

    const parsed = ChatCompletionSchema.safeParse(raw);
    const data: z.infer<typeof ChatCompletionSchema> = parsed.success ? parsed.data : {};
    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(raw).slice(0, 200) });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model ?? this.model, tokens: tokenCount }, 'LLM call completed');

    return {
      content,
      model: data.model ?? this.model,
      token_count: tokenCount,
    };
  }
}
