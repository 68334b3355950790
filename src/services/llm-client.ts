// src/services/llm-client.ts: low-level chat client used by the reranker

import OpenAI from 'openai';

export interface LlmCallOptions {
  task: 'rerank';
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  call(system: string, prompt: string, options?: LlmCallOptions): Promise<string>;
}

export interface ProviderLlmClientConfig {
  apiKey: string;
  model?: string;
}

export class ProviderLlmClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: ProviderLlmClientConfig) {
    if (!config.apiKey) {
      throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
    }
    // Retries are left to the circuit breaker.
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? 'gpt-4o-mini';
  }

  async call(system: string, prompt: string, options?: LlmCallOptions): Promise<string> {
    const maxTokens = typeof options?.maxTokens === 'number' ? options.maxTokens : 512;

    const res = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        temperature: 0,
        max_tokens: maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal: options?.signal },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}
