// node/src/services/llm-client.ts: low-level chat completion client used by the narrative generator

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export interface LlmCallOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LlmClient {
  complete(prompt: string, options?: LlmCallOptions): Promise<string>;
}

export class OpenAiLlmClient implements LlmClient {
  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string = 'gpt-4o-mini',
  ) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
      }
      this.client = new OpenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async complete(prompt: string, options?: LlmCallOptions): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [];
    if (options?.system) messages.push({ role: 'system', content: options.system });
    messages.push({ role: 'user', content: prompt });

    const res = await this.getClient().chat.completions.create({
      model: this.model,
      messages,
      temperature: options?.temperature ?? 0.6,
      max_tokens: options?.maxTokens ?? 700,
    });
    return res.choices[0]?.message?.content ?? '';
  }
}
