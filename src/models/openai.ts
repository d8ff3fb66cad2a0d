/**
 * @netlens/models - OpenAI Provider
 *
 * Implements ModelProvider for the OpenAI Chat Completions API
 * (non-streaming).
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { MalformedResponseError } from '@netlens/fallback';
import { postJson } from './http.js';
import type { GenerateOptions, ModelProvider } from './provider.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const API_BASE = 'https://api.openai.com';

const ChatCompletionSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: Type.Optional(Type.Union([Type.String(), Type.Null()])),
      }),
    }),
  ),
});

// ---------------------------------------------------------------------------
// OpenAIProvider
// ---------------------------------------------------------------------------

export class OpenAIProvider implements ModelProvider {
  readonly name = 'openai';
  readonly model: string;

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(model: string, apiKey?: string, baseUrl?: string) {
    this.model = model;
    this.apiKey = apiKey;
    this.baseUrl = (baseUrl ?? API_BASE).replace(/\/+$/, '');
  }

  isConfigured(): boolean {
    return typeof this.apiKey === 'string' && this.apiKey.length > 0;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY not set');
    }

    const data = await postJson(
      'OpenAI',
      `${this.baseUrl}/v1/chat/completions`,
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxOutputTokens,
        temperature: options.temperature,
      },
      options.signal,
    );

    if (!Value.Check(ChatCompletionSchema, data)) {
      throw new MalformedResponseError('OpenAI response does not match chat completion shape');
    }

    const text = (data.choices[0]?.message.content ?? '').trim();
    if (!text) {
      throw new MalformedResponseError('OpenAI returned an empty completion');
    }
    return text;
  }
}
