/**
 * @netlens/models - Gemini Provider
 *
 * Implements ModelProvider for the Gemini generateContent API.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { MalformedResponseError } from '@netlens/fallback';
import { postJson } from './http.js';
import type { GenerateOptions, ModelProvider } from './provider.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const API_BASE = 'https://generativelanguage.googleapis.com';

const GenerateContentResponseSchema = Type.Object({
  candidates: Type.Optional(
    Type.Array(
      Type.Object({
        content: Type.Optional(
          Type.Object({
            parts: Type.Optional(Type.Array(Type.Object({ text: Type.Optional(Type.String()) }))),
          }),
        ),
      }),
    ),
  ),
});

// ---------------------------------------------------------------------------
// GeminiProvider
// ---------------------------------------------------------------------------

export class GeminiProvider implements ModelProvider {
  readonly name = 'gemini';
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
      throw new Error('Gemini API key not set');
    }

    const url = `${this.baseUrl}/v1beta/models/${encodeURIComponent(this.model)}:generateContent`;
    const data = await postJson(
      'Gemini',
      url,
      { 'x-goog-api-key': this.apiKey },
      {
        contents: [{ parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
        },
      },
      options.signal,
    );

    if (!Value.Check(GenerateContentResponseSchema, data)) {
      throw new MalformedResponseError('Gemini response does not match generateContent shape');
    }

    // Only the first candidate is used; its text parts are concatenated
    const parts = data.candidates?.[0]?.content?.parts ?? [];
    const text = parts.map((part) => part.text ?? '').join('').trim();
    if (!text) {
      throw new MalformedResponseError('Gemini returned no candidate text');
    }
    return text;
  }
}
