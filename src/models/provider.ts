/**
 * @netlens/models - Model Provider Interface & Factory
 *
 * Defines the ModelProvider contract implemented by each vendor transport
 * and a factory that picks the transport for a provider config entry.
 */

import type { ProviderConfig } from '@netlens/core';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  signal?: AbortSignal;
  maxOutputTokens: number;
  temperature: number;
}

/**
 * The ModelProvider interface that all vendor transports implement.
 * `generate` resolves with non-empty text or throws one of the errors
 * from @netlens/fallback (HttpError, MalformedResponseError); network
 * failures and aborts propagate as thrown by fetch.
 */
export interface ModelProvider {
  /** Vendor name (e.g. 'gemini', 'openai'). */
  readonly name: string;

  /** The specific model being used. */
  readonly model: string;

  /** Whether credentials are present. */
  isConfigured(): boolean;

  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

// ---------------------------------------------------------------------------
// Provider factory
// ---------------------------------------------------------------------------

/**
 * Create the ModelProvider for a provider config entry.
 */
export function createProvider(config: ProviderConfig): ModelProvider {
  switch (config.kind) {
    case 'gemini':
      return new GeminiProvider(config.model, config.apiKey, config.baseUrl);
    case 'openai':
      return new OpenAIProvider(config.model, config.apiKey, config.baseUrl);
  }
}
