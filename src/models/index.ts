/**
 * @netlens/models - Model providers
 *
 * Vendor transports plus the retrying, circuit-guarded ProviderClient.
 */

export { ProviderClient, type ProviderClientOptions } from './client.js';
export { GeminiProvider } from './gemini.js';
export { OpenAIProvider } from './openai.js';
export { postJson } from './http.js';
export { createProvider, type GenerateOptions, type ModelProvider } from './provider.js';
