/**
 * @netlens/assistant - Dashboard assistant
 *
 * Resolves questions to diagnostic tools, answers them through the
 * provider chain with caching, and falls back to local guidance.
 *
 * @packageDocumentation
 */

export {
  DashboardAssistant,
  INTRO_QUESTION,
  type DashboardAssistantOptions,
} from './assistant.js';

export {
  buildGuidanceAnswer,
  buildModelAnswer,
  buildUnavailableAnswer,
  toolSuggestions,
  DEFAULT_ACTIONS,
  UNAVAILABLE_MESSAGE,
  PROVIDER_CACHE,
  PROVIDER_DETERMINISTIC,
  type ModelAnswerInput,
} from './answer.js';

export { contextFingerprint, contextLine, normalizeContext } from './context.js';
export { GuidanceCatalog, TOOL_GUIDANCE, type GuidanceLookup } from './guidance.js';
export {
  ASSISTANT_PREAMBLE,
  DEFAULT_PROMPT_STRATEGIES,
  buildGeneralPrompt,
  buildToolPrompt,
  generalStrategy,
  toolStrategy,
  type PromptInput,
  type PromptStrategy,
  type PromptStrategyName,
} from './prompt.js';
export { ResponseCache, type ResponseCacheOptions } from './response-cache.js';
export { ToolResolver } from './tool-resolver.js';
export type {
  Answer,
  AssistantContext,
  CompletionClient,
  CompletionFailureReason,
  CompletionOutcome,
  ToolGuidance,
} from './types.js';
