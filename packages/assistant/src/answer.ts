/**
 * @netlens/assistant - Answer builders
 *
 * Confidence labels carry provenance: live or cached model text scores
 * high, locally templated guidance lower, the unavailable notice zero.
 */

import { contextLine } from './context.js';
import type { Answer, AssistantContext, ToolGuidance } from './types.js';

export const DEFAULT_ACTIONS: readonly string[] = [
  'Review /api/tool-guidance?tool=whois to learn how the WHOIS lookup works.',
  'Use /api/domain with a `fields` array to combine multiple tools in one request.',
  'Check the FAQ or documentation panels inside the dashboard for more tips.',
];

export const UNAVAILABLE_MESSAGE =
  "I'm having trouble reaching the assistant right now. Please try again in a moment.";

export const PROVIDER_CACHE = 'cache';
export const PROVIDER_DETERMINISTIC = 'deterministic';

export function toolSuggestions(tool: string, guidance: ToolGuidance): string[] {
  const actions = [`Call \`/api/tool-guidance?tool=${tool}\` for step-by-step usage.`, guidance.example];
  if (tool === 'domain') {
    actions.push('Include the `fields` payload to filter the diagnostics you need.');
  }
  return actions.filter(Boolean);
}

export interface ModelAnswerInput {
  text: string;
  tool: string | null;
  guidance: ToolGuidance | undefined;
  context: AssistantContext | null;
  provider: string;
}

/**
 * Wrap model text (live or cached). A resolved tool contributes its tips,
 * example and suggestions; otherwise the general suggestions apply.
 */
export function buildModelAnswer(input: ModelAnswerInput): Answer {
  const { tool, guidance } = input;
  if (tool && guidance) {
    return {
      answer: input.text.trim(),
      tool,
      tips: [...guidance.usage],
      example: guidance.example,
      suggestedActions: toolSuggestions(tool, guidance),
      confidence: '92%',
      context: input.context,
      provider: input.provider,
    };
  }

  return {
    answer: input.text.trim(),
    tool: null,
    tips: [],
    example: null,
    suggestedActions: [...DEFAULT_ACTIONS],
    confidence: '90%',
    context: input.context,
    provider: input.provider,
  };
}

/**
 * Templated answer built from the catalog alone.
 */
export function buildGuidanceAnswer(
  tool: string,
  guidance: ToolGuidance,
  context: AssistantContext | null,
): Answer {
  const body =
    `${guidance.title} helps with ${guidance.description.toLowerCase()} ` +
    `Ask for more details or use ${guidance.example}.`;
  const line = contextLine(context);

  return {
    answer: line ? `${line} ${body}` : body,
    tool,
    tips: [...guidance.usage],
    example: guidance.example,
    suggestedActions: toolSuggestions(tool, guidance),
    confidence: `${Math.min(95, 50 + guidance.usage.length * 10)}%`,
    context,
    provider: PROVIDER_DETERMINISTIC,
  };
}

export function buildUnavailableAnswer(supportedTools: string[]): Answer {
  return {
    answer: UNAVAILABLE_MESSAGE,
    tool: null,
    tips: [],
    example: null,
    suggestedActions: [...DEFAULT_ACTIONS],
    confidence: '0%',
    context: null,
    provider: PROVIDER_DETERMINISTIC,
    availableTools: supportedTools,
  };
}
