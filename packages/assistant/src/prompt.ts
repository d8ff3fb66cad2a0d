/**
 * @netlens/assistant - Prompt strategies
 *
 * Prompts are a pure function of (question, tool, guidance, context,
 * suggestions). The retry-with-variation policy is the ordered strategy
 * list: the first strategy that yields text wins.
 */

import { contextLine } from './context.js';
import type { AssistantContext, ToolGuidance } from './types.js';

export const ASSISTANT_PREAMBLE =
  'You are a patient technical expert specializing in IT, computer systems, and networking. ' +
  'You are helping a user inside the NetLens dashboard, which offers WHOIS, DNS records, IP Geolocation, ' +
  'Port Scan, Speed Test, and a combined Domain Research tool. ' +
  "Explain the 'why' and 'how' behind technical topics, keep advice actionable, and offer practice questions when helpful. " +
  'If a question is unrelated to IT or networking, politely state your scope.';

const BREVITY = 'Respond concisely with 2-4 sentences.';

export interface PromptInput {
  question: string;
  tool: string | null;
  guidance: ToolGuidance | undefined;
  context: AssistantContext | null;
  /** Next steps offered alongside a tool answer. */
  suggestions: string[];
}

export type PromptStrategyName = 'tool' | 'general';

export interface PromptStrategy {
  name: PromptStrategyName;
  build(input: PromptInput): string;
}

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

function contextLines(context: AssistantContext | null): string[] {
  const line = contextLine(context);
  return line ? [`Recent context: ${line}`] : [];
}

export function buildGeneralPrompt(input: PromptInput): string {
  return [
    ASSISTANT_PREAMBLE,
    '',
    ...contextLines(input.context),
    `User question: ${input.question}`,
    BREVITY,
  ].join('\n');
}

/**
 * Tool-tailored prompt. Without a resolved tool this is the general prompt.
 */
export function buildToolPrompt(input: PromptInput): string {
  const { tool, guidance } = input;
  if (!tool || !guidance) {
    return buildGeneralPrompt(input);
  }

  return [
    ASSISTANT_PREAMBLE,
    '',
    `Selected tool: ${tool}`,
    `Description: ${guidance.description}`,
    'Usage tips:',
    ...bullets(guidance.usage),
    `Example call: ${guidance.example}`,
    'Suggested actions:',
    ...bullets(input.suggestions),
    ...contextLines(input.context),
    '',
    `User question: ${input.question}`,
    BREVITY,
  ].join('\n');
}

export const toolStrategy: PromptStrategy = { name: 'tool', build: buildToolPrompt };
export const generalStrategy: PromptStrategy = { name: 'general', build: buildGeneralPrompt };

/** Tailored first, then tool-agnostic, then tailored once more. */
export const DEFAULT_PROMPT_STRATEGIES: readonly PromptStrategy[] = [
  toolStrategy,
  generalStrategy,
  toolStrategy,
];
