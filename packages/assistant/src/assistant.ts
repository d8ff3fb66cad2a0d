/**
 * @netlens/assistant - DashboardAssistant
 *
 * Turns a question into an Answer:
 *   1. Empty question  -> provider introduction, else the unavailable notice
 *   2. Resolve the tool (hint, keywords, then the prior turn's tool)
 *   3. Cache hit       -> cached text, no provider call
 *   4. Provider chain  -> first non-empty text, cached and returned
 *   5. Nothing usable  -> templated guidance, else the unavailable notice
 *
 * `answer` never throws. The instance holds no per-request state; the
 * cache and the providers' breakers are the only shared state.
 */

import { createLogger, type Logger } from '@netlens/core';
import { FallbackChain, FallbackChainError, describeError } from '@netlens/fallback';
import {
  buildGuidanceAnswer,
  buildModelAnswer,
  buildUnavailableAnswer,
  toolSuggestions,
  PROVIDER_CACHE,
} from './answer.js';
import { normalizeContext } from './context.js';
import { GuidanceCatalog } from './guidance.js';
import { DEFAULT_PROMPT_STRATEGIES, type PromptInput, type PromptStrategy } from './prompt.js';
import type { ResponseCache } from './response-cache.js';
import { ToolResolver } from './tool-resolver.js';
import type {
  Answer,
  AssistantContext,
  CompletionClient,
  CompletionFailureReason,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DashboardAssistantOptions {
  cache: ResponseCache;
  /** Providers in priority order (first = tried first). */
  clients?: CompletionClient[];
  catalog?: GuidanceCatalog;
  strategies?: readonly PromptStrategy[];
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const INTRO_QUESTION =
  'Briefly introduce how you can help with IT, systems, and networking questions.';

/** Outcomes after which trying another prompt on the same provider is pointless. */
const STOP_REASONS: ReadonlySet<CompletionFailureReason> = new Set(['circuit-open', 'aborted', 'disabled']);

// ---------------------------------------------------------------------------
// DashboardAssistant
// ---------------------------------------------------------------------------

export class DashboardAssistant {
  private readonly catalog: GuidanceCatalog;
  private readonly resolver: ToolResolver;
  private readonly cache: ResponseCache;
  private readonly strategies: readonly PromptStrategy[];
  private readonly chain: FallbackChain<PromptInput, string>;
  private readonly log: Logger;

  constructor(options: DashboardAssistantOptions) {
    this.catalog = options.catalog ?? new GuidanceCatalog();
    this.resolver = new ToolResolver(this.catalog);
    this.cache = options.cache;
    this.strategies = options.strategies ?? DEFAULT_PROMPT_STRATEGIES;
    this.log = options.logger ?? createLogger('@netlens/assistant');

    const clients = options.clients ?? [];
    this.chain = new FallbackChain<PromptInput, string>({
      providers: clients.map((client, index) => ({
        name: client.name,
        priority: index * 10, // Config order determines priority
        isAvailable: () => client.isAvailable(),
        execute: (input: PromptInput, signal?: AbortSignal) => this.runStrategies(client, input, signal),
      })),
      onFallback: (from, to, error) => {
        this.log.warn({ from, to, error }, 'Falling back to next provider');
      },
      logger: this.log,
    });
  }

  /** Number of configured providers. */
  get providerCount(): number {
    return this.chain.size;
  }

  getCatalog(): GuidanceCatalog {
    return this.catalog;
  }

  async answer(
    question: string,
    toolHint?: string | null,
    context?: AssistantContext | null,
    signal?: AbortSignal,
  ): Promise<Answer> {
    const text = question.trim();
    if (!text) {
      return this.introduce(signal);
    }

    const ctx = normalizeContext(context);
    const tool = this.resolver.resolve(text, toolHint) ?? this.contextTool(ctx);
    const guidance = tool ? this.catalog.get(tool) : undefined;

    const cached = this.cache.get(tool, ctx, text);
    if (cached !== undefined) {
      this.log.debug({ tool }, 'Answer served from cache');
      return buildModelAnswer({ text: cached, tool, guidance, context: ctx, provider: PROVIDER_CACHE });
    }

    const live = await this.askProviders(
      {
        question: text,
        tool,
        guidance,
        context: ctx,
        suggestions: tool && guidance ? toolSuggestions(tool, guidance) : [],
      },
      signal,
    );

    if (live) {
      this.cache.set(tool, ctx, text, live.text);
      return buildModelAnswer({ text: live.text, tool, guidance, context: ctx, provider: live.provider });
    }

    if (tool && guidance) {
      return buildGuidanceAnswer(tool, guidance, ctx);
    }
    return buildUnavailableAnswer(this.catalog.supportedTools());
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async introduce(signal?: AbortSignal): Promise<Answer> {
    const live = await this.askProviders(
      { question: INTRO_QUESTION, tool: null, guidance: undefined, context: null, suggestions: [] },
      signal,
    );
    if (live) {
      return buildModelAnswer({
        text: live.text,
        tool: null,
        guidance: undefined,
        context: null,
        provider: live.provider,
      });
    }
    return buildUnavailableAnswer(this.catalog.supportedTools());
  }

  private contextTool(context: AssistantContext | null): string | null {
    const tool = context?.tool?.toLowerCase();
    return tool && this.catalog.has(tool) ? tool : null;
  }

  /**
   * Walk the provider chain. Null when no provider produced text, which
   * includes a request cancelled before any provider answered.
   */
  private async askProviders(
    input: PromptInput,
    signal?: AbortSignal,
  ): Promise<{ text: string; provider: string } | null> {
    if (this.chain.size === 0) {
      return null;
    }

    try {
      const { result, provider } = await this.chain.execute(input, signal);
      return { text: result, provider };
    } catch (err) {
      if (err instanceof FallbackChainError) {
        this.log.warn(
          {
            tool: input.tool,
            aborted: err.aborted,
            attempts: err.attempts.map((a) => `${a.provider}:${a.skipped ? 'skipped' : 'failed'}`),
          },
          'No provider answered, using local guidance',
        );
      } else {
        this.log.error({ error: describeError(err) }, 'Unexpected failure in provider chain');
      }
      return null;
    }
  }

  /**
   * Try each prompt strategy in order against one provider.
   */
  private async runStrategies(
    client: CompletionClient,
    input: PromptInput,
    signal?: AbortSignal,
  ): Promise<string> {
    let lastReason: string = 'no strategies';

    for (const strategy of this.strategies) {
      const outcome = await client.complete(strategy.build(input), signal);

      if (outcome.ok) {
        const text = outcome.text.trim();
        if (text) return text;
        lastReason = 'empty completion';
        continue;
      }

      lastReason = outcome.reason;
      this.log.debug({ provider: client.name, strategy: strategy.name, reason: outcome.reason }, 'Prompt strategy failed');
      if (STOP_REASONS.has(outcome.reason)) break;
    }

    throw new Error(`Provider "${client.name}" produced no answer (${lastReason})`);
  }
}
