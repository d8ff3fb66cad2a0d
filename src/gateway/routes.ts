/**
 * @netlens/gateway - Assistant routes
 *
 * Transport-independent handlers. Each takes already-parsed request parts
 * and returns a status code with a JSON-serializable body, so the HTTP
 * server stays a thin adapter and the handlers are testable in process.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Logger } from '@netlens/core';
import type { HealthReporter } from '@netlens/fallback';
import type {
  Answer,
  AssistantContext,
  DashboardAssistant,
  ResponseCache,
} from '@netlens/assistant';
import type { ConversationHistory } from './history.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RouteResponse {
  status: number;
  body: unknown;
}

/** Answer as sent over the wire (snake_case keys). */
export interface WireAnswer {
  answer: string;
  tool: string | null;
  tips: string[];
  example: string | null;
  suggested_actions: string[];
  confidence: string;
  context: AssistantContext | null;
  provider: string;
  available_tools?: string[];
}

export interface AssistantRoutesOptions {
  assistant: DashboardAssistant;
  history: ConversationHistory;
  health: HealthReporter;
  cache: ResponseCache;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Request schema
// ---------------------------------------------------------------------------

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const AssistantRequestSchema = Type.Object({
  question: Type.Optional(Type.String({ maxLength: 2000 })),
  tool: NullableString,
  context: Type.Optional(
    Type.Union([
      Type.Object({
        tool: NullableString,
        target: NullableString,
        summary: NullableString,
        timestamp: NullableString,
      }),
      Type.Null(),
    ]),
  ),
});

export type AssistantRequest = Static<typeof AssistantRequestSchema>;

// ---------------------------------------------------------------------------
// Mapping helpers
// ---------------------------------------------------------------------------

export function toWireAnswer(answer: Answer): WireAnswer {
  const wire: WireAnswer = {
    answer: answer.answer,
    tool: answer.tool,
    tips: answer.tips,
    example: answer.example,
    suggested_actions: answer.suggestedActions,
    confidence: answer.confidence,
    context: answer.context,
    provider: answer.provider,
  };
  if (answer.availableTools) {
    wire.available_tools = answer.availableTools;
  }
  return wire;
}

function toContext(raw: AssistantRequest['context']): AssistantContext | null {
  if (!raw) return null;
  return {
    tool: raw.tool ?? undefined,
    target: raw.target ?? undefined,
    summary: raw.summary ?? undefined,
    timestamp: raw.timestamp ?? undefined,
  };
}

// ---------------------------------------------------------------------------
// AssistantRoutes
// ---------------------------------------------------------------------------

export class AssistantRoutes {
  private readonly assistant: DashboardAssistant;
  private readonly history: ConversationHistory;
  private readonly health: HealthReporter;
  private readonly cache: ResponseCache;
  private readonly log: Logger;

  constructor(options: AssistantRoutesOptions) {
    this.assistant = options.assistant;
    this.history = options.history;
    this.health = options.health;
    this.cache = options.cache;
    this.log = options.logger;
  }

  /**
   * POST /api/assistant
   */
  async ask(body: unknown, sessionId: string | undefined, signal?: AbortSignal): Promise<RouteResponse> {
    if (body === null) {
      return { status: 400, body: { error: 'Request body must be a JSON object' } };
    }
    if (!Value.Check(AssistantRequestSchema, body)) {
      const first = Value.Errors(AssistantRequestSchema, body).First();
      const detail = first ? `${first.path || '/'}: ${first.message}` : 'invalid payload';
      return { status: 400, body: { error: `Invalid request (${detail})` } };
    }

    const answer = await this.assistant.answer(body.question ?? '', body.tool, toContext(body.context), signal);

    if (sessionId) {
      this.history.record(sessionId, {
        question: body.question ?? '',
        tool: answer.tool,
        answer: answer.answer,
        provider: answer.provider,
        confidence: answer.confidence,
      });
    }

    this.log.info({ tool: answer.tool, provider: answer.provider }, 'Assistant answered');
    return { status: 200, body: toWireAnswer(answer) };
  }

  /**
   * GET /api/assistant/history
   */
  getHistory(sessionId: string | undefined): RouteResponse {
    if (!sessionId) {
      return { status: 400, body: { error: 'Missing x-session-id header' } };
    }
    return { status: 200, body: { session_id: sessionId, turns: this.history.list(sessionId) } };
  }

  /**
   * GET /api/tool-guidance?tool=
   */
  getToolGuidance(tool: string | null): RouteResponse {
    const catalog = this.assistant.getCatalog();
    if (!tool) {
      return {
        status: 200,
        body: { tools: catalog.list().map(([name, guidance]) => ({ tool: name, ...guidance })) },
      };
    }

    const lookup = catalog.describe(tool);
    if (lookup.found) {
      return { status: 200, body: { tool: lookup.tool, ...lookup.guidance } };
    }
    return {
      status: 404,
      body: {
        title: lookup.title,
        description: lookup.description,
        supported_tools: lookup.supportedTools,
      },
    };
  }

  /**
   * GET /health
   */
  getHealth(): RouteResponse {
    const report = this.health.getReport();
    return {
      status: report.overallStatus === 'down' ? 503 : 200,
      body: {
        status: report.overallStatus,
        providers: report.providers.map((p) => ({
          name: p.name,
          state: p.state,
          consecutive_failures: p.consecutiveFailures,
          open_until: p.openUntil ? p.openUntil.toISOString() : null,
          degraded: p.degraded,
        })),
        cache_entries: this.cache.size,
        generated_at: report.generatedAt.toISOString(),
      },
    };
  }
}
