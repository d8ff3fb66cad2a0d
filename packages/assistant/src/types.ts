/**
 * @netlens/assistant - Shared types
 */

/** Static usage guidance for one diagnostic tool. */
export interface ToolGuidance {
  title: string;
  description: string;
  keywords: readonly string[];
  usage: readonly string[];
  example: string;
}

/** The user's most recent diagnostic action, supplied by session history. */
export interface AssistantContext {
  tool?: string;
  target?: string;
  summary?: string;
  timestamp?: string;
}

export type CompletionFailureReason =
  | 'circuit-open'
  | 'client-error'
  | 'malformed'
  | 'exhausted'
  | 'aborted'
  | 'disabled';

export type CompletionOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: CompletionFailureReason; error?: string };

/**
 * One text-completion backend as the assistant sees it. Implementations
 * own their retries and circuit breaker; `complete` never throws.
 */
export interface CompletionClient {
  readonly name: string;
  /** False when a call would be refused without touching the network. */
  isAvailable(): boolean;
  complete(prompt: string, signal?: AbortSignal): Promise<CompletionOutcome>;
}

export interface Answer {
  answer: string;
  tool: string | null;
  tips: string[];
  example: string | null;
  suggestedActions: string[];
  confidence: string;
  context: AssistantContext | null;
  /** Provider name, 'cache', or 'deterministic'. */
  provider: string;
  /** Only on the "assistant unavailable" answer. */
  availableTools?: string[];
}
