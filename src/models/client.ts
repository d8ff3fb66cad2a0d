/**
 * @netlens/models - ProviderClient
 *
 * Wraps one ModelProvider with bounded retries, a hard per-attempt
 * deadline and a circuit breaker, and reports every call as a
 * CompletionOutcome instead of throwing.
 *
 *   - 5xx, timeout, transport -> counted by the breaker, retried after
 *                                backoffMs * attempt
 *   - 4xx, malformed body     -> returned at once, breaker untouched
 *   - caller abort            -> returned at once, breaker untouched
 */

import { createLogger, sleep as defaultSleep, type Logger, type ProviderConfig } from '@netlens/core';
import {
  CircuitBreaker,
  ProviderTimeoutError,
  classifyFailure,
  countsTowardCircuit,
  describeError,
  type FailureKind,
} from '@netlens/fallback';
import type { CompletionClient, CompletionFailureReason, CompletionOutcome } from '@netlens/assistant';
import { createProvider, type ModelProvider } from './provider.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProviderClientOptions {
  /** Name used in logs, health reports and answers (the config id). */
  name: string;
  provider: ModelProvider;
  enabled?: boolean;
  /** Attempts per call, including the first. */
  maxRetries: number;
  backoffMs: number;
  timeoutMs: number;
  maxOutputTokens: number;
  temperature: number;
  failureThreshold: number;
  cooldownMs: number;
  /** Clock for the breaker, injectable for tests. */
  now?: () => number;
  /** Backoff sleep, injectable for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/** Failure kinds that end the call without touching the breaker. */
const NEUTRAL_REASONS: Partial<Record<FailureKind, CompletionFailureReason>> = {
  client: 'client-error',
  malformed: 'malformed',
  aborted: 'aborted',
};

// ---------------------------------------------------------------------------
// ProviderClient
// ---------------------------------------------------------------------------

export class ProviderClient implements CompletionClient {
  readonly name: string;
  readonly breaker: CircuitBreaker;

  private readonly provider: ModelProvider;
  private readonly enabled: boolean;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly timeoutMs: number;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly log: Logger;

  constructor(options: ProviderClientOptions) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer (got ${options.maxRetries})`);
    }
    if (options.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be positive (got ${options.timeoutMs})`);
    }

    this.name = options.name;
    this.provider = options.provider;
    this.enabled = options.enabled ?? true;
    this.maxRetries = options.maxRetries;
    this.backoffMs = options.backoffMs;
    this.timeoutMs = options.timeoutMs;
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger('@netlens/models');
    this.breaker = new CircuitBreaker(options.name, {
      failureThreshold: options.failureThreshold,
      cooldownMs: options.cooldownMs,
      now: options.now,
      logger: this.log,
    });
  }

  /**
   * Build a client from a provider config entry.
   */
  static fromConfig(
    config: ProviderConfig,
    overrides: Partial<Pick<ProviderClientOptions, 'provider' | 'now' | 'sleep' | 'logger'>> = {},
  ): ProviderClient {
    return new ProviderClient({
      name: config.id,
      provider: overrides.provider ?? createProvider(config),
      enabled: config.enabled,
      maxRetries: config.maxRetries,
      backoffMs: config.retryBackoffSeconds * 1000,
      timeoutMs: config.timeoutSeconds * 1000,
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
      failureThreshold: config.circuitFailureThreshold,
      cooldownMs: config.circuitCooldownSeconds * 1000,
      now: overrides.now,
      sleep: overrides.sleep,
      logger: overrides.logger,
    });
  }

  /** The underlying model name. */
  get model(): string {
    return this.provider.model;
  }

  isAvailable(): boolean {
    return this.isUsable() && !this.breaker.isBlocking();
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<CompletionOutcome> {
    if (!this.isUsable()) {
      return { ok: false, reason: 'disabled' };
    }

    let lastError: string | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) {
        return { ok: false, reason: 'aborted', error: lastError };
      }
      const permit = this.breaker.tryAcquire();
      if (permit === null) {
        return { ok: false, reason: 'circuit-open', error: lastError };
      }

      try {
        const text = await this.attempt(prompt, signal);
        this.breaker.recordSuccess();
        return { ok: true, text };
      } catch (err) {
        const kind = classifyFailure(err);
        lastError = describeError(err);

        if (!countsTowardCircuit(kind)) {
          this.breaker.recordNeutral(permit);
          this.log.warn({ provider: this.name, attempt, kind, error: lastError }, 'Provider call failed, not retrying');
          return { ok: false, reason: NEUTRAL_REASONS[kind] ?? 'client-error', error: lastError };
        }

        const opened = this.breaker.recordFailure(permit);
        this.log.warn({ provider: this.name, attempt, kind, error: lastError }, 'Provider call failed');
        if (opened) {
          return { ok: false, reason: 'circuit-open', error: lastError };
        }
      }

      if (attempt < this.maxRetries) {
        try {
          await this.sleep(this.backoffMs * attempt, signal);
        } catch (err) {
          this.log.debug({ provider: this.name, error: describeError(err) }, 'Backoff interrupted');
          return { ok: false, reason: 'aborted', error: lastError };
        }
      }
    }

    return { ok: false, reason: 'exhausted', error: lastError };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private isUsable(): boolean {
    return this.enabled && this.provider.isConfigured();
  }

  /**
   * One provider call bounded by `timeoutMs`. The call is cut off at the
   * deadline or on caller abort even if the provider ignores its signal.
   */
  private async attempt(prompt: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(abortError());
    const timer = setTimeout(
      () => controller.abort(new ProviderTimeoutError(this.name, this.timeoutMs)),
      this.timeoutMs,
    );
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const interrupted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      return await Promise.race([
        this.provider.generate(prompt, {
          signal: controller.signal,
          maxOutputTokens: this.maxOutputTokens,
          temperature: this.temperature,
        }),
        interrupted,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function abortError(): Error {
  const err = new Error('Request cancelled by caller');
  err.name = 'AbortError';
  return err;
}
