/**
 * @netlens/fallback - FallbackChain
 *
 * Generic fallback chain that tries providers in priority order, skips the
 * ones that report themselves unavailable without calling them, and keeps
 * a record of every attempt.
 */

import { createLogger, type Logger } from '@netlens/core';
import { describeError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A provider that can be registered into a FallbackChain. */
export interface FallbackProvider<I, T> {
  /** Human-readable name (e.g. "primary", "secondary"). */
  name: string;
  /** Execute the provider logic and return a result. */
  execute: (input: I, signal?: AbortSignal) => Promise<T>;
  /** Returns false when calling now would be pointless (circuit open, disabled). */
  isAvailable: () => boolean | Promise<boolean>;
  /** Lower number = tried first. */
  priority: number;
}

/** Record of a single attempt within a chain execution. */
export interface FallbackAttempt {
  provider: string;
  success: boolean;
  /** True when the provider was skipped without being called. */
  skipped: boolean;
  error?: string;
  durationMs: number;
}

/** Successful chain execution result. */
export interface FallbackResult<T> {
  result: T;
  provider: string;
  attempts: FallbackAttempt[];
}

/** Options accepted by FallbackChain constructor. */
export interface FallbackChainOptions<I, T> {
  /** Providers (will be sorted by priority internally). */
  providers: FallbackProvider<I, T>[];
  /** Called whenever we fall back from one provider to the next. */
  onFallback?: (from: string, to: string, error: string) => void;
  /** Custom pino logger instance. */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// FallbackChain
// ---------------------------------------------------------------------------

/**
 * Executes providers in priority order until one succeeds.
 *
 * ```ts
 * const chain = new FallbackChain({
 *   providers: [primary, secondary],
 *   onFallback: (from, to, err) => log.warn({ from, to, err }, 'falling back'),
 * });
 * const { result, provider, attempts } = await chain.execute(input, signal);
 * ```
 */
export class FallbackChain<I, T> {
  private readonly providers: FallbackProvider<I, T>[];
  private readonly onFallback?: (from: string, to: string, error: string) => void;
  private readonly log: Logger;

  constructor(options: FallbackChainOptions<I, T>) {
    // Sort providers ascending by priority (lower = first); sort is stable
    this.providers = [...options.providers].sort((a, b) => a.priority - b.priority);
    this.onFallback = options.onFallback;
    this.log = options.logger ?? createLogger('@netlens/fallback');
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  get size(): number {
    return this.providers.length;
  }

  /**
   * Execute the chain against `input`. Tries each provider in priority order,
   * skipping unavailable ones and moving past any that throw. Stops early
   * only when `signal` aborts.
   */
  async execute(input: I, signal?: AbortSignal): Promise<FallbackResult<T>> {
    const attempts: FallbackAttempt[] = [];
    let lastError: string | undefined;

    for (const [i, provider] of this.providers.entries()) {
      if (signal?.aborted) {
        throw new FallbackChainError('Request cancelled before a provider answered', attempts, true);
      }

      const next = this.providers[i + 1];

      // --- availability check ------------------------------------------------
      let available: boolean;
      try {
        available = await provider.isAvailable();
      } catch (err) {
        this.log.warn(
          { provider: provider.name, error: describeError(err) },
          'isAvailable() threw -- treating as unavailable',
        );
        available = false;
      }

      if (!available) {
        this.log.info({ provider: provider.name }, 'Provider unavailable, skipping');
        attempts.push({
          provider: provider.name,
          success: false,
          skipped: true,
          error: 'Provider unavailable',
          durationMs: 0,
        });

        if (this.onFallback && next) {
          this.onFallback(provider.name, next.name, 'Provider unavailable');
        }
        continue;
      }

      // --- execution ---------------------------------------------------------
      const start = performance.now();
      try {
        const result = await provider.execute(input, signal);
        const durationMs = Math.round(performance.now() - start);

        this.log.info({ provider: provider.name, durationMs }, 'Provider succeeded');
        attempts.push({ provider: provider.name, success: true, skipped: false, durationMs });

        return { result, provider: provider.name, attempts };
      } catch (err: unknown) {
        const durationMs = Math.round(performance.now() - start);
        const errorMessage = describeError(err);

        this.log.warn({ provider: provider.name, durationMs, error: errorMessage }, 'Provider failed');
        attempts.push({
          provider: provider.name,
          success: false,
          skipped: false,
          error: errorMessage,
          durationMs,
        });
        lastError = errorMessage;

        if (this.onFallback && next) {
          this.onFallback(provider.name, next.name, errorMessage);
        }
      }
    }

    throw new FallbackChainError(
      `All ${this.providers.length} providers failed. Last error: ${lastError ?? 'none attempted'}`,
      attempts,
      false,
    );
  }

  /**
   * Return the ordered list of provider names (by priority).
   */
  getProviderNames(): string[] {
    return this.providers.map((p) => p.name);
  }
}

// ---------------------------------------------------------------------------
// FallbackChainError
// ---------------------------------------------------------------------------

/** Error thrown when the entire chain is exhausted or the caller cancelled. */
export class FallbackChainError extends Error {
  constructor(
    message: string,
    public readonly attempts: FallbackAttempt[],
    public readonly aborted: boolean,
  ) {
    super(message);
    this.name = 'FallbackChainError';
  }
}
