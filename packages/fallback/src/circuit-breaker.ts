/**
 * @netlens/fallback - CircuitBreaker
 *
 * Per-provider breaker counting consecutive health failures.
 *
 *   closed    -> calls allowed
 *   open      -> calls refused until `openUntil`
 *   half-open -> cooldown elapsed; exactly one probe call is admitted and its
 *                outcome closes or reopens the circuit
 *
 * `tryAcquire` hands out a permit and every outcome is reported with it. Only
 * the `probe` permit frees the probe slot, so a call admitted before the
 * circuit opened cannot release it when it finishes late.
 *
 * All transitions are synchronous, so on Node's single event loop each
 * check-and-update runs to completion before any other request observes the
 * state. Never hold a slot across an await other than the provider call
 * itself.
 */

import { createLogger, type Logger } from '@netlens/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CircuitState = 'closed' | 'open' | 'half-open';

/** What `tryAcquire` granted: an ordinary call or the half-open probe. */
export type CircuitPermit = 'call' | 'probe';

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number;
  /** How long the circuit stays open, in ms. */
  cooldownMs: number;
  /** Clock, injectable for tests. */
  now?: () => number;
  logger?: Logger;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  /** Epoch ms, or null when the circuit is not open. */
  openUntil: number | null;
}

// ---------------------------------------------------------------------------
// CircuitBreaker
// ---------------------------------------------------------------------------

export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  private consecutiveFailures = 0;
  private openUntil: number | null = null;
  private probeInFlight = false;

  constructor(name: string, options: CircuitBreakerOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer (got ${options.failureThreshold})`);
    }
    if (options.cooldownMs < 0) {
      throw new RangeError(`cooldownMs must not be negative (got ${options.cooldownMs})`);
    }
    this.name = name;
    this.failureThreshold = options.failureThreshold;
    this.cooldownMs = options.cooldownMs;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('@netlens/fallback-breaker');
  }

  get state(): CircuitState {
    if (this.openUntil === null) return 'closed';
    return this.now() < this.openUntil ? 'open' : 'half-open';
  }

  /**
   * Side-effect free: would a call be refused right now?
   */
  isBlocking(): boolean {
    const state = this.state;
    return state === 'open' || (state === 'half-open' && this.probeInFlight);
  }

  /**
   * Ask to make one call. In half-open state the first caller takes the
   * probe slot and every other caller is refused until the probe reports.
   * Null means refused.
   */
  tryAcquire(): CircuitPermit | null {
    const state = this.state;
    if (state === 'closed') return 'call';
    if (state === 'open' || this.probeInFlight) return null;

    this.probeInFlight = true;
    this.log.info({ provider: this.name }, 'Cooldown elapsed, admitting probe call');
    return 'probe';
  }

  /**
   * A call succeeded: close the circuit and forget past failures, whichever
   * permit the call held.
   */
  recordSuccess(): void {
    if (this.openUntil !== null) {
      this.log.info({ provider: this.name }, 'Circuit closed');
    }
    this.consecutiveFailures = 0;
    this.openUntil = null;
    this.probeInFlight = false;
  }

  /**
   * A call failed for a health reason (transport, timeout, 5xx).
   * Returns true when this failure left the circuit open.
   */
  recordFailure(permit: CircuitPermit = 'call'): boolean {
    this.consecutiveFailures += 1;
    if (permit === 'probe') this.probeInFlight = false;

    if (this.consecutiveFailures >= this.failureThreshold) {
      this.openUntil = this.now() + this.cooldownMs;
      this.log.warn(
        { provider: this.name, consecutiveFailures: this.consecutiveFailures, cooldownMs: this.cooldownMs },
        'Circuit opened',
      );
      return true;
    }
    return false;
  }

  /**
   * A call ended without saying anything about provider health (4xx,
   * malformed body, caller cancellation). Frees the probe slot when the
   * outcome belongs to the probe.
   */
  recordNeutral(permit: CircuitPermit = 'call'): void {
    if (permit === 'probe') this.probeInFlight = false;
  }

  snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openUntil: this.openUntil,
    };
  }

  /**
   * Reset to the initial closed state. Useful in tests.
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.openUntil = null;
    this.probeInFlight = false;
  }
}
