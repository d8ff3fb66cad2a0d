/**
 * @netlens/fallback - HealthReporter
 *
 * Builds a structured health report from the circuit breakers of every
 * provider. Reading the report never touches the network.
 */

import type { CircuitBreaker, CircuitState } from './circuit-breaker.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Health snapshot for a single provider. */
export interface ProviderHealth {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  openUntil: Date | null;
  /** True when the circuit is not closed or has recorded failures. */
  degraded: boolean;
}

/** Overall status level. */
export type OverallStatus = 'healthy' | 'degraded' | 'down';

/** Top-level health report returned by getReport(). */
export interface HealthReport {
  overallStatus: OverallStatus;
  providers: ProviderHealth[];
  generatedAt: Date;
}

// ---------------------------------------------------------------------------
// HealthReporter
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const reporter = new HealthReporter(clients.map((c) => c.breaker));
 * const { overallStatus } = reporter.getReport();
 * ```
 */
export class HealthReporter {
  private readonly breakers: CircuitBreaker[];

  constructor(breakers: CircuitBreaker[]) {
    this.breakers = [...breakers];
  }

  getReport(): HealthReport {
    const providers = this.breakers.map((breaker): ProviderHealth => {
      const snap = breaker.snapshot();
      return {
        name: snap.name,
        state: snap.state,
        consecutiveFailures: snap.consecutiveFailures,
        openUntil: snap.openUntil === null ? null : new Date(snap.openUntil),
        degraded: snap.state !== 'closed' || snap.consecutiveFailures > 0,
      };
    });

    return {
      overallStatus: deriveOverallStatus(providers),
      providers,
      generatedAt: new Date(),
    };
  }
}

// ---------------------------------------------------------------------------
// Status derivation helpers
// ---------------------------------------------------------------------------

/**
 * - healthy : providers exist and none is degraded
 * - degraded: at least one provider can still be called, or none is
 *             configured (answers come from guidance alone)
 * - down    : every configured circuit is open
 */
export function deriveOverallStatus(providers: ProviderHealth[]): OverallStatus {
  if (providers.length === 0) return 'degraded';

  if (providers.every((p) => p.state === 'open')) return 'down';
  if (providers.some((p) => p.degraded)) return 'degraded';
  return 'healthy';
}
