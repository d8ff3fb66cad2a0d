/**
 * @netlens/fallback - Provider resilience primitives
 *
 * Provides:
 *   - Priority-ordered provider failover with attempt tracking
 *   - Per-provider circuit breakers with a single-probe recovery
 *   - A failure taxonomy that separates provider health from bad requests
 *   - A health report derived from breaker state
 *
 * @packageDocumentation
 */

// Chain - core execution engine
export {
  FallbackChain,
  FallbackChainError,
  type FallbackProvider,
  type FallbackAttempt,
  type FallbackResult,
  type FallbackChainOptions,
} from './chain.js';

// Breaker - per-provider failure isolation
export {
  CircuitBreaker,
  type CircuitState,
  type CircuitPermit,
  type CircuitSnapshot,
  type CircuitBreakerOptions,
} from './circuit-breaker.js';

// Errors - failure taxonomy
export {
  HttpError,
  MalformedResponseError,
  ProviderTimeoutError,
  classifyFailure,
  countsTowardCircuit,
  describeError,
  type FailureKind,
} from './errors.js';

// Health - breaker-derived report
export {
  HealthReporter,
  deriveOverallStatus,
  type ProviderHealth,
  type HealthReport,
  type OverallStatus,
} from './health.js';
