/**
 * @netlens/fallback - Provider failure taxonomy
 *
 * Every provider failure is reduced to a FailureKind. Retry and circuit
 * decisions are made on the kind, never on vendor-specific error shapes.
 */

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Custom error that carries an HTTP status code so callers can decide
 * whether the failure is the provider's or the request's.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** The provider answered 2xx but the body held no usable completion. */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

/** A single attempt ran past its hard deadline. */
export class ProviderTimeoutError extends Error {
  constructor(
    public readonly provider: string,
    public readonly timeoutMs: number,
  ) {
    super(`Provider "${provider}" timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type FailureKind = 'server' | 'client' | 'malformed' | 'timeout' | 'transport' | 'aborted';

/**
 * Map an error thrown by a provider call onto a FailureKind.
 *
 *   - 5xx                       -> server
 *   - any other HTTP status     -> client
 *   - empty / unparsable body   -> malformed
 *   - attempt deadline          -> timeout
 *   - caller cancellation       -> aborted
 *   - anything else (DNS, reset, refused) -> transport
 */
export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof HttpError) {
    return err.statusCode >= 500 && err.statusCode <= 599 ? 'server' : 'client';
  }
  if (err instanceof MalformedResponseError) return 'malformed';
  if (err instanceof ProviderTimeoutError) return 'timeout';
  if (err instanceof Error && err.name === 'AbortError') return 'aborted';
  return 'transport';
}

/**
 * Whether a failure says something about the provider's health. Only these
 * count toward opening a circuit, and only these are retried.
 */
export function countsTowardCircuit(kind: FailureKind): boolean {
  return kind === 'server' || kind === 'timeout' || kind === 'transport';
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
