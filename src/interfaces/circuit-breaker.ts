import type { Metrics } from "../core/breaker-metrics.js";
import type { CircuitState } from "../core/circuit-state.js";
import type { EventBus } from "../core/event-bus.js";
import type { ResolvedConfig } from "../types/config.js";
import type { BreakerEvent } from "../types/events.js";

/**
 * Proof that a call was admitted. Opaque to callers; each token is consumed
 * exactly once by `recordResult`, `recordSuccess`, `recordFailure` or `release`.
 */
export interface PermitToken {
  readonly circuitBreakerName: string;
  /** State the breaker was in when the permit was granted. */
  readonly issuedIn: CircuitState;
  readonly issuedAt: number;
}

export type CallPermission =
  | { permitted: true; token: PermitToken }
  | { permitted: false; state: CircuitState };

export type CallOutcome =
  | { succeeded: true; elapsedMs: number }
  | { succeeded: false; elapsedMs: number; error: unknown };

/**
 * Circuit breaker interface.
 * Gates calls to a protected operation based on the outcomes of recent calls.
 *
 * States: CLOSED (normal) → OPEN (failing) → HALF_OPEN (probing) → CLOSED,
 * plus the operator states FORCED_OPEN, DISABLED and METRICS_ONLY.
 */
export interface CircuitBreaker {
  readonly name: string;
  readonly config: ResolvedConfig;
  readonly state: CircuitState;
  readonly events: EventBus<BreakerEvent>;

  /** Ask to execute a call. Rejections are results, not exceptions. */
  permitCall(): CallPermission;

  /** Whether `permitCall()` would currently grant a permit. Has no side effects. */
  permittingCalls(): boolean;

  /** Report the outcome of a permitted call. */
  recordResult(token: PermitToken, outcome: CallOutcome): void;
  recordSuccess(token: PermitToken, elapsedMs: number): void;
  recordFailure(token: PermitToken, elapsedMs: number, error: unknown): void;

  /** Give back a permit whose call was never executed. */
  release(token: PermitToken): void;

  /** Snapshot of the current state's window. */
  metrics(): Metrics;

  /**
   * Run `fn` under the breaker. Throws CallNotPermittedError without invoking
   * `fn` when the call is rejected; otherwise records and returns/rethrows.
   */
  execute<T>(fn: () => T | Promise<T>): Promise<T>;

  close(): void;
  open(): void;
  halfOpen(): void;
  forceOpen(): void;
  disable(): void;
  metricsOnly(): void;
  /** Back to CLOSED with empty windows. Emits `reset`, not `state-transition`. */
  reset(): void;
}
