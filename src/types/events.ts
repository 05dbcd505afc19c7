import type { CircuitState } from "../core/circuit-state.js";
import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";

interface BreakerEventBase {
  circuitBreakerName: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
}

export interface SuccessEvent extends BreakerEventBase {
  type: "success";
  elapsedMs: number;
}

export interface ErrorEvent extends BreakerEventBase {
  type: "error";
  elapsedMs: number;
  error: unknown;
}

export interface IgnoredErrorEvent extends BreakerEventBase {
  type: "ignored-error";
  elapsedMs: number;
  error: unknown;
}

export interface NotPermittedEvent extends BreakerEventBase {
  type: "not-permitted";
}

export interface StateTransitionEvent extends BreakerEventBase {
  type: "state-transition";
  from: CircuitState;
  to: CircuitState;
}

export interface ResetEvent extends BreakerEventBase {
  type: "reset";
}

export interface FailureRateExceededEvent extends BreakerEventBase {
  type: "failure-rate-exceeded";
  failureRate: number;
}

export interface SlowCallRateExceededEvent extends BreakerEventBase {
  type: "slow-call-rate-exceeded";
  slowCallRate: number;
}

export type BreakerEvent =
  | SuccessEvent
  | ErrorEvent
  | IgnoredErrorEvent
  | NotPermittedEvent
  | StateTransitionEvent
  | ResetEvent
  | FailureRateExceededEvent
  | SlowCallRateExceededEvent;

export type BreakerEventType = BreakerEvent["type"];

// ── Registry events ──

interface RegistryEventBase {
  timestamp: number;
}

export interface EntryAddedEvent extends RegistryEventBase {
  type: "added";
  addedEntry: CircuitBreaker;
}

export interface EntryRemovedEvent extends RegistryEventBase {
  type: "removed";
  removedEntry: CircuitBreaker;
}

export interface EntryReplacedEvent extends RegistryEventBase {
  type: "replaced";
  oldEntry: CircuitBreaker;
  newEntry: CircuitBreaker;
}

export type RegistryEvent = EntryAddedEvent | EntryRemovedEvent | EntryReplacedEvent;

export type RegistryEventType = RegistryEvent["type"];
