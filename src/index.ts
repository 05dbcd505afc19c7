/**
 * Public API barrel.
 *
 * Re-exports the breaker, its registry, the event plumbing, adapters and the
 * types that make up the public surface area of the package.
 * @module
 */

// Adapters
export { PrometheusBreakerMetrics } from "./adapters/prometheus-breaker-metrics.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { circuitBreakerConfigSchema } from "./config/config-schema.js";
// Core
export type { Metrics, WindowCounts } from "./core/breaker-metrics.js";
export type { CircuitBreakerOptions } from "./core/circuit-breaker.js";
export { CircuitBreakerStateMachine } from "./core/circuit-breaker.js";
export { CircuitBreakerRegistry, DEFAULT_CONFIG_NAME } from "./core/circuit-breaker-registry.js";
export type { CircuitState } from "./core/circuit-state.js";
export { CIRCUIT_STATES } from "./core/circuit-state.js";
export type { PredicateClassifierOptions } from "./core/error-classifier.js";
export { PredicateErrorClassifier, recordAllErrors } from "./core/error-classifier.js";
export type { EventFilter, EventListener, EventSink, Subscription } from "./core/event-bus.js";
export { EventBus } from "./core/event-bus.js";
export { EventChannel } from "./core/event-channel.js";
export type { OutcomeWindow, RecordedOutcome } from "./core/outcome-window.js";
export { CountBasedWindow, createOutcomeWindow, TimeBasedWindow } from "./core/outcome-window.js";
// Errors
export {
  BreakwaterError,
  CallNotPermittedError,
  ConfigurationError,
  ConfigurationNotFoundError,
  errorMessage,
  ProtocolViolationError,
  toBreakwaterError,
} from "./errors.js";
// Interfaces
export type {
  CallOutcome,
  CallPermission,
  CircuitBreaker,
  PermitToken,
} from "./interfaces/circuit-breaker.js";
export type {
  ErrorClassification,
  ErrorClassifier,
  ErrorConstructorLike,
} from "./interfaces/error-classifier.js";
export type { Logger } from "./interfaces/logger.js";
// Types
export type { CircuitBreakerConfig, ResolvedConfig, SlidingWindowType } from "./types/config.js";
export { DEFAULT_CONFIG, effectiveMinimumNumberOfCalls, resolveConfig } from "./types/config.js";
export type {
  BreakerEvent,
  BreakerEventType,
  EntryAddedEvent,
  EntryRemovedEvent,
  EntryReplacedEvent,
  ErrorEvent,
  FailureRateExceededEvent,
  IgnoredErrorEvent,
  NotPermittedEvent,
  RegistryEvent,
  RegistryEventType,
  ResetEvent,
  SlowCallRateExceededEvent,
  StateTransitionEvent,
  SuccessEvent,
} from "./types/events.js";
