import type { CircuitState } from "./core/circuit-state.js";

export class BreakwaterError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BreakwaterError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Invalid option value. Raised before any breaker or registry entry is built. */
export class ConfigurationError extends BreakwaterError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class ConfigurationNotFoundError extends BreakwaterError {
  readonly configurationName: string;

  constructor(configurationName: string) {
    super(`Configuration "${configurationName}" not found`, "CONFIGURATION_NOT_FOUND");
    this.name = "ConfigurationNotFoundError";
    this.configurationName = configurationName;
  }
}

/**
 * Thrown by `execute` when the breaker rejects a call. The protected
 * operation was not invoked.
 */
export class CallNotPermittedError extends BreakwaterError {
  readonly circuitBreakerName: string;
  readonly state: CircuitState;

  constructor(circuitBreakerName: string, state: CircuitState) {
    super(
      `Circuit breaker "${circuitBreakerName}" is ${state.toUpperCase()} and does not permit further calls`,
      "CALL_NOT_PERMITTED",
    );
    this.name = "CallNotPermittedError";
    this.circuitBreakerName = circuitBreakerName;
    this.state = state;
  }
}

/** A permit token was unknown to the breaker or had already been consumed. */
export class ProtocolViolationError extends BreakwaterError {
  constructor(message: string) {
    super(message, "PROTOCOL_VIOLATION");
    this.name = "ProtocolViolationError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to BreakwaterError (preserves cause chain). */
export function toBreakwaterError(value: unknown): BreakwaterError {
  if (value instanceof BreakwaterError) return value;
  if (value instanceof Error) return new BreakwaterError(value.message, "UNKNOWN", { cause: value });
  return new BreakwaterError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
