import { circuitBreakerConfigSchema } from "../config/config-schema.js";
import { PredicateErrorClassifier, recordAllErrors } from "../core/error-classifier.js";
import { ConfigurationError } from "../errors.js";
import type { ErrorClassifier, ErrorConstructorLike } from "../interfaces/error-classifier.js";

export type SlidingWindowType = "count-based" | "time-based";

/** Circuit breaker configuration; every field is optional and defaulted. */
export interface CircuitBreakerConfig {
  // Thresholds
  failureRateThreshold?: number; // default: 50 (percent)
  slowCallRateThreshold?: number; // default: 100 (percent)
  slowCallDurationThresholdMs?: number; // default: 60000

  // Sliding window
  slidingWindowType?: SlidingWindowType; // default: "count-based"
  slidingWindowSize?: number; // default: 100 (calls, or seconds when time-based)
  minimumNumberOfCalls?: number; // default: 10

  // Open / half-open
  permittedCallsInHalfOpen?: number; // default: 10
  waitDurationInOpenMs?: number; // default: 60000
  autoTransitionFromOpenToHalfOpen?: boolean; // default: false
  maxWaitDurationInHalfOpenMs?: number; // default: 0 (wait for the permitted calls indefinitely)

  // Error classification. An explicit classifier wins over the four fields below it.
  errorClassifier?: ErrorClassifier;
  recordError?: (error: unknown) => boolean;
  ignoreError?: (error: unknown) => boolean;
  recordErrors?: readonly ErrorConstructorLike[];
  ignoreErrors?: readonly ErrorConstructorLike[];
}

/** Fully resolved, frozen configuration. Classifier options are folded into `errorClassifier`. */
export type ResolvedConfig = Readonly<
  Required<
    Omit<CircuitBreakerConfig, "recordError" | "ignoreError" | "recordErrors" | "ignoreErrors">
  >
>;

export const DEFAULT_CONFIG: ResolvedConfig = Object.freeze<ResolvedConfig>({
  failureRateThreshold: 50,
  slowCallRateThreshold: 100,
  slowCallDurationThresholdMs: 60000,
  slidingWindowType: "count-based",
  slidingWindowSize: 100,
  minimumNumberOfCalls: 10,
  permittedCallsInHalfOpen: 10,
  waitDurationInOpenMs: 60000,
  autoTransitionFromOpenToHalfOpen: false,
  maxWaitDurationInHalfOpenMs: 0,
  errorClassifier: recordAllErrors,
});

function buildClassifier(config: CircuitBreakerConfig, fallback: ErrorClassifier): ErrorClassifier {
  if (config.errorClassifier) return config.errorClassifier;
  const { recordError, ignoreError, recordErrors, ignoreErrors } = config;
  if (!recordError && !ignoreError && !recordErrors?.length && !ignoreErrors?.length) {
    return fallback;
  }
  return new PredicateErrorClassifier({ recordError, ignoreError, recordErrors, ignoreErrors });
}

/**
 * Validate a user config and apply defaults from `base`.
 * Throws ConfigurationError listing every invalid field; nothing is built from
 * a rejected config. Resolving an already-resolved config returns an equal one.
 */
export function resolveConfig(
  config: CircuitBreakerConfig = {},
  base: ResolvedConfig = DEFAULT_CONFIG,
): ResolvedConfig {
  const validation = circuitBreakerConfigSchema.safeParse(config);
  if (!validation.success) {
    const issues = validation.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return Object.freeze<ResolvedConfig>({
    failureRateThreshold: config.failureRateThreshold ?? base.failureRateThreshold,
    slowCallRateThreshold: config.slowCallRateThreshold ?? base.slowCallRateThreshold,
    slowCallDurationThresholdMs:
      config.slowCallDurationThresholdMs ?? base.slowCallDurationThresholdMs,
    slidingWindowType: config.slidingWindowType ?? base.slidingWindowType,
    slidingWindowSize: config.slidingWindowSize ?? base.slidingWindowSize,
    minimumNumberOfCalls: config.minimumNumberOfCalls ?? base.minimumNumberOfCalls,
    permittedCallsInHalfOpen: config.permittedCallsInHalfOpen ?? base.permittedCallsInHalfOpen,
    waitDurationInOpenMs: config.waitDurationInOpenMs ?? base.waitDurationInOpenMs,
    autoTransitionFromOpenToHalfOpen:
      config.autoTransitionFromOpenToHalfOpen ?? base.autoTransitionFromOpenToHalfOpen,
    maxWaitDurationInHalfOpenMs:
      config.maxWaitDurationInHalfOpenMs ?? base.maxWaitDurationInHalfOpenMs,
    errorClassifier: buildClassifier(config, base.errorClassifier),
  });
}

/**
 * Minimum sample size actually enforced. A count-based window can never hold
 * more than `slidingWindowSize` calls, so the minimum is capped there.
 */
export function effectiveMinimumNumberOfCalls(config: ResolvedConfig): number {
  return config.slidingWindowType === "count-based"
    ? Math.min(config.minimumNumberOfCalls, config.slidingWindowSize)
    : config.minimumNumberOfCalls;
}
