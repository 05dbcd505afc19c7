import { describe, expect, it } from "vitest";
import { PredicateErrorClassifier, recordAllErrors } from "../core/error-classifier.js";
import { ConfigurationError } from "../errors.js";
import { DEFAULT_CONFIG, effectiveMinimumNumberOfCalls, resolveConfig } from "../types/config.js";
import { circuitBreakerNameSchema } from "./config-schema.js";

/** Untyped input, as a config loaded from JSON would arrive. */
function resolveUntyped(input: unknown) {
  return resolveConfig(Object.assign({}, input));
}

describe("config validation", () => {
  it("applies defaults for omitted fields", () => {
    const config = resolveConfig({});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.failureRateThreshold).toBe(50);
    expect(config.slowCallRateThreshold).toBe(100);
    expect(config.slowCallDurationThresholdMs).toBe(60000);
    expect(config.slidingWindowType).toBe("count-based");
    expect(config.slidingWindowSize).toBe(100);
    expect(config.minimumNumberOfCalls).toBe(10);
    expect(config.permittedCallsInHalfOpen).toBe(10);
    expect(config.waitDurationInOpenMs).toBe(60000);
    expect(config.autoTransitionFromOpenToHalfOpen).toBe(false);
    expect(config.maxWaitDurationInHalfOpenMs).toBe(0);
    expect(config.errorClassifier).toBe(recordAllErrors);
  });

  it("keeps supplied values", () => {
    const config = resolveConfig({
      failureRateThreshold: 25,
      slidingWindowType: "time-based",
      slidingWindowSize: 30,
      autoTransitionFromOpenToHalfOpen: true,
    });
    expect(config.failureRateThreshold).toBe(25);
    expect(config.slidingWindowType).toBe("time-based");
    expect(config.slidingWindowSize).toBe(30);
    expect(config.autoTransitionFromOpenToHalfOpen).toBe(true);
    expect(config.minimumNumberOfCalls).toBe(DEFAULT_CONFIG.minimumNumberOfCalls);
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(resolveConfig({}))).toBe(true);
  });

  it("is idempotent on its own output", () => {
    const once = resolveConfig({ failureRateThreshold: 30, recordErrors: [TypeError] });
    const twice = resolveConfig(once);
    expect(twice).toEqual(once);
    expect(twice.errorClassifier).toBe(once.errorClassifier);
  });

  it("fills omitted fields from a custom base", () => {
    const base = resolveConfig({ waitDurationInOpenMs: 500 });
    const config = resolveConfig({ failureRateThreshold: 10 }, base);
    expect(config.waitDurationInOpenMs).toBe(500);
    expect(config.failureRateThreshold).toBe(10);
  });

  it("accepts the boundary values", () => {
    expect(() =>
      resolveConfig({
        failureRateThreshold: 0,
        slowCallRateThreshold: 100,
        slowCallDurationThresholdMs: 0,
        waitDurationInOpenMs: 0,
        slidingWindowSize: 1,
        minimumNumberOfCalls: 1,
        permittedCallsInHalfOpen: 1,
      }),
    ).not.toThrow();
  });

  it("rejects a failure rate threshold above 100", () => {
    expect(() => resolveConfig({ failureRateThreshold: 101 })).toThrow("Invalid configuration");
  });

  it("rejects a negative slow call rate threshold", () => {
    expect(() => resolveConfig({ slowCallRateThreshold: -1 })).toThrow("Invalid configuration");
  });

  it("rejects zero for count fields", () => {
    expect(() => resolveConfig({ slidingWindowSize: 0 })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ minimumNumberOfCalls: 0 })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ permittedCallsInHalfOpen: 0 })).toThrow("Invalid configuration");
  });

  it("rejects non-integer sizes", () => {
    expect(() => resolveConfig({ slidingWindowSize: 2.5 })).toThrow("Invalid configuration");
  });

  it("rejects a negative wait duration", () => {
    expect(() => resolveConfig({ waitDurationInOpenMs: -100 })).toThrow("Invalid configuration");
  });

  it("lists every offending path", () => {
    let error: unknown;
    try {
      resolveConfig({ slidingWindowSize: 0, waitDurationInOpenMs: -1 });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.code).toBe("CONFIGURATION");
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^slidingWindowSize: /);
    expect(error.issues[1]).toMatch(/^waitDurationInOpenMs: /);
  });

  it("rejects an unknown sliding window type", () => {
    expect(() => resolveUntyped({ slidingWindowType: "sessions" })).toThrow("slidingWindowType: ");
  });

  it("rejects a classifier without classify()", () => {
    expect(() => resolveUntyped({ errorClassifier: {} })).toThrow(
      "errorClassifier: must implement classify(error)",
    );
  });

  it("rejects non-class entries in error type lists", () => {
    expect(() => resolveUntyped({ recordErrors: ["TypeError"] })).toThrow(
      "recordErrors.0: must be an error class",
    );
  });

  it("keeps an explicit classifier over predicate options", () => {
    const classifier = new PredicateErrorClassifier({ ignoreErrors: [RangeError] });
    const config = resolveConfig({ errorClassifier: classifier, recordErrors: [TypeError] });
    expect(config.errorClassifier).toBe(classifier);
  });

  it("builds a classifier from predicate options", () => {
    const config = resolveConfig({
      recordErrors: [TypeError],
      ignoreError: (error) => error instanceof RangeError,
    });
    expect(config.errorClassifier.classify(new TypeError("x"))).toBe("failure");
    expect(config.errorClassifier.classify(new RangeError("x"))).toBe("ignored");
    expect(config.errorClassifier.classify(new Error("x"))).toBe("not-matched");
  });
});

describe("effectiveMinimumNumberOfCalls", () => {
  it("caps the minimum at the window size for count-based windows", () => {
    expect(
      effectiveMinimumNumberOfCalls(resolveConfig({ slidingWindowSize: 5, minimumNumberOfCalls: 10 })),
    ).toBe(5);
  });

  it("keeps the minimum for time-based windows", () => {
    expect(
      effectiveMinimumNumberOfCalls(
        resolveConfig({
          slidingWindowType: "time-based",
          slidingWindowSize: 5,
          minimumNumberOfCalls: 10,
        }),
      ),
    ).toBe(10);
  });
});

describe("circuitBreakerNameSchema", () => {
  it("accepts a non-empty name", () => {
    expect(circuitBreakerNameSchema.safeParse("payments").success).toBe(true);
  });

  it("rejects blank names", () => {
    expect(circuitBreakerNameSchema.safeParse("").success).toBe(false);
    expect(circuitBreakerNameSchema.safeParse("   ").success).toBe(false);
  });
});
