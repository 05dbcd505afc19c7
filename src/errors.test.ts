import { describe, expect, it } from "vitest";
import {
  BreakwaterError,
  CallNotPermittedError,
  ConfigurationError,
  ConfigurationNotFoundError,
  errorMessage,
  ProtocolViolationError,
  toBreakwaterError,
} from "./errors.js";

describe("BreakwaterError hierarchy", () => {
  it("BreakwaterError is an Error with code", () => {
    const err = new BreakwaterError("test", "TEST_ERROR");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("BreakwaterError");
    expect(err.code).toBe("TEST_ERROR");
    expect(err.message).toBe("test");
  });

  it("domain errors have correct codes and extend BreakwaterError", () => {
    const config = new ConfigurationError("bad", ["slidingWindowSize: too small"]);
    expect(config).toBeInstanceOf(BreakwaterError);
    expect(config.code).toBe("CONFIGURATION");
    expect(config.name).toBe("ConfigurationError");
    expect(config.issues).toEqual(["slidingWindowSize: too small"]);

    const missing = new ConfigurationNotFoundError("backend");
    expect(missing).toBeInstanceOf(BreakwaterError);
    expect(missing.code).toBe("CONFIGURATION_NOT_FOUND");
    expect(missing.message).toBe('Configuration "backend" not found');

    const violation = new ProtocolViolationError("reused token");
    expect(violation.code).toBe("PROTOCOL_VIOLATION");
    expect(violation.name).toBe("ProtocolViolationError");
  });

  it("CallNotPermittedError carries breaker name and state", () => {
    const err = new CallNotPermittedError("payments", "forced-open");
    expect(err).toBeInstanceOf(BreakwaterError);
    expect(err.code).toBe("CALL_NOT_PERMITTED");
    expect(err.circuitBreakerName).toBe("payments");
    expect(err.state).toBe("forced-open");
    expect(err.message).toBe(
      'Circuit breaker "payments" is FORCED-OPEN and does not permit further calls',
    );
  });

  it("preserves cause chain", () => {
    const cause = new Error("original");
    const err = new ConfigurationError("invalid", [], { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("toBreakwaterError", () => {
  it("passes through BreakwaterError unchanged", () => {
    const err = new BreakwaterError("x", "X");
    expect(toBreakwaterError(err)).toBe(err);
  });

  it("wraps plain Error with cause chain", () => {
    const plain = new Error("plain");
    const wrapped = toBreakwaterError(plain);
    expect(wrapped).toBeInstanceOf(BreakwaterError);
    expect(wrapped.message).toBe("plain");
    expect(wrapped.cause).toBe(plain);
  });

  it("wraps non-Error values", () => {
    expect(toBreakwaterError("string error").message).toBe("string error");
    expect(toBreakwaterError(42).message).toBe("42");
    expect(toBreakwaterError(null).message).toBe("Unknown error");
    expect(toBreakwaterError(undefined).message).toBe("Unknown error");
  });
});

describe("errorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(new BreakwaterError("typed", "T"))).toBe("typed");
  });

  it("stringifies non-Error values", () => {
    expect(errorMessage("string error")).toBe("string error");
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("Unknown error");
    expect(errorMessage(undefined)).toBe("Unknown error");
  });
});
