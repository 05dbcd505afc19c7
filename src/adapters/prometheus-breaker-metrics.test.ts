import * as promClient from "prom-client";
import { describe, expect, it } from "vitest";
import { CircuitBreakerStateMachine } from "../core/circuit-breaker.js";
import { PrometheusBreakerMetrics } from "./prometheus-breaker-metrics.js";

function makeBreaker(name = "payments") {
  return new CircuitBreakerStateMachine(name, {
    slidingWindowSize: 2,
    minimumNumberOfCalls: 2,
  });
}

function callAndFail(breaker: CircuitBreakerStateMachine) {
  const permission = breaker.permitCall();
  if (!permission.permitted) throw new Error("expected a permit");
  breaker.recordFailure(permission.token, 5, new Error("boom"));
}

describe("PrometheusBreakerMetrics", () => {
  it("exports the bound breaker's current state as a one-hot gauge", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    metrics.bind(makeBreaker());

    const output = await metrics.getMetricsOutput();
    expect(output).toContain('circuitbreaker_state{name="payments",state="closed"} 1');
    expect(output).toContain('circuitbreaker_state{name="payments",state="open"} 0');
    expect(output).toContain('circuitbreaker_state{name="payments",state="metrics-only"} 0');
  });

  it("counts calls by kind", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    const breaker = new CircuitBreakerStateMachine("payments", {
      ignoreErrors: [TypeError],
    });
    metrics.bind(breaker);

    const a = breaker.permitCall();
    const b = breaker.permitCall();
    const c = breaker.permitCall();
    if (!a.permitted || !b.permitted || !c.permitted) throw new Error("expected permits");
    breaker.recordSuccess(a.token, 1);
    breaker.recordFailure(b.token, 1, new Error("boom"));
    breaker.recordFailure(c.token, 1, new TypeError("ignored"));

    const output = await metrics.getMetricsOutput();
    expect(output).toContain('circuitbreaker_calls_total{name="payments",kind="successful"} 1');
    expect(output).toContain('circuitbreaker_calls_total{name="payments",kind="failed"} 1');
    expect(output).toContain('circuitbreaker_calls_total{name="payments",kind="ignored"} 1');
  });

  it("tracks transitions and rejected calls", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    const breaker = makeBreaker();
    metrics.bind(breaker);

    callAndFail(breaker);
    callAndFail(breaker);
    expect(breaker.permitCall().permitted).toBe(false);

    const output = await metrics.getMetricsOutput();
    expect(output).toContain(
      'circuitbreaker_state_transitions_total{name="payments",from="closed",to="open"} 1',
    );
    expect(output).toContain('circuitbreaker_not_permitted_calls_total{name="payments"} 1');
    expect(output).toContain('circuitbreaker_state{name="payments",state="open"} 1');
    expect(output).toContain('circuitbreaker_state{name="payments",state="closed"} 0');
  });

  it("marks the breaker closed again after reset", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    const breaker = makeBreaker();
    metrics.bind(breaker);

    breaker.forceOpen();
    breaker.reset();

    const output = await metrics.getMetricsOutput();
    expect(output).toContain('circuitbreaker_state{name="payments",state="closed"} 1');
    expect(output).toContain('circuitbreaker_state{name="payments",state="forced-open"} 0');
  });

  it("stops counting after unbind", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    const breaker = makeBreaker();
    metrics.bind(breaker);
    metrics.unbind("payments");

    breaker.open();

    expect(breaker.events.subscriberCount).toBe(0);
    const output = await metrics.getMetricsOutput();
    expect(output).toContain('circuitbreaker_state{name="payments",state="closed"} 1');
  });

  it("keeps a single subscription when the same name is bound twice", () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    const first = makeBreaker();
    const second = makeBreaker();
    metrics.bind(first);
    metrics.bind(second);

    expect(first.events.subscriberCount).toBe(0);
    expect(second.events.subscriberCount).toBe(1);
  });

  it("supports custom prefix and default labels", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient, {
      prefix: "myapp_",
      defaultLabels: { service: "checkout" },
    });
    metrics.bind(makeBreaker());

    const output = await metrics.getMetricsOutput();
    expect(output).toContain("# TYPE myapp_state gauge");
    expect(output).toContain('service="checkout"');
  });

  it("reset zeroes the counters", async () => {
    const metrics = new PrometheusBreakerMetrics(promClient);
    const breaker = makeBreaker();
    metrics.bind(breaker);
    callAndFail(breaker);
    metrics.reset();

    const output = await metrics.getMetricsOutput();
    expect(output).not.toContain("circuitbreaker_calls_total{");
  });
});
