import { CIRCUIT_STATES, type CircuitState } from "../core/circuit-state.js";
import type { Subscription } from "../core/event-bus.js";
import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { BreakerEvent } from "../types/events.js";

type PromClient = typeof import("prom-client");

/**
 * Prometheus export for circuit breakers, using a private registry.
 * Requires prom-client to be passed in at construction time.
 *
 *   const metrics = new PrometheusBreakerMetrics(promClient);
 *   metrics.bind(breaker);
 *   res.end(await metrics.getMetricsOutput());
 */
export class PrometheusBreakerMetrics {
  private readonly registry: InstanceType<PromClient["Registry"]>;

  // Counters
  private readonly callsTotal: InstanceType<PromClient["Counter"]>;
  private readonly notPermittedCallsTotal: InstanceType<PromClient["Counter"]>;
  private readonly stateTransitionsTotal: InstanceType<PromClient["Counter"]>;

  // Gauges
  private readonly state: InstanceType<PromClient["Gauge"]>;

  private readonly bindings = new Map<string, Subscription>();

  constructor(
    promClient: PromClient,
    options?: { prefix?: string; defaultLabels?: Record<string, string> },
  ) {
    const prefix = options?.prefix ?? "circuitbreaker_";
    this.registry = new promClient.Registry();

    if (options?.defaultLabels) {
      this.registry.setDefaultLabels(options.defaultLabels);
    }

    // Counters
    this.callsTotal = new promClient.Counter({
      name: `${prefix}calls_total`,
      help: "Total permitted calls by outcome",
      labelNames: ["name", "kind"],
      registers: [this.registry],
    });

    this.notPermittedCallsTotal = new promClient.Counter({
      name: `${prefix}not_permitted_calls_total`,
      help: "Total calls rejected by the circuit breaker",
      labelNames: ["name"],
      registers: [this.registry],
    });

    this.stateTransitionsTotal = new promClient.Counter({
      name: `${prefix}state_transitions_total`,
      help: "Total circuit breaker state transitions",
      labelNames: ["name", "from", "to"],
      registers: [this.registry],
    });

    // Gauges
    this.state = new promClient.Gauge({
      name: `${prefix}state`,
      help: "Circuit breaker state (1 for the current state, 0 otherwise)",
      labelNames: ["name", "state"],
      registers: [this.registry],
    });
  }

  /**
   * Start exporting `breaker`. Binding a second breaker under a name already
   * bound replaces the first binding.
   */
  bind(breaker: CircuitBreaker): void {
    this.unbind(breaker.name);
    this.setState(breaker.name, breaker.state);
    this.bindings.set(
      breaker.name,
      breaker.events.subscribe((event) => this.recordEvent(event)),
    );
  }

  /** Stop exporting the breaker called `name`. Its series keep their last values. */
  unbind(name: string): void {
    this.bindings.get(name)?.unsubscribe();
    this.bindings.delete(name);
  }

  recordEvent(event: BreakerEvent): void {
    const name = event.circuitBreakerName;
    switch (event.type) {
      case "success":
        this.callsTotal.inc({ name, kind: "successful" });
        break;
      case "error":
        this.callsTotal.inc({ name, kind: "failed" });
        break;
      case "ignored-error":
        this.callsTotal.inc({ name, kind: "ignored" });
        break;
      case "not-permitted":
        this.notPermittedCallsTotal.inc({ name });
        break;
      case "state-transition":
        this.stateTransitionsTotal.inc({ name, from: event.from, to: event.to });
        this.setState(name, event.to);
        break;
      case "reset":
        this.setState(name, "closed");
        break;
      case "failure-rate-exceeded":
      case "slow-call-rate-exceeded":
        break;
    }
  }

  async getMetricsOutput(): Promise<string> {
    return this.registry.metrics();
  }

  reset(): void {
    this.registry.resetMetrics();
  }

  private setState(name: string, current: CircuitState): void {
    for (const state of CIRCUIT_STATES) {
      this.state.set({ name, state }, state === current ? 1 : 0);
    }
  }
}
