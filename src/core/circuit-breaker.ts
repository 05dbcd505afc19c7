import { circuitBreakerNameSchema } from "../config/config-schema.js";
import { CallNotPermittedError, ConfigurationError, ProtocolViolationError } from "../errors.js";
import type {
  CallOutcome,
  CallPermission,
  CircuitBreaker,
  PermitToken,
} from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import {
  type CircuitBreakerConfig,
  effectiveMinimumNumberOfCalls,
  type ResolvedConfig,
  resolveConfig,
} from "../types/config.js";
import type { BreakerEvent } from "../types/events.js";
import { noopLogger } from "../utils/noop-logger.js";
import {
  checkThresholds,
  computeMetrics,
  EMPTY_COUNTS,
  type Metrics,
  type ThresholdBreach,
} from "./breaker-metrics.js";
import { type CircuitState, publishesCallEvents, recordsOutcomes } from "./circuit-state.js";
import { EventBus } from "./event-bus.js";
import { createOutcomeWindow, type OutcomeWindow, type RecordedOutcome } from "./outcome-window.js";

export interface CircuitBreakerOptions {
  logger?: Logger;
  /** Clock used for wait durations, time-based windows and call timing. */
  now?: () => number;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type EventDraft = DistributiveOmit<BreakerEvent, "circuitBreakerName" | "timestamp">;

const FORCE_PUBLISHED: ReadonlySet<BreakerEvent["type"]> = new Set(["state-transition", "reset"]);

/** Largest delay setTimeout honours (2^31 - 1 ms). */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Circuit breaker driven by sliding-window failure and slow-call rates.
 *
 * CLOSED: all calls permitted; opens once the window holds the minimum number
 *   of calls and either rate meets its threshold
 * OPEN: calls rejected until `waitDurationInOpenMs` has elapsed, then HALF_OPEN
 *   (lazily on the next permit request, or by timer when auto-transition is on)
 * HALF_OPEN: admits `permittedCallsInHalfOpen` probes, then closes or reopens
 *   depending on their rates
 * FORCED_OPEN / DISABLED: reject / admit everything, record nothing
 * METRICS_ONLY: admits everything and records, never transitions by itself
 *
 * Every public method runs to completion synchronously, so each
 * read-record-evaluate-transition sequence is atomic with respect to other
 * callers. Events are queued while state is mutated and delivered afterwards,
 * in commit order, including events raised by re-entrant subscriber calls.
 */
export class CircuitBreakerStateMachine implements CircuitBreaker {
  readonly name: string;
  readonly config: ResolvedConfig;
  readonly events: EventBus<BreakerEvent>;

  private current: CircuitState = "closed";
  /** Bumped on every state entry; permits from an earlier epoch are stale. */
  private epoch = 0;

  private readonly closedWindow: OutcomeWindow;
  private readonly halfOpenWindow: OutcomeWindow;
  private readonly metricsOnlyWindow: OutcomeWindow;
  /** Snapshot of the last window-bearing state, reported while none is active. */
  private frozenMetrics: Metrics;

  private openedAt = 0;
  private halfOpenPermitsIssued = 0;
  private notPermittedCalls = 0;
  private raisedAlarms: ThresholdBreach = { failureRate: false, slowCallRate: false };

  private readonly outstanding = new WeakMap<PermitToken, number>();
  private stateTimer: ReturnType<typeof setTimeout> | undefined;

  private readonly outbox: BreakerEvent[] = [];
  private delivering = false;

  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(name: string, config: CircuitBreakerConfig = {}, options: CircuitBreakerOptions = {}) {
    const parsedName = circuitBreakerNameSchema.safeParse(name);
    if (!parsedName.success) {
      throw new ConfigurationError("Invalid circuit breaker name: must be a non-empty string", [
        "name: must be a non-empty string",
      ]);
    }

    this.name = name;
    this.config = resolveConfig(config);
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => Date.now());
    this.events = new EventBus<BreakerEvent>({ logger: this.logger });

    const { slidingWindowType, slidingWindowSize, permittedCallsInHalfOpen } = this.config;
    this.closedWindow = createOutcomeWindow(slidingWindowType, slidingWindowSize, this.now);
    this.metricsOnlyWindow = createOutcomeWindow(slidingWindowType, slidingWindowSize, this.now);
    this.halfOpenWindow = createOutcomeWindow("count-based", permittedCallsInHalfOpen, this.now);
    this.frozenMetrics = computeMetrics(EMPTY_COUNTS, effectiveMinimumNumberOfCalls(this.config));
  }

  get state(): CircuitState {
    return this.current;
  }

  // ---------------------------------------------------------------------------
  // Call permission
  // ---------------------------------------------------------------------------

  permitCall(): CallPermission {
    const permission = this.acquirePermission();
    this.flush();
    return permission;
  }

  permittingCalls(): boolean {
    switch (this.current) {
      case "closed":
      case "disabled":
      case "metrics-only":
        return true;
      case "forced-open":
        return false;
      case "open":
        // The half-open state entered next starts with every permit available.
        return this.openWaitElapsed();
      case "half-open":
        return this.halfOpenPermitsIssued < this.config.permittedCallsInHalfOpen;
    }
  }

  private acquirePermission(): CallPermission {
    switch (this.current) {
      case "closed":
      case "disabled":
      case "metrics-only":
        return this.grant();
      case "forced-open":
        return this.reject();
      case "open":
        if (!this.openWaitElapsed()) return this.reject();
        this.transitionTo("half-open");
        return this.acquireHalfOpenPermit();
      case "half-open":
        return this.acquireHalfOpenPermit();
    }
  }

  private acquireHalfOpenPermit(): CallPermission {
    if (this.halfOpenPermitsIssued >= this.config.permittedCallsInHalfOpen) return this.reject();
    this.halfOpenPermitsIssued++;
    return this.grant();
  }

  private openWaitElapsed(): boolean {
    return this.now() - this.openedAt >= this.config.waitDurationInOpenMs;
  }

  private grant(): CallPermission {
    const token: PermitToken = Object.freeze({
      circuitBreakerName: this.name,
      issuedIn: this.current,
      issuedAt: this.now(),
    });
    this.outstanding.set(token, this.epoch);
    return { permitted: true, token };
  }

  private reject(): CallPermission {
    this.notPermittedCalls++;
    this.enqueue({ type: "not-permitted" });
    return { permitted: false, state: this.current };
  }

  // ---------------------------------------------------------------------------
  // Outcome recording
  // ---------------------------------------------------------------------------

  recordResult(token: PermitToken, outcome: CallOutcome): void {
    const issuedEpoch = this.consume(token);
    const { elapsedMs } = outcome;

    let recorded: RecordedOutcome = "success";
    if (!outcome.succeeded) {
      const classification = this.config.errorClassifier.classify(outcome.error);
      if (classification === "ignored") {
        if (issuedEpoch === this.epoch && this.current === "half-open") {
          this.halfOpenPermitsIssued--;
        }
        this.enqueue({ type: "ignored-error", elapsedMs, error: outcome.error });
        this.flush();
        return;
      }
      if (classification === "failure") {
        recorded = "failure";
        this.enqueue({ type: "error", elapsedMs, error: outcome.error });
      }
    }
    // Errors outside the record rules count as successes.
    if (recorded === "success") this.enqueue({ type: "success", elapsedMs });

    // Results land in the current state's window, whichever state admitted the call.
    this.recordInCurrentState(recorded, elapsedMs >= this.config.slowCallDurationThresholdMs);
    this.flush();
  }

  recordSuccess(token: PermitToken, elapsedMs: number): void {
    this.recordResult(token, { succeeded: true, elapsedMs });
  }

  recordFailure(token: PermitToken, elapsedMs: number, error: unknown): void {
    this.recordResult(token, { succeeded: false, elapsedMs, error });
  }

  release(token: PermitToken): void {
    const issuedEpoch = this.consume(token);
    if (issuedEpoch === this.epoch && this.current === "half-open") {
      this.halfOpenPermitsIssued--;
    }
  }

  private consume(token: PermitToken): number {
    const issuedEpoch = this.outstanding.get(token);
    if (issuedEpoch === undefined) {
      throw new ProtocolViolationError(
        `Permit token is unknown to circuit breaker "${this.name}" or was already consumed`,
      );
    }
    this.outstanding.delete(token);
    return issuedEpoch;
  }

  private recordInCurrentState(outcome: RecordedOutcome, slow: boolean): void {
    const window = this.windowOf(this.current);
    if (!window) return;
    window.record(outcome, slow);

    const metrics = this.metrics();
    const breach = checkThresholds(
      metrics,
      this.config.failureRateThreshold,
      this.config.slowCallRateThreshold,
    );

    switch (this.current) {
      case "closed":
        if (breach.failureRate || breach.slowCallRate) {
          this.raiseThresholdEvents(breach, metrics);
          this.transitionTo("open");
        }
        return;
      case "half-open":
        if (metrics.totalCalls < this.config.permittedCallsInHalfOpen) return;
        if (breach.failureRate || breach.slowCallRate) {
          this.raiseThresholdEvents(breach, metrics);
          this.transitionTo("open");
        } else {
          this.transitionTo("closed");
        }
        return;
      case "metrics-only":
        // Edge-triggered: raise once per crossing, re-arm when the rate drops back.
        this.raiseThresholdEvents(
          {
            failureRate: breach.failureRate && !this.raisedAlarms.failureRate,
            slowCallRate: breach.slowCallRate && !this.raisedAlarms.slowCallRate,
          },
          metrics,
        );
        this.raisedAlarms = breach;
        return;
      case "open":
      case "forced-open":
      case "disabled":
        return;
    }
  }

  private raiseThresholdEvents(breach: ThresholdBreach, metrics: Metrics): void {
    if (breach.failureRate) {
      this.logger.warn("Circuit breaker failure rate exceeded", {
        circuitBreaker: this.name,
        state: this.current,
        failureRate: metrics.failureRate,
        threshold: this.config.failureRateThreshold,
      });
      this.enqueue({ type: "failure-rate-exceeded", failureRate: metrics.failureRate });
    }
    if (breach.slowCallRate) {
      this.logger.warn("Circuit breaker slow call rate exceeded", {
        circuitBreaker: this.name,
        state: this.current,
        slowCallRate: metrics.slowCallRate,
        threshold: this.config.slowCallRateThreshold,
      });
      this.enqueue({ type: "slow-call-rate-exceeded", slowCallRate: metrics.slowCallRate });
    }
  }

  // ---------------------------------------------------------------------------
  // Metrics
  // ---------------------------------------------------------------------------

  metrics(): Metrics {
    const window = this.windowOf(this.current);
    if (!window) return { ...this.frozenMetrics, notPermittedCalls: this.notPermittedCalls };
    return computeMetrics(window.counts(), this.minimumCallsOf(this.current), this.notPermittedCalls);
  }

  private windowOf(state: CircuitState): OutcomeWindow | undefined {
    switch (state) {
      case "closed":
        return this.closedWindow;
      case "half-open":
        return this.halfOpenWindow;
      case "metrics-only":
        return this.metricsOnlyWindow;
      case "open":
      case "forced-open":
      case "disabled":
        return undefined;
    }
  }

  private minimumCallsOf(state: CircuitState): number {
    return state === "half-open"
      ? this.config.permittedCallsInHalfOpen
      : effectiveMinimumNumberOfCalls(this.config);
  }

  // ---------------------------------------------------------------------------
  // Manual transitions
  // ---------------------------------------------------------------------------

  close(): void {
    this.command("closed");
  }

  open(): void {
    this.command("open");
  }

  halfOpen(): void {
    this.command("half-open");
  }

  forceOpen(): void {
    this.command("forced-open");
  }

  disable(): void {
    this.command("disabled");
  }

  metricsOnly(): void {
    this.command("metrics-only");
  }

  reset(): void {
    this.cancelStateTimer();
    this.current = "closed";
    this.epoch++;
    this.closedWindow.reset();
    this.halfOpenWindow.reset();
    this.metricsOnlyWindow.reset();
    this.frozenMetrics = computeMetrics(EMPTY_COUNTS, effectiveMinimumNumberOfCalls(this.config));
    this.halfOpenPermitsIssued = 0;
    this.notPermittedCalls = 0;
    this.raisedAlarms = { failureRate: false, slowCallRate: false };
    this.logger.info("Circuit breaker reset", { circuitBreaker: this.name });
    this.enqueue({ type: "reset" });
    this.flush();
  }

  private command(to: CircuitState): void {
    this.transitionTo(to);
    this.flush();
  }

  // ---------------------------------------------------------------------------
  // State transitions
  // ---------------------------------------------------------------------------

  private transitionTo(to: CircuitState): void {
    const from = this.current;
    if (recordsOutcomes(from)) this.frozenMetrics = this.metrics();

    this.cancelStateTimer();
    this.current = to;
    this.epoch++;
    this.halfOpenPermitsIssued = 0;
    this.notPermittedCalls = 0;
    this.raisedAlarms = { failureRate: false, slowCallRate: false };
    this.windowOf(to)?.reset();

    if (to === "open") {
      this.openedAt = this.now();
      if (this.config.autoTransitionFromOpenToHalfOpen) {
        this.scheduleStateTimer(this.config.waitDurationInOpenMs, "half-open");
      }
    } else if (to === "half-open" && this.config.maxWaitDurationInHalfOpenMs > 0) {
      this.scheduleStateTimer(this.config.maxWaitDurationInHalfOpenMs, "open");
    }

    if (from === to) return;
    this.logger.info("Circuit breaker state transition", { circuitBreaker: this.name, from, to });
    this.enqueue({ type: "state-transition", from, to });
  }

  /**
   * Timer-driven transition. The epoch check makes a timer that outlived its
   * state a no-op even if clearTimeout raced with its firing.
   */
  private scheduleStateTimer(delayMs: number, to: CircuitState, scheduledEpoch = this.epoch): void {
    // Longer delays are armed in slices; setTimeout clamps anything above the max to 1 ms.
    const sliceMs = Math.min(delayMs, MAX_TIMER_DELAY_MS);
    this.stateTimer = setTimeout(() => {
      this.stateTimer = undefined;
      if (this.epoch !== scheduledEpoch) return;
      if (delayMs > sliceMs) {
        this.scheduleStateTimer(delayMs - sliceMs, to, scheduledEpoch);
        return;
      }
      this.transitionTo(to);
      this.flush();
    }, sliceMs);
    this.stateTimer.unref();
  }

  private cancelStateTimer(): void {
    if (this.stateTimer === undefined) return;
    clearTimeout(this.stateTimer);
    this.stateTimer = undefined;
  }

  // ---------------------------------------------------------------------------
  // Protected execution
  // ---------------------------------------------------------------------------

  async execute<T>(fn: () => T | Promise<T>): Promise<T> {
    const permission = this.permitCall();
    if (!permission.permitted) {
      throw new CallNotPermittedError(this.name, permission.state);
    }

    const startedAt = this.now();
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      this.recordFailure(permission.token, this.now() - startedAt, err);
      throw err;
    }
    this.recordSuccess(permission.token, this.now() - startedAt);
    return result;
  }

  // ---------------------------------------------------------------------------
  // Event delivery
  // ---------------------------------------------------------------------------

  private enqueue(draft: EventDraft): void {
    if (!FORCE_PUBLISHED.has(draft.type) && !publishesCallEvents(this.current)) return;
    this.outbox.push({ ...draft, circuitBreakerName: this.name, timestamp: this.now() });
  }

  /** Deliver queued events. Re-entrant calls from subscribers append and return. */
  private flush(): void {
    if (this.delivering) return;
    this.delivering = true;
    try {
      for (let event = this.outbox.shift(); event !== undefined; event = this.outbox.shift()) {
        this.events.publish(event);
      }
    } finally {
      this.delivering = false;
    }
  }
}
