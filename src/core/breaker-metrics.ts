/** Raw aggregates kept by an outcome window. */
export interface WindowCounts {
  totalCalls: number;
  failedCalls: number;
  slowCalls: number;
  slowFailedCalls: number;
}

/** Point-in-time snapshot of a breaker's current window. */
export interface Metrics {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  slowCalls: number;
  slowSuccessfulCalls: number;
  slowFailedCalls: number;
  /** Calls rejected since the current state was entered. */
  notPermittedCalls: number;
  /** Percentage of failed calls, or -1 below the minimum number of calls. */
  failureRate: number;
  /** Percentage of slow calls, or -1 below the minimum number of calls. */
  slowCallRate: number;
}

export interface ThresholdBreach {
  failureRate: boolean;
  slowCallRate: boolean;
}

export const EMPTY_COUNTS: Readonly<WindowCounts> = Object.freeze({
  totalCalls: 0,
  failedCalls: 0,
  slowCalls: 0,
  slowFailedCalls: 0,
});

export function computeMetrics(
  counts: Readonly<WindowCounts>,
  minimumNumberOfCalls: number,
  notPermittedCalls = 0,
): Metrics {
  const { totalCalls, failedCalls, slowCalls, slowFailedCalls } = counts;
  const meaningful = totalCalls > 0 && totalCalls >= minimumNumberOfCalls;
  return {
    totalCalls,
    successfulCalls: totalCalls - failedCalls,
    failedCalls,
    slowCalls,
    slowSuccessfulCalls: slowCalls - slowFailedCalls,
    slowFailedCalls,
    notPermittedCalls,
    failureRate: meaningful ? (failedCalls * 100) / totalCalls : -1,
    slowCallRate: meaningful ? (slowCalls * 100) / totalCalls : -1,
  };
}

/** A rate of -1 never breaches, whatever the threshold. */
export function checkThresholds(
  metrics: Metrics,
  failureRateThreshold: number,
  slowCallRateThreshold: number,
): ThresholdBreach {
  return {
    failureRate: metrics.failureRate >= 0 && metrics.failureRate >= failureRateThreshold,
    slowCallRate: metrics.slowCallRate >= 0 && metrics.slowCallRate >= slowCallRateThreshold,
  };
}
