import type { SlidingWindowType } from "../types/config.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import type { WindowCounts } from "./breaker-metrics.js";

/** Outcome of a non-ignored call as seen by a window. */
export type RecordedOutcome = "success" | "failure";

/**
 * Aggregates call outcomes over a bounded window.
 * Ignored calls never reach a window; callers filter them out first.
 */
export interface OutcomeWindow {
  readonly type: SlidingWindowType;
  readonly size: number;
  record(outcome: RecordedOutcome, slow: boolean): void;
  counts(): WindowCounts;
  reset(): void;
}

interface Sample {
  failed: boolean;
  slow: boolean;
}

function addSample(counts: WindowCounts, sample: Sample, sign: 1 | -1): void {
  counts.totalCalls += sign;
  if (sample.failed) counts.failedCalls += sign;
  if (sample.slow) counts.slowCalls += sign;
  if (sample.failed && sample.slow) counts.slowFailedCalls += sign;
}

function zeroCounts(): WindowCounts {
  return { totalCalls: 0, failedCalls: 0, slowCalls: 0, slowFailedCalls: 0 };
}

/**
 * The last `size` outcomes. Running totals are adjusted for the evicted sample
 * on every insert, so `counts()` never rescans the buffer.
 */
export class CountBasedWindow implements OutcomeWindow {
  readonly type = "count-based" as const;
  private readonly samples: RingBuffer<Sample>;
  private totals = zeroCounts();

  constructor(readonly size: number) {
    this.samples = new RingBuffer<Sample>(size);
  }

  record(outcome: RecordedOutcome, slow: boolean): void {
    const sample: Sample = { failed: outcome === "failure", slow };
    const evicted = this.samples.push(sample);
    if (evicted) addSample(this.totals, evicted, -1);
    addSample(this.totals, sample, 1);
  }

  counts(): WindowCounts {
    return { ...this.totals };
  }

  reset(): void {
    this.samples.clear();
    this.totals = zeroCounts();
  }
}

interface Bucket extends WindowCounts {
  epochSecond: number;
}

/**
 * `size` one-second buckets addressed by `epochSecond % size`.
 *
 * Buckets that fall out of the window are cleared lazily whenever the clock
 * has moved past the newest bucket, and subtracted from the running totals.
 */
export class TimeBasedWindow implements OutcomeWindow {
  readonly type = "time-based" as const;
  private readonly buckets: Bucket[];
  private totals = zeroCounts();
  private headSecond: number;

  constructor(
    readonly size: number,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError("TimeBasedWindow size must be a positive integer");
    }
    this.headSecond = this.currentSecond();
    this.buckets = Array.from({ length: size }, () => ({ epochSecond: -1, ...zeroCounts() }));
  }

  record(outcome: RecordedOutcome, slow: boolean): void {
    const bucket = this.advance();
    const sample: Sample = { failed: outcome === "failure", slow };
    addSample(bucket, sample, 1);
    addSample(this.totals, sample, 1);
  }

  counts(): WindowCounts {
    this.advance();
    return { ...this.totals };
  }

  reset(): void {
    for (const bucket of this.buckets) this.clearBucket(bucket, -1);
    this.totals = zeroCounts();
    this.headSecond = this.currentSecond();
  }

  private currentSecond(): number {
    return Math.floor(this.now() / 1000);
  }

  /** Roll the window forward to the current second and return its bucket. */
  private advance(): Bucket {
    const second = this.currentSecond();

    // A clock that went backwards keeps writing into the newest bucket.
    if (second > this.headSecond) {
      const steps = Math.min(second - this.headSecond, this.size);
      for (let s = second - steps + 1; s <= second; s++) {
        const bucket = this.bucketFor(s);
        this.totals.totalCalls -= bucket.totalCalls;
        this.totals.failedCalls -= bucket.failedCalls;
        this.totals.slowCalls -= bucket.slowCalls;
        this.totals.slowFailedCalls -= bucket.slowFailedCalls;
        this.clearBucket(bucket, s);
      }
      this.headSecond = second;
    }

    const head = this.bucketFor(this.headSecond);
    if (head.epochSecond !== this.headSecond) this.clearBucket(head, this.headSecond);
    return head;
  }

  private bucketFor(epochSecond: number): Bucket {
    return this.buckets[epochSecond % this.size];
  }

  private clearBucket(bucket: Bucket, epochSecond: number): void {
    bucket.epochSecond = epochSecond;
    bucket.totalCalls = 0;
    bucket.failedCalls = 0;
    bucket.slowCalls = 0;
    bucket.slowFailedCalls = 0;
  }
}

export function createOutcomeWindow(
  type: SlidingWindowType,
  size: number,
  now: () => number = Date.now,
): OutcomeWindow {
  switch (type) {
    case "count-based":
      return new CountBasedWindow(size);
    case "time-based":
      return new TimeBasedWindow(size, now);
  }
}
