import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { CountBasedWindow, type RecordedOutcome, TimeBasedWindow } from "./outcome-window.js";

const arbOutcome = fc.record({
  outcome: fc.constantFrom<RecordedOutcome>("success", "failure"),
  slow: fc.boolean(),
});

describe("outcome window property tests", () => {
  it("count-based totals equal min(size, recorded)", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 20 }), fc.array(arbOutcome, { maxLength: 60 }), (size, outcomes) => {
        const window = new CountBasedWindow(size);
        for (const { outcome, slow } of outcomes) window.record(outcome, slow);
        expect(window.counts().totalCalls).toBe(Math.min(size, outcomes.length));
      }),
    );
  });

  it("count-based aggregates match a rescan of the last `size` outcomes", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 20 }), fc.array(arbOutcome, { maxLength: 60 }), (size, outcomes) => {
        const window = new CountBasedWindow(size);
        for (const { outcome, slow } of outcomes) window.record(outcome, slow);

        const recent = outcomes.slice(-size);
        expect(window.counts()).toEqual({
          totalCalls: recent.length,
          failedCalls: recent.filter((o) => o.outcome === "failure").length,
          slowCalls: recent.filter((o) => o.slow).length,
          slowFailedCalls: recent.filter((o) => o.slow && o.outcome === "failure").length,
        });
      }),
    );
  });

  it("time-based totals equal the calls recorded in the last `size` seconds", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 10 }),
        fc.array(fc.tuple(fc.integer({ min: 0, max: 2500 }), arbOutcome), { maxLength: 40 }),
        (size, steps) => {
          let now = 1_000_000;
          const window = new TimeBasedWindow(size, () => now);
          const recorded: number[] = [];

          for (const [delay, { outcome, slow }] of steps) {
            now += delay;
            window.record(outcome, slow);
            recorded.push(Math.floor(now / 1000));
          }

          const currentSecond = Math.floor(now / 1000);
          const expected = recorded.filter((second) => second > currentSecond - size).length;
          expect(window.counts().totalCalls).toBe(expected);
        },
      ),
    );
  });
});
