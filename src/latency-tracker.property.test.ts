// Property-Based Tests: Latency budget tracker

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { LatencyTracker, STAGE_ORDER, percentile } from "./latency-tracker.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryDuration = () => fc.double({ min: 0, max: 200, noNaN: true, noDefaultInfinity: true });

const arbitraryCycle = () =>
  fc.array(fc.tuple(fc.constantFrom(...STAGE_ORDER), arbitraryDuration()), { minLength: 1, maxLength: 8 });

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: percentile bounds", () => {
  it("p50 ≤ p95 and both lie within [min, max]", () => {
    fc.assert(
      fc.property(fc.array(arbitraryDuration(), { minLength: 1, maxLength: 100 }), (samples) => {
        const p50 = percentile(samples, 50);
        const p95 = percentile(samples, 95);
        expect(p50).toBeLessThanOrEqual(p95);
        expect(p50).toBeGreaterThanOrEqual(Math.min(...samples));
        expect(p95).toBeLessThanOrEqual(Math.max(...samples));
      }),
      { numRuns: 200 },
    );
  });
});

describe("Property: cycle reports", () => {
  it("totals equal the sum of recorded durations and breaches match the budgets", () => {
    fc.assert(
      fc.property(arbitraryCycle(), (stages) => {
        const tracker = new LatencyTracker();
        tracker.beginCycle();
        for (const [stage, ms] of stages) tracker.record(stage, ms);
        const report = tracker.endCycle();

        const expectedTotal = stages.reduce((sum, [, ms]) => sum + ms, 0);
        expect(report.totalMs).toBeCloseTo(expectedTotal, 9);
        expect(report.withinBudget).toBe(report.totalMs <= 95);
        expect(report.breachedStages).toEqual(
          stages.filter(([stage, ms]) => ms > tracker.budgetFor(stage)).map(([stage]) => stage),
        );
      }),
      { numRuns: 200 },
    );
  });

  it("every record belongs to exactly one cycle and the log only grows", () => {
    fc.assert(
      fc.property(fc.array(arbitraryCycle(), { minLength: 1, maxLength: 15 }), (cycles) => {
        const tracker = new LatencyTracker();
        let previousLength = 0;
        cycles.forEach((stages, i) => {
          tracker.beginCycle();
          for (const [stage, ms] of stages) tracker.record(stage, ms);
          tracker.endCycle();

          const records = tracker.records();
          expect(records.length).toBe(previousLength + stages.length);
          expect(records.slice(previousLength).every((r) => r.cycleId === i + 1)).toBe(true);
          previousLength = records.length;
        });

        const summary = tracker.summarize();
        expect(summary.cycles).toBe(cycles.length);
        const counted = Object.values(summary.stages).reduce((sum, s) => sum + s.count, 0);
        expect(counted).toBe(previousLength);
      }),
      { numRuns: 100 },
    );
  });
});
