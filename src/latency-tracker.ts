// ─── Latency Budget Tracker ─────────────────────────────────────────────────────
// Records per-stage durations against static budgets and aggregates percentiles.
// Breaches are observational: the tracker never aborts a cycle.

import { InvalidConfigError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  CycleReport,
  HealthStatus,
  LatencySummary,
  PipelineStage,
  StageSummary,
  StageTiming,
} from "./types.js";

export type StageBudgets = Record<PipelineStage, number>;

export interface LatencyBudgetConfig {
  stageBudgets: StageBudgets;
  /** End-to-end p95 budget for one cycle. Default: 95 */
  totalBudgetMs: number;
  /** Number of recent cycle totals the health check looks at. Default: 20 */
  healthWindow: number;
  /** Cycles required before the tracker reports "degraded". Default: 5 */
  minHealthSamples: number;
  /** Completed cycles kept for summaries and export; older ones are evicted with their records. Default: 10000 */
  retainCycles: number;
}

export const DEFAULT_STAGE_BUDGETS: Readonly<StageBudgets> = Object.freeze({
  capture: 5,
  vad: 6,
  asr: 5,
  keyframe: 40,
  fusion: 2,
  fsm: 2,
  response: 55,
  dispatch: 8,
});

export const DEFAULT_LATENCY_CONFIG: Readonly<LatencyBudgetConfig> = Object.freeze({
  stageBudgets: DEFAULT_STAGE_BUDGETS,
  totalBudgetMs: 95,
  healthWindow: 20,
  minHealthSamples: 5,
  retainCycles: 10_000,
});

/** Stage order used for reporting. */
export const STAGE_ORDER: readonly PipelineStage[] = [
  "capture",
  "vad",
  "asr",
  "keyframe",
  "fusion",
  "fsm",
  "response",
  "dispatch",
];

/**
 * Percentile with linear interpolation between closest ranks.
 * Returns 0 for an empty sample set.
 */
export function percentile(samples: readonly number[], p: number): number {
  if (samples.length === 0) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  if (p <= 0) return sorted[0];
  if (p >= 100) return sorted[sorted.length - 1];

  const position = (sorted.length - 1) * (p / 100);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  const fraction = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

function validateLatencyConfig(config: LatencyBudgetConfig): LatencyBudgetConfig {
  for (const [stage, budget] of Object.entries(config.stageBudgets)) {
    if (!Number.isFinite(budget) || budget <= 0) {
      throw new InvalidConfigError(`stageBudgets.${stage}`, `must be a positive number of ms, got ${budget}`);
    }
  }
  if (!Number.isFinite(config.totalBudgetMs) || config.totalBudgetMs <= 0) {
    throw new InvalidConfigError("totalBudgetMs", `must be a positive number of ms, got ${config.totalBudgetMs}`);
  }
  if (!Number.isInteger(config.healthWindow) || config.healthWindow < 1) {
    throw new InvalidConfigError("healthWindow", `must be a positive integer, got ${config.healthWindow}`);
  }
  if (!Number.isInteger(config.minHealthSamples) || config.minHealthSamples < 1) {
    throw new InvalidConfigError("minHealthSamples", `must be a positive integer, got ${config.minHealthSamples}`);
  }
  if (!Number.isInteger(config.retainCycles) || config.retainCycles < config.healthWindow) {
    throw new InvalidConfigError(
      "retainCycles",
      `must be an integer no smaller than healthWindow (${config.healthWindow}), got ${config.retainCycles}`,
    );
  }
  return config;
}

export interface LatencyTrackerOptions {
  config?: Partial<LatencyBudgetConfig>;
  logger?: Logger;
  /** Monotonic clock in milliseconds. Defaults to performance.now(). */
  now?: () => number;
  /** Called whenever the health status changes. */
  onHealthChange?: (status: HealthStatus, totalP95Ms: number) => void;
}

interface CycleRecord {
  cycleId: number;
  timings: StageTiming[];
  totalMs: number;
}

export class LatencyTracker {
  readonly config: Readonly<LatencyBudgetConfig>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly onHealthChange?: (status: HealthStatus, totalP95Ms: number) => void;

  private readonly log: StageTiming[] = [];
  private readonly cycles: CycleRecord[] = [];
  private open: CycleRecord | null = null;
  private nextCycleId = 1;
  private evicted = 0;
  private healthStatus: HealthStatus = "ok";

  constructor(options: LatencyTrackerOptions = {}) {
    const merged: LatencyBudgetConfig = {
      ...DEFAULT_LATENCY_CONFIG,
      ...options.config,
      stageBudgets: { ...DEFAULT_STAGE_BUDGETS, ...options.config?.stageBudgets },
    };
    this.config = Object.freeze(validateLatencyConfig(merged));
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.onHealthChange = options.onHealthChange;
  }

  get health(): HealthStatus {
    return this.healthStatus;
  }

  /** Completed cycles since construction, evicted ones included. */
  get cycleCount(): number {
    return this.cycles.length + this.evicted;
  }

  budgetFor(stageName: string): number {
    const budgets: Record<string, number> = this.config.stageBudgets;
    return budgets[stageName] ?? this.config.totalBudgetMs;
  }

  /** Open a new cycle; an unfinished previous cycle is closed first. */
  beginCycle(): number {
    if (this.open) {
      this.endCycle();
    }
    this.open = { cycleId: this.nextCycleId++, timings: [], totalMs: 0 };
    return this.open.cycleId;
  }

  /**
   * Append one StageTiming. Outside beginCycle()/endCycle() the timing forms
   * a single-stage cycle of its own.
   */
  record(stageName: string, durationMs: number): StageTiming {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new InvalidConfigError("durationMs", `stage "${stageName}" duration must be a non-negative number, got ${durationMs}`);
    }

    const implicit = this.open === null;
    if (implicit) this.beginCycle();
    const cycle = this.requireOpenCycle();

    const budgetMs = this.budgetFor(stageName);
    const timing: StageTiming = Object.freeze({
      cycleId: cycle.cycleId,
      stageName,
      durationMs,
      budgetMs,
      withinBudget: durationMs <= budgetMs,
    });

    if (!timing.withinBudget) {
      this.logger.warn(`stage "${stageName}" took ${durationMs.toFixed(2)}ms (budget ${budgetMs}ms)`);
    }

    cycle.timings.push(timing);
    cycle.totalMs += durationMs;
    this.log.push(timing);

    if (implicit) this.endCycle();
    return timing;
  }

  /** Time a sync or async stage with the tracker's clock and record it. */
  async measure<T>(stageName: string, fn: () => T | Promise<T>): Promise<T> {
    const start = this.now();
    try {
      return await fn();
    } finally {
      this.record(stageName, Math.max(0, this.now() - start));
    }
  }

  /** Close the current cycle and re-evaluate health. */
  endCycle(): CycleReport {
    const cycle = this.requireOpenCycle();
    this.open = null;
    this.cycles.push(cycle);
    this.evictBeyondRetention();

    const breachedStages = cycle.timings.filter((t) => !t.withinBudget).map((t) => t.stageName);
    const report: CycleReport = {
      cycleId: cycle.cycleId,
      timings: [...cycle.timings],
      totalMs: cycle.totalMs,
      withinBudget: cycle.totalMs <= this.config.totalBudgetMs,
      breachedStages,
    };

    this.evaluateHealth();
    return report;
  }

  /** Flat append-only record list for telemetry export, limited to retained cycles. */
  records(): readonly StageTiming[] {
    return [...this.log];
  }

  /**
   * p50/p95 per stage plus the cycle total, over the last `window` cycles
   * (all retained cycles when omitted; none when `window` is below 1).
   */
  summarize(window?: number): LatencySummary {
    const selected =
      window === undefined ? this.cycles : !(window >= 1) ? [] : this.cycles.slice(-Math.floor(window));

    const byStage = new Map<string, number[]>();
    for (const cycle of selected) {
      for (const timing of cycle.timings) {
        const samples = byStage.get(timing.stageName) ?? [];
        samples.push(timing.durationMs);
        byStage.set(timing.stageName, samples);
      }
    }

    const stages: Record<string, StageSummary> = {};
    const ordered = [
      ...STAGE_ORDER.filter((s) => byStage.has(s)),
      ...[...byStage.keys()].filter((s) => !STAGE_ORDER.some((known) => known === s)),
    ];
    for (const stageName of ordered) {
      const samples = byStage.get(stageName) ?? [];
      const budgetMs = this.budgetFor(stageName);
      stages[stageName] = {
        count: samples.length,
        p50Ms: percentile(samples, 50),
        p95Ms: percentile(samples, 95),
        budgetMs,
        breaches: samples.filter((d) => d > budgetMs).length,
      };
    }

    const totals = selected.map((c) => c.totalMs);
    const totalP95 = percentile(totals, 95);
    return {
      cycles: selected.length,
      stages,
      total: { p50Ms: percentile(totals, 50), p95Ms: totalP95, budgetMs: this.config.totalBudgetMs },
      withinBudget: totalP95 <= this.config.totalBudgetMs,
      health: this.healthStatus,
    };
  }

  // Cycles close in id order, so the log holds each cycle's timings contiguously.
  private evictBeyondRetention(): void {
    while (this.cycles.length > this.config.retainCycles) {
      const oldest = this.cycles.shift();
      if (oldest === undefined) return;
      this.log.splice(0, oldest.timings.length);
      this.evicted++;
    }
  }

  private requireOpenCycle(): CycleRecord {
    if (this.open === null) {
      throw new Error("No open cycle: call beginCycle() before endCycle().");
    }
    return this.open;
  }

  // Only a sustained breach of the total p95 over the rolling window degrades health.
  private evaluateHealth(): void {
    const recent = this.cycles.slice(-this.config.healthWindow).map((c) => c.totalMs);
    const totalP95 = percentile(recent, 95);
    const next: HealthStatus =
      recent.length >= this.config.minHealthSamples && totalP95 > this.config.totalBudgetMs ? "degraded" : "ok";

    if (next === this.healthStatus) return;
    this.healthStatus = next;

    if (next === "degraded") {
      this.logger.warn(`total p95 ${totalP95.toFixed(2)}ms over the last ${recent.length} cycles exceeds ${this.config.totalBudgetMs}ms budget`);
    } else {
      this.logger.info(`total p95 back within budget (${totalP95.toFixed(2)}ms)`);
    }
    this.onHealthChange?.(next, totalP95);
  }
}
