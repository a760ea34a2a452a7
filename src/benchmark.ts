// Benchmark runner: drives one session through N synthetic cycles and
// reports the latency summary against the stage budgets.

import { silentLogger, type Logger } from "./logger.js";
import { RecordingOutputChannel } from "./output-channel.js";
import { SyntheticPerceptionProvider, type SyntheticProviderOptions } from "./perception-provider.js";
import type { ResponseGenerator } from "./response-generator.js";
import { SessionRegistry, type SessionSettings } from "./session-registry.js";
import type { TelemetryExporter } from "./telemetry-export.js";
import type { CycleOutcome, TelemetrySummary } from "./types.js";

export interface BenchmarkOptions {
  cycles: number;
  settings: SessionSettings;
  provider?: SyntheticProviderOptions;
  generator?: ResponseGenerator;
  telemetry?: TelemetryExporter;
  logger?: Logger;
}

export interface BenchmarkResult {
  summary: TelemetrySummary;
  outcomes: Record<CycleOutcome, number>;
  captions: string[];
  savedPaths: string[];
}

export async function runBenchmark(options: BenchmarkOptions): Promise<BenchmarkResult> {
  if (!Number.isInteger(options.cycles) || options.cycles < 1) {
    throw new RangeError(`cycles must be a positive integer, got ${options.cycles}`);
  }
  const logger = options.logger ?? silentLogger;

  const registry = new SessionRegistry({
    settings: options.settings,
    generator: options.generator,
    telemetry: options.telemetry,
    loggerFactory: () => logger,
  });
  const output = new RecordingOutputChannel();
  const session = registry.createSession({
    provider: new SyntheticPerceptionProvider(options.provider),
    output,
  });

  const outcomes: Record<CycleOutcome, number> = { responded: 0, pending: 0, cancelled: 0, expired: 0 };
  for (let i = 0; i < options.cycles; i++) {
    const result = await session.runCycle();
    outcomes[result.outcome]++;
  }

  const summary = session.summarize();
  const savedPaths = await registry.closeSession(session.sessionId);
  logger.info(
    `${summary.cycles} cycles: total p50 ${summary.total.p50Ms.toFixed(2)}ms, p95 ${summary.total.p95Ms.toFixed(2)}ms ` +
      `(budget ${summary.total.budgetMs}ms) → ${summary.withinBudget ? "within budget" : "OVER BUDGET"}`,
  );

  return { summary, outcomes, captions: [...output.spoken], savedPaths };
}
