// Command-line benchmark: `npm run bench -- [cycles]`

import "dotenv/config";
import { runBenchmark } from "./benchmark.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { TelemetryExporter } from "./telemetry-export.js";

const DEFAULT_CYCLES = 100;

async function main(): Promise<void> {
  const config = loadConfig();
  const cycles = process.argv[2] ? parseInt(process.argv[2], 10) : DEFAULT_CYCLES;
  const logger = createConsoleLogger("Benchmark");

  const result = await runBenchmark({
    cycles,
    settings: config,
    telemetry: new TelemetryExporter(config.telemetryDir ?? "telemetry"),
    logger,
  });

  for (const [stage, stats] of Object.entries(result.summary.stages)) {
    logger.info(
      `${stage.padEnd(9)} p50 ${stats.p50Ms.toFixed(3)}ms  p95 ${stats.p95Ms.toFixed(3)}ms  budget ${stats.budgetMs}ms  breaches ${stats.breaches}`,
    );
  }
  logger.info(`mean fused score ${result.summary.meanFusedScore.toFixed(4)}, responses ${result.summary.responsesDispatched}`);
  for (const path of result.savedPaths) {
    logger.info(`wrote ${path}`);
  }
  process.exitCode = result.summary.withinBudget ? 0 : 1;
}

main().catch((err: unknown) => {
  console.error(`[FATAL] ${errorMessage(err)}`);
  process.exit(1);
});
