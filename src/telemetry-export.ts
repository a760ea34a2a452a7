// Telemetry Export
// Writes a session's stage timings and latency summary to disk for external
// monitoring and CI ingestion.
//
//   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
//     stage_timings.jsonl   one StageTiming per line
//     stage_timings.csv     same records, header row first
//     summary.json          TelemetrySummary

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { StageTiming, TelemetrySummary } from "./types.js";

export function formatTimingsJsonl(records: readonly StageTiming[]): string {
  return records.map((r) => JSON.stringify(r)).join("\n") + (records.length > 0 ? "\n" : "");
}

const CSV_HEADER = "cycle_id,stage,duration_ms,budget_ms,within_budget";

export function formatTimingsCsv(records: readonly StageTiming[]): string {
  const rows = records.map(
    (r) => `${r.cycleId},${r.stageName},${r.durationMs.toFixed(3)},${r.budgetMs},${r.withinBudget}`,
  );
  return [CSV_HEADER, ...rows].join("\n") + "\n";
}

export function formatSummary(summary: TelemetrySummary): string {
  return JSON.stringify(summary, null, 2);
}

/**
 * Builds the directory name: YYYY-MM-DD_HH-mm-ss_{sessionId}
 */
export function buildDirectoryName(sessionId: string, date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${stamp}_${sessionId}`;
}

export interface TelemetrySource {
  readonly sessionId: string;
  records(): readonly StageTiming[];
  summarize(): TelemetrySummary;
}

export class TelemetryExporter {
  constructor(
    private readonly baseDir: string = "telemetry",
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** @returns the paths that were written */
  async exportSession(source: TelemetrySource): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(source.sessionId, this.now()));
    await mkdir(dirPath, { recursive: true });

    const records = source.records();
    const files: Array<[string, string]> = [
      ["stage_timings.jsonl", formatTimingsJsonl(records)],
      ["stage_timings.csv", formatTimingsCsv(records)],
      ["summary.json", formatSummary(source.summarize())],
    ];

    const savedPaths: string[] = [];
    for (const [name, content] of files) {
      const filePath = join(dirPath, name);
      await writeFile(filePath, content, "utf-8");
      savedPaths.push(filePath);
    }
    return savedPaths;
  }
}
