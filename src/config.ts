// Runtime configuration read from the environment (.env is loaded by index.ts).
// Every numeric option is validated here, once, before any session exists.

import { InvalidConfigError } from "./errors.js";
import { DEFAULT_FUSION_CONFIG, validateFusionConfig, type FusionGateConfig } from "./fusion-gate.js";
import {
  DEFAULT_INTERACTION_TIMEOUTS,
  DEFAULT_OBSERVATION_THRESHOLDS,
  validateTimeouts,
  type InteractionTimeouts,
  type ObservationThresholds,
} from "./interaction-fsm.js";
import { DEFAULT_LATENCY_CONFIG } from "./latency-tracker.js";
import { DEFAULT_ORCHESTRATOR_CONFIG } from "./pipeline-orchestrator.js";

export interface AppConfig {
  port: number;
  fusion: FusionGateConfig;
  totalBudgetMs: number;
  staleMultiplier: number;
  thresholds: ObservationThresholds;
  /** Per-state limits after which a stalled activation returns to IDLE. */
  timeouts: InteractionTimeouts;
  minConfirmConfidence: number;
  /** Directory for per-session telemetry artifacts; null disables export. */
  telemetryDir: string | null;
  openai: {
    apiKey: string | null;
    model: string;
  };
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

function inUnitInterval(name: string, value: number): number {
  if (value < 0 || value > 1) {
    throw new InvalidConfigError(name, `must lie in [0, 1], got ${value}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = readNumber(env, "PORT", 3000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidConfigError("PORT", `must be an integer in [0, 65535], got ${port}`);
  }

  const fusion = validateFusionConfig({
    k: readNumber(env, "FUSION_K", DEFAULT_FUSION_CONFIG.k),
    b: readNumber(env, "FUSION_BIAS", DEFAULT_FUSION_CONFIG.b),
    beta: readNumber(env, "FUSION_BETA", DEFAULT_FUSION_CONFIG.beta),
    initialAlpha: DEFAULT_FUSION_CONFIG.initialAlpha,
  });

  const totalBudgetMs = readNumber(env, "TOTAL_BUDGET_MS", DEFAULT_LATENCY_CONFIG.totalBudgetMs);
  if (totalBudgetMs <= 0) {
    throw new InvalidConfigError("TOTAL_BUDGET_MS", `must be positive, got ${totalBudgetMs}`);
  }

  const staleMultiplier = readNumber(env, "STALE_MULTIPLIER", DEFAULT_ORCHESTRATOR_CONFIG.staleMultiplier);
  if (staleMultiplier <= 0) {
    throw new InvalidConfigError("STALE_MULTIPLIER", `must be positive, got ${staleMultiplier}`);
  }

  return {
    port,
    fusion,
    totalBudgetMs,
    staleMultiplier,
    thresholds: {
      minSpeechRatio: inUnitInterval(
        "MIN_SPEECH_RATIO",
        readNumber(env, "MIN_SPEECH_RATIO", DEFAULT_OBSERVATION_THRESHOLDS.minSpeechRatio),
      ),
      minKeyframeSalience: inUnitInterval(
        "MIN_KEYFRAME_SALIENCE",
        readNumber(env, "MIN_KEYFRAME_SALIENCE", DEFAULT_OBSERVATION_THRESHOLDS.minKeyframeSalience),
      ),
    },
    timeouts: validateTimeouts({
      listenTimeoutMs: readNumber(env, "LISTEN_TIMEOUT_MS", DEFAULT_INTERACTION_TIMEOUTS.listenTimeoutMs),
      analyseTimeoutMs: readNumber(env, "ANALYSE_TIMEOUT_MS", DEFAULT_INTERACTION_TIMEOUTS.analyseTimeoutMs),
      responseTimeoutMs: readNumber(env, "RESPONSE_TIMEOUT_MS", DEFAULT_INTERACTION_TIMEOUTS.responseTimeoutMs),
    }),
    minConfirmConfidence: inUnitInterval("MIN_CONFIRM_CONFIDENCE", readNumber(env, "MIN_CONFIRM_CONFIDENCE", 0.5)),
    telemetryDir: readString(env, "TELEMETRY_DIR"),
    openai: {
      apiKey: readString(env, "OPENAI_API_KEY"),
      model: readString(env, "OPENAI_MODEL") ?? "gpt-4o-mini",
    },
  };
}
