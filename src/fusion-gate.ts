// ─── Fusion Gate ────────────────────────────────────────────────────────────────
// Blends vision and audio confidence into a smoothed control value α(t).
// α near 1 favours the vision stream, α near 0 favours audio.

import { InvalidConfidenceError, InvalidConfigError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ConfidenceSample, FusionState } from "./types.js";

export interface FusionGateConfig {
  /** Steepness of the logistic transition. Default: 4 */
  k: number;
  /** Midpoint offset added to the scaled difference. Default: 0 */
  b: number;
  /** Smoothing factor in (0, 1]. Larger is more responsive. Default: 0.25 */
  beta: number;
  /** Prior α before the first update. Default: 0.5 */
  initialAlpha: number;
}

export const DEFAULT_FUSION_CONFIG: Readonly<FusionGateConfig> = Object.freeze({
  k: 4,
  b: 0,
  beta: 0.25,
  initialAlpha: 0.5,
});

/** Exponent arguments are clamped to ±LOGISTIC_LIMIT; exp(60) is still finite. */
const LOGISTIC_LIMIT = 60;

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Logistic sigmoid that never overflows: branches on the sign of `x` so the
 * exponent passed to Math.exp is always ≤ 0.
 */
export function stableLogistic(x: number): number {
  if (x >= 0) {
    const z = Math.exp(-Math.min(x, LOGISTIC_LIMIT));
    return 1 / (1 + z);
  }
  const z = Math.exp(Math.max(x, -LOGISTIC_LIMIT));
  return z / (1 + z);
}

/** α_raw = logistic(k·(cVision − cAudio) + b) */
export function alphaFromConfidence(cVision: number, cAudio: number, k: number, b: number): number {
  return stableLogistic(k * (cVision - cAudio) + b);
}

/** One exponential-smoothing step, clamped against floating-point drift. */
export function smoothAlpha(previous: number, raw: number, beta: number): number {
  return clamp01((1 - beta) * previous + beta * raw);
}

/**
 * Validate gate parameters once, at configuration time.
 * @throws InvalidConfigError naming the first offending field
 */
export function validateFusionConfig(config: FusionGateConfig): FusionGateConfig {
  if (!Number.isFinite(config.k)) {
    throw new InvalidConfigError("k", `must be a finite number, got ${config.k}`);
  }
  if (!Number.isFinite(config.b)) {
    throw new InvalidConfigError("b", `must be a finite number, got ${config.b}`);
  }
  if (!Number.isFinite(config.beta) || config.beta <= 0 || config.beta > 1) {
    throw new InvalidConfigError("beta", `must lie in (0, 1], got ${config.beta}`);
  }
  if (!Number.isFinite(config.initialAlpha) || config.initialAlpha < 0 || config.initialAlpha > 1) {
    throw new InvalidConfigError("initialAlpha", `must lie in [0, 1], got ${config.initialAlpha}`);
  }
  return config;
}

function assertConfidence(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfidenceError(field, value);
  }
}

/**
 * Owns the FusionState of one session. Synchronous and free of I/O, so the
 * same sequence of inputs always yields the same sequence of α values.
 */
export class FusionGate {
  readonly config: Readonly<FusionGateConfig>;
  private readonly logger: Logger;
  private state: FusionState;
  private alphaSum: number;
  private updateCount: number;

  constructor(config: Partial<FusionGateConfig> = {}, logger: Logger = silentLogger) {
    this.config = Object.freeze(validateFusionConfig({ ...DEFAULT_FUSION_CONFIG, ...config }));
    this.logger = logger;
    this.state = { alpha: this.config.initialAlpha, lastUpdate: null };
    this.alphaSum = 0;
    this.updateCount = 0;
  }

  get alpha(): number {
    return this.state.alpha;
  }

  get lastUpdate(): number | null {
    return this.state.lastUpdate;
  }

  /** Running mean of every α returned so far; the prior until the first update. */
  get alphaAverage(): number {
    return this.updateCount === 0 ? this.state.alpha : this.alphaSum / this.updateCount;
  }

  get updates(): number {
    return this.updateCount;
  }

  snapshot(): FusionState {
    return { ...this.state };
  }

  /**
   * Fold one pair of confidences into α.
   * @throws InvalidConfidenceError when either input is outside [0, 1]
   */
  update(cVision: number, cAudio: number, t: number): number {
    assertConfidence("vision", cVision);
    assertConfidence("audio", cAudio);

    const raw = alphaFromConfidence(cVision, cAudio, this.config.k, this.config.b);
    const alpha = smoothAlpha(this.state.alpha, raw, this.config.beta);

    this.state.alpha = alpha;
    // Samples arrive asynchronously; lastUpdate never moves backwards.
    this.state.lastUpdate = this.state.lastUpdate === null ? t : Math.max(this.state.lastUpdate, t);
    this.alphaSum += alpha;
    this.updateCount++;

    this.logger.debug(`fusion.alpha_raw=${raw.toFixed(6)} fusion.alpha_last=${alpha.toFixed(6)} fusion.alpha_avg=${this.alphaAverage.toFixed(6)}`);
    return alpha;
  }

  updateFromSamples(vision: ConfidenceSample, audio: ConfidenceSample): number {
    if (vision.source !== "vision") {
      throw new InvalidConfigError("vision.source", `expected a vision sample, got "${vision.source}"`);
    }
    if (audio.source !== "audio") {
      throw new InvalidConfigError("audio.source", `expected an audio sample, got "${audio.source}"`);
    }
    return this.update(vision.value, audio.value, Math.max(vision.timestamp, audio.timestamp));
  }

  /** Back to the prior; used on session teardown. */
  reset(): void {
    this.state = { alpha: this.config.initialAlpha, lastUpdate: null };
    this.alphaSum = 0;
    this.updateCount = 0;
  }
}
