// ─── Speech Activity Detector ───────────────────────────────────────────────────
// Energy-based voice activity detection over 16-bit PCM. Splits a capture into
// fixed-duration frames and classifies each by its mean squared energy.

import { InvalidConfigError } from "./errors.js";

/**
 * Configuration for the speech activity detector.
 * Energy is computed on samples normalized to [-1, 1).
 */
export interface SpeechActivityConfig {
  /** Frame duration in milliseconds. Default: 20 */
  frameMs: number;
  /** Mean squared energy at or above which a frame counts as speech. Default: 0.0001 */
  energyThreshold: number;
}

export const DEFAULT_SPEECH_ACTIVITY_CONFIG: Readonly<SpeechActivityConfig> = Object.freeze({
  frameMs: 20,
  energyThreshold: 1e-4,
});

export interface SpeechActivityResult {
  /** Speech frames / total frames, 0 when the capture holds no samples */
  speechRatio: number;
  speechFrames: number;
  totalFrames: number;
}

/** Full-scale value of a signed 16-bit sample */
const INT16_FULL_SCALE = 32768;

/**
 * Compute the mean squared energy of a 16-bit little-endian PCM region,
 * normalized to full scale. Returns 0 for an empty region.
 */
export function computeFrameEnergy(pcm: Buffer, startSample = 0, endSample = Math.floor(pcm.length / 2)): number {
  const count = endSample - startSample;
  if (count <= 0) return 0;
  let sumSquares = 0;
  for (let i = startSample; i < endSample; i++) {
    const sample = pcm.readInt16LE(i * 2) / INT16_FULL_SCALE;
    sumSquares += sample * sample;
  }
  return sumSquares / count;
}

/**
 * Stateless energy VAD. The final frame may be shorter than `frameLength`;
 * it is classified like any other.
 */
export class SpeechActivityDetector {
  readonly config: Readonly<SpeechActivityConfig>;

  constructor(config: Partial<SpeechActivityConfig> = {}) {
    const merged = { ...DEFAULT_SPEECH_ACTIVITY_CONFIG, ...config };
    if (!Number.isFinite(merged.frameMs) || merged.frameMs <= 0) {
      throw new InvalidConfigError("vad.frameMs", `must be positive, got ${merged.frameMs}`);
    }
    if (!Number.isFinite(merged.energyThreshold) || merged.energyThreshold < 0) {
      throw new InvalidConfigError("vad.energyThreshold", `must be non-negative, got ${merged.energyThreshold}`);
    }
    this.config = Object.freeze(merged);
  }

  /** Samples per full frame at the given sample rate. */
  frameLength(sampleRate: number): number {
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new InvalidConfigError("sampleRate", `must be positive, got ${sampleRate}`);
    }
    return Math.max(1, Math.round(sampleRate * (this.config.frameMs / 1000)));
  }

  isSpeech(pcm: Buffer, startSample?: number, endSample?: number): boolean {
    const total = Math.floor(pcm.length / 2);
    const start = startSample ?? 0;
    const end = endSample ?? total;
    if (end <= start) return false;
    return computeFrameEnergy(pcm, start, end) >= this.config.energyThreshold;
  }

  analyse(pcm: Buffer, sampleRate: number): SpeechActivityResult {
    const frameSize = this.frameLength(sampleRate);
    const totalSamples = Math.floor(pcm.length / 2);

    let speechFrames = 0;
    let totalFrames = 0;
    for (let start = 0; start < totalSamples; start += frameSize) {
      const end = Math.min(start + frameSize, totalSamples);
      totalFrames++;
      if (this.isSpeech(pcm, start, end)) speechFrames++;
    }

    return {
      speechRatio: totalFrames === 0 ? 0 : speechFrames / totalFrames,
      speechFrames,
      totalFrames,
    };
  }
}
