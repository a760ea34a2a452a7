// ─── Confidence Adapters ────────────────────────────────────────────────────────
// Map raw perception measurements onto normalized ConfidenceSamples.
//
//   audio:  logistic(2·speechRatio − 0.5)
//   vision: logistic(3·keyframeSalience − 0.5)

import { InvalidConfidenceError } from "./errors.js";
import { stableLogistic } from "./fusion-gate.js";
import { analyseKeyframes, type KeyframeConfig } from "./keyframe-selector.js";
import { SpeechActivityDetector } from "./speech-activity.js";
import type { AudioCapture, ConfidenceSample, VisionCapture } from "./types.js";

const AUDIO_GAIN = 2;
const VISION_GAIN = 3;
const SIGNAL_OFFSET = 0.5;

function assertRatio(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfidenceError(field, value);
  }
}

function sample(source: ConfidenceSample["source"], value: number, timestamp: number): ConfidenceSample {
  return Object.freeze({ source, value, timestamp });
}

export function audioConfidence(speechRatio: number): number {
  assertRatio("speechRatio", speechRatio);
  return stableLogistic(speechRatio * AUDIO_GAIN - SIGNAL_OFFSET);
}

export function visionConfidence(keyframeSalience: number): number {
  assertRatio("keyframeSalience", keyframeSalience);
  return stableLogistic(keyframeSalience * VISION_GAIN - SIGNAL_OFFSET);
}

export interface AudioMeasurement {
  speechRatio: number;
  sample: ConfidenceSample;
}

export interface VisionMeasurement {
  keyframeSalience: number;
  keyframeCount: number;
  frameCount: number;
  motion: string | null;
  sample: ConfidenceSample;
}

/** Speech ratio from raw PCM (via energy VAD) or as reported by the device. */
export class AudioConfidenceAdapter {
  constructor(private readonly vad: SpeechActivityDetector = new SpeechActivityDetector()) {}

  measure(capture: AudioCapture, timestamp: number): AudioMeasurement {
    const speechRatio =
      capture.kind === "measured" ? capture.speechRatio : this.vad.analyse(capture.pcm, capture.sampleRate).speechRatio;
    return { speechRatio, sample: sample("audio", audioConfidence(speechRatio), timestamp) };
  }
}

/** Keyframe salience from a grayscale clip or as reported by the device. */
export class VisionConfidenceAdapter {
  constructor(private readonly keyframes: Partial<KeyframeConfig> = {}) {}

  measure(capture: VisionCapture, timestamp: number): VisionMeasurement {
    if (capture.kind === "measured") {
      return {
        keyframeSalience: capture.keyframeSalience,
        keyframeCount: 0,
        frameCount: 0,
        motion: null,
        sample: sample("vision", visionConfidence(capture.keyframeSalience), timestamp),
      };
    }
    const selection = analyseKeyframes(capture.frames, this.keyframes);
    return {
      keyframeSalience: selection.salience,
      keyframeCount: selection.indices.length,
      frameCount: selection.frameCount,
      motion: selection.motion,
      sample: sample("vision", visionConfidence(selection.salience), timestamp),
    };
  }
}
