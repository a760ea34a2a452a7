// ─── Perception Provider ────────────────────────────────────────────────────────
// Source of CaptureBundles for one cycle. Device SDKs sit behind this
// interface; the synthetic provider replays a deterministic clip for the
// benchmark and tests.

import type { CaptureBundle, GrayFrame } from "./types.js";

export interface PerceptionProvider {
  capture(signal?: AbortSignal): Promise<CaptureBundle>;
}

export interface MovingSquareOptions {
  numFrames?: number;
  frameSize?: number;
  squareSize?: number;
}

/** A bright square translating left to right across a black frame. */
export function generateMovingSquareClip(options: MovingSquareOptions = {}): GrayFrame[] {
  const { numFrames = 24, frameSize = 48, squareSize = 12 } = options;
  const limit = frameSize - squareSize;
  const top = Math.floor(frameSize / 3);
  const frames: GrayFrame[] = [];

  for (let idx = 0; idx < numFrames; idx++) {
    const pixels = new Float32Array(frameSize * frameSize);
    const left = Math.min(limit, Math.round(idx * (limit / Math.max(1, numFrames - 1))));
    for (let r = top; r < top + squareSize; r++) {
      pixels.fill(1, r * frameSize + left, r * frameSize + left + squareSize);
    }
    frames.push({ width: frameSize, height: frameSize, pixels });
  }
  return frames;
}

export interface ToneOptions {
  durationSeconds?: number;
  sampleRate?: number;
  frequencyHz?: number;
  amplitude?: number;
  /** Voiced segment as fractions of the buffer. Default: [0.2, 0.8] */
  voiced?: [number, number];
}

/** 16-bit little-endian PCM holding a sine tone, silent outside the voiced segment. */
export function synthesizeTonePcm(options: ToneOptions = {}): Buffer {
  const {
    durationSeconds = 1,
    sampleRate = 16_000,
    frequencyHz = 440,
    amplitude = 0.15,
    voiced = [0.2, 0.8],
  } = options;

  const total = Math.round(durationSeconds * sampleRate);
  const start = Math.floor(total * voiced[0]);
  const end = Math.floor(total * voiced[1]);
  const pcm = Buffer.alloc(total * 2);

  for (let i = start; i < end; i++) {
    const value = amplitude * Math.sin((2 * Math.PI * frequencyHz * i) / sampleRate);
    pcm.writeInt16LE(Math.round(value * 32767), i * 2);
  }
  return pcm;
}

export interface SyntheticProviderOptions {
  clip?: MovingSquareOptions;
  tone?: ToneOptions;
  /** ASR partials replayed on every capture. */
  partials?: string[];
  now?: () => number;
}

export class SyntheticPerceptionProvider implements PerceptionProvider {
  private readonly frames: GrayFrame[];
  private readonly pcm: Buffer;
  private readonly sampleRate: number;
  private readonly partials: string[];
  private readonly now: () => number;

  constructor(options: SyntheticProviderOptions = {}) {
    this.frames = generateMovingSquareClip(options.clip);
    this.pcm = synthesizeTonePcm(options.tone);
    this.sampleRate = options.tone?.sampleRate ?? 16_000;
    this.partials = options.partials ?? [];
    this.now = options.now ?? (() => performance.now());
  }

  async capture(): Promise<CaptureBundle> {
    return {
      audio: { kind: "pcm", pcm: this.pcm, sampleRate: this.sampleRate },
      vision: { kind: "frames", frames: this.frames },
      partials: [...this.partials],
      capturedAt: this.now(),
    };
  }
}
