// ─── Keyframe Selector ──────────────────────────────────────────────────────────
// Picks keyframes from a grayscale clip by accumulating L1 differences between
// 8×8 average-pooled thumbnails.

import { InvalidConfigError } from "./errors.js";
import type { GrayFrame } from "./types.js";

export interface KeyframeConfig {
  /** Accumulated L1 difference that triggers a new keyframe. Default: 8 */
  diffTau: number;
  /** Minimum index distance between consecutive keyframes. Default: 3 */
  minGap: number;
}

export const DEFAULT_KEYFRAME_CONFIG: Readonly<KeyframeConfig> = Object.freeze({
  diffTau: 8,
  minGap: 3,
});

export interface KeyframeSelection {
  indices: number[];
  frameCount: number;
  /** keyframes / frames, 0 for an empty clip */
  salience: number;
  motion: string;
}

const GRID = 8;

function assertFrameShape(frame: GrayFrame): void {
  if (!Number.isInteger(frame.width) || !Number.isInteger(frame.height) || frame.width < 1 || frame.height < 1) {
    throw new InvalidConfigError("frame", `dimensions must be positive integers, got ${frame.width}x${frame.height}`);
  }
  if (frame.pixels.length !== frame.width * frame.height) {
    throw new InvalidConfigError(
      "frame",
      `expected ${frame.width * frame.height} pixels for ${frame.width}x${frame.height}, got ${frame.pixels.length}`,
    );
  }
}

/**
 * Average-pool a frame onto an 8×8 grid. Cell edges are floor(i·H/8), so a
 * frame smaller than the grid leaves some cells at 0.
 */
export function downsample(frame: GrayFrame): Float64Array {
  assertFrameShape(frame);
  const out = new Float64Array(GRID * GRID);

  for (let i = 0; i < GRID; i++) {
    const r0 = Math.floor((i * frame.height) / GRID);
    const r1 = Math.floor(((i + 1) * frame.height) / GRID);
    if (r1 <= r0) continue;
    for (let j = 0; j < GRID; j++) {
      const c0 = Math.floor((j * frame.width) / GRID);
      const c1 = Math.floor(((j + 1) * frame.width) / GRID);
      if (c1 <= c0) continue;

      let sum = 0;
      for (let r = r0; r < r1; r++) {
        for (let c = c0; c < c1; c++) {
          sum += frame.pixels[r * frame.width + c];
        }
      }
      out[i * GRID + j] = sum / ((r1 - r0) * (c1 - c0));
    }
  }
  return out;
}

function l1Distance(a: Float64Array, b: Float64Array): number {
  let total = 0;
  for (let i = 0; i < a.length; i++) {
    total += Math.abs(a[i] - b[i]);
  }
  return total;
}

/**
 * Frame 0 is always a keyframe and the last frame is appended when not
 * already selected.
 */
export function selectKeyframes(frames: readonly GrayFrame[], config: Partial<KeyframeConfig> = {}): number[] {
  const { diffTau, minGap } = { ...DEFAULT_KEYFRAME_CONFIG, ...config };
  if (!Number.isInteger(minGap) || minGap < 1) {
    throw new InvalidConfigError("keyframes.minGap", `must be at least 1, got ${minGap}`);
  }
  if (!Number.isFinite(diffTau) || diffTau < 0) {
    throw new InvalidConfigError("keyframes.diffTau", `must be non-negative, got ${diffTau}`);
  }
  if (frames.length === 0) return [];

  const thumbs = frames.map(downsample);
  const keyframes = [0];
  let lastSelected = 0;
  let accumulated = 0;

  for (let idx = 1; idx < thumbs.length; idx++) {
    accumulated += l1Distance(thumbs[idx], thumbs[idx - 1]);
    if (idx - lastSelected < minGap) continue;
    if (accumulated >= diffTau) {
      keyframes.push(idx);
      lastSelected = idx;
      accumulated = 0;
    }
  }

  if (keyframes[keyframes.length - 1] !== frames.length - 1) {
    keyframes.push(frames.length - 1);
  }
  return keyframes;
}

/** Intensity-weighted centroid as [row, col]; the frame centre when the frame is black. */
export function centroid(frame: GrayFrame): [number, number] {
  assertFrameShape(frame);
  let total = 0;
  let sumRow = 0;
  let sumCol = 0;
  for (let r = 0; r < frame.height; r++) {
    for (let c = 0; c < frame.width; c++) {
      const v = frame.pixels[r * frame.width + c];
      total += v;
      sumRow += r * v;
      sumCol += c * v;
    }
  }
  if (total <= 0) return [frame.height / 2, frame.width / 2];
  return [sumRow / total, sumCol / total];
}

const MOTION_EPSILON = 0.5;

/** Describe how the bright mass moved between the first and last frame. */
export function describeMotion(frames: readonly GrayFrame[]): string {
  if (frames.length === 0) return "no visible content";

  const [startRow, startCol] = centroid(frames[0]);
  const [endRow, endCol] = centroid(frames[frames.length - 1]);
  const dy = endRow - startRow;
  const dx = endCol - startCol;
  if (Math.hypot(dx, dy) < MOTION_EPSILON) return "scene appears static";

  const horizontal = Math.abs(dx) > MOTION_EPSILON ? (dx > 0 ? "right" : "left") : null;
  const vertical = Math.abs(dy) > MOTION_EPSILON ? (dy > 0 ? "down" : "up") : null;
  if (horizontal && vertical) return `motion towards ${horizontal} and ${vertical}`;
  if (horizontal) return `motion towards ${horizontal}`;
  if (vertical) return `motion towards ${vertical}`;
  return "scene appears static";
}

export function analyseKeyframes(frames: readonly GrayFrame[], config: Partial<KeyframeConfig> = {}): KeyframeSelection {
  const indices = selectKeyframes(frames, config);
  return {
    indices,
    frameCount: frames.length,
    salience: frames.length === 0 ? 0 : indices.length / frames.length,
    motion: describeMotion(indices.map((i) => frames[i])),
  };
}
