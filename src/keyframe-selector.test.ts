import { describe, it, expect } from "vitest";
import {
  analyseKeyframes,
  centroid,
  describeMotion,
  downsample,
  selectKeyframes,
} from "./keyframe-selector.js";
import { generateMovingSquareClip } from "./perception-provider.js";
import { InvalidConfigError } from "./errors.js";
import type { GrayFrame } from "./types.js";

function solidFrame(value: number, size = 8): GrayFrame {
  return { width: size, height: size, pixels: new Array<number>(size * size).fill(value) };
}

/** 8×8 black frame with one lit pixel at (row, col). */
function dotFrame(row: number, col: number): GrayFrame {
  const pixels = new Array<number>(64).fill(0);
  pixels[row * 8 + col] = 1;
  return { width: 8, height: 8, pixels };
}

describe("downsample", () => {
  it("averages each grid cell", () => {
    const pixels: number[] = [];
    for (let r = 0; r < 16; r++) {
      for (let c = 0; c < 16; c++) pixels.push(r);
    }
    const thumb = downsample({ width: 16, height: 16, pixels });
    expect(thumb).toHaveLength(64);
    expect(thumb[0]).toBe(0.5);
    expect(thumb[3 * 8 + 5]).toBe(6.5);
    expect(thumb[7 * 8 + 7]).toBe(14.5);
  });

  it("leaves cells empty for frames smaller than the grid", () => {
    const thumb = downsample(solidFrame(5, 4));
    expect(thumb.filter((v) => v === 5)).toHaveLength(16);
    expect(thumb.filter((v) => v === 0)).toHaveLength(48);
  });

  it("rejects frames whose pixel count does not match", () => {
    expect(() => downsample({ width: 4, height: 4, pixels: [1, 2, 3] })).toThrow(InvalidConfigError);
    expect(() => downsample({ width: 0, height: 4, pixels: [] })).toThrow(InvalidConfigError);
  });
});

describe("selectKeyframes", () => {
  it("returns nothing for an empty clip", () => {
    expect(selectKeyframes([])).toEqual([]);
  });

  it("always selects the only frame", () => {
    expect(selectKeyframes([solidFrame(1)])).toEqual([0]);
  });

  it("selects first and last of a static clip", () => {
    expect(selectKeyframes(Array.from({ length: 5 }, () => solidFrame(3)))).toEqual([0, 4]);
  });

  it("respects the minimum gap on a flickering clip", () => {
    const frames = Array.from({ length: 7 }, (_, i) => solidFrame(i % 2));
    expect(selectKeyframes(frames)).toEqual([0, 3, 6]);
  });

  it("selects every frame with minGap 1 when each step exceeds tau", () => {
    const frames = Array.from({ length: 4 }, (_, i) => solidFrame(i % 2));
    expect(selectKeyframes(frames, { minGap: 1 })).toEqual([0, 1, 2, 3]);
  });

  it("accumulates small differences until they reach tau", () => {
    // each step differs by 0.05 per cell → 3.2 per step; tau 8 is reached on the third step
    const frames = Array.from({ length: 7 }, (_, i) => solidFrame(i * 0.05));
    expect(selectKeyframes(frames, { minGap: 1 })).toEqual([0, 3, 6]);
  });

  it("rejects a minGap below 1", () => {
    expect(() => selectKeyframes([solidFrame(0)], { minGap: 0 })).toThrow(InvalidConfigError);
  });
});

describe("centroid / describeMotion", () => {
  it("centroid of a black frame is the frame centre", () => {
    expect(centroid(solidFrame(0))).toEqual([4, 4]);
  });

  it("centroid of a single lit pixel is that pixel", () => {
    expect(centroid(dotFrame(2, 5))).toEqual([2, 5]);
  });

  it("describes an empty clip", () => {
    expect(describeMotion([])).toBe("no visible content");
  });

  it("describes a static clip", () => {
    expect(describeMotion([dotFrame(3, 3), dotFrame(3, 3)])).toBe("scene appears static");
  });

  it.each([
    [dotFrame(3, 1), dotFrame(3, 6), "motion towards right"],
    [dotFrame(3, 6), dotFrame(3, 1), "motion towards left"],
    [dotFrame(6, 3), dotFrame(1, 3), "motion towards up"],
    [dotFrame(1, 3), dotFrame(6, 3), "motion towards down"],
    [dotFrame(1, 1), dotFrame(6, 6), "motion towards right and down"],
  ])("describes the move from first to last frame", (first, last, expected) => {
    expect(describeMotion([first, dotFrame(0, 0), last])).toBe(expected);
  });
});

describe("analyseKeyframes", () => {
  it("reports salience as keyframes over frames", () => {
    const selection = analyseKeyframes(Array.from({ length: 5 }, () => solidFrame(2)));
    expect(selection).toEqual({
      indices: [0, 4],
      frameCount: 5,
      salience: 0.4,
      motion: "scene appears static",
    });
  });

  it("reports an empty clip", () => {
    expect(analyseKeyframes([])).toEqual({ indices: [], frameCount: 0, salience: 0, motion: "no visible content" });
  });

  it("sees the synthetic square moving right", () => {
    const selection = analyseKeyframes(generateMovingSquareClip());
    expect(selection.frameCount).toBe(24);
    expect(selection.indices[0]).toBe(0);
    expect(selection.indices[selection.indices.length - 1]).toBe(23);
    expect(selection.motion).toBe("motion towards right");
  });
});
