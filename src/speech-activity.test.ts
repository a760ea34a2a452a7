import { describe, it, expect } from "vitest";
import { SpeechActivityDetector, computeFrameEnergy } from "./speech-activity.js";
import { synthesizeTonePcm } from "./perception-provider.js";
import { InvalidConfigError } from "./errors.js";

/** Builds 16-bit LE PCM: `silent` zero samples followed by `loud` samples of constant amplitude. */
function buildPcm(silent: number, loud: number, amplitude = 3277): Buffer {
  const buf = Buffer.alloc((silent + loud) * 2);
  for (let i = silent; i < silent + loud; i++) {
    buf.writeInt16LE(amplitude, i * 2);
  }
  return buf;
}

describe("computeFrameEnergy", () => {
  it("returns 0 for an empty buffer", () => {
    expect(computeFrameEnergy(Buffer.alloc(0))).toBe(0);
  });

  it("computes normalized mean squared energy", () => {
    const buf = Buffer.alloc(4);
    buf.writeInt16LE(16384, 0);
    buf.writeInt16LE(-16384, 2);
    expect(computeFrameEnergy(buf)).toBe(0.25);
  });

  it("only looks at the requested sample range", () => {
    const buf = buildPcm(4, 4, 16384);
    expect(computeFrameEnergy(buf, 0, 4)).toBe(0);
    expect(computeFrameEnergy(buf, 4, 8)).toBe(0.25);
  });
});

describe("SpeechActivityDetector", () => {
  const vad = new SpeechActivityDetector();

  it("uses 20ms frames by default", () => {
    expect(vad.frameLength(16_000)).toBe(320);
    expect(vad.frameLength(8_000)).toBe(160);
  });

  it("never uses frames shorter than one sample", () => {
    expect(vad.frameLength(10)).toBe(1);
  });

  it("rejects a non-positive sample rate", () => {
    expect(() => vad.frameLength(0)).toThrow(InvalidConfigError);
  });

  it("rejects a negative energy threshold", () => {
    expect(() => new SpeechActivityDetector({ energyThreshold: -1 })).toThrow(InvalidConfigError);
  });

  it("counts a short trailing frame", () => {
    // frames: [0,320) silent, [320,640) silent, [640,960) loud, [960,1000) loud
    const result = vad.analyse(buildPcm(640, 360), 16_000);
    expect(result).toEqual({ speechRatio: 0.5, speechFrames: 2, totalFrames: 4 });
  });

  it("reports 0 for an empty capture", () => {
    expect(vad.analyse(Buffer.alloc(0), 16_000)).toEqual({ speechRatio: 0, speechFrames: 0, totalFrames: 0 });
  });

  it("treats silence as non-speech", () => {
    expect(vad.isSpeech(Buffer.alloc(640))).toBe(false);
  });

  it("finds speech in 30 of 50 frames of the synthetic tone", () => {
    const result = vad.analyse(synthesizeTonePcm(), 16_000);
    expect(result.totalFrames).toBe(50);
    expect(result.speechFrames).toBe(30);
    expect(result.speechRatio).toBe(0.6);
  });

  it("a higher threshold rejects quiet frames", () => {
    const strict = new SpeechActivityDetector({ energyThreshold: 0.5 });
    expect(strict.analyse(buildPcm(0, 320), 16_000).speechRatio).toBe(0);
  });
});
