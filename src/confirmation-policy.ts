// Confirmation policy - decides whether an analysed activation should respond.

import { InvalidConfigError } from "./errors.js";
import type { ConfirmationSignal, PerceptionEvidence } from "./types.js";

export interface ConfirmationInput {
  activationId: string;
  alpha: number;
  confidences: { audio: number; vision: number };
  evidence: PerceptionEvidence;
}

export interface ConfirmationPolicy {
  confirm(input: ConfirmationInput): ConfirmationSignal | Promise<ConfirmationSignal>;
}

/** Confirms once either modality's confidence reaches `minConfidence`. */
export class ThresholdConfirmationPolicy implements ConfirmationPolicy {
  constructor(readonly minConfidence = 0.5) {
    if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
      throw new InvalidConfigError("minConfirmConfidence", `must lie in [0, 1], got ${minConfidence}`);
    }
  }

  confirm({ confidences }: ConfirmationInput): ConfirmationSignal {
    const best = Math.max(confidences.audio, confidences.vision);
    return { confirm: best >= this.minConfidence };
  }
}
