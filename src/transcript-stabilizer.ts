// ─── Transcript Stabilizer ──────────────────────────────────────────────────────
// Turns a stream of ASR partial hypotheses into a growing final transcript.
// A token is finalized once the last K partials agree on it closely enough.

import { InvalidConfigError } from "./errors.js";

export interface TranscriptStabilizerConfig {
  /** Number of recent partials (K) consulted for stability. Default: 4 */
  stabilityWindow: number;
  /** Maximum share of disagreeing partials tolerated per token. Default: 0.25 */
  stabilityDelta: number;
}

export const DEFAULT_STABILIZER_CONFIG: Readonly<TranscriptStabilizerConfig> = Object.freeze({
  stabilityWindow: 4,
  stabilityDelta: 0.25,
});

export type TranscriptEvent =
  | { type: "partial"; text: string; stability: number }
  | { type: "final"; text: string; stability: number };

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

/** Most common token in a column; ties go to the one seen first. */
function majority(column: readonly string[]): { token: string; count: number } {
  const counts = new Map<string, number>();
  for (const token of column) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  let best = { token: column[0], count: 0 };
  for (const [token, count] of counts) {
    if (count > best.count) best = { token, count };
  }
  return best;
}

export class TranscriptStabilizer {
  readonly config: Readonly<TranscriptStabilizerConfig>;
  private history: string[][] = [];
  private finalTokens: string[] = [];

  constructor(config: Partial<TranscriptStabilizerConfig> = {}) {
    const merged = { ...DEFAULT_STABILIZER_CONFIG, ...config };
    if (!Number.isInteger(merged.stabilityWindow) || merged.stabilityWindow < 1) {
      throw new InvalidConfigError("asr.stabilityWindow", `must be an integer >= 1, got ${merged.stabilityWindow}`);
    }
    if (!Number.isFinite(merged.stabilityDelta) || merged.stabilityDelta < 0 || merged.stabilityDelta > 1) {
      throw new InvalidConfigError("asr.stabilityDelta", `must lie in [0, 1], got ${merged.stabilityDelta}`);
    }
    this.config = Object.freeze(merged);
  }

  get finalText(): string {
    return this.finalTokens.join(" ");
  }

  /** Feed one partial; yields the partial event and, when tokens stabilized, a final event. */
  push(partial: string): TranscriptEvent[] {
    const tokens = tokenize(partial);
    this.history.push(tokens);
    if (this.history.length > this.config.stabilityWindow) {
      this.history.shift();
    }

    const before = this.finalTokens.length;
    this.extendStablePrefix();
    const stability = tokens.length === 0 ? 1 : Math.min(1, this.finalTokens.length / tokens.length);

    const events: TranscriptEvent[] = [{ type: "partial", text: tokens.join(" "), stability }];
    if (this.finalTokens.length > before) {
      events.push({ type: "final", text: this.finalText, stability });
    }
    return events;
  }

  /** End of stream: the newest partial's remaining tokens become final. */
  flush(): TranscriptEvent | null {
    const residual = this.history[this.history.length - 1];
    if (residual === undefined || residual.length <= this.finalTokens.length) return null;
    this.finalTokens.push(...residual.slice(this.finalTokens.length));
    return { type: "final", text: this.finalText, stability: 1 };
  }

  /** Run a whole batch of partials through a fresh stabilizer pass and flush. */
  stabilize(partials: readonly string[]): string {
    this.reset();
    for (const partial of partials) this.push(partial);
    this.flush();
    return this.finalText;
  }

  reset(): void {
    this.history = [];
    this.finalTokens = [];
  }

  private extendStablePrefix(): void {
    if (this.history.length < this.config.stabilityWindow) return;

    const prefixLen = Math.min(...this.history.map((seq) => seq.length));
    for (let idx = this.finalTokens.length; idx < prefixLen; idx++) {
      const { token, count } = majority(this.history.map((seq) => seq[idx]));
      const agreement = count / this.history.length;
      if (1 - agreement > this.config.stabilityDelta) break;
      this.finalTokens.push(token);
    }
  }
}
