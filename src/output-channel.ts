// ─── Output Channel ─────────────────────────────────────────────────────────────
// Where a generated response leaves the core: speech always, the overlay only
// when the device has a display.

import type { ResponsePayload } from "./types.js";

/** Fixed speaking rate used to estimate utterance length. */
export const CHARS_PER_SECOND = 14;

export function estimateSpeechSeconds(text: string): number {
  return text.length === 0 ? 0 : text.length / CHARS_PER_SECOND;
}

export interface SpeechResult {
  charCount: number;
  durationSeconds: number;
}

export interface OutputChannel {
  hasDisplay(): boolean;
  /** Every dispatched response is spoken; this is the delivery that always happens. */
  speak(payload: ResponsePayload, signal?: AbortSignal): Promise<SpeechResult>;
  render?(payload: ResponsePayload, signal?: AbortSignal): Promise<void>;
}

function speechResult(text: string): SpeechResult {
  return { charCount: text.length, durationSeconds: estimateSpeechSeconds(text) };
}

/**
 * In-memory channel: keeps every utterance and overlay it was handed.
 * Used by the benchmark and as the default for headless sessions.
 */
export class RecordingOutputChannel implements OutputChannel {
  readonly spoken: string[] = [];
  readonly rendered: ResponsePayload[] = [];

  constructor(private readonly display = true) {}

  hasDisplay(): boolean {
    return this.display;
  }

  async speak(payload: ResponsePayload): Promise<SpeechResult> {
    this.spoken.push(payload.text);
    return speechResult(payload.text);
  }

  async render(payload: ResponsePayload): Promise<void> {
    this.rendered.push(payload);
  }
}

/**
 * Forwards responses to callbacks, e.g. a WebSocket send. Speech itself is
 * produced on the device, so the payload goes out with its estimated
 * duration. The channel has a display only when an overlay callback is given.
 */
export class CallbackOutputChannel implements OutputChannel {
  constructor(
    private readonly onSpeech: (payload: ResponsePayload, speechSeconds: number) => void,
    private readonly onOverlay?: (payload: ResponsePayload) => void,
  ) {}

  hasDisplay(): boolean {
    return this.onOverlay !== undefined;
  }

  async speak(payload: ResponsePayload): Promise<SpeechResult> {
    const result = speechResult(payload.text);
    this.onSpeech(payload, result.durationSeconds);
    return result;
  }

  async render(payload: ResponsePayload): Promise<void> {
    this.onOverlay?.(payload);
  }
}
