// Pipeline Orchestrator - sequences one cycle per external tick for one session.
//
//   capture → vad / asr / keyframe → fusion → fsm → response → dispatch
//
// Owns sequencing only. The gate, FSM and tracker belong to this orchestrator
// alone; nothing is shared between sessions.
//
// Ticks are serialized: a tick arriving mid-cycle waits for the previous one.
// cancel() bumps runId so every await in the in-flight cycle sees a stale run
// and discards its work. Every await on a collaborator is raced against the
// cycle's AbortSignal, so one that ignores the signal cannot hold the queue.
//
// An activation that outstays its state's limit (measured on capture
// timestamps; wall clock for the response) is dropped back to IDLE and the
// cycle reports "expired".

import { v4 as uuidv4 } from "uuid";
import { AudioConfidenceAdapter, VisionConfidenceAdapter } from "./confidence-adapters.js";
import type { AudioMeasurement, VisionMeasurement } from "./confidence-adapters.js";
import { ThresholdConfirmationPolicy, type ConfirmationPolicy } from "./confirmation-policy.js";
import {
  CycleCancelledError,
  InteractionTimeoutError,
  InvalidConfigError,
  PipelineError,
  StageTimeoutError,
  errorMessage,
} from "./errors.js";
import { FusionGate } from "./fusion-gate.js";
import { InteractionFSM } from "./interaction-fsm.js";
import { LatencyTracker } from "./latency-tracker.js";
import { silentLogger, type Logger } from "./logger.js";
import type { OutputChannel } from "./output-channel.js";
import type { PerceptionProvider } from "./perception-provider.js";
import { TemplateCaptionGenerator, type ResponseGenerator } from "./response-generator.js";
import { TranscriptStabilizer } from "./transcript-stabilizer.js";
import { InteractionState } from "./types.js";
import type {
  AudioCapture,
  CaptureBundle,
  ConfidenceSample,
  CycleOutcome,
  CycleResult,
  HealthStatus,
  Modality,
  PerceptionEvidence,
  PipelineStage,
  ResponsePayload,
  ResponseTicket,
  StageTiming,
  TelemetrySummary,
  VisionCapture,
} from "./types.js";

// ─── Stage collaborators ────────────────────────────────────────────────────────

export interface AudioStage {
  measure(capture: AudioCapture, timestamp: number, signal: AbortSignal): AudioMeasurement | Promise<AudioMeasurement>;
}

export interface VisionStage {
  measure(capture: VisionCapture, timestamp: number, signal: AbortSignal): VisionMeasurement | Promise<VisionMeasurement>;
}

export interface TranscriptStage {
  stabilize(partials: readonly string[]): string;
}

export interface OrchestratorConfig {
  /** An adapter stage is abandoned after budget × staleMultiplier ms. Default: 3 */
  staleMultiplier: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: Readonly<OrchestratorConfig> = Object.freeze({
  staleMultiplier: 3,
});

/** Confidence assumed for a modality that has never produced a sample. */
const PRIOR_CONFIDENCE = 0.5;

interface BoundedSignal {
  signal: AbortSignal;
  dispose(): void;
}

/** A child of `parent` that also aborts with `timeoutError()` once `limitMs` elapses. */
function boundedSignal(parent: AbortSignal, limitMs: number, timeoutError: () => Error): BoundedSignal {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = Number.isFinite(limitMs) ? setTimeout(() => controller.abort(timeoutError()), limitMs) : undefined;
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener("abort", onParentAbort);
    },
  };
}

/** Settle with `work`, or reject with the abort reason as soon as `signal` fires. */
async function untilAborted<T>(signal: AbortSignal, work: () => T | Promise<T>): Promise<Awaited<T>> {
  if (signal.aborted) throw signal.reason;

  let onAbort: () => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    return await Promise.race([Promise.resolve().then(work), aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

export interface PipelineOrchestratorDeps {
  provider: PerceptionProvider;
  output: OutputChannel;
  sessionId?: string;
  generator?: ResponseGenerator;
  policy?: ConfirmationPolicy;
  gate?: FusionGate;
  fsm?: InteractionFSM;
  tracker?: LatencyTracker;
  audio?: AudioStage;
  vision?: VisionStage;
  transcript?: TranscriptStage;
  config?: Partial<OrchestratorConfig>;
  logger?: Logger;
  /** Forwarded from the tracker when the session's latency health changes. */
  onHealthChange?: (status: HealthStatus, totalP95Ms: number) => void;
}

interface CycleDraft {
  outcome: CycleOutcome;
  alpha: number;
  confidences: { audio: number; vision: number };
  staleInputs: Modality[];
  response: ResponsePayload | null;
}

export class PipelineOrchestrator {
  readonly sessionId: string;
  readonly gate: FusionGate;
  readonly fsm: InteractionFSM;
  readonly tracker: LatencyTracker;
  readonly config: Readonly<OrchestratorConfig>;

  private readonly provider: PerceptionProvider;
  private readonly output: OutputChannel;
  private readonly generator: ResponseGenerator;
  private readonly policy: ConfirmationPolicy;
  private readonly audio: AudioStage;
  private readonly vision: VisionStage;
  private readonly transcript: TranscriptStage;
  private readonly logger: Logger;

  private runId = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private inFlight: AbortController | null = null;
  private readonly lastSample: Partial<Record<Modality, ConfidenceSample>> = {};
  private lastTranscript = "";
  private cycleTime = 0;
  private stateEnteredAt = 0;

  constructor(deps: PipelineOrchestratorDeps) {
    const staleMultiplier = deps.config?.staleMultiplier ?? DEFAULT_ORCHESTRATOR_CONFIG.staleMultiplier;
    if (!Number.isFinite(staleMultiplier) || staleMultiplier <= 0) {
      throw new InvalidConfigError("staleMultiplier", `must be a positive number, got ${staleMultiplier}`);
    }
    this.config = Object.freeze({ staleMultiplier });

    this.sessionId = deps.sessionId ?? uuidv4();
    this.logger = deps.logger ?? silentLogger;
    this.provider = deps.provider;
    this.output = deps.output;
    this.generator = deps.generator ?? new TemplateCaptionGenerator();
    this.policy = deps.policy ?? new ThresholdConfirmationPolicy();
    this.gate = deps.gate ?? new FusionGate({}, this.logger);
    this.fsm = deps.fsm ?? new InteractionFSM({ logger: this.logger });
    this.tracker = deps.tracker ?? new LatencyTracker({ logger: this.logger, onHealthChange: deps.onHealthChange });
    this.audio = deps.audio ?? new AudioConfidenceAdapter();
    this.vision = deps.vision ?? new VisionConfidenceAdapter();
    this.transcript = deps.transcript ?? new TranscriptStabilizer();
    this.fsm.subscribe(() => {
      this.stateEnteredAt = this.cycleTime;
    });
  }

  /**
   * Run one cycle. With `bundle` the capture stage records the hand-off of
   * pushed data; without it the provider is asked to capture.
   */
  runCycle(bundle?: CaptureBundle): Promise<CycleResult> {
    const run = this.queue.then(() => this.executeCycle(bundle));
    // The caller gets `run` with its rejection; the queue only needs to settle.
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Force IDLE now and discard whatever the in-flight cycle produces. */
  cancel(reason: string): void {
    this.runId++;
    this.inFlight?.abort(new CycleCancelledError(reason));
    this.fsm.cancel(reason);
  }

  summarize(window?: number): TelemetrySummary {
    return {
      sessionId: this.sessionId,
      ...this.tracker.summarize(window),
      meanFusedScore: this.gate.alphaAverage,
      responsesDispatched: this.fsm.responsesDispatched,
    };
  }

  records(): readonly StageTiming[] {
    return this.tracker.records();
  }

  /** Session teardown: cancel in-flight work and drop the fusion state. */
  dispose(): void {
    this.cancel("session closed");
    this.gate.reset();
  }

  // ── Cycle ──────────────────────────────────────────────────────────────────

  private async executeCycle(bundle?: CaptureBundle): Promise<CycleResult> {
    const runId = this.runId;
    const controller = new AbortController();
    this.inFlight = controller;
    this.tracker.beginCycle();

    const draft: CycleDraft = {
      outcome: "pending",
      alpha: this.gate.alpha,
      confidences: { audio: this.confidenceOf("audio"), vision: this.confidenceOf("vision") },
      staleInputs: [],
      response: null,
    };

    try {
      await this.runStages(draft, runId, controller.signal, bundle);
    } catch (err) {
      if (this.runId === runId) {
        this.logger.error(`Cycle failed in "${this.fsm.state}" state: ${errorMessage(err)}`);
        this.fsm.cancel(`cycle error: ${errorMessage(err)}`);
        this.tracker.endCycle();
        throw err;
      }
      draft.outcome = "cancelled";
    } finally {
      if (this.inFlight === controller) this.inFlight = null;
    }

    const report = this.tracker.endCycle();
    return {
      outcome: draft.outcome,
      state: this.fsm.state,
      activationId: this.fsm.activationId,
      alpha: draft.alpha,
      confidences: draft.confidences,
      staleInputs: draft.staleInputs,
      response: draft.response,
      report,
      health: this.tracker.health,
    };
  }

  private async runStages(draft: CycleDraft, runId: number, signal: AbortSignal, bundle?: CaptureBundle): Promise<void> {
    const cancelled = (): boolean => {
      if (this.runId === runId) return false;
      draft.outcome = "cancelled";
      return true;
    };

    // 1. Capture
    const captured = await this.tracker.measure("capture", () =>
      bundle ?? untilAborted(signal, () => this.provider.capture(signal)),
    );
    if (cancelled()) return;
    const t = captured.capturedAt;
    this.cycleTime = t;

    // 2. Perception adapters, each bounded by its stale deadline
    const audio = await this.tracker.measure("vad", () =>
      this.withDeadline("vad", signal, (stageSignal) =>
        captured.audio ? this.audio.measure(captured.audio, t, stageSignal) : null,
      ),
    );
    if (cancelled()) return;

    const transcript = await this.tracker.measure("asr", () =>
      this.withDeadline("asr", signal, () => this.transcript.stabilize(captured.partials ?? [])),
    );
    if (cancelled()) return;

    const vision = await this.tracker.measure("keyframe", () =>
      this.withDeadline("keyframe", signal, (stageSignal) =>
        captured.vision ? this.vision.measure(captured.vision, t, stageSignal) : null,
      ),
    );
    if (cancelled()) return;

    const audioSample = this.resolveSample("audio", audio.ok ? audio.value?.sample : undefined, t, draft, audio.ok ? null : audio.error);
    const visionSample = this.resolveSample("vision", vision.ok ? vision.value?.sample : undefined, t, draft, vision.ok ? null : vision.error);
    if (transcript.ok) {
      this.lastTranscript = transcript.value;
    } else {
      this.logger.warn(`asr: ${errorMessage(transcript.error)}; keeping previous transcript`);
    }

    const evidence: PerceptionEvidence = {
      speechRatio: audio.ok && audio.value ? audio.value.speechRatio : 0,
      keyframeSalience: vision.ok && vision.value ? vision.value.keyframeSalience : 0,
      keyframeCount: vision.ok && vision.value ? vision.value.keyframeCount : 0,
      frameCount: vision.ok && vision.value ? vision.value.frameCount : 0,
      motion: vision.ok && vision.value ? vision.value.motion : null,
      transcript: this.lastTranscript,
    };
    draft.confidences = { audio: audioSample.value, vision: visionSample.value };

    // 3. Fusion
    draft.alpha = await this.tracker.measure("fusion", () => this.gate.updateFromSamples(visionSample, audioSample));

    // 4. Interaction FSM
    const ticket = await this.tracker.measure("fsm", () => this.stepFsm(evidence, draft, runId, signal));
    if (cancelled() || ticket === null) return;

    // 5-6. Response generation and dispatch, bounded by the response timeout
    const responseLimitMs = this.fsm.timeoutFor(InteractionState.RESPONDING);
    const responding = boundedSignal(
      signal,
      responseLimitMs,
      () => new InteractionTimeoutError(ticket.activationId, InteractionState.RESPONDING, responseLimitMs),
    );
    let payload: ResponsePayload;
    try {
      payload = await this.tracker.measure("response", () =>
        untilAborted(responding.signal, () => this.generator.generate({ ticket, evidence, signal: responding.signal })),
      );
      if (cancelled()) return;

      await this.tracker.measure("dispatch", () =>
        untilAborted(responding.signal, () => this.dispatch(payload, responding.signal)),
      );
      if (cancelled()) return;
    } catch (err) {
      if (!(err instanceof InteractionTimeoutError) || this.runId !== runId) throw err;
      this.expire(err, draft);
      return;
    } finally {
      responding.dispose();
    }

    this.fsm.completeResponse(ticket.activationId);
    draft.response = payload;
    draft.outcome = "responded";
  }

  private async stepFsm(
    evidence: PerceptionEvidence,
    draft: CycleDraft,
    runId: number,
    signal: AbortSignal,
  ): Promise<ResponseTicket | null> {
    const state = this.fsm.state;
    const limitMs = this.fsm.timeoutFor(state);
    if (this.cycleTime - this.stateEnteredAt > limitMs) {
      this.expire(new InteractionTimeoutError(this.fsm.activationId, state, limitMs), draft);
      return null;
    }

    if (this.fsm.state === InteractionState.IDLE) {
      this.fsm.activate();
    }
    if (this.fsm.state === InteractionState.LISTENING) {
      this.fsm.observe(evidence, draft.alpha);
    }
    if (this.fsm.state !== InteractionState.ANALYSING) return null;

    const activationId = this.fsm.activationId;
    if (activationId === null) return null;
    const decision = await untilAborted(signal, () =>
      this.policy.confirm({
        activationId,
        alpha: draft.alpha,
        confidences: draft.confidences,
        evidence,
      }),
    );
    if (this.runId !== runId) return null;
    return this.fsm.respond(decision.confirm, decision.payload);
  }

  private expire(err: InteractionTimeoutError, draft: CycleDraft): void {
    this.logger.warn(err.message);
    this.fsm.cancel("timeout");
    draft.outcome = "expired";
  }

  private async dispatch(payload: ResponsePayload, signal: AbortSignal): Promise<void> {
    await this.output.speak(payload, signal);
    if (this.output.hasDisplay() && this.output.render) {
      await this.output.render(payload, signal);
    }
  }

  // ── Stale-input policy ─────────────────────────────────────────────────────

  private confidenceOf(modality: Modality): number {
    return this.lastSample[modality]?.value ?? PRIOR_CONFIDENCE;
  }

  /**
   * A fresh sample replaces the last-known one. Otherwise the last-known
   * sample (or the prior) stands in and the modality is reported stale.
   */
  private resolveSample(
    modality: Modality,
    fresh: ConfidenceSample | undefined,
    t: number,
    draft: CycleDraft,
    failure: unknown,
  ): ConfidenceSample {
    if (fresh) {
      this.lastSample[modality] = fresh;
      return fresh;
    }

    const fallback: ConfidenceSample =
      this.lastSample[modality] ?? Object.freeze({ source: modality, value: PRIOR_CONFIDENCE, timestamp: t });
    const why = failure === null ? "no input in capture" : errorMessage(failure);
    this.logger.warn(`${modality}: ${why}; using last-known confidence ${fallback.value.toFixed(3)}`);
    draft.staleInputs.push(modality);
    return fallback;
  }

  /**
   * Race a stage against budget × staleMultiplier. Timeouts and adapter
   * failures come back as `{ ok: false }`; validation errors still throw.
   */
  private async withDeadline<T>(
    stage: PipelineStage,
    parent: AbortSignal,
    fn: (signal: AbortSignal) => T | Promise<T>,
  ): Promise<{ ok: true; value: Awaited<T> } | { ok: false; error: unknown }> {
    const limitMs = this.tracker.budgetFor(stage) * this.config.staleMultiplier;
    const bounded = boundedSignal(parent, limitMs, () => new StageTimeoutError(stage, limitMs));

    try {
      const value = await untilAborted(bounded.signal, () => fn(bounded.signal));
      return { ok: true, value };
    } catch (err) {
      if (err instanceof PipelineError && !(err instanceof StageTimeoutError) && !(err instanceof CycleCancelledError)) {
        throw err;
      }
      if (!(err instanceof PipelineError)) {
        this.logger.warn(`Stage "${stage}" failed: ${errorMessage(err)}`);
      }
      return { ok: false, error: err };
    } finally {
      bounded.dispose();
    }
  }
}
