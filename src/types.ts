// Glasses Companion Pipeline - Shared TypeScript interfaces and types

// ─── Interaction State Machine ──────────────────────────────────────────────────

export enum InteractionState {
  IDLE = "idle",
  LISTENING = "listening",
  ANALYSING = "analysing",
  RESPONDING = "responding",
}

// ─── Confidence Signals ─────────────────────────────────────────────────────────

export type Modality = "audio" | "vision";

export interface ConfidenceSample {
  readonly source: Modality;
  /** Normalized confidence in [0, 1] */
  readonly value: number;
  /** Monotonic timestamp in milliseconds */
  readonly timestamp: number;
}

export interface FusionState {
  alpha: number;
  lastUpdate: number | null;
}

// ─── Perception Input ───────────────────────────────────────────────────────────

/**
 * Grayscale frame. `pixels` is row-major with `width * height` intensity values.
 */
export interface GrayFrame {
  width: number;
  height: number;
  pixels: ArrayLike<number>;
}

/** Audio as captured from the device, or a ratio already measured on the device. */
export type AudioCapture =
  | { kind: "pcm"; pcm: Buffer; sampleRate: number }
  | { kind: "measured"; speechRatio: number };

/** Video as captured from the device, or a salience already measured on the device. */
export type VisionCapture =
  | { kind: "frames"; frames: GrayFrame[] }
  | { kind: "measured"; keyframeSalience: number };

export interface CaptureBundle {
  audio: AudioCapture | null;
  vision: VisionCapture | null;
  /** Streaming ASR hypotheses, oldest first. */
  partials?: string[];
  /** Monotonic capture time in milliseconds */
  capturedAt: number;
}

export interface PerceptionEvidence {
  speechRatio: number;
  keyframeSalience: number;
  keyframeCount: number;
  frameCount: number;
  /** Coarse motion description across the keyframes, null without raw frames */
  motion: string | null;
  transcript: string;
}

// ─── Response ───────────────────────────────────────────────────────────────────

export interface ConfirmationSignal {
  confirm: boolean;
  payload?: Record<string, unknown>;
}

export interface ResponseTicket {
  activationId: string;
  alpha: number;
  dominantModality: Modality;
  payload?: Record<string, unknown>;
}

export interface ResponsePayload {
  type: "caption";
  activationId: string;
  text: string;
  dominantModality: Modality;
  alpha: number;
}

// ─── Latency ────────────────────────────────────────────────────────────────────

export type PipelineStage =
  | "capture"
  | "vad"
  | "asr"
  | "keyframe"
  | "fusion"
  | "fsm"
  | "response"
  | "dispatch";

export interface StageTiming {
  readonly cycleId: number;
  readonly stageName: string;
  readonly durationMs: number;
  readonly budgetMs: number;
  readonly withinBudget: boolean;
}

export interface CycleReport {
  cycleId: number;
  timings: StageTiming[];
  totalMs: number;
  withinBudget: boolean;
  breachedStages: string[];
}

export type HealthStatus = "ok" | "degraded";

export interface StageSummary {
  count: number;
  p50Ms: number;
  p95Ms: number;
  budgetMs: number;
  breaches: number;
}

export interface LatencySummary {
  cycles: number;
  stages: Record<string, StageSummary>;
  total: { p50Ms: number; p95Ms: number; budgetMs: number };
  withinBudget: boolean;
  health: HealthStatus;
}

export interface TelemetrySummary extends LatencySummary {
  sessionId: string;
  meanFusedScore: number;
  responsesDispatched: number;
}

// ─── Cycle Result ───────────────────────────────────────────────────────────────

export type CycleOutcome = "responded" | "pending" | "cancelled" | "expired";

export interface CycleResult {
  outcome: CycleOutcome;
  state: InteractionState;
  activationId: string | null;
  alpha: number;
  confidences: { audio: number; vision: number };
  staleInputs: Modality[];
  response: ResponsePayload | null;
  report: CycleReport;
  health: HealthStatus;
}

// ─── WebSocket Message Types ────────────────────────────────────────────────────

// Client → Server messages are validated in server.ts (see clientMessageSchema).

// Server → Client messages
export type ServerMessage =
  | { type: "session_created"; sessionId: string }
  | { type: "state_change"; state: InteractionState; activationId: string | null }
  | { type: "response"; payload: ResponsePayload; speechSeconds: number }
  | {
      type: "cycle_report";
      cycleId: number;
      outcome: CycleOutcome;
      totalMs: number;
      withinBudget: boolean;
      breachedStages: string[];
      alpha: number;
      staleInputs: Modality[];
    }
  | { type: "health"; status: HealthStatus }
  | { type: "summary"; summary: TelemetrySummary }
  | { type: "error"; message: string; recoverable: boolean };
