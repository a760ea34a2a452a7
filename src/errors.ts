// Error taxonomy for the companion core.
// Validation errors surface immediately; protocol errors signal an out-of-sequence caller.

import type { InteractionState } from "./types.js";

export type PipelineErrorCode =
  | "INVALID_CONFIDENCE"
  | "INVALID_CONFIG"
  | "INVALID_TRANSITION"
  | "DUPLICATE_ACTIVATION"
  | "STAGE_TIMEOUT"
  | "INTERACTION_TIMEOUT"
  | "CYCLE_CANCELLED"
  | "SESSION_NOT_FOUND";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A confidence value outside [0, 1] (or not a finite number). */
export class InvalidConfidenceError extends PipelineError {
  constructor(readonly field: string, readonly value: number) {
    super("INVALID_CONFIDENCE", `Invalid confidence for ${field}: ${value}. Must be a finite number in [0, 1].`);
  }
}

export class InvalidConfigError extends PipelineError {
  constructor(readonly field: string, message: string) {
    super("INVALID_CONFIG", `Invalid config "${field}": ${message}`);
  }
}

export class InteractionProtocolError extends PipelineError {
  constructor(
    code: "INVALID_TRANSITION" | "DUPLICATE_ACTIVATION",
    readonly event: string,
    readonly state: InteractionState,
    message: string,
  ) {
    super(code, message);
  }
}

export class InvalidTransitionError extends InteractionProtocolError {
  constructor(event: string, state: InteractionState, expected: InteractionState) {
    super(
      "INVALID_TRANSITION",
      event,
      state,
      `Invalid state transition: cannot call ${event}() in "${state}" state. Expected state: "${expected}".`,
    );
  }
}

/** Raised for any event delivered while a response is being dispatched. */
export class DuplicateActivationError extends InteractionProtocolError {
  constructor(event: string, state: InteractionState, readonly activationId: string | null) {
    super(
      "DUPLICATE_ACTIVATION",
      event,
      state,
      `Duplicate activation: ${event}() rejected while activation ${activationId ?? "<none>"} is responding.`,
    );
  }
}

/** An adapter stage ran past budget × stale multiplier. */
export class StageTimeoutError extends PipelineError {
  constructor(readonly stage: string, readonly limitMs: number) {
    super("STAGE_TIMEOUT", `Stage "${stage}" exceeded ${limitMs}ms; using last-known input.`);
  }
}

/** An activation stayed in one state past its limit and was dropped back to IDLE. */
export class InteractionTimeoutError extends PipelineError {
  constructor(
    readonly activationId: string | null,
    readonly state: InteractionState,
    readonly limitMs: number,
  ) {
    super("INTERACTION_TIMEOUT", `Activation ${activationId ?? "<none>"} exceeded the ${limitMs}ms "${state}" timeout.`);
  }
}

/** Abort reason handed to in-flight work when an activation is cancelled. */
export class CycleCancelledError extends PipelineError {
  constructor(readonly reason: string) {
    super("CYCLE_CANCELLED", `Cycle cancelled: ${reason}`);
  }
}

export class SessionNotFoundError extends PipelineError {
  constructor(readonly sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
