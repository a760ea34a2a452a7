// Interaction FSM - governs when the companion listens, analyses and responds.
//
// IDLE → LISTENING:       activate()
// LISTENING → ANALYSING:  observe() once enough perception evidence has accumulated
// ANALYSING → RESPONDING: respond(true); respond(false) stays in ANALYSING
// RESPONDING → IDLE:      completeResponse() after the response is dispatched
//
// cancel() can transition from ANY state → IDLE.
//
// Each non-idle state has a time limit (timeoutFor). The FSM holds no clock;
// the orchestrator measures time in state and calls cancel("timeout").

import { v4 as uuidv4 } from "uuid";
import { DuplicateActivationError, InvalidConfigError, InvalidTransitionError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { InteractionState } from "./types.js";
import type { Modality, PerceptionEvidence, ResponseTicket } from "./types.js";

export interface ObservationThresholds {
  /** Accumulated speech ratio that counts as enough audio evidence. Default: 0.2 */
  minSpeechRatio: number;
  /** Accumulated keyframe salience that counts as enough visual evidence. Default: 0.1 */
  minKeyframeSalience: number;
}

export const DEFAULT_OBSERVATION_THRESHOLDS: Readonly<ObservationThresholds> = Object.freeze({
  minSpeechRatio: 0.2,
  minKeyframeSalience: 0.1,
});

export interface InteractionTimeouts {
  /** Longest an activation may wait in LISTENING for enough evidence. Default: 2000 */
  listenTimeoutMs: number;
  /** Longest an activation may wait in ANALYSING for confirmation. Default: 2000 */
  analyseTimeoutMs: number;
  /** Longest response generation plus dispatch may take. Default: 2000 */
  responseTimeoutMs: number;
}

export const DEFAULT_INTERACTION_TIMEOUTS: Readonly<InteractionTimeouts> = Object.freeze({
  listenTimeoutMs: 2000,
  analyseTimeoutMs: 2000,
  responseTimeoutMs: 2000,
});

export type TransitionListener = (
  from: InteractionState,
  to: InteractionState,
  activationId: string | null,
) => void;

export interface InteractionFSMOptions {
  thresholds?: Partial<ObservationThresholds>;
  /** Infinity disables a limit. */
  timeouts?: Partial<InteractionTimeouts>;
  logger?: Logger;
  /** Activation token factory. Defaults to uuid v4. */
  idFactory?: () => string;
}

const VALID_TRANSITIONS: ReadonlyMap<InteractionState, InteractionState> = new Map([
  [InteractionState.IDLE, InteractionState.LISTENING],
  [InteractionState.LISTENING, InteractionState.ANALYSING],
  [InteractionState.ANALYSING, InteractionState.RESPONDING],
  [InteractionState.RESPONDING, InteractionState.IDLE],
]);

function sourceStateFor(target: InteractionState): InteractionState {
  for (const [source, next] of VALID_TRANSITIONS) {
    if (next === target) return source;
  }
  return InteractionState.IDLE;
}

function validateThresholds(thresholds: ObservationThresholds): ObservationThresholds {
  for (const field of ["minSpeechRatio", "minKeyframeSalience"] as const) {
    const value = thresholds[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidConfigError(field, `must be a non-negative number, got ${value}`);
    }
  }
  return thresholds;
}

export function validateTimeouts(timeouts: InteractionTimeouts): InteractionTimeouts {
  for (const field of ["listenTimeoutMs", "analyseTimeoutMs", "responseTimeoutMs"] as const) {
    const value = timeouts[field];
    if (Number.isNaN(value) || value <= 0) {
      throw new InvalidConfigError(field, `must be a positive number of milliseconds, got ${value}`);
    }
  }
  return timeouts;
}

export class InteractionFSM {
  readonly thresholds: Readonly<ObservationThresholds>;
  readonly timeouts: Readonly<InteractionTimeouts>;
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private readonly listeners: TransitionListener[] = [];

  private current: InteractionState = InteractionState.IDLE;
  private activation: string | null = null;
  private speechEvidence = 0;
  private visionEvidence = 0;
  private advisoryAlpha = 0.5;
  private dispatched = 0;
  private cancellations = 0;

  constructor(options: InteractionFSMOptions = {}) {
    this.thresholds = Object.freeze(
      validateThresholds({ ...DEFAULT_OBSERVATION_THRESHOLDS, ...options.thresholds }),
    );
    this.timeouts = Object.freeze(validateTimeouts({ ...DEFAULT_INTERACTION_TIMEOUTS, ...options.timeouts }));
    this.logger = options.logger ?? silentLogger;
    this.idFactory = options.idFactory ?? uuidv4;
  }

  get state(): InteractionState {
    return this.current;
  }

  get activationId(): string | null {
    return this.activation;
  }

  /** Responses completed since construction. */
  get responsesDispatched(): number {
    return this.dispatched;
  }

  get cancelCount(): number {
    return this.cancellations;
  }

  /** The modality α currently favours; advisory only, never gates a transition. */
  get dominantModality(): Modality {
    return this.advisoryAlpha >= 0.5 ? "vision" : "audio";
  }

  /** Time an activation may spend in `state`; IDLE has no limit. */
  timeoutFor(state: InteractionState): number {
    switch (state) {
      case InteractionState.LISTENING:
        return this.timeouts.listenTimeoutMs;
      case InteractionState.ANALYSING:
        return this.timeouts.analyseTimeoutMs;
      case InteractionState.RESPONDING:
        return this.timeouts.responseTimeoutMs;
      default:
        return Number.POSITIVE_INFINITY;
    }
  }

  subscribe(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /** IDLE → LISTENING. Returns the new activation token. */
  activate(): string {
    this.assertTransition(InteractionState.LISTENING, "activate");

    const activationId = this.idFactory();
    this.activation = activationId;
    this.speechEvidence = 0;
    this.visionEvidence = 0;
    this.advisoryAlpha = 0.5;
    this.transitionTo(InteractionState.LISTENING, activationId);
    return activationId;
  }

  /**
   * Accumulate perception evidence for the current activation.
   * Returns true when this call moved the machine to ANALYSING.
   */
  observe(evidence: Pick<PerceptionEvidence, "speechRatio" | "keyframeSalience">, alpha: number): boolean {
    this.assertTransition(InteractionState.ANALYSING, "observe");

    this.speechEvidence += Math.max(0, evidence.speechRatio);
    this.visionEvidence += Math.max(0, evidence.keyframeSalience);
    this.advisoryAlpha = alpha;

    const enoughAudio = this.speechEvidence >= this.thresholds.minSpeechRatio;
    const enoughVision = this.visionEvidence >= this.thresholds.minKeyframeSalience;
    if (!enoughAudio && !enoughVision) {
      this.logger.debug(
        `Activation ${this.activation}: evidence speech=${this.speechEvidence.toFixed(3)} vision=${this.visionEvidence.toFixed(3)} below thresholds`,
      );
      return false;
    }

    this.transitionTo(InteractionState.ANALYSING, this.activation);
    return true;
  }

  /**
   * Apply the policy's confirmation signal. `confirm=false` keeps the machine
   * in ANALYSING and returns null.
   */
  respond(confirm: boolean, payload?: Record<string, unknown>): ResponseTicket | null {
    this.assertTransition(InteractionState.RESPONDING, "respond");
    const activationId = this.requireActivation("respond");

    if (!confirm) {
      this.logger.debug(`Activation ${activationId}: response not confirmed, staying in ${this.current}`);
      return null;
    }
    this.transitionTo(InteractionState.RESPONDING, activationId);
    return {
      activationId,
      alpha: this.advisoryAlpha,
      dominantModality: this.dominantModality,
      ...(payload ? { payload } : {}),
    };
  }

  /** RESPONDING → IDLE once the response has been handed to the output channel. */
  completeResponse(activationId: string): void {
    if (this.current !== InteractionState.RESPONDING) {
      throw new InvalidTransitionError("completeResponse", this.current, InteractionState.RESPONDING);
    }
    if (activationId !== this.activation) {
      throw new DuplicateActivationError("completeResponse", this.current, activationId);
    }

    this.dispatched++;
    this.clearActivation();
    this.transitionTo(InteractionState.IDLE, activationId);
  }

  /**
   * Force the machine back to IDLE from any state, discarding the in-flight
   * activation. A no-op when already IDLE.
   */
  cancel(reason: string): void {
    if (this.current === InteractionState.IDLE) return;

    const activationId = this.activation;
    this.logger.info(`Activation ${activationId} cancelled in "${this.current}" state: ${reason}`);
    this.cancellations++;
    this.clearActivation();
    this.transitionTo(InteractionState.IDLE, activationId);
  }

  private clearActivation(): void {
    this.activation = null;
    this.speechEvidence = 0;
    this.visionEvidence = 0;
  }

  private requireActivation(event: string): string {
    if (this.activation === null) {
      throw new InvalidTransitionError(event, this.current, InteractionState.LISTENING);
    }
    return this.activation;
  }

  private assertTransition(target: InteractionState, event: string): void {
    if (this.current === InteractionState.RESPONDING) {
      throw new DuplicateActivationError(event, this.current, this.activation);
    }
    if (VALID_TRANSITIONS.get(this.current) !== target) {
      throw new InvalidTransitionError(event, this.current, sourceStateFor(target));
    }
  }

  private transitionTo(next: InteractionState, activationId: string | null): void {
    const previous = this.current;
    this.current = next;
    this.logger.debug(`${previous} → ${next} (activation ${activationId})`);
    for (const listener of this.listeners) {
      listener(previous, next, activationId);
    }
  }
}
