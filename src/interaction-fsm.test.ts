import { describe, it, expect, vi, beforeEach } from "vitest";
import { InteractionFSM } from "./interaction-fsm.js";
import { DuplicateActivationError, InvalidConfigError, InvalidTransitionError } from "./errors.js";
import { InteractionState } from "./types.js";

function sequentialIds(): () => string {
  let n = 0;
  return () => `act-${++n}`;
}

/** Drives a fresh machine to ANALYSING with enough audio evidence. */
function toAnalysing(fsm: InteractionFSM, alpha = 0.4): string {
  const id = fsm.activate();
  fsm.observe({ speechRatio: 0.5, keyframeSalience: 0 }, alpha);
  return id;
}

describe("InteractionFSM", () => {
  let fsm: InteractionFSM;

  beforeEach(() => {
    fsm = new InteractionFSM({ idFactory: sequentialIds() });
  });

  it("starts in IDLE with no activation", () => {
    expect(fsm.state).toBe(InteractionState.IDLE);
    expect(fsm.activationId).toBeNull();
    expect(fsm.responsesDispatched).toBe(0);
  });

  // ─── activate ───

  describe("activate", () => {
    it("moves IDLE → LISTENING and issues an activation token", () => {
      const listener = vi.fn();
      fsm.subscribe(listener);

      expect(fsm.activate()).toBe("act-1");
      expect(fsm.state).toBe(InteractionState.LISTENING);
      expect(fsm.activationId).toBe("act-1");
      expect(listener).toHaveBeenCalledWith(InteractionState.IDLE, InteractionState.LISTENING, "act-1");
    });

    it("rejects a second activate while LISTENING", () => {
      fsm.activate();
      expect(() => fsm.activate()).toThrow(
        'Invalid state transition: cannot call activate() in "listening" state. Expected state: "idle".',
      );
      expect(fsm.state).toBe(InteractionState.LISTENING);
    });
  });

  // ─── observe ───

  describe("observe", () => {
    it("stays in LISTENING until accumulated speech reaches the threshold", () => {
      fsm.activate();
      expect(fsm.observe({ speechRatio: 0.1, keyframeSalience: 0 }, 0.4)).toBe(false);
      expect(fsm.state).toBe(InteractionState.LISTENING);
      expect(fsm.observe({ speechRatio: 0.1, keyframeSalience: 0 }, 0.4)).toBe(true);
      expect(fsm.state).toBe(InteractionState.ANALYSING);
    });

    it("moves to ANALYSING on visual evidence alone", () => {
      fsm.activate();
      expect(fsm.observe({ speechRatio: 0, keyframeSalience: 0.1 }, 0.7)).toBe(true);
      expect(fsm.state).toBe(InteractionState.ANALYSING);
    });

    it("is rejected in IDLE", () => {
      expect(() => fsm.observe({ speechRatio: 1, keyframeSalience: 1 }, 0.5)).toThrow(InvalidTransitionError);
    });

    it("is rejected once ANALYSING", () => {
      toAnalysing(fsm);
      expect(() => fsm.observe({ speechRatio: 1, keyframeSalience: 1 }, 0.5)).toThrow(
        'Invalid state transition: cannot call observe() in "analysing" state. Expected state: "listening".',
      );
    });

    it("ignores negative evidence", () => {
      fsm.activate();
      fsm.observe({ speechRatio: -5, keyframeSalience: -5 }, 0.5);
      expect(fsm.observe({ speechRatio: 0.2, keyframeSalience: 0 }, 0.5)).toBe(true);
    });
  });

  // ─── respond ───

  describe("respond", () => {
    it("stays in ANALYSING when not confirmed", () => {
      toAnalysing(fsm);
      expect(fsm.respond(false)).toBeNull();
      expect(fsm.state).toBe(InteractionState.ANALYSING);
    });

    it("moves to RESPONDING and returns a ticket when confirmed", () => {
      toAnalysing(fsm, 0.4);
      const ticket = fsm.respond(true);
      expect(ticket).toEqual({ activationId: "act-1", alpha: 0.4, dominantModality: "audio" });
      expect(fsm.state).toBe(InteractionState.RESPONDING);
    });

    it("carries the payload and reports vision as dominant at α = 0.5", () => {
      toAnalysing(fsm, 0.5);
      const ticket = fsm.respond(true, { query: "what is this" });
      expect(ticket).toEqual({
        activationId: "act-1",
        alpha: 0.5,
        dominantModality: "vision",
        payload: { query: "what is this" },
      });
    });

    it("is rejected while LISTENING", () => {
      fsm.activate();
      expect(() => fsm.respond(true)).toThrow(
        'Invalid state transition: cannot call respond() in "listening" state. Expected state: "analysing".',
      );
    });
  });

  // ─── RESPONDING guard ───

  describe("while RESPONDING", () => {
    beforeEach(() => {
      toAnalysing(fsm);
      fsm.respond(true);
    });

    it.each([
      ["activate", (m: InteractionFSM) => m.activate()],
      ["observe", (m: InteractionFSM) => m.observe({ speechRatio: 1, keyframeSalience: 1 }, 0.5)],
      ["respond", (m: InteractionFSM) => m.respond(true)],
    ])("rejects %s() with DuplicateActivationError", (_name, call) => {
      expect(() => call(fsm)).toThrow(DuplicateActivationError);
      expect(fsm.state).toBe(InteractionState.RESPONDING);
      expect(fsm.activationId).toBe("act-1");
    });

    it("rejects completion of a different activation", () => {
      expect(() => fsm.completeResponse("act-9")).toThrow(DuplicateActivationError);
      expect(fsm.state).toBe(InteractionState.RESPONDING);
    });

    it("completeResponse returns to IDLE and counts the dispatch", () => {
      const listener = vi.fn();
      fsm.subscribe(listener);
      fsm.completeResponse("act-1");

      expect(fsm.state).toBe(InteractionState.IDLE);
      expect(fsm.activationId).toBeNull();
      expect(fsm.responsesDispatched).toBe(1);
      expect(listener).toHaveBeenCalledWith(InteractionState.RESPONDING, InteractionState.IDLE, "act-1");
    });
  });

  it("completeResponse outside RESPONDING is an invalid transition", () => {
    expect(() => fsm.completeResponse("act-1")).toThrow(InvalidTransitionError);
  });

  // ─── cancel ───

  describe("cancel", () => {
    it("is a no-op in IDLE", () => {
      const listener = vi.fn();
      fsm.subscribe(listener);
      fsm.cancel("nothing running");
      expect(fsm.cancelCount).toBe(0);
      expect(listener).not.toHaveBeenCalled();
    });

    it.each([
      ["LISTENING", (m: InteractionFSM) => m.activate()],
      ["ANALYSING", (m: InteractionFSM) => toAnalysing(m)],
      [
        "RESPONDING",
        (m: InteractionFSM) => {
          toAnalysing(m);
          m.respond(true);
        },
      ],
    ])("returns to IDLE from %s", (_name, setup) => {
      setup(fsm);
      const listener = vi.fn();
      fsm.subscribe(listener);

      fsm.cancel("user dismissed");

      expect(fsm.state).toBe(InteractionState.IDLE);
      expect(fsm.activationId).toBeNull();
      expect(fsm.cancelCount).toBe(1);
      expect(fsm.responsesDispatched).toBe(0);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][1]).toBe(InteractionState.IDLE);
      expect(listener.mock.calls[0][2]).toBe("act-1");
    });

    it("discards accumulated evidence so the next activation starts fresh", () => {
      fsm.activate();
      fsm.observe({ speechRatio: 0.15, keyframeSalience: 0 }, 0.5);
      fsm.cancel("timeout");

      expect(fsm.activate()).toBe("act-2");
      expect(fsm.observe({ speechRatio: 0.1, keyframeSalience: 0 }, 0.5)).toBe(false);
      expect(fsm.state).toBe(InteractionState.LISTENING);
    });

    it("logs the cancelled activation", () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const machine = new InteractionFSM({ idFactory: sequentialIds(), logger });
      machine.activate();
      machine.cancel("user dismissed");
      expect(logger.info).toHaveBeenCalledWith('Activation act-1 cancelled in "listening" state: user dismissed');
    });
  });

  // ─── configuration & listeners ───

  it("rejects negative thresholds", () => {
    expect(() => new InteractionFSM({ thresholds: { minSpeechRatio: -0.1 } })).toThrow(InvalidConfigError);
  });

  describe("timeouts", () => {
    it("defaults every active state to two seconds and leaves IDLE unbounded", () => {
      expect(fsm.timeouts).toEqual({ listenTimeoutMs: 2000, analyseTimeoutMs: 2000, responseTimeoutMs: 2000 });
      expect(fsm.timeoutFor(InteractionState.IDLE)).toBe(Number.POSITIVE_INFINITY);
    });

    it("maps each state to its own limit", () => {
      const machine = new InteractionFSM({
        timeouts: { listenTimeoutMs: 100, analyseTimeoutMs: 200, responseTimeoutMs: Number.POSITIVE_INFINITY },
      });
      expect(machine.timeoutFor(InteractionState.LISTENING)).toBe(100);
      expect(machine.timeoutFor(InteractionState.ANALYSING)).toBe(200);
      expect(machine.timeoutFor(InteractionState.RESPONDING)).toBe(Number.POSITIVE_INFINITY);
    });

    it.each([
      ["listenTimeoutMs", { listenTimeoutMs: 0 }],
      ["analyseTimeoutMs", { analyseTimeoutMs: -5 }],
      ["responseTimeoutMs", { responseTimeoutMs: Number.NaN }],
    ])("rejects a non-positive %s", (field, timeouts) => {
      expect(() => new InteractionFSM({ timeouts })).toThrow(`Invalid config "${field}"`);
    });
  });

  it("unsubscribe stops notifications", () => {
    const listener = vi.fn();
    const unsubscribe = fsm.subscribe(listener);
    unsubscribe();
    fsm.activate();
    expect(listener).not.toHaveBeenCalled();
  });

  it("defaults to uuid activation tokens", () => {
    const machine = new InteractionFSM();
    expect(machine.activate()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("runs several full activations back to back", () => {
    for (let i = 1; i <= 3; i++) {
      const id = toAnalysing(fsm);
      expect(id).toBe(`act-${i}`);
      const ticket = fsm.respond(true);
      expect(ticket?.activationId).toBe(id);
      fsm.completeResponse(id);
    }
    expect(fsm.responsesDispatched).toBe(3);
    expect(fsm.state).toBe(InteractionState.IDLE);
  });
});
