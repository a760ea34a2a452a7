// Glasses Companion Pipeline - WebSocket Handler and Express Server
//
// One session per WebSocket connection. Clients push capture data (or ask the
// server-side provider to capture with "tick"), and receive state changes,
// responses, per-cycle reports and health changes back.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { CallbackOutputChannel } from "./output-channel.js";
import { SyntheticPerceptionProvider, type PerceptionProvider } from "./perception-provider.js";
import type { PipelineOrchestrator } from "./pipeline-orchestrator.js";
import type { SessionRegistry } from "./session-registry.js";
import type { AudioCapture, CaptureBundle, HealthStatus, ServerMessage, VisionCapture } from "./types.js";

// ─── Client → Server messages ───────────────────────────────────────────────────

const MAX_FRAMES_PER_CAPTURE = 120;

// Ranges are not checked here: out-of-range values reach the adapters and come
// back as InvalidConfidenceError.
const audioSchema = z.union([
  z.object({ speechRatio: z.number() }),
  z.object({ pcmBase64: z.string(), sampleRate: z.number().int().positive() }),
]);

const frameSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  pixels: z.array(z.number()),
});

const visionSchema = z.union([
  z.object({ keyframeSalience: z.number() }),
  z.object({ frames: z.array(frameSchema).max(MAX_FRAMES_PER_CAPTURE) }),
]);

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("capture"),
    audio: audioSchema.nullable().optional(),
    vision: visionSchema.nullable().optional(),
    partials: z.array(z.string()).optional(),
  }),
  z.object({ type: z.literal("tick") }),
  z.object({ type: z.literal("cancel"), reason: z.string().optional() }),
  z.object({ type: z.literal("get_summary"), window: z.number().int().positive().optional() }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
type CaptureMessage = Extract<ClientMessage, { type: "capture" }>;

export function toCaptureBundle(message: CaptureMessage, capturedAt: number): CaptureBundle {
  let audio: AudioCapture | null = null;
  if (message.audio) {
    audio =
      "speechRatio" in message.audio
        ? { kind: "measured", speechRatio: message.audio.speechRatio }
        : { kind: "pcm", pcm: Buffer.from(message.audio.pcmBase64, "base64"), sampleRate: message.audio.sampleRate };
  }

  let vision: VisionCapture | null = null;
  if (message.vision) {
    vision =
      "keyframeSalience" in message.vision
        ? { kind: "measured", keyframeSalience: message.vision.keyframeSalience }
        : { kind: "frames", frames: message.vision.frames };
  }

  return { audio, vision, partials: message.partials, capturedAt };
}

// ─── Connection Handler ─────────────────────────────────────────────────────────

export interface ConnectionHandler {
  readonly sessionId: string;
  handleMessage(text: string): Promise<void>;
  close(): Promise<void>;
}

export interface ConnectionOptions {
  providerFactory?: () => PerceptionProvider;
  logger?: Logger;
  now?: () => number;
}

/**
 * Binds one session to a message sink. Transport-agnostic: the WebSocket
 * server feeds it text frames and forwards whatever it sends.
 */
export function createConnectionHandler(
  registry: SessionRegistry,
  send: (message: ServerMessage) => void,
  options: ConnectionOptions = {},
): ConnectionHandler {
  const logger = options.logger ?? createConsoleLogger("Server");
  const now = options.now ?? (() => performance.now());
  const provider = options.providerFactory?.() ?? new SyntheticPerceptionProvider({ now });

  const session: PipelineOrchestrator = registry.createSession({
    provider,
    output: new CallbackOutputChannel((payload, speechSeconds) => send({ type: "response", payload, speechSeconds })),
    onHealthChange: (status: HealthStatus) => send({ type: "health", status }),
  });
  const sessionId = session.sessionId;

  const unsubscribe = session.fsm.subscribe((_from, to, activationId) => {
    send({ type: "state_change", state: to, activationId });
  });

  send({ type: "session_created", sessionId });

  async function runAndReport(bundle?: CaptureBundle): Promise<void> {
    const result = await session.runCycle(bundle);
    send({
      type: "cycle_report",
      cycleId: result.report.cycleId,
      outcome: result.outcome,
      totalMs: result.report.totalMs,
      withinBudget: result.report.withinBudget,
      breachedStages: result.report.breachedStages,
      alpha: result.alpha,
      staleInputs: result.staleInputs,
    });
  }

  async function dispatch(message: ClientMessage): Promise<void> {
    switch (message.type) {
      case "capture":
        await runAndReport(toCaptureBundle(message, now()));
        break;
      case "tick":
        await runAndReport();
        break;
      case "cancel":
        session.cancel(message.reason ?? "cancelled by client");
        break;
      case "get_summary":
        send({ type: "summary", summary: session.summarize(message.window) });
        break;
      default: {
        const exhaustiveCheck: never = message;
        throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  }

  return {
    sessionId,
    async handleMessage(text: string): Promise<void> {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        send({ type: "error", message: "Message is not valid JSON.", recoverable: true });
        return;
      }

      const result = clientMessageSchema.safeParse(parsed);
      if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
        send({ type: "error", message: `Invalid message: ${issues}`, recoverable: true });
        return;
      }

      try {
        await dispatch(result.data);
      } catch (err) {
        logger.error(`Error handling "${result.data.type}" for session ${sessionId}: ${errorMessage(err)}`);
        send({ type: "error", message: errorMessage(err), recoverable: true });
      }
    },
    async close(): Promise<void> {
      unsubscribe();
      // Shutdown may already have closed the session through the registry.
      if (!registry.has(sessionId)) return;
      await registry.closeSession(sessionId);
    },
  };
}

// ─── HTTP routes ────────────────────────────────────────────────────────────────

/** The slice of express.Response the route handlers use. */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): void;
}

export function sendHealth(registry: SessionRegistry, res: JsonResponse): void {
  const degraded = registry.listSessions().filter((id) => registry.getSession(id).tracker.health === "degraded");
  const status: HealthStatus = degraded.length > 0 ? "degraded" : "ok";
  res.json({ status, sessions: registry.size, degradedSessions: degraded });
}

export function sendTelemetry(registry: SessionRegistry, res: JsonResponse, sessionId?: string): void {
  if (sessionId === undefined) {
    res.json({ sessions: registry.listSessions().map((id) => registry.getSession(id).summarize()) });
    return;
  }
  if (!registry.listSessions().includes(sessionId)) {
    res.status(404).json({ error: `Session not found: ${sessionId}` });
    return;
  }
  res.json(registry.getSession(sessionId).summarize());
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  registry: SessionRegistry;
  logger?: Logger;
  providerFactory?: () => PerceptionProvider;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  registry: SessionRegistry;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { registry, providerFactory } = options;
  const logger = options.logger ?? createConsoleLogger("Server");

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => sendHealth(registry, res));
  app.get("/telemetry", (_req, res) => sendTelemetry(registry, res));
  app.get("/telemetry/:sessionId", (req, res) => sendTelemetry(registry, res, req.params.sessionId));

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    const handler = createConnectionHandler(registry, (message) => sendMessage(ws, message), { providerFactory, logger });
    logger.info(`New WebSocket connection, session ${handler.sessionId}`);

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        sendMessage(ws, {
          type: "error",
          message: "Binary frames are not supported; send a JSON capture message.",
          recoverable: true,
        });
        return;
      }
      handler.handleMessage(data.toString()).catch((err: unknown) => {
        logger.error(`Unexpected error for session ${handler.sessionId}: ${errorMessage(err)}`);
      });
    });

    ws.on("close", () => {
      logger.info(`WebSocket closed, session ${handler.sessionId}`);
      handler.close().catch((err: unknown) => {
        logger.error(`Failed to close session ${handler.sessionId}: ${errorMessage(err)}`);
      });
    });

    ws.on("error", (err) => {
      logger.error(`WebSocket error for session ${handler.sessionId}: ${err.message}`);
    });
  });

  return {
    app,
    httpServer,
    wss,
    registry,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}
