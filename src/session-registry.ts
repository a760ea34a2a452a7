// Session Registry - one PipelineOrchestrator per live session.
//
// Each session owns its fusion gate, FSM and latency tracker; the registry
// only maps ids to orchestrators and tears them down. Sessions never share
// state, so cycles of different sessions may interleave freely.

import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "./config.js";
import { ThresholdConfirmationPolicy } from "./confirmation-policy.js";
import { SessionNotFoundError, errorMessage } from "./errors.js";
import { FusionGate } from "./fusion-gate.js";
import { InteractionFSM } from "./interaction-fsm.js";
import { LatencyTracker } from "./latency-tracker.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { OutputChannel } from "./output-channel.js";
import { PipelineOrchestrator } from "./pipeline-orchestrator.js";
import type { PerceptionProvider } from "./perception-provider.js";
import { TemplateCaptionGenerator, type ResponseGenerator } from "./response-generator.js";
import type { TelemetryExporter } from "./telemetry-export.js";
import type { HealthStatus } from "./types.js";

export type SessionSettings = Pick<
  AppConfig,
  "fusion" | "totalBudgetMs" | "staleMultiplier" | "thresholds" | "minConfirmConfidence"
> &
  Partial<Pick<AppConfig, "timeouts">>;

export interface SessionRegistryDeps {
  settings: SessionSettings;
  /** Shared across sessions; it keeps no per-session state. */
  generator?: ResponseGenerator;
  telemetry?: TelemetryExporter;
  loggerFactory?: (component: string) => Logger;
}

export interface CreateSessionOptions {
  output: OutputChannel;
  provider: PerceptionProvider;
  onHealthChange?: (status: HealthStatus, totalP95Ms: number) => void;
}

export class SessionRegistry {
  private sessions: Map<string, PipelineOrchestrator> = new Map();
  private readonly generator: ResponseGenerator;
  private readonly loggerFactory: (component: string) => Logger;
  private readonly log: Logger;

  constructor(private readonly deps: SessionRegistryDeps) {
    this.generator = deps.generator ?? new TemplateCaptionGenerator();
    this.loggerFactory = deps.loggerFactory ?? createConsoleLogger;
    this.log = this.loggerFactory("SessionRegistry");
  }

  get size(): number {
    return this.sessions.size;
  }

  createSession(options: CreateSessionOptions): PipelineOrchestrator {
    const { settings } = this.deps;
    const sessionId = uuidv4();
    const logger = this.loggerFactory(`Session ${sessionId.slice(0, 8)}`);

    const orchestrator = new PipelineOrchestrator({
      sessionId,
      provider: options.provider,
      output: options.output,
      generator: this.generator,
      policy: new ThresholdConfirmationPolicy(settings.minConfirmConfidence),
      gate: new FusionGate(settings.fusion, logger),
      fsm: new InteractionFSM({ thresholds: settings.thresholds, timeouts: settings.timeouts, logger }),
      tracker: new LatencyTracker({
        config: { totalBudgetMs: settings.totalBudgetMs },
        logger,
        onHealthChange: options.onHealthChange,
      }),
      config: { staleMultiplier: settings.staleMultiplier },
      logger,
    });

    this.sessions.set(sessionId, orchestrator);
    this.log.info(`Session ${sessionId} created (${this.sessions.size} active)`);
    return orchestrator;
  }

  /** @throws SessionNotFoundError */
  getSession(sessionId: string): PipelineOrchestrator {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  listSessions(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Tear a session down: cancel in-flight work, export its telemetry when an
   * exporter is configured, then forget it. Returns the exported file paths.
   */
  async closeSession(sessionId: string): Promise<string[]> {
    const session = this.getSession(sessionId);
    this.sessions.delete(sessionId);

    const summary = session.summarize();
    session.dispose();

    let saved: string[] = [];
    if (this.deps.telemetry && summary.cycles > 0) {
      try {
        saved = await this.deps.telemetry.exportSession({
          sessionId,
          records: () => session.records(),
          summarize: () => summary,
        });
      } catch (err) {
        this.log.error(`Telemetry export failed for session ${sessionId}: ${errorMessage(err)}`);
        throw err;
      }
    }

    this.log.info(
      `Session ${sessionId} closed after ${summary.cycles} cycles, ${summary.responsesDispatched} responses (${this.sessions.size} active)`,
    );
    return saved;
  }

  /** Sessions closed elsewhere while this runs (e.g. by their connection) are skipped. */
  async closeAll(): Promise<void> {
    for (const sessionId of this.listSessions()) {
      if (this.sessions.has(sessionId)) {
        await this.closeSession(sessionId);
      }
    }
  }
}
