// Glasses Companion Pipeline - Entry point
// Loads configuration, wires the session registry and starts the server.

import "dotenv/config";
import OpenAI from "openai";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { OpenAICaptionGenerator, TemplateCaptionGenerator, type OpenAIChatClient, type ResponseGenerator } from "./response-generator.js";
import { createAppServer } from "./server.js";
import { SessionRegistry } from "./session-registry.js";
import { TelemetryExporter } from "./telemetry-export.js";
import { createConsoleLogger } from "./logger.js";

export const APP_NAME = "Glasses Companion Pipeline";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

/** Adapts the SDK client to the narrow chat surface the generator needs. */
export function wrapOpenAI(client: OpenAI): OpenAIChatClient {
  return {
    chat: {
      completions: {
        create: (params, options) => client.chat.completions.create(params, options),
      },
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  logInit(
    `Fusion k=${config.fusion.k} b=${config.fusion.b} beta=${config.fusion.beta}, ` +
      `total budget ${config.totalBudgetMs}ms, stale multiplier ${config.staleMultiplier}`,
  );

  let generator: ResponseGenerator;
  if (config.openai.apiKey) {
    logInit(`Captions: OpenAI (${config.openai.model})`);
    generator = new OpenAICaptionGenerator(
      wrapOpenAI(new OpenAI({ apiKey: config.openai.apiKey })),
      config.openai.model,
      createConsoleLogger("Captions"),
    );
  } else {
    logInit("Captions: template (OPENAI_API_KEY not set)");
    generator = new TemplateCaptionGenerator();
  }

  const telemetry = config.telemetryDir ? new TelemetryExporter(config.telemetryDir) : undefined;
  logInit(telemetry ? `Telemetry export to ${config.telemetryDir}/` : "Telemetry export disabled");

  const registry = new SessionRegistry({ settings: config, generator, telemetry });
  const server = createAppServer({ registry });

  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit("Pipeline: capture → vad/asr/keyframe → fusion → fsm → response → dispatch");

  const shutdown = (signal: string) => {
    logInit(`${signal} received, closing server and sessions`);
    server
      .close()
      .then(() => registry.closeAll())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logFatal(errorMessage(err));
  process.exit(1);
});
