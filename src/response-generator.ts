// Response Generator - turns a confirmed activation into a caption payload.
//
// TemplateCaptionGenerator is deterministic and needs no network access.
// OpenAICaptionGenerator asks a chat model for a one-line caption and falls
// back to the template when the model returns nothing usable.

import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { PerceptionEvidence, ResponsePayload, ResponseTicket } from "./types.js";

export interface ResponseContext {
  ticket: ResponseTicket;
  evidence: PerceptionEvidence;
  signal?: AbortSignal;
}

export interface ResponseGenerator {
  generate(context: ResponseContext): Promise<ResponsePayload>;
}

function describeVisual(evidence: PerceptionEvidence): string {
  if (evidence.motion !== null) {
    return `${evidence.keyframeCount} keyframes; ${evidence.motion}`;
  }
  return `scene salience ${evidence.keyframeSalience.toFixed(2)}`;
}

function describeAudio(evidence: PerceptionEvidence): string {
  if (evidence.transcript.length > 0) {
    return `heard "${evidence.transcript}"`;
  }
  return `speech in ${Math.round(evidence.speechRatio * 100)}% of frames`;
}

/**
 * Compose a caption with the dominant modality first.
 * e.g. `3 keyframes; motion towards right. heard "exit on the left".`
 */
export function composeCaption(ticket: ResponseTicket, evidence: PerceptionEvidence): string {
  const visual = describeVisual(evidence);
  const audio = describeAudio(evidence);
  const parts = ticket.dominantModality === "vision" ? [visual, audio] : [audio, visual];
  return `${parts.join(". ")}.`;
}

function toPayload(ticket: ResponseTicket, text: string): ResponsePayload {
  return {
    type: "caption",
    activationId: ticket.activationId,
    text,
    dominantModality: ticket.dominantModality,
    alpha: ticket.alpha,
  };
}

export class TemplateCaptionGenerator implements ResponseGenerator {
  async generate({ ticket, evidence }: ResponseContext): Promise<ResponsePayload> {
    return toPayload(ticket, composeCaption(ticket, evidence));
  }
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: "system" | "user"; content: string }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

const CAPTION_SYSTEM_PROMPT =
  "You write captions for a heads-up display on smart glasses. " +
  "Reply with one short sentence (at most 20 words) describing what the wearer is seeing and hearing. " +
  "No preamble, no quotes.";

export class OpenAICaptionGenerator implements ResponseGenerator {
  private readonly fallback = new TemplateCaptionGenerator();

  constructor(
    private readonly openai: OpenAIChatClient,
    private readonly model: string = "gpt-4o-mini",
    private readonly logger: Logger = silentLogger,
  ) {}

  async generate(context: ResponseContext): Promise<ResponsePayload> {
    const { ticket, evidence, signal } = context;
    const response = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: CAPTION_SYSTEM_PROMPT },
          { role: "user", content: this.buildUserPrompt(ticket, evidence) },
        ],
        temperature: 0.3,
        max_tokens: 60,
      },
      signal ? { signal } : undefined,
    );

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      this.logger.warn(`Empty caption from ${this.model} for activation ${ticket.activationId}, using template`);
      return this.fallback.generate(context);
    }
    return toPayload(ticket, content);
  }

  private buildUserPrompt(ticket: ResponseTicket, evidence: PerceptionEvidence): string {
    return [
      `Dominant modality: ${ticket.dominantModality} (alpha ${ticket.alpha.toFixed(3)})`,
      `Visual: ${describeVisual(evidence)}`,
      `Audio: ${describeAudio(evidence)}`,
    ].join("\n");
  }
}
