/**
 * Text Generation Capability
 *
 * The only door between the orchestration core and a language model: a
 * prompt goes in, free-form text comes out. Everything downstream treats the
 * returned text as untrusted and runs it through the extraction layer.
 *
 * Both providers are reached through their vendor SDKs. Every call is bounded
 * by a timeout and by the caller's AbortSignal.
 */

import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { z } from "zod";
import {
  DEFAULT_ANTHROPIC_MODEL,
  DEFAULT_OPENAI_MODEL,
  MAX_OUTPUT_TOKENS,
} from "../config/constants.ts";
import { env } from "../config/env.ts";
import { CapabilityError, errorMessage } from "../lib/errors.ts";
import { createAnthropicClientGetter, createOpenAIClientGetter } from "./client-factory.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerationRequest {
  system: string;
  prompt: string;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  readonly provider: string;
  readonly model: string;
  /** Resolves with non-empty text or rejects with a CapabilityError. */
  generate(request: GenerationRequest): Promise<string>;
}

export interface TextGeneratorOptions {
  model?: string;
  timeoutMs?: number;
  maxTokens?: number;
}

const DEFAULT_TEMPERATURE = 0.7;

// ---------------------------------------------------------------------------
// OpenAI
// ---------------------------------------------------------------------------

export class OpenAITextGenerator implements TextGenerator {
  readonly provider = "openai";
  readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;

  constructor(
    private readonly getClient: () => OpenAI = createOpenAIClientGetter(),
    options: TextGeneratorOptions = {},
  ) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.timeoutMs = options.timeoutMs ?? env.LLM_TIMEOUT_MS;
    this.maxTokens = options.maxTokens ?? MAX_OUTPUT_TOKENS;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.prompt },
      ],
    };

    // GPT-5.x models use max_completion_tokens instead of max_tokens
    if (this.model.startsWith("gpt-5")) {
      params.max_completion_tokens = this.maxTokens;
    } else {
      params.max_tokens = this.maxTokens;
    }

    let text: string | null | undefined;
    try {
      const client = this.getClient();
      const response = await client.chat.completions.create(params, {
        signal: request.signal,
        timeout: this.timeoutMs,
      });
      text = response.choices[0]?.message.content;
    } catch (err) {
      throw new CapabilityError(this.provider, `OpenAI request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!text || !text.trim()) {
      throw new CapabilityError(this.provider, "OpenAI returned an empty response");
    }
    return text;
  }
}

// ---------------------------------------------------------------------------
// Anthropic
// ---------------------------------------------------------------------------

export class AnthropicTextGenerator implements TextGenerator {
  readonly provider = "anthropic";
  readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;

  constructor(
    private readonly getClient: () => Anthropic = createAnthropicClientGetter(),
    options: TextGeneratorOptions = {},
  ) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.timeoutMs = options.timeoutMs ?? env.LLM_TIMEOUT_MS;
    this.maxTokens = options.maxTokens ?? MAX_OUTPUT_TOKENS;
  }

  async generate(request: GenerationRequest): Promise<string> {
    let text = "";
    try {
      const client = this.getClient();
      const response = await client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        },
        { signal: request.signal, timeout: this.timeoutMs },
      );

      for (const block of response.content) {
        if (block.type === "text") text += block.text;
      }
    } catch (err) {
      throw new CapabilityError(this.provider, `Anthropic request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!text.trim()) {
      throw new CapabilityError(this.provider, "Anthropic returned no text response");
    }
    return text;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Generator for the provider named by LLM_PROVIDER (or the override).
 */
export function createTextGenerator(
  provider: "openai" | "anthropic" = env.LLM_PROVIDER,
  options: TextGeneratorOptions = {},
): TextGenerator {
  const merged: TextGeneratorOptions = { model: env.LLM_MODEL, ...options };
  return provider === "anthropic"
    ? new AnthropicTextGenerator(createAnthropicClientGetter(), merged)
    : new OpenAITextGenerator(createOpenAIClientGetter(), merged);
}

// ---------------------------------------------------------------------------
// Structured output
// ---------------------------------------------------------------------------

/**
 * Pull the first JSON object out of model text, tolerating code fences and
 * surrounding prose. Returns null when nothing parses.
 */
export function extractJsonObject(raw: string): unknown {
  let cleaned = raw.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }

  const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return null;

  try {
    return JSON.parse(jsonMatch[0]);
  } catch {
    return null;
  }
}

/**
 * Ask for a JSON object matching `schema`. Resolves with the validated value,
 * or null when the reply does not conform. Capability failures still reject.
 */
export async function generateStructured<T>(
  generator: TextGenerator,
  request: GenerationRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | null> {
  const text = await generator.generate({
    ...request,
    prompt: `${request.prompt}\n\nRespond with a single JSON object and nothing else.`,
  });

  const parsed = schema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    console.warn(
      `[TextGenerator] ${generator.provider} reply failed schema validation: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
    );
    return null;
  }
  return parsed.data;
}
