/**
 * Shared client initialization for the text-generation providers.
 *
 * Clients are created on first use so a session that never reaches a model
 * (fallback planning, tests) never needs an API key.
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { env } from "../config/env.ts";

/**
 * Creates a lazy-initialized Anthropic client getter function.
 * Returns a function that initializes the client on first call.
 */
export function createAnthropicClientGetter(
  apiKey: string | undefined = env.ANTHROPIC_API_KEY,
): () => Anthropic {
  let client: Anthropic | null = null;

  return () => {
    if (!client) {
      if (!apiKey) {
        throw new Error(
          "ANTHROPIC_API_KEY environment variable is not set. Anthropic text generation is unavailable.",
        );
      }
      client = new Anthropic({ apiKey });
    }
    return client;
  };
}

/**
 * Creates a lazy-initialized OpenAI client getter function.
 * Returns a function that initializes the client on first call.
 */
export function createOpenAIClientGetter(
  apiKey: string | undefined = env.OPENAI_API_KEY,
): () => OpenAI {
  let client: OpenAI | null = null;

  return () => {
    if (!client) {
      if (!apiKey) {
        throw new Error(
          "OPENAI_API_KEY environment variable is not set. OpenAI text generation is unavailable.",
        );
      }
      client = new OpenAI({ apiKey });
    }
    return client;
  };
}
