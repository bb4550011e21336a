/**
 * Shared fixtures for service and agent tests.
 */

import type { GenerationRequest, TextGenerator } from "../../agents/text-generator.ts";
import type { Hypothesis, Review } from "../../schemas/envelope.ts";

export const FIXED_TIME = "2026-01-01T00:00:00.000Z";

export function makeHypothesis(
  id: string,
  title: string,
  overrides: Partial<Hypothesis> = {},
): Hypothesis {
  return {
    id,
    title,
    description: `${title}: description`,
    source: "generation",
    parentIds: [],
    researchGoal: "test goal",
    order: 0,
    createdAt: FIXED_TIME,
    status: "active",
    supersededBy: [],
    ...overrides,
  };
}

export function makeReview(id: string, hypothesisId: string, overallScore = 5): Review {
  return {
    id,
    hypothesisId,
    scores: {
      scientific_merit: overallScore,
      novelty: overallScore,
      testability: overallScore,
      impact: overallScore,
      limitations: overallScore,
    },
    overallScore,
    recommendation: "revise",
    justification: "",
    createdAt: FIXED_TIME,
  };
}

/** A reply rule: first rule whose system prompt and prompt match answers. */
export interface ScriptedReply {
  /** Matched against the system prompt */
  system?: RegExp;
  /** Matched against the user prompt */
  prompt?: RegExp;
  /** Text to return, or an Error to reject with */
  reply: string | Error | ((request: GenerationRequest) => string);
}

/**
 * In-process TextGenerator that answers from a list of rules and records
 * every request. Unmatched requests reject.
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly provider = "scripted";
  readonly model = "scripted-model";
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly rules: ScriptedReply[]) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const rule = this.rules.find(
      (r) =>
        (r.system === undefined || r.system.test(request.system)) &&
        (r.prompt === undefined || r.prompt.test(request.prompt)),
    );
    if (!rule) throw new Error("no scripted reply for request");
    if (rule.reply instanceof Error) throw rule.reply;
    return typeof rule.reply === "function" ? rule.reply(request) : rule.reply;
  }

  callsMatching(system: RegExp): GenerationRequest[] {
    return this.requests.filter((r) => system.test(r.system));
  }
}
