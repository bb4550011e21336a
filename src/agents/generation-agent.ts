/**
 * Generation Agent
 *
 * Proposes new hypotheses for the research goal. New hypotheses are always
 * appended; existing ones are listed in the prompt so the model avoids
 * repeating them.
 */

import { randomUUID } from "crypto";
import {
  FOLLOWUP_GENERATION_COUNT,
  INITIAL_GENERATION_COUNT,
} from "../config/constants.ts";
import type { Hypothesis } from "../schemas/envelope.ts";
import { extractHypotheses } from "../services/text-extraction.ts";
import { BaseResearchAgent, type StepContext, type StepOutcome } from "./base-agent.ts";
import {
  GENERATION_PROMPT,
  GENERATION_SYSTEM_PROMPT,
  existingTitlesSection,
  fillTemplate,
} from "./prompts.ts";
import type { TextGenerator } from "./text-generator.ts";

/** More ideas on the first pass, fewer once the pool exists */
export function generationCount(iteration: number): number {
  return iteration === 0 ? INITIAL_GENERATION_COUNT : FOLLOWUP_GENERATION_COUNT;
}

export class GenerationAgent extends BaseResearchAgent {
  constructor(generator: TextGenerator) {
    super(
      {
        name: "GenerationAgent",
        step: "generation",
        temperature: 0.7,
        systemPrompt: GENERATION_SYSTEM_PROMPT,
      },
      generator,
    );
  }

  async run({ envelope, signal }: StepContext): Promise<StepOutcome> {
    if (!envelope.researchGoal.trim()) {
      return this.noop("No research goal set; nothing to generate");
    }

    const count = generationCount(envelope.iteration);
    const prompt = fillTemplate(GENERATION_PROMPT, {
      RESEARCH_GOAL: envelope.researchGoal,
      COUNT: count,
      EXISTING: existingTitlesSection(envelope.hypotheses.map((h) => h.title)),
    });

    const raw = await this.complete(prompt, signal);
    const drafts = extractHypotheses(raw);

    const now = new Date().toISOString();
    const firstOrder = envelope.hypotheses.length;
    const hypotheses: Hypothesis[] = drafts.map((draft, i) => ({
      id: randomUUID(),
      title: draft.title,
      description: draft.description,
      source: "generation",
      parentIds: [],
      researchGoal: envelope.researchGoal,
      order: firstOrder + i,
      createdAt: now,
      status: "active",
      supersededBy: [],
    }));

    const summary = `Generated ${hypotheses.length} hypotheses (requested ${count})`;
    console.log(`[${this.name}] ${summary}`);

    return {
      delta: {
        addHypotheses: hypotheses,
        stepState: {
          requested: count,
          generated: hypotheses.length,
          hypothesisIds: hypotheses.map((h) => h.id),
          lastOutput: this.preview(raw),
          updatedAt: now,
        },
      },
      diagnostics: { summary, capabilityCalls: 1, failedCalls: 0 },
    };
  }
}
