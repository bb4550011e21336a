/**
 * Evolution Agent
 *
 * Refines the top-rated active hypotheses into evolved children. A parent
 * referenced by at least one child leaves the active set (it is marked
 * superseded, never deleted); parents nobody evolved stay untouched.
 */

import { randomUUID } from "crypto";
import { EVOLUTION_TOP_K } from "../config/constants.ts";
import { activeHypotheses, type Hypothesis } from "../schemas/envelope.ts";
import { extractEvolvedHypotheses } from "../services/text-extraction.ts";
import { rankByRating } from "../services/tournament-engine.ts";
import {
  BaseResearchAgent,
  type StepContext,
  type StepOutcome,
  type Supersession,
} from "./base-agent.ts";
import {
  EVOLUTION_PROMPT,
  EVOLUTION_SYSTEM_PROMPT,
  fillTemplate,
  formatHypothesisList,
} from "./prompts.ts";
import type { TextGenerator } from "./text-generator.ts";

export interface EvolutionAgentOptions {
  topK?: number;
}

/**
 * Group children by the parents they reference, in parent order.
 */
export function supersessionsFor(parents: Hypothesis[], children: Hypothesis[]): Supersession[] {
  return parents
    .map((parent) => ({
      parentId: parent.id,
      childIds: children.filter((c) => c.parentIds.includes(parent.id)).map((c) => c.id),
    }))
    .filter((s) => s.childIds.length > 0);
}

export class EvolutionAgent extends BaseResearchAgent {
  private readonly topK: number;

  constructor(generator: TextGenerator, options: EvolutionAgentOptions = {}) {
    super(
      {
        name: "EvolutionAgent",
        step: "evolution",
        temperature: 0.7,
        systemPrompt: EVOLUTION_SYSTEM_PROMPT,
      },
      generator,
    );
    this.topK = options.topK ?? EVOLUTION_TOP_K;
  }

  async run({ envelope, signal }: StepContext): Promise<StepOutcome> {
    const parents = rankByRating(activeHypotheses(envelope), envelope.ratings).slice(0, this.topK);
    if (parents.length === 0) {
      return this.noop("No active hypotheses to evolve");
    }

    const raw = await this.complete(
      fillTemplate(EVOLUTION_PROMPT, {
        RESEARCH_GOAL: envelope.researchGoal,
        HYPOTHESES: formatHypothesisList(parents, { withIds: true, ratings: envelope.ratings }),
      }),
      signal,
    );

    const now = new Date().toISOString();
    const firstOrder = envelope.hypotheses.length;
    const children: Hypothesis[] = extractEvolvedHypotheses(raw, parents).map((draft, i) => ({
      id: randomUUID(),
      title: draft.title,
      description: draft.description,
      source: "evolution",
      parentIds: draft.parentIds,
      researchGoal: envelope.researchGoal,
      order: firstOrder + i,
      createdAt: now,
      status: "active",
      supersededBy: [],
      evolutionStrategies: draft.evolutionStrategies,
      improvements: draft.improvements,
      validationApproach: draft.validationApproach,
    }));

    const supersede = supersessionsFor(parents, children);
    const summary = `Evolved ${children.length} hypotheses from ${parents.length} parents; ${supersede.length} superseded`;
    console.log(`[${this.name}] ${summary}`);

    return {
      delta: {
        addHypotheses: children,
        supersede,
        stepState: {
          parentIds: parents.map((p) => p.id),
          childIds: children.map((c) => c.id),
          supersededIds: supersede.map((s) => s.parentId),
          lastOutput: this.preview(raw),
          updatedAt: now,
        },
      },
      diagnostics: { summary, capabilityCalls: 1, failedCalls: 0 },
    };
  }
}
