/**
 * Meta-review Agent
 *
 * Synthesizes a research overview from the top-rated active hypotheses,
 * their reviews and the similarity clusters. Completing a meta-review is
 * the only thing that advances the session's iteration counter.
 */

import { z } from "zod";
import { META_REVIEW_TOP_K } from "../config/constants.ts";
import { activeHypotheses, type Envelope, type Hypothesis } from "../schemas/envelope.ts";
import { clusterHypotheses } from "../services/similarity-graph.ts";
import { rankByRating } from "../services/tournament-engine.ts";
import { BaseResearchAgent, type StepContext, type StepOutcome } from "./base-agent.ts";
import {
  META_REVIEW_PROMPT,
  META_REVIEW_SYSTEM_PROMPT,
  fillTemplate,
  formatHypothesisList,
  formatReviews,
} from "./prompts.ts";
import { generateStructured, type TextGenerator } from "./text-generator.ts";

export const researchOverviewSchema = z.object({
  overview: z.string().min(1),
  keyThemes: z.array(z.string()).default([]),
  researchDirections: z.array(z.string()).default([]),
  limitations: z.array(z.string()).default([]),
});

export type ResearchOverview = z.infer<typeof researchOverviewSchema>;

export interface MetaReviewAgentOptions {
  topK?: number;
}

function describeClusters(envelope: Envelope, hypotheses: Hypothesis[]): string {
  const titles = new Map(hypotheses.map((h): [string, string] => [h.id, h.title]));
  const clusters = clusterHypotheses(hypotheses, envelope.edges).filter(
    (c) => c.members.length > 1,
  );
  if (clusters.length === 0) return "No clusters identified yet.";

  return clusters
    .map(
      (c, i) =>
        `Cluster ${i + 1} (cohesion ${c.cohesion.toFixed(2)}): ${c.members
          .map((id) => titles.get(id) ?? id)
          .join("; ")}`,
    )
    .join("\n");
}

export class MetaReviewAgent extends BaseResearchAgent {
  private readonly topK: number;

  constructor(generator: TextGenerator, options: MetaReviewAgentOptions = {}) {
    super(
      {
        name: "MetaReviewAgent",
        step: "meta_review",
        temperature: 0.3,
        systemPrompt: META_REVIEW_SYSTEM_PROMPT,
      },
      generator,
    );
    this.topK = options.topK ?? META_REVIEW_TOP_K;
  }

  async run({ envelope, signal }: StepContext): Promise<StepOutcome> {
    const active = activeHypotheses(envelope);
    const top = rankByRating(active, envelope.ratings).slice(0, this.topK);
    if (top.length === 0) {
      return this.noop("No active hypotheses to synthesize");
    }

    const topIds = new Set(top.map((h) => h.id));
    const reviews = envelope.reviews.filter((r) => topIds.has(r.hypothesisId));

    const overview = await generateStructured(
      this.generator,
      {
        system: this.config.systemPrompt,
        prompt: fillTemplate(META_REVIEW_PROMPT, {
          RESEARCH_GOAL: envelope.researchGoal,
          HYPOTHESES: formatHypothesisList(top, { ratings: envelope.ratings }),
          REVIEWS: formatReviews(reviews),
          CLUSTERS: describeClusters(envelope, active),
        }),
        temperature: this.config.temperature,
        signal,
      },
      researchOverviewSchema,
    );

    const now = new Date().toISOString();
    const summary = overview
      ? `Synthesized overview of ${top.length} hypotheses`
      : `Overview of ${top.length} hypotheses did not match the expected format`;
    console.log(`[${this.name}] ${summary}`);

    return {
      delta: {
        incrementIteration: true,
        stepState: {
          iteration: envelope.iteration + 1,
          topHypothesisIds: top.map((h) => h.id),
          overview,
          updatedAt: now,
        },
      },
      diagnostics: { summary, capabilityCalls: 1, failedCalls: 0 },
    };
  }
}
