/**
 * Proximity Agent
 *
 * Scores similarity between active hypotheses that are not yet connected,
 * extending the similarity graph used for clustering.
 */

import { MAX_COMPARISONS_PER_ROUND } from "../config/constants.ts";
import { activeHypotheses, type Hypothesis } from "../schemas/envelope.ts";
import {
  buildSimilarityGraph,
  type SimilarityComparer,
} from "../services/similarity-graph.ts";
import { extractSimilarity } from "../services/text-extraction.ts";
import { BaseResearchAgent, type StepContext, type StepOutcome } from "./base-agent.ts";
import { PROXIMITY_SYSTEM_PROMPT, SIMILARITY_PROMPT, fillTemplate } from "./prompts.ts";
import type { TextGenerator } from "./text-generator.ts";

export interface ProximityAgentOptions {
  maxComparisons?: number;
}

export class ProximityAgent extends BaseResearchAgent {
  private readonly maxComparisons: number;

  constructor(generator: TextGenerator, options: ProximityAgentOptions = {}) {
    super(
      {
        name: "ProximityAgent",
        step: "proximity",
        temperature: 0.3,
        systemPrompt: PROXIMITY_SYSTEM_PROMPT,
      },
      generator,
    );
    this.maxComparisons = options.maxComparisons ?? MAX_COMPARISONS_PER_ROUND;
  }

  async run({ envelope, signal }: StepContext): Promise<StepOutcome> {
    const nodes = activeHypotheses(envelope);
    if (nodes.length < 2) {
      return this.noop("Fewer than two active hypotheses; nothing to compare");
    }

    const compare: SimilarityComparer<Hypothesis> = async (a, b) => {
      const reply = await this.complete(
        fillTemplate(SIMILARITY_PROMPT, {
          RESEARCH_GOAL: envelope.researchGoal,
          A_TITLE: a.title,
          A_DESCRIPTION: a.description,
          B_TITLE: b.title,
          B_DESCRIPTION: b.description,
        }),
        signal,
      );
      return extractSimilarity(reply);
    };

    const result = await buildSimilarityGraph(nodes, envelope.edges, compare, {
      maxComparisons: this.maxComparisons,
    });

    const failedCalls = result.comparisons.filter((c) => c.error !== undefined).length;
    if (result.comparisons.length > 0 && failedCalls === result.comparisons.length) {
      throw new Error(
        `All ${failedCalls} comparisons failed: ${result.comparisons[0]?.error ?? "unknown error"}`,
      );
    }

    const summary = `Added ${result.newEdges.length} edges from ${result.comparisons.length} comparisons`;
    console.log(`[${this.name}] ${summary}`);

    return {
      delta: {
        addEdges: result.newEdges,
        stepState: {
          comparisons: result.comparisons.map((c) => ({ ...c })),
          newEdges: result.newEdges.length,
          updatedAt: new Date().toISOString(),
        },
      },
      diagnostics: {
        summary,
        capabilityCalls: result.comparisons.length,
        failedCalls,
      },
    };
  }
}
