/**
 * Reflection Agent
 *
 * Reviews active hypotheses that have no review yet. Hypotheses are sent in
 * batches; batches are reviewed concurrently and merged into one delta.
 */

import { randomUUID } from "crypto";
import { REVIEW_BATCH_SIZE } from "../config/constants.ts";
import { errorMessage } from "../lib/errors.ts";
import { chunk } from "../lib/math-utils.ts";
import { activeHypotheses, type Hypothesis, type Review } from "../schemas/envelope.ts";
import { extractReviews } from "../services/text-extraction.ts";
import { BaseResearchAgent, type StepContext, type StepOutcome } from "./base-agent.ts";
import {
  REFLECTION_PROMPT,
  REFLECTION_SYSTEM_PROMPT,
  fillTemplate,
  formatHypothesisList,
} from "./prompts.ts";
import type { TextGenerator } from "./text-generator.ts";

export function unreviewedHypotheses(hypotheses: Hypothesis[], reviews: Review[]): Hypothesis[] {
  const reviewed = new Set(reviews.map((r) => r.hypothesisId));
  return hypotheses.filter((h) => !reviewed.has(h.id));
}

export class ReflectionAgent extends BaseResearchAgent {
  constructor(generator: TextGenerator) {
    super(
      {
        name: "ReflectionAgent",
        step: "reflection",
        temperature: 0.3,
        systemPrompt: REFLECTION_SYSTEM_PROMPT,
      },
      generator,
    );
  }

  async run({ envelope, signal }: StepContext): Promise<StepOutcome> {
    const pending = unreviewedHypotheses(activeHypotheses(envelope), envelope.reviews);
    if (pending.length === 0) {
      return this.noop("Every active hypothesis already has a review");
    }

    const batches = chunk(pending, REVIEW_BATCH_SIZE);
    const settled = await Promise.allSettled(
      batches.map((batch) =>
        this.complete(
          fillTemplate(REFLECTION_PROMPT, {
            RESEARCH_GOAL: envelope.researchGoal,
            HYPOTHESES: formatHypothesisList(batch),
          }),
          signal,
        ),
      ),
    );

    const failures = settled.filter((s) => s.status === "rejected");
    if (failures.length === batches.length) {
      const [first] = failures;
      throw first?.status === "rejected" ? first.reason : new Error("All review batches failed");
    }

    const now = new Date().toISOString();
    const reviews: Review[] = [];
    const outputs: string[] = [];

    settled.forEach((result, i) => {
      if (result.status === "rejected") {
        console.warn(`[${this.name}] Review batch ${i + 1} failed: ${errorMessage(result.reason)}`);
        return;
      }
      outputs.push(result.value);
      for (const draft of extractReviews(result.value, batches[i])) {
        reviews.push({ id: randomUUID(), ...draft, createdAt: now });
      }
    });

    const summary = `Reviewed ${reviews.length} of ${pending.length} hypotheses in ${batches.length} batch(es)`;
    console.log(`[${this.name}] ${summary}`);

    return {
      delta: {
        addReviews: reviews,
        stepState: {
          pending: pending.length,
          reviewed: reviews.length,
          failedBatches: failures.length,
          lastOutput: this.preview(outputs.join("\n\n")),
          updatedAt: now,
        },
      },
      diagnostics: {
        summary,
        capabilityCalls: batches.length,
        failedCalls: failures.length,
      },
    };
  }
}
