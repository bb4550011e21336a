/**
 * Supervisor Agent
 *
 * Plans the next round. The model is asked for an ordered step list; its
 * reply goes through the extraction layer and the scheduler's decision
 * policy, which falls back to the fixed rotation whenever nothing usable
 * comes back.
 */

import type { StepName } from "../schemas/envelope.ts";
import {
  decideSteps,
  summarizeState,
  type StateSummary,
  type StepDecision,
} from "../services/step-scheduler.ts";
import { extractStepPlan } from "../services/text-extraction.ts";
import { BaseResearchAgent, type StepContext } from "./base-agent.ts";
import { SUPERVISOR_PROMPT, SUPERVISOR_SYSTEM_PROMPT, fillTemplate } from "./prompts.ts";
import type { TextGenerator } from "./text-generator.ts";

export interface PlanOutcome {
  decision: StepDecision;
  /** Steps parsed from the reply before the decision policy ran */
  parsed: StepName[];
  state: StateSummary;
  /** Planning reply, trimmed; null when no model was asked */
  rawPlan: string | null;
}

export function tournamentSummary(state: StateSummary): string {
  const base = `${state.ratedCount} hypotheses rated`;
  return state.topHypothesisTitle ? `${base}, top hypothesis: ${state.topHypothesisTitle}` : base;
}

export class SupervisorAgent extends BaseResearchAgent<PlanOutcome> {
  constructor(generator: TextGenerator) {
    super(
      {
        name: "SupervisorAgent",
        step: "supervisor",
        temperature: 0.3,
        systemPrompt: SUPERVISOR_SYSTEM_PROMPT,
      },
      generator,
    );
  }

  async run({ envelope, signal }: StepContext): Promise<PlanOutcome> {
    const state = summarizeState(envelope);
    const raw = await this.complete(
      fillTemplate(SUPERVISOR_PROMPT, {
        RESEARCH_GOAL: envelope.researchGoal,
        ITERATION: state.iteration,
        ROUNDS: state.rounds,
        HYPOTHESIS_COUNT: state.hypothesisCount,
        ACTIVE_COUNT: state.activeCount,
        UNREVIEWED_COUNT: state.unreviewedCount,
        TOURNAMENT_SUMMARY: tournamentSummary(state),
      }),
      signal,
    );

    const parsed = extractStepPlan(raw);
    const decision = decideSteps(parsed, envelope.rounds);
    console.log(
      `[${this.name}] Round ${envelope.rounds} plan (${decision.source}): ${decision.queue.join(" → ") || "end"}`,
    );
    return { decision, parsed, state, rawPlan: this.preview(raw) };
  }
}

/**
 * Plan without a model: the fixed rotation for this round.
 */
export function fallbackPlan(envelope: StepContext["envelope"]): PlanOutcome {
  return {
    decision: decideSteps([], envelope.rounds),
    parsed: [],
    state: summarizeState(envelope),
    rawPlan: null,
  };
}
