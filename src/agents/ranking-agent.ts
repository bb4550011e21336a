/**
 * Ranking Agent
 *
 * Runs one tournament round over the active hypotheses. Each match is a
 * model-judged debate whose reply is read by the extraction layer; the
 * tournament engine owns pairing and the rating update.
 */

import { MAX_MATCHES_PER_ROUND } from "../config/constants.ts";
import { activeHypotheses, type Hypothesis, type Review } from "../schemas/envelope.ts";
import { extractDebateOutcome } from "../services/text-extraction.ts";
import { runTournament, type DebateJudge } from "../services/tournament-engine.ts";
import { BaseResearchAgent, type StepContext, type StepOutcome } from "./base-agent.ts";
import { DEBATE_PROMPT, RANKING_SYSTEM_PROMPT, fillTemplate, formatReviews } from "./prompts.ts";
import type { TextGenerator } from "./text-generator.ts";

export interface RankingAgentOptions {
  maxMatches?: number;
}

export class RankingAgent extends BaseResearchAgent {
  private readonly maxMatches: number;

  constructor(generator: TextGenerator, options: RankingAgentOptions = {}) {
    super(
      {
        name: "RankingAgent",
        step: "ranking",
        temperature: 0.3,
        systemPrompt: RANKING_SYSTEM_PROMPT,
      },
      generator,
    );
    this.maxMatches = options.maxMatches ?? MAX_MATCHES_PER_ROUND;
  }

  async run({ envelope, signal, random }: StepContext): Promise<StepOutcome> {
    const contenders = activeHypotheses(envelope);
    if (contenders.length === 0) {
      return this.noop("No active hypotheses to rank");
    }

    const reviewsFor = (h: Hypothesis): Review[] =>
      envelope.reviews.filter((r) => r.hypothesisId === h.id);

    const judge: DebateJudge<Hypothesis> = async (a, b) => {
      const reply = await this.complete(
        fillTemplate(DEBATE_PROMPT, {
          RESEARCH_GOAL: envelope.researchGoal,
          A_TITLE: a.title,
          A_DESCRIPTION: a.description,
          A_REVIEWS: formatReviews(reviewsFor(a)),
          B_TITLE: b.title,
          B_DESCRIPTION: b.description,
          B_REVIEWS: formatReviews(reviewsFor(b)),
        }),
        signal,
      );
      return extractDebateOutcome(reply);
    };

    const result = await runTournament(contenders, envelope.ratings, judge, {
      maxMatches: this.maxMatches,
      random,
    });

    const failedCalls = result.matches.filter((m) => m.error !== undefined).length;
    if (result.matches.length > 0 && failedCalls === result.matches.length) {
      throw new Error(`All ${failedCalls} debates failed: ${result.matches[0]?.error ?? "unknown error"}`);
    }

    const summary = `Played ${result.matchesPlayed} of ${result.matches.length} matches over ${contenders.length} hypotheses`;
    console.log(`[${this.name}] ${summary}`);

    return {
      delta: {
        ratings: result.ratings,
        matchesPlayed: result.matchesPlayed,
        stepState: {
          matchesPlayed: result.matchesPlayed,
          matches: result.matches.map((m) => ({ ...m })),
          updatedAt: new Date().toISOString(),
        },
      },
      diagnostics: {
        summary,
        capabilityCalls: result.matches.length,
        failedCalls,
      },
    };
  }
}
