/**
 * Prompt Templates
 *
 * System prompts and user-prompt templates for each research agent.
 * Templates use {{PLACEHOLDER}} markers filled by `fillTemplate`. The output
 * formats requested here are the ones the extraction layer reads; the rest
 * of the wording is free to change.
 */

import { REVIEW_CRITERIA } from "../config/constants.ts";
import { round1 } from "../lib/math-utils.ts";
import type { Hypothesis, Review } from "../schemas/envelope.ts";

// ---------------------------------------------------------------------------
// Template Filling
// ---------------------------------------------------------------------------

export function fillTemplate(template: string, values: Record<string, string | number>): string {
  let filled = template;
  for (const [key, value] of Object.entries(values)) {
    filled = filled.replaceAll(`{{${key}}}`, String(value));
  }
  return filled;
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

/** "Scientific Merit" from "scientific_merit" */
export function criterionLabel(criterion: string): string {
  return criterion
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function formatReviews(reviews: Review[]): string {
  if (reviews.length === 0) return "No reviews available.";

  return reviews
    .map((review) => {
      const lines = [
        `Overall Score: ${review.overallScore.toFixed(1)}/10`,
        `Recommendation: ${review.recommendation}`,
        "Detailed Scores:",
        ...REVIEW_CRITERIA.map((c) => `- ${criterionLabel(c)}: ${review.scores[c]}/10`),
      ];
      return lines.join("\n");
    })
    .join("\n\n");
}

/**
 * Numbered hypothesis list. The numbers are what "Hypothesis N" references
 * in replies resolve against, so callers must keep the same order.
 */
export function formatHypothesisList(
  hypotheses: Hypothesis[],
  options: { withIds?: boolean; ratings?: Record<string, number> } = {},
): string {
  return hypotheses
    .map((h, i) => {
      const id = options.withIds ? ` (ID: ${h.id})` : "";
      const rating = options.ratings?.[h.id];
      const ratingLine = rating !== undefined ? `\nRating: ${round1(rating)}` : "";
      return `Hypothesis ${i + 1}${id}: ${h.title}${ratingLine}\n${h.description}`;
    })
    .join("\n\n");
}

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

export const SUPERVISOR_SYSTEM_PROMPT = `You are the supervisor of a team of research agents. You decide which agents run next so that new ideas, critique, ranking and refinement stay in balance and findings are synthesized periodically.`;

export const SUPERVISOR_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Current state:
- Meta-review iteration: {{ITERATION}}
- Completed rounds: {{ROUNDS}}
- Hypotheses generated: {{HYPOTHESIS_COUNT}} ({{ACTIVE_COUNT}} active)
- Active hypotheses awaiting review: {{UNREVIEWED_COUNT}}
- Tournament: {{TOURNAMENT_SUMMARY}}

Available agents:
- generation: proposes new hypotheses
- reflection: reviews hypotheses that have no review yet
- ranking: runs a pairwise tournament to rate hypotheses
- evolution: refines the top-rated hypotheses into improved variants
- proximity: scores similarity between hypotheses for clustering
- meta_review: synthesizes a research overview from the top hypotheses
- end: stop the session

Give a short explanation, then the ordered task list as JSON on its own line:
{"steps": ["generation", "reflection", "ranking"]}`;

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export const GENERATION_SYSTEM_PROMPT = `You generate novel, specific and testable research hypotheses that are grounded in scientific principles and suggest how they could be validated.`;

export const GENERATION_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Generate {{COUNT}} distinct hypotheses that approach the goal from different angles. Consider interdisciplinary approaches where appropriate.

{{EXISTING}}

Format each hypothesis exactly as:
Hypothesis N: <title>
<two or three paragraphs: the core idea, how it addresses the goal, how to validate it, and its main limitations>`;

export function existingTitlesSection(titles: string[]): string {
  if (titles.length === 0) return "No hypotheses exist yet.";
  return `Avoid repeating these existing hypotheses:\n${titles.map((t) => `- ${t}`).join("\n")}`;
}

// ---------------------------------------------------------------------------
// Reflection
// ---------------------------------------------------------------------------

export const REFLECTION_SYSTEM_PROMPT = `You critically review research hypotheses with scientific rigor. Your criticism is thorough and constructive.`;

export const REFLECTION_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Review each hypothesis below on these criteria, scoring each from 1 to 10:
- Scientific Merit: grounding in established principles, plausible mechanisms
- Novelty: how far it advances current understanding
- Testability: whether it can realistically be validated
- Impact: significance if proven true
- Limitations: key assumptions and risks (10 = few limitations)

Hypotheses to review:
{{HYPOTHESES}}

For each hypothesis reply with a section in exactly this form:
Hypothesis N
Scientific Merit: <score>/10
Novelty: <score>/10
Testability: <score>/10
Impact: <score>/10
Limitations: <score>/10
Recommendation: Accept | Revise | Reject
Justification: <why, with specific suggestions for improvement>`;

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

export const RANKING_SYSTEM_PROMPT = `You judge scientific debates between two competing research hypotheses and pick the stronger one.`;

export const DEBATE_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Hypothesis A:
Title: {{A_TITLE}}
Description:
{{A_DESCRIPTION}}

Reviews:
{{A_REVIEWS}}

Hypothesis B:
Title: {{B_TITLE}}
Description:
{{B_DESCRIPTION}}

Reviews:
{{B_REVIEWS}}

Compare them on scientific merit, novelty, feasibility, potential impact and clarity, then decide which is stronger.

Reply in exactly this form:
WINNER: <A or B>
CONFIDENCE: <0-100>
JUSTIFICATION:
<your analysis>`;

// ---------------------------------------------------------------------------
// Evolution
// ---------------------------------------------------------------------------

export const EVOLUTION_SYSTEM_PROMPT = `You refine promising research hypotheses into stronger variants while keeping their valuable core ideas.`;

export const EVOLUTION_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Input hypotheses:
{{HYPOTHESES}}

Evolve them using strategies such as synthesis, specialization, generalization, cross-pollination from other fields, constraint relaxation or mechanism elaboration. For each input produce one or two evolved variants that address its limitations and improve feasibility.

Format each evolved hypothesis exactly as:
Hypothesis N
Title: <title>
Parent: <ID of the input hypothesis it evolves>
Evolution Strategy: <strategies used, comma separated>
Description: <detailed explanation>
Improvements:
- <improvement>
Validation: <how to test the improvements>`;

// ---------------------------------------------------------------------------
// Proximity
// ---------------------------------------------------------------------------

export const PROXIMITY_SYSTEM_PROMPT = `You analyze how similar two research hypotheses are in concepts, methods, target outcomes, implementation and resource needs.`;

export const SIMILARITY_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Hypothesis A: {{A_TITLE}}
{{A_DESCRIPTION}}

Hypothesis B: {{B_TITLE}}
{{B_DESCRIPTION}}

Rate their similarity from 0 (completely different) to 1 (identical). Briefly explain the main overlaps and differences, then end with this line:
OVERALL_SIMILARITY: <0-1>`;

// ---------------------------------------------------------------------------
// Meta-review
// ---------------------------------------------------------------------------

export const META_REVIEW_SYSTEM_PROMPT = `You synthesize research overviews from the strongest hypotheses of a research session, their reviews and how they cluster.`;

export const META_REVIEW_PROMPT = `Research goal:
"{{RESEARCH_GOAL}}"

Top hypotheses by tournament rating:
{{HYPOTHESES}}

Reviews:
{{REVIEWS}}

Similarity clusters:
{{CLUSTERS}}

Write a research overview. Use these JSON keys:
- "overview": a few paragraphs synthesizing the findings
- "keyThemes": recurring themes across the hypotheses
- "researchDirections": the most promising next directions
- "limitations": open problems and risks`;
