/**
 * Text Extraction Layer
 *
 * Turns free-form model output into typed drafts: hypotheses, evolved
 * hypotheses, reviews, debate outcomes, similarity scores and step plans.
 *
 * Every extractor is a pure function and never throws. Malformed input
 * degrades to partial or empty output; callers treat "no result" (null or
 * an empty array) as a legitimate outcome.
 */

import { z } from "zod";
import {
  DEFAULT_DEBATE_CONFIDENCE,
  REVIEW_CRITERIA,
  REVIEW_SCORE_MAX,
  REVIEW_SCORE_MIN,
  type ReviewCriterion,
} from "../config/constants.ts";
import { clamp, mean } from "../lib/math-utils.ts";
import {
  recommendationEnum,
  stepNameEnum,
  workStepEnum,
  type Hypothesis,
  type Recommendation,
  type ReviewScores,
  type StepName,
  type WorkStep,
} from "../schemas/envelope.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HypothesisDraft {
  title: string;
  description: string;
}

export interface EvolvedHypothesisDraft extends HypothesisDraft {
  parentIds: string[];
  evolutionStrategies: string[];
  improvements: string[];
  validationApproach: string;
}

export interface ReviewDraft {
  hypothesisId: string;
  scores: ReviewScores;
  overallScore: number;
  recommendation: Recommendation;
  justification: string;
}

export interface DebateOutcome {
  winner: "A" | "B";
  /** Judge confidence in [0,1] */
  confidence: number;
}

/** Title given to a block that has a body but no recognizable heading */
export const UNTITLED_HYPOTHESIS = "Untitled hypothesis";

// ---------------------------------------------------------------------------
// Block splitting
// ---------------------------------------------------------------------------

interface TextBlock {
  /** Number from a "Hypothesis N" or "N." heading, if any */
  index: number | null;
  /** Remainder of the heading line */
  heading: string;
  lines: string[];
}

const HYPOTHESIS_HEADING =
  /^\s*(?:#{1,6}\s*)?(?:\*\*)?\s*(?:evolved\s+|refined\s+|new\s+)?hypothesis\s*#?\s*(\d+)\b(.*)$/i;

/** Top-level numbered item; indented sub-lists are not block boundaries */
const NUMBERED_HEADING = /^(?:#{1,6}\s*)?(?:\*\*)?(\d+)[.)]\s+(.*)$/;

const TITLE_LABEL = /^\s*(?:[-*]\s*)?(?:\d+[.)]\s*)?(?:\*\*)?\s*title\s*(?:\*\*)?\s*:\s*(.*)$/i;

function stripMarkdown(text: string): string {
  return text
    .replace(/\*\*|__|`/g, "")
    .replace(/^#{1,6}\s*/, "")
    .trim();
}

function cleanHeading(text: string): string {
  return stripMarkdown(text)
    .replace(/\s*\(ID:[^)]*\)\s*/i, " ")
    .replace(/^[\s:.)\-–—]+/, "")
    .replace(/[\s:]+$/, "")
    .trim();
}

function splitOn(lines: string[], matcher: (line: string) => { index: number | null; heading: string } | null): TextBlock[] {
  const blocks: TextBlock[] = [];
  let current: TextBlock | null = null;

  for (const line of lines) {
    const match = matcher(line);
    if (match) {
      current = { index: match.index, heading: match.heading, lines: [] };
      blocks.push(current);
    } else if (current) {
      current.lines.push(line);
    }
    // Text before the first heading is preamble and is dropped
  }
  return blocks;
}

function byHypothesisHeading(line: string) {
  const m = HYPOTHESIS_HEADING.exec(line);
  return m ? { index: Number(m[1]), heading: m[2] ?? "" } : null;
}

function byNumberedHeading(line: string) {
  const m = NUMBERED_HEADING.exec(line);
  return m ? { index: Number(m[1]), heading: m[2] ?? "" } : null;
}

function byTitleLabel(line: string) {
  const m = TITLE_LABEL.exec(line);
  return m ? { index: null, heading: m[1] ?? "" } : null;
}

type SplitStrategy = "hypothesis" | "numbered" | "title";

/**
 * Split text into blocks using the first strategy that finds any heading.
 * With no headings at all, the whole text is one block headed by its first
 * non-empty line.
 */
function splitBlocks(text: string, strategies: SplitStrategy[]): TextBlock[] {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const matchers = {
    hypothesis: byHypothesisHeading,
    numbered: byNumberedHeading,
    title: byTitleLabel,
  } as const;

  for (const strategy of strategies) {
    const blocks = splitOn(lines, matchers[strategy]);
    if (blocks.length > 0) return blocks;
  }

  const firstIdx = lines.findIndex((l) => l.trim().length > 0);
  if (firstIdx === -1) return [];
  return [{ index: null, heading: lines[firstIdx] ?? "", lines: lines.slice(firstIdx + 1) }];
}

// ---------------------------------------------------------------------------
// Hypotheses
// ---------------------------------------------------------------------------

const DESCRIPTION_LABEL = /^\s*(?:[-*]\s*)?(?:\d+[.)]\s*)?(?:\*\*)?\s*description\s*(?:\*\*)?\s*:\s*(.*)$/i;

function blockToDraft(block: TextBlock): HypothesisDraft | null {
  let title = cleanHeading(block.heading);
  const body: string[] = [];

  for (const line of block.lines) {
    const titleMatch = TITLE_LABEL.exec(line);
    if (titleMatch) {
      const labelled = cleanHeading(titleMatch[1] ?? "");
      if (labelled) title = labelled;
      continue;
    }
    const descMatch = DESCRIPTION_LABEL.exec(line);
    if (descMatch) {
      const rest = (descMatch[1] ?? "").trim();
      if (rest) body.push(rest);
      continue;
    }
    body.push(line);
  }

  let description = body.join("\n").trim();

  // "Hypothesis 2" on its own line, title on the next line
  if (!title && description.includes("\n")) {
    const [first, ...rest] = description.split("\n");
    title = cleanHeading(first ?? "");
    description = rest.join("\n").trim();
  }

  if (!title && !description) return null;
  return { title: title || UNTITLED_HYPOTHESIS, description };
}

/**
 * Extract hypotheses from a generation response. Blocks are numbered items
 * ("1.", "2)"), "Hypothesis N" headings, or "Title:" labelled sections.
 */
export function extractHypotheses(text: string): HypothesisDraft[] {
  if (!text.trim()) return [];
  return splitBlocks(text, ["hypothesis", "numbered", "title"])
    .map(blockToDraft)
    .filter((d): d is HypothesisDraft => d !== null);
}

// ---------------------------------------------------------------------------
// Evolved hypotheses
// ---------------------------------------------------------------------------

type EvolvedField = "title" | "parent" | "strategy" | "description" | "improvements" | "validation";

const FIELD_LABEL =
  /^\s*(?:[-*]\s*)?(?:\d+[.)]\s*)?(?:\*\*)?\s*(title|parent(?:\s+id)?|parents|evolution\s+strateg(?:y|ies)|strateg(?:y|ies)|description|improvements?|validation(?:\s+approach)?)\s*(?:\*\*)?\s*:\s*(?:\*\*)?\s*(.*)$/i;

function fieldFor(label: string): EvolvedField {
  const l = label.toLowerCase();
  if (l.startsWith("title")) return "title";
  if (l.startsWith("parent")) return "parent";
  if (l.includes("strateg")) return "strategy";
  if (l.startsWith("description")) return "description";
  if (l.startsWith("improvement")) return "improvements";
  return "validation";
}

function resolveParent(parentText: string, blockText: string, parents: Hypothesis[]): string[] {
  const haystack = parentText || blockText;

  const byId = parents.filter((p) => haystack.includes(p.id));
  if (byId.length > 0) return byId.map((p) => p.id);

  if (parentText) {
    const numbered = /hypothesis\s*#?\s*(\d+)/i.exec(parentText) ?? /^\s*#?(\d+)\s*$/.exec(parentText);
    const parent = numbered ? parents[Number(numbered[1]) - 1] : undefined;
    if (parent) return [parent.id];

    // Only a reference that contains a whole title names that parent
    const reference = stripMarkdown(parentText).toLowerCase();
    const byTitle = parents.filter((p) => {
      const t = p.title.toLowerCase().trim();
      return t.length > 0 && reference.includes(t);
    });
    if (byTitle.length > 0) return byTitle.map((p) => p.id);
  }

  if (parents.length === 1 && parents[0]) return [parents[0].id];
  return [];
}

/**
 * Extract evolved hypotheses and their lineage. `parents` are the
 * hypotheses that were handed to the evolution step, in prompt order.
 */
export function extractEvolvedHypotheses(
  text: string,
  parents: Hypothesis[],
): EvolvedHypothesisDraft[] {
  if (!text.trim()) return [];
  const drafts: EvolvedHypothesisDraft[] = [];

  for (const block of splitBlocks(text, ["hypothesis", "title"])) {
    let title = "";
    let parentText = "";
    const strategies: string[] = [];
    const improvements: string[] = [];
    const description: string[] = [];
    const validation: string[] = [];
    let field: EvolvedField | null = null;

    // A "Title:" split puts the first label's value in the heading
    const headingIsTitle = block.index === null && !HYPOTHESIS_HEADING.test(block.heading);
    if (headingIsTitle) {
      title = cleanHeading(block.heading);
      field = "title";
    }

    for (const raw of block.lines) {
      const line = raw.trim();
      if (!line) continue;

      const label = FIELD_LABEL.exec(line);
      if (label) {
        field = fieldFor(label[1] ?? "");
        const value = (label[2] ?? "").trim();
        switch (field) {
          case "title":
            if (value) title = cleanHeading(value);
            break;
          case "parent":
            parentText = value;
            break;
          case "strategy":
            strategies.push(...splitList(value));
            break;
          case "description":
            if (value) description.push(value);
            break;
          case "improvements":
            if (value) improvements.push(stripBullet(value));
            break;
          case "validation":
            if (value) validation.push(value);
            break;
        }
        continue;
      }

      switch (field) {
        case "description":
          description.push(line);
          break;
        case "improvements":
          improvements.push(stripBullet(line));
          break;
        case "validation":
          validation.push(line);
          break;
        case "strategy":
          strategies.push(...splitList(stripBullet(line)));
          break;
        default:
          // Unlabelled prose right after the heading reads as description
          if (field === null || field === "title") description.push(line);
      }
    }

    if (!title && block.index !== null) title = cleanHeading(block.heading);
    const desc = description.join("\n").trim();
    if (!title && !desc) continue;

    drafts.push({
      title: title || UNTITLED_HYPOTHESIS,
      description: desc,
      parentIds: resolveParent(parentText, block.lines.join("\n"), parents),
      evolutionStrategies: strategies,
      improvements: improvements.filter((i) => i.length > 0),
      validationApproach: validation.join("\n").trim(),
    });
  }

  return drafts;
}

function stripBullet(line: string): string {
  return line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, "").trim();
}

function splitList(value: string): string[] {
  return value
    .split(/[,;]/)
    .map((s) => stripMarkdown(s))
    .filter((s) => s.length > 0);
}

// ---------------------------------------------------------------------------
// Reviews
// ---------------------------------------------------------------------------

const CRITERION_ALIASES: Record<ReviewCriterion, string[]> = {
  scientific_merit: ["scientific merit", "scientific_merit", "merit", "rigor"],
  novelty: ["novelty", "innovation"],
  testability: ["testability", "feasibility"],
  impact: ["potential impact", "impact"],
  limitations: ["limitations", "risks"],
};

const NUMBER = /(-?\d+(?:\.\d+)?)/;

/**
 * A score on the criterion's own line: after a colon, or written as "N/10".
 */
function scoreOnLine(rest: string): number | null {
  const colon = rest.indexOf(":");
  if (colon >= 0) {
    const m = NUMBER.exec(rest.slice(colon + 1));
    return m ? Number(m[1]) : null;
  }
  const outOfTen = /(-?\d+(?:\.\d+)?)\s*\/\s*10\b/.exec(rest);
  return outOfTen ? Number(outOfTen[1]) : null;
}

/** A "Score: N" line shortly after a criterion heading. */
function scoreBelow(lines: string[], from: number): number | null {
  for (let i = from + 1; i < Math.min(lines.length, from + 4); i++) {
    const line = stripMarkdown(lines[i] ?? "");
    const m =
      /\b(?:score|rating)\s*(?:\(\s*1\s*-\s*10\s*\))?\s*[:=]?\s*(-?\d+(?:\.\d+)?)/i.exec(line) ??
      /^\W*(-?\d+(?:\.\d+)?)\s*\/\s*10\b/.exec(line);
    if (m) return Number(m[1]);
  }
  return null;
}

function clampScore(value: number): number {
  return Math.round(clamp(value, REVIEW_SCORE_MIN, REVIEW_SCORE_MAX));
}

/**
 * Locate each criterion case-insensitively and read its score. Missing or
 * unparseable scores default to the minimum valid score.
 */
export function extractReviewScores(section: string): ReviewScores {
  const lines = section.split("\n");
  const found = new Map<ReviewCriterion, number>();

  lines.forEach((raw, i) => {
    const line = stripMarkdown(raw);
    const lower = line.toLowerCase();
    for (const criterion of REVIEW_CRITERIA) {
      if (found.has(criterion)) continue;
      for (const alias of CRITERION_ALIASES[criterion]) {
        const at = lower.indexOf(alias);
        if (at === -1) continue;
        // Only a criterion heading counts, not a mention after another score
        const colon = lower.indexOf(":");
        if (colon !== -1 && colon < at) continue;
        const rest = line.slice(at + alias.length);
        const value =
          scoreOnLine(rest) ?? (/:\s*$/.test(rest) ? scoreBelow(lines, i) : null);
        if (value !== null && Number.isFinite(value)) {
          found.set(criterion, clampScore(value));
        }
        break;
      }
    }
  });

  return {
    scientific_merit: found.get("scientific_merit") ?? REVIEW_SCORE_MIN,
    novelty: found.get("novelty") ?? REVIEW_SCORE_MIN,
    testability: found.get("testability") ?? REVIEW_SCORE_MIN,
    impact: found.get("impact") ?? REVIEW_SCORE_MIN,
    limitations: found.get("limitations") ?? REVIEW_SCORE_MIN,
  };
}

export function extractRecommendation(section: string): Recommendation {
  const match =
    /recommendation[^:\n]*:\s*[*_\s]*(accept|revise|reject)/i.exec(section) ??
    /\b(accept|revise|reject)(?:s|ed)?\b/i.exec(section);
  const parsed = recommendationEnum.safeParse(match?.[1]?.toLowerCase());
  return parsed.success ? parsed.data : "revise";
}

/** "Hypothesis N", optionally led in by "Review of" and similar */
const REVIEW_HEADING =
  /^\s*(?:#{1,6}\s*)?(?:\*\*)?\s*(?:(?:review|evaluation|assessment|critique)\s+(?:of|for)\s+)?(?:evolved\s+|refined\s+|new\s+)?hypothesis\s*#?\s*(\d+)\b(.*)$/i;

function byReviewHeading(line: string) {
  const m = REVIEW_HEADING.exec(line);
  return m ? { index: Number(m[1]), heading: m[2] ?? "" } : null;
}

/**
 * Extract one review per reviewed hypothesis. Sections are matched by their
 * "Hypothesis N" number (1-based, prompt order), falling back to position.
 * Sections that resolve to the same hypothesis are merged, so a body line
 * opening with "Hypothesis N" does not split its review.
 */
export function extractReviews(text: string, hypotheses: Hypothesis[]): ReviewDraft[] {
  if (!text.trim() || hypotheses.length === 0) return [];

  let sections = splitOn(text.replace(/\r\n?/g, "\n").split("\n"), byReviewHeading);
  if (sections.length === 0) {
    // Unlabelled text can only be attributed to a lone hypothesis
    if (hypotheses.length !== 1) return [];
    sections = [{ index: 1, heading: "", lines: text.split("\n") }];
  }

  // Insertion order keeps the first-mentioned hypothesis first
  const bodies = new Map<string, string[]>();
  sections.forEach((section, position) => {
    const byNumber = section.index !== null ? hypotheses[section.index - 1] : undefined;
    const target = byNumber ?? hypotheses[position];
    if (!target) return;
    const lines = bodies.get(target.id) ?? [];
    lines.push(section.heading, ...section.lines);
    bodies.set(target.id, lines);
  });

  return [...bodies].map(([hypothesisId, lines]) => {
    const body = lines.join("\n").trim();
    const scores = extractReviewScores(body);
    return {
      hypothesisId,
      scores,
      overallScore: mean(REVIEW_CRITERIA.map((c) => scores[c])),
      recommendation: extractRecommendation(body),
      justification: body,
    };
  });
}

// ---------------------------------------------------------------------------
// Debate outcome
// ---------------------------------------------------------------------------

/**
 * Read "WINNER: A|B" and "CONFIDENCE: 0-100". Anything other than A or B
 * is no result. Confidence is a percentage mapped into [0,1].
 */
export function extractDebateOutcome(text: string): DebateOutcome | null {
  let winner: "A" | "B" | null = null;
  let confidence: number | null = null;

  for (const raw of text.split("\n")) {
    const line = stripMarkdown(raw).replace(/^[-*]\s*/, "");

    if (winner === null) {
      const w = /^winner\s*[:\-]\s*(.*)$/i.exec(line);
      if (w) {
        const value = (w[1] ?? "").replace(/[[\]().*]/g, " ").trim();
        // An echoed "A/B" placeholder is not a verdict
        const token = /^a\s*\/\s*b\b/i.test(value)
          ? null
          : /^(?:hypothesis\s+)?([ab])\b/i.exec(value);
        if (token?.[1]) winner = token[1].toUpperCase() === "A" ? "A" : "B";
        continue;
      }
    }

    if (confidence === null) {
      const c = /^confidence\s*[:\-]\s*\[?\s*(-?\d+(?:\.\d+)?)/i.exec(line);
      if (c) confidence = clamp(Number(c[1]) / 100, 0, 1);
    }
  }

  if (winner === null) return null;
  return { winner, confidence: confidence ?? DEFAULT_DEBATE_CONFIDENCE };
}

// ---------------------------------------------------------------------------
// Similarity
// ---------------------------------------------------------------------------

/**
 * Read the single "OVERALL_SIMILARITY: x" line. Values are clamped to
 * [0,1]; a trailing "%" is read as a percentage.
 */
export function extractSimilarity(text: string): number | null {
  for (const raw of text.split("\n")) {
    const line = stripMarkdown(raw);
    const m = /^overall[_\s]similarity\s*[:\-]\s*\[?\s*(-?\d+(?:\.\d+)?)\s*(%)?/i.exec(line);
    if (!m) continue;
    const value = Number(m[1]);
    if (!Number.isFinite(value)) continue;
    return clamp(m[2] ? value / 100 : value, 0, 1);
  }
  return null;
}

// ---------------------------------------------------------------------------
// Step plan
// ---------------------------------------------------------------------------

/**
 * Map any token onto the step vocabulary. Unknown tokens become
 * "supervisor" (replan).
 */
export function normalizeStepName(token: string): StepName {
  const normalized = token.trim().toLowerCase().replace(/[\s-]+/g, "_");
  const parsed = stepNameEnum.safeParse(normalized);
  return parsed.success ? parsed.data : "supervisor";
}

const STEP_KEYWORDS: Record<WorkStep, string[]> = {
  generation: ["generation", "generate", "new hypotheses", "new ideas"],
  reflection: ["reflection", "review", "evaluate", "critique"],
  ranking: ["ranking", "tournament", "rank", "prioritize"],
  evolution: ["evolution", "evolve", "refine", "improve"],
  proximity: ["proximity", "cluster", "similarity", "graph"],
  meta_review: ["meta-review", "meta review", "meta_review", "synthesize", "overview", "summarize"],
};

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s+/;

const jsonPlanSchema = z.object({
  steps: z.array(z.string()),
});

function jsonPlan(text: string): StepName[] | null {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) return null;
  let data: unknown;
  try {
    data = JSON.parse(match[0]);
  } catch {
    return null;
  }
  const parsed = jsonPlanSchema.safeParse(data);
  return parsed.success ? parsed.data.steps.map(normalizeStepName) : null;
}

/** Pick the step whose keyword appears earliest in the line. */
function stepForLine(line: string): WorkStep | null {
  const lower = line.toLowerCase();
  let best: { step: WorkStep; at: number } | null = null;
  for (const step of workStepEnum.options) {
    for (const keyword of STEP_KEYWORDS[step]) {
      const at = lower.indexOf(keyword);
      if (at !== -1 && (best === null || at < best.at)) best = { step, at };
    }
  }
  return best?.step ?? null;
}

/**
 * Parse a planning response into step names. A JSON object
 * `{"steps": [...]}` wins; otherwise each list item is mapped by keyword.
 * Consecutive repeats are collapsed. An empty result means "no plan".
 */
export function extractStepPlan(text: string): StepName[] {
  const fromJson = jsonPlan(text);
  if (fromJson && fromJson.length > 0) return fromJson;

  const steps: StepName[] = [];
  for (const line of text.split("\n")) {
    if (!LIST_ITEM.test(line)) continue;
    const step = stepForLine(line);
    if (step && steps[steps.length - 1] !== step) steps.push(step);
  }
  return steps;
}
