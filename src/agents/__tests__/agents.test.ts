/**
 * Research Agent Tests
 *
 * Each step agent runs against an envelope snapshot and a scripted text
 * generator; the tests check the delta it returns and the prompts it sends.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDefaultEnvelope, type Envelope, type Hypothesis } from "../../schemas/envelope.ts";
import { makeHypothesis, makeReview, ScriptedTextGenerator } from "../../services/__tests__/helpers.ts";
import { EvolutionAgent, supersessionsFor } from "../evolution-agent.ts";
import { GenerationAgent, generationCount } from "../generation-agent.ts";
import { MetaReviewAgent } from "../meta-review-agent.ts";
import { ProximityAgent } from "../proximity-agent.ts";
import { RankingAgent } from "../ranking-agent.ts";
import { ReflectionAgent, unreviewedHypotheses } from "../reflection-agent.ts";
import { SupervisorAgent, fallbackPlan, tournamentSummary } from "../supervisor-agent.ts";

const GOAL = "Why do we sleep?";

function envelopeWith(hypotheses: Hypothesis[], patch: Partial<Envelope> = {}): Envelope {
  return { ...createDefaultEnvelope("agent-test", GOAL), hypotheses, ...patch };
}

const first = () => 0;

describe("Research Agents", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // -------------------------------------------------------------------------
  // Generation
  // -------------------------------------------------------------------------

  describe("GenerationAgent", () => {
    it("should ask for five hypotheses on the first iteration and three later", () => {
      expect(generationCount(0)).toBe(5);
      expect(generationCount(1)).toBe(3);
      expect(generationCount(4)).toBe(3);
    });

    it("should turn the reply into new active hypotheses", async () => {
      const generator = new ScriptedTextGenerator([
        {
          system: /generate novel/,
          reply: "Hypothesis 1: Sleep clears metabolites\nGlymphatic flow rises.\n\nHypothesis 2: Sleep consolidates memory\nReplay strengthens synapses.",
        },
      ]);

      const outcome = await new GenerationAgent(generator).run({ envelope: envelopeWith([]) });
      const added = outcome.delta.addHypotheses ?? [];

      expect(added.map((h) => h.title)).toEqual(["Sleep clears metabolites", "Sleep consolidates memory"]);
      expect(added.map((h) => h.order)).toEqual([0, 1]);
      expect(added.every((h) => h.source === "generation" && h.status === "active")).toBe(true);
      expect(added[0].researchGoal).toBe(GOAL);
      expect(outcome.diagnostics).toEqual({
        summary: "Generated 2 hypotheses (requested 5)",
        capabilityCalls: 1,
        failedCalls: 0,
      });

      const [request] = generator.requests;
      expect(request.prompt).toContain("Generate 5 distinct hypotheses");
      expect(request.prompt).toContain("No hypotheses exist yet.");
      expect(request.temperature).toBe(0.7);
    });

    it("should list existing titles once hypotheses exist", async () => {
      const generator = new ScriptedTextGenerator([{ system: /generate novel/, reply: "1. Dreams rehearse threats" }]);
      const envelope = envelopeWith([makeHypothesis("h1", "Sleep clears metabolites")], { iteration: 2 });

      const outcome = await new GenerationAgent(generator).run({ envelope });

      expect(generator.requests[0].prompt).toContain("Generate 3 distinct hypotheses");
      expect(generator.requests[0].prompt).toContain("- Sleep clears metabolites");
      expect(outcome.delta.addHypotheses?.[0]?.order).toBe(1);
    });

    it("should do nothing without a research goal", async () => {
      const generator = new ScriptedTextGenerator([]);
      const envelope = { ...createDefaultEnvelope("agent-test") };

      const outcome = await new GenerationAgent(generator).run({ envelope });

      expect(outcome.delta).toEqual({});
      expect(generator.requests).toHaveLength(0);
    });
  });

  // -------------------------------------------------------------------------
  // Reflection
  // -------------------------------------------------------------------------

  describe("ReflectionAgent", () => {
    const six = ["First", "Second", "Third", "Fourth", "Fifth", "Sixth"].map((title, i) =>
      makeHypothesis(`h${i + 1}`, title),
    );
    const review = "Hypothesis 1\nScientific Merit: 6/10\nRecommendation: Accept";

    it("should only review active hypotheses without a review", () => {
      const hypotheses = [makeHypothesis("h1", "A"), makeHypothesis("h2", "B")];
      expect(unreviewedHypotheses(hypotheses, [makeReview("r1", "h1")]).map((h) => h.id)).toEqual(["h2"]);
    });

    it("should review in batches of five", async () => {
      const generator = new ScriptedTextGenerator([{ system: /critically review/, reply: review }]);

      const outcome = await new ReflectionAgent(generator).run({ envelope: envelopeWith(six) });

      expect(generator.requests).toHaveLength(2);
      expect(generator.requests[1].prompt).toContain("Hypothesis 1: Sixth");
      expect(outcome.delta.addReviews?.map((r) => r.hypothesisId)).toEqual(["h1", "h6"]);
      expect(outcome.delta.addReviews?.[0]?.recommendation).toBe("accept");
      expect(outcome.diagnostics).toMatchObject({ capabilityCalls: 2, failedCalls: 0 });
    });

    it("should keep the reviews of batches that succeeded", async () => {
      const generator = new ScriptedTextGenerator([
        { system: /critically review/, prompt: /Hypothesis 1: Sixth/, reply: new Error("batch failed") },
        { system: /critically review/, reply: review },
      ]);

      const outcome = await new ReflectionAgent(generator).run({ envelope: envelopeWith(six) });

      expect(outcome.delta.addReviews?.map((r) => r.hypothesisId)).toEqual(["h1"]);
      expect(outcome.diagnostics).toMatchObject({ capabilityCalls: 2, failedCalls: 1 });
    });

    it("should fail the step when every batch fails", async () => {
      const generator = new ScriptedTextGenerator([{ system: /critically review/, reply: new Error("provider down") }]);
      await expect(new ReflectionAgent(generator).run({ envelope: envelopeWith(six) })).rejects.toThrow(
        "provider down",
      );
    });

    it("should skip superseded and reviewed hypotheses", async () => {
      const generator = new ScriptedTextGenerator([]);
      const envelope = envelopeWith(
        [
          makeHypothesis("h1", "Old", { status: "superseded", supersededBy: ["h2"] }),
          makeHypothesis("h2", "New"),
        ],
        { reviews: [makeReview("r1", "h2")] },
      );

      const outcome = await new ReflectionAgent(generator).run({ envelope });

      expect(outcome.diagnostics.summary).toBe("Every active hypothesis already has a review");
      expect(generator.requests).toHaveLength(0);
    });
  });

  // -------------------------------------------------------------------------
  // Ranking
  // -------------------------------------------------------------------------

  describe("RankingAgent", () => {
    const pair = [makeHypothesis("h1", "First"), makeHypothesis("h2", "Second")];

    it("should update ratings from the judged debate", async () => {
      const generator = new ScriptedTextGenerator([
        { system: /judge scientific debates/, reply: "WINNER: B\nCONFIDENCE: 50\nJUSTIFICATION:\nB is sharper." },
      ]);

      const outcome = await new RankingAgent(generator).run({ envelope: envelopeWith(pair), random: first });

      expect(outcome.delta.ratings).toEqual({ h1: 1492, h2: 1508 });
      expect(outcome.delta.matchesPlayed).toBe(1);
      expect(generator.requests[0].prompt).toContain("Hypothesis A:\nTitle: First");
      expect(generator.requests[0].prompt).toContain("No reviews available.");
    });

    it("should not move ratings for an undecided debate", async () => {
      const generator = new ScriptedTextGenerator([{ system: /judge scientific debates/, reply: "Too close to call." }]);

      const outcome = await new RankingAgent(generator).run({ envelope: envelopeWith(pair), random: first });

      expect(outcome.delta.ratings).toEqual({ h1: 1500, h2: 1500 });
      expect(outcome.delta.matchesPlayed).toBe(0);
    });

    it("should fail the step when every debate fails", async () => {
      const generator = new ScriptedTextGenerator([{ system: /judge scientific debates/, reply: new Error("judge down") }]);
      await expect(
        new RankingAgent(generator).run({ envelope: envelopeWith(pair), random: first }),
      ).rejects.toThrow("All 1 debates failed: judge down");
    });
  });

  // -------------------------------------------------------------------------
  // Evolution
  // -------------------------------------------------------------------------

  describe("EvolutionAgent", () => {
    it("should group children by the parents they reference", () => {
      const parents = [makeHypothesis("p1", "P1"), makeHypothesis("p2", "P2")];
      const children = [
        makeHypothesis("c1", "C1", { parentIds: ["p2"] }),
        makeHypothesis("c2", "C2", { parentIds: ["p2", "p1"] }),
      ];
      expect(supersessionsFor(parents, children)).toEqual([
        { parentId: "p1", childIds: ["c2"] },
        { parentId: "p2", childIds: ["c1", "c2"] },
      ]);
    });

    it("should evolve the top-rated hypotheses with ids and ratings in the prompt", async () => {
      const generator = new ScriptedTextGenerator([
        {
          system: /refine promising/,
          reply: "Hypothesis 1\nTitle: Targeted clearance\nParent: h2\nEvolution Strategy: specialization\nDescription: Only in cortex.",
        },
      ]);
      const envelope = envelopeWith(
        [makeHypothesis("h1", "Low"), makeHypothesis("h2", "High"), makeHypothesis("h3", "Mid")],
        { ratings: { h1: 1400, h2: 1600, h3: 1500 } },
      );

      const outcome = await new EvolutionAgent(generator, { topK: 2 }).run({ envelope });

      const prompt = generator.requests[0].prompt;
      expect(prompt).toContain("Hypothesis 1 (ID: h2): High\nRating: 1600");
      expect(prompt).toContain("Hypothesis 2 (ID: h3): Mid\nRating: 1500");
      expect(prompt).not.toContain("(ID: h1)");

      const [child] = outcome.delta.addHypotheses ?? [];
      expect(child).toMatchObject({
        title: "Targeted clearance",
        source: "evolution",
        parentIds: ["h2"],
        evolutionStrategies: ["specialization"],
        order: 3,
      });
      expect(outcome.delta.supersede).toEqual([{ parentId: "h2", childIds: [child.id] }]);
    });
  });

  // -------------------------------------------------------------------------
  // Proximity
  // -------------------------------------------------------------------------

  describe("ProximityAgent", () => {
    it("should add an edge for every scored pair", async () => {
      const generator = new ScriptedTextGenerator([
        { system: /analyze how similar/, reply: "Shared mechanism.\nOVERALL_SIMILARITY: 0.9" },
      ]);
      const envelope = envelopeWith([makeHypothesis("a", "A"), makeHypothesis("b", "B"), makeHypothesis("c", "C")]);

      const outcome = await new ProximityAgent(generator).run({ envelope });

      expect(outcome.delta.addEdges?.map((e) => [e.source, e.target, e.similarity])).toEqual([
        ["a", "b", 0.9],
        ["a", "c", 0.9],
        ["b", "c", 0.9],
      ]);
      expect(outcome.diagnostics).toMatchObject({ capabilityCalls: 3, failedCalls: 0 });
    });

    it("should add nothing when replies carry no score", async () => {
      const generator = new ScriptedTextGenerator([{ system: /analyze how similar/, reply: "Hard to say." }]);
      const envelope = envelopeWith([makeHypothesis("a", "A"), makeHypothesis("b", "B")]);

      const outcome = await new ProximityAgent(generator).run({ envelope });

      expect(outcome.delta.addEdges).toEqual([]);
    });

    it("should skip with fewer than two active hypotheses", async () => {
      const generator = new ScriptedTextGenerator([]);
      const outcome = await new ProximityAgent(generator).run({ envelope: envelopeWith([makeHypothesis("a", "A")]) });
      expect(outcome.delta).toEqual({});
    });
  });

  // -------------------------------------------------------------------------
  // Meta-review
  // -------------------------------------------------------------------------

  describe("MetaReviewAgent", () => {
    const envelope = envelopeWith([makeHypothesis("h1", "First"), makeHypothesis("h2", "Second")], {
      ratings: { h1: 1450, h2: 1550 },
    });

    it("should store a validated overview and advance the iteration", async () => {
      const generator = new ScriptedTextGenerator([
        {
          system: /synthesize research overviews/,
          reply: 'Here you go:\n```json\n{"overview": "Two strong leads.", "keyThemes": ["clearance"]}\n```',
        },
      ]);

      const outcome = await new MetaReviewAgent(generator).run({ envelope });

      expect(outcome.delta.incrementIteration).toBe(true);
      expect(outcome.delta.stepState).toMatchObject({
        iteration: 1,
        topHypothesisIds: ["h2", "h1"],
        overview: {
          overview: "Two strong leads.",
          keyThemes: ["clearance"],
          researchDirections: [],
          limitations: [],
        },
      });
      expect(generator.requests[0].prompt).toContain("Respond with a single JSON object and nothing else.");
    });

    it("should still advance the iteration when the reply does not conform", async () => {
      const generator = new ScriptedTextGenerator([{ system: /synthesize research overviews/, reply: "Plain prose." }]);

      const outcome = await new MetaReviewAgent(generator).run({ envelope });

      expect(outcome.delta.incrementIteration).toBe(true);
      expect(outcome.delta.stepState?.overview).toBeNull();
    });
  });

  // -------------------------------------------------------------------------
  // Supervisor
  // -------------------------------------------------------------------------

  describe("SupervisorAgent", () => {
    it("should plan from the reply", async () => {
      const generator = new ScriptedTextGenerator([
        { system: /supervisor of a team/, reply: 'Rank, then refine.\n{"steps": ["ranking", "evolution"]}' },
      ]);
      const envelope = envelopeWith([makeHypothesis("h1", "First"), makeHypothesis("h2", "Second")], {
        ratings: { h1: 1520 },
      });

      const plan = await new SupervisorAgent(generator).run({ envelope });

      expect(plan.decision).toEqual({
        queue: ["ranking", "evolution"],
        nextStep: "ranking",
        source: "plan",
        terminate: false,
      });
      expect(plan.parsed).toEqual(["ranking", "evolution"]);
      expect(generator.requests[0].prompt).toContain("Hypotheses generated: 2 (2 active)");
      expect(generator.requests[0].prompt).toContain("Tournament: 1 hypotheses rated, top hypothesis: First");
    });

    it("should fall back to the rotation for an unusable reply", async () => {
      const generator = new ScriptedTextGenerator([{ system: /supervisor of a team/, reply: "Keep going." }]);

      const plan = await new SupervisorAgent(generator).run({ envelope: envelopeWith([], { rounds: 5 }) });

      expect(plan.decision.source).toBe("fallback");
      expect(plan.decision.queue).toEqual(["meta_review"]);
    });

    it("should build the fallback plan without a model", () => {
      const plan = fallbackPlan(envelopeWith([], { rounds: 0 }));
      expect(plan.decision.queue).toEqual(["generation", "reflection", "ranking"]);
      expect(plan.rawPlan).toBeNull();
    });

    it("should summarize the tournament with or without a leader", () => {
      const state = fallbackPlan(envelopeWith([])).state;
      expect(tournamentSummary(state)).toBe("0 hypotheses rated");
    });
  });
});
