/**
 * Similarity Graph Tests
 *
 * Validates edge accumulation and clustering:
 * - Pair selection skips existing edges and favours low-degree nodes
 * - Repeated builds never duplicate an edge
 * - Failed or unscored comparisons add nothing
 * - Connected-component clustering above a threshold
 */

import { describe, it, expect, vi } from "vitest";
import type { SimilarityEdge } from "../../schemas/envelope.ts";
import {
  buildSimilarityGraph,
  clusterHypotheses,
  edgeDegrees,
  hasEdge,
  selectComparisonPairs,
} from "../similarity-graph.ts";

const h = (id: string) => ({ id });

function edge(source: string, target: string, similarity: number, order = 0): SimilarityEdge {
  return {
    id: `e-${source}-${target}`,
    source,
    target,
    similarity,
    order,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

describe("Similarity Graph", () => {
  describe("edge helpers", () => {
    it("should count degrees from both endpoints", () => {
      const degrees = edgeDegrees([edge("a", "b", 0.5), edge("a", "c", 0.5)]);
      expect(degrees.get("a")).toBe(2);
      expect(degrees.get("b")).toBe(1);
      expect(degrees.get("d")).toBeUndefined();
    });

    it("should treat edges as undirected", () => {
      expect(hasEdge([edge("a", "b", 0.5)], "b", "a")).toBe(true);
      expect(hasEdge([edge("a", "b", 0.5)], "a", "c")).toBe(false);
    });
  });

  describe("selectComparisonPairs", () => {
    it("should pair every hypothesis once when there are no edges", () => {
      const pairs = selectComparisonPairs([h("a"), h("b"), h("c")], []);
      expect(pairs.map(([x, y]) => [x.id, y.id])).toEqual([
        ["a", "b"],
        ["a", "c"],
        ["b", "c"],
      ]);
    });

    it("should skip existing edges and start from the least-connected node", () => {
      const pairs = selectComparisonPairs([h("a"), h("b"), h("c")], [edge("b", "a", 0.4)]);
      expect(pairs.map(([x, y]) => [x.id, y.id])).toEqual([
        ["c", "a"],
        ["c", "b"],
      ]);
    });

    it("should respect the comparison cap", () => {
      const pairs = selectComparisonPairs(["a", "b", "c", "d"].map(h), [], 2);
      expect(pairs).toHaveLength(2);
    });
  });

  describe("buildSimilarityGraph", () => {
    it("should add one ordered edge per scored pair", async () => {
      const result = await buildSimilarityGraph([h("a"), h("b"), h("c")], [], async () => 0.8);
      expect(result.newEdges).toHaveLength(3);
      expect(result.edges.map((e) => e.order)).toEqual([0, 1, 2]);
      expect(result.edges.every((e) => e.similarity === 0.8)).toBe(true);
    });

    it("should not duplicate edges when built again", async () => {
      const hyps = [h("a"), h("b"), h("c")];
      const compare = vi.fn(async () => 0.6);

      const firstBuild = await buildSimilarityGraph(hyps, [], compare);
      const secondBuild = await buildSimilarityGraph(hyps, firstBuild.edges, compare);

      expect(compare).toHaveBeenCalledTimes(3);
      expect(secondBuild.newEdges).toEqual([]);
      expect(secondBuild.edges).toEqual(firstBuild.edges);
    });

    it("should continue numbering after existing edges", async () => {
      const result = await buildSimilarityGraph(
        [h("a"), h("b"), h("c")],
        [edge("a", "b", 0.5, 4)],
        async () => 0.2,
      );
      expect(result.newEdges.map((e) => e.order)).toEqual([5, 6]);
    });

    it("should clamp scores into [0, 1]", async () => {
      const result = await buildSimilarityGraph([h("a"), h("b")], [], async () => 1.4);
      expect(result.newEdges[0].similarity).toBe(1);
    });

    it("should add nothing for unscored or failed comparisons", async () => {
      const compare = vi
        .fn<(a: { id: string }, b: { id: string }) => Promise<number | null>>()
        .mockResolvedValueOnce(null)
        .mockRejectedValueOnce(new Error("rate limited"))
        .mockResolvedValueOnce(0.3);

      const result = await buildSimilarityGraph([h("a"), h("b"), h("c")], [], compare);

      expect(result.newEdges).toHaveLength(1);
      expect(result.newEdges[0]).toMatchObject({ source: "b", target: "c", similarity: 0.3 });
      expect(result.comparisons[1]).toMatchObject({ similarity: null, error: "rate limited" });
    });
  });

  describe("clusterHypotheses", () => {
    it("should group hypotheses connected above the threshold", () => {
      const clusters = clusterHypotheses(
        ["a", "b", "c", "d"].map(h),
        [edge("a", "b", 0.9), edge("b", "c", 0.8), edge("c", "d", 0.3)],
      );

      expect(clusters).toHaveLength(2);
      expect(clusters[0].members).toEqual(["a", "b", "c"]);
      expect(clusters[0].cohesion).toBeCloseTo(0.85, 10);
      expect(clusters[1]).toEqual({ members: ["d"], cohesion: 0 });
    });

    it("should honour a custom threshold", () => {
      const clusters = clusterHypotheses(
        ["a", "b", "c", "d"].map(h),
        [edge("a", "b", 0.9), edge("b", "c", 0.8), edge("c", "d", 0.3)],
        0.25,
      );
      expect(clusters).toHaveLength(1);
      expect(clusters[0].members).toEqual(["a", "b", "c", "d"]);
    });

    it("should ignore edges to unknown hypotheses", () => {
      const clusters = clusterHypotheses([h("a"), h("b")], [edge("a", "zz", 0.95)]);
      expect(clusters.map((c) => c.members)).toEqual([["a"], ["b"]]);
    });
  });
});
