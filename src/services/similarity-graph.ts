/**
 * Similarity Graph Builder
 *
 * Accumulates an undirected graph of scored similarity edges between
 * hypotheses. Comparisons are expensive model calls, so the builder only
 * schedules pairs that have no edge yet and favours the least-connected
 * hypotheses first.
 *
 * The edge set holds at most one edge per unordered pair. That is checked
 * twice: when pairs are selected, and again right before each edge is
 * appended, so repeated or overlapping builds never duplicate an edge.
 */

import { randomUUID } from "crypto";
import {
  CLUSTER_SIMILARITY_THRESHOLD,
  MAX_COMPARISONS_PER_ROUND,
} from "../config/constants.ts";
import { errorMessage } from "../lib/errors.ts";
import { clamp, mean, unorderedPairKey } from "../lib/math-utils.ts";
import type { SimilarityEdge } from "../schemas/envelope.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GraphNode {
  id: string;
}

/** Scores one pair in [0,1]; `null` means the comparison gave no score. */
export type SimilarityComparer<T extends GraphNode> = (a: T, b: T) => Promise<number | null>;

export interface GraphBuildOptions {
  maxComparisons?: number;
}

export interface ComparisonRecord {
  source: string;
  target: string;
  similarity: number | null;
  error?: string;
}

export interface GraphBuildResult {
  /** Existing edges followed by the ones added in this build */
  edges: SimilarityEdge[];
  newEdges: SimilarityEdge[];
  comparisons: ComparisonRecord[];
}

export interface HypothesisCluster {
  members: string[];
  /** Mean similarity over the qualifying edges inside the cluster */
  cohesion: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function edgeKeys(edges: readonly SimilarityEdge[]): Set<string> {
  return new Set(edges.map((e) => unorderedPairKey(e.source, e.target)));
}

export function edgeDegrees(edges: readonly SimilarityEdge[]): Map<string, number> {
  const degrees = new Map<string, number>();
  for (const e of edges) {
    degrees.set(e.source, (degrees.get(e.source) ?? 0) + 1);
    degrees.set(e.target, (degrees.get(e.target) ?? 0) + 1);
  }
  return degrees;
}

export function hasEdge(edges: readonly SimilarityEdge[], a: string, b: string): boolean {
  const key = unorderedPairKey(a, b);
  return edges.some((e) => unorderedPairKey(e.source, e.target) === key);
}

// ---------------------------------------------------------------------------
// Pair Selection
// ---------------------------------------------------------------------------

/**
 * Pairs without an edge, least-connected hypotheses first.
 *
 * Hypotheses are stable-sorted by current edge degree, then paired i<j in
 * that order until the cap is reached.
 */
export function selectComparisonPairs<T extends GraphNode>(
  hypotheses: readonly T[],
  edges: readonly SimilarityEdge[],
  maxComparisons: number = MAX_COMPARISONS_PER_ROUND,
): Array<[T, T]> {
  if (hypotheses.length < 2 || maxComparisons <= 0) return [];

  const degrees = edgeDegrees(edges);
  const existing = edgeKeys(edges);
  const sorted = [...hypotheses].sort(
    (a, b) => (degrees.get(a.id) ?? 0) - (degrees.get(b.id) ?? 0),
  );

  const pairs: Array<[T, T]> = [];
  const queued = new Set<string>();

  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length; j++) {
      const a = sorted[i];
      const b = sorted[j];
      if (a.id === b.id) continue;
      const key = unorderedPairKey(a.id, b.id);
      if (existing.has(key) || queued.has(key)) continue;
      queued.add(key);
      pairs.push([a, b]);
      if (pairs.length >= maxComparisons) return pairs;
    }
  }
  return pairs;
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

/**
 * Compare the selected pairs concurrently and append one edge per scored
 * pair. The input edge list is not modified.
 */
export async function buildSimilarityGraph<T extends GraphNode>(
  hypotheses: readonly T[],
  edges: readonly SimilarityEdge[],
  compare: SimilarityComparer<T>,
  options: GraphBuildOptions = {},
): Promise<GraphBuildResult> {
  const pairs = selectComparisonPairs(hypotheses, edges, options.maxComparisons);
  if (pairs.length === 0) {
    return { edges: [...edges], newEdges: [], comparisons: [] };
  }

  const settled = await Promise.allSettled(pairs.map(([a, b]) => compare(a, b)));

  const result: SimilarityEdge[] = [...edges];
  const present = edgeKeys(result);
  const newEdges: SimilarityEdge[] = [];
  const comparisons: ComparisonRecord[] = [];
  let nextOrder = result.reduce((max, e) => Math.max(max, e.order + 1), 0);

  settled.forEach((outcome, i) => {
    const [a, b] = pairs[i];

    if (outcome.status === "rejected") {
      const message = errorMessage(outcome.reason);
      console.warn(`[SimilarityGraph] Comparison ${a.id} vs ${b.id} failed: ${message}`);
      comparisons.push({ source: a.id, target: b.id, similarity: null, error: message });
      return;
    }

    const score = outcome.value;
    comparisons.push({ source: a.id, target: b.id, similarity: score });
    if (score === null || !Number.isFinite(score)) return;

    // Re-check against everything appended so far
    const key = unorderedPairKey(a.id, b.id);
    if (present.has(key)) return;
    present.add(key);

    const edge: SimilarityEdge = {
      id: randomUUID(),
      source: a.id,
      target: b.id,
      similarity: clamp(score, 0, 1),
      order: nextOrder++,
      createdAt: new Date().toISOString(),
    };
    result.push(edge);
    newEdges.push(edge);
  });

  return { edges: result, newEdges, comparisons };
}

// ---------------------------------------------------------------------------
// Clustering
// ---------------------------------------------------------------------------

/**
 * Connected components over edges at or above `threshold`.
 *
 * Hypotheses with no qualifying edge form singleton clusters. Clusters are
 * ordered largest first, then by the position of their first member in
 * `hypotheses`.
 */
export function clusterHypotheses(
  hypotheses: readonly GraphNode[],
  edges: readonly SimilarityEdge[],
  threshold: number = CLUSTER_SIMILARITY_THRESHOLD,
): HypothesisCluster[] {
  const ids = hypotheses.map((h) => h.id);
  const known = new Set(ids);
  const parent = new Map<string, string>(ids.map((id): [string, string] => [id, id]));

  const find = (id: string): string => {
    let root = id;
    let next = parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = parent.get(root);
    }
    parent.set(id, root);
    return root;
  };

  const strong = edges.filter(
    (e) => e.similarity >= threshold && known.has(e.source) && known.has(e.target),
  );
  for (const e of strong) {
    const ra = find(e.source);
    const rb = find(e.target);
    if (ra !== rb) parent.set(rb, ra);
  }

  const groups = new Map<string, string[]>();
  for (const id of ids) {
    const root = find(id);
    const members = groups.get(root) ?? [];
    members.push(id);
    groups.set(root, members);
  }

  const clusters = [...groups.values()].map((members): HypothesisCluster => {
    const inside = new Set(members);
    const internal = strong.filter((e) => inside.has(e.source) && inside.has(e.target));
    return { members, cohesion: mean(internal.map((e) => e.similarity)) };
  });

  return clusters.sort((a, b) => b.members.length - a.members.length);
}
