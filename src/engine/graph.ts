import { dot, compareScoresDesc } from './rank.js';
import type { KeyedVector, NeighborGraph, SimilarityEdge } from '../types.js';

/** Neighbors linked per node by default */
export const DEFAULT_GRAPH_NEIGHBORS = 3;

/**
 * Build an undirected top-k similarity graph.
 *
 * Nodes are processed in input order; each links to its `k` most similar
 * other nodes (score descending, lower index first on ties). An edge is kept
 * the first time its unordered pair is seen, with that direction's score;
 * `source` is the node being processed. Fewer than two records produce an
 * empty graph.
 */
export function buildGraph(records: readonly KeyedVector[], k = DEFAULT_GRAPH_NEIGHBORS): NeighborGraph {
  if (records.length < 2) return { nodes: [], edges: [] };

  const n = records.length;
  const sims = similarityMatrix(records);
  const seen = new Set<string>();
  const edges: SimilarityEdge[] = [];

  for (let i = 0; i < n; i++) {
    const neighbors: Array<{ j: number; score: number }> = [];
    for (let j = 0; j < n; j++) {
      if (j !== i) neighbors.push({ j, score: sims[i][j] });
    }
    // stable: equal scores stay in ascending index order
    neighbors.sort((a, b) => compareScoresDesc(a.score, b.score));

    for (const { j, score } of neighbors.slice(0, Math.max(0, k))) {
      const pair = i < j ? `${i}:${j}` : `${j}:${i}`;
      if (seen.has(pair)) continue;
      seen.add(pair);
      edges.push({ source: records[i][0], target: records[j][0], similarity: score });
    }
  }

  return { nodes: records.map(([key]) => key), edges };
}

function similarityMatrix(records: readonly KeyedVector[]): Float64Array[] {
  const n = records.length;
  const rows = Array.from({ length: n }, () => new Float64Array(n));

  for (let i = 0; i < n; i++) {
    rows[i][i] = dot(records[i][1], records[i][1]);
    for (let j = i + 1; j < n; j++) {
      const score = dot(records[i][1], records[j][1]);
      rows[i][j] = score;
      rows[j][i] = score;
    }
  }
  return rows;
}
