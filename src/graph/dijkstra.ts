import { ERROR_CODES } from "../types.js";
import { GraphModelError } from "./errors.js";
import { MinHeap } from "./minHeap.js";
import type { Digraph, DijkstraResult, PathResult, VertexId } from "./types.js";

function invalidWeight(from: VertexId, to: VertexId, weight: number): GraphModelError {
  return new GraphModelError([
    {
      code: ERROR_CODES.GRAPH_INVALID_WEIGHT,
      message: `Dijkstra cannot handle weight ${weight} on edge '${from}' -> '${to}'`,
      path: `/${from}/${to}`,
      hint: "use_non_negative_integer_weights",
    },
  ]);
}

/**
 * Single-source shortest paths over non-negative weights.
 *
 * The frontier is a min-heap of candidate distances paired with the best known
 * entry per vertex; outdated heap entries are skipped when popped. A vertex is
 * final once popped, so the returned map only holds vertices whose distance is
 * settled. When `destination` is given the search stops as soon as it is
 * final; otherwise every vertex reachable from `start` is returned.
 *
 * ```ts
 * dijkstra(digraphFromRecord({ a: { b: 10 } }), "a", "b");
 * // Map { "a" => { distance: 0, path: ["a"] }, "b" => { distance: 10, path: ["a", "b"] } }
 * ```
 */
export function dijkstra(graph: Digraph, start: VertexId, destination?: VertexId): DijkstraResult {
  const result = new Map<VertexId, PathResult>();
  const frontier = new Map<VertexId, PathResult>([[start, { distance: 0, path: [start] }]]);
  const queue = new MinHeap<VertexId>();
  queue.enqueue(0, start);

  while (destination === undefined || !result.has(destination)) {
    const next = queue.dequeue();
    if (!next) {
      break;
    }
    const current = next.value;
    const settled = frontier.get(current);
    if (result.has(current) || !settled) {
      continue;
    }

    for (const [adjacent, weight] of graph.get(current) ?? []) {
      if (result.has(adjacent)) {
        continue;
      }
      if (!Number.isFinite(weight) || weight < 0) {
        throw invalidWeight(current, adjacent, weight);
      }
      const candidate = settled.distance + weight;
      const known = frontier.get(adjacent);
      if (known === undefined || candidate < known.distance) {
        frontier.set(adjacent, { distance: candidate, path: [...settled.path, adjacent] });
        queue.enqueue(candidate, adjacent);
      }
    }

    frontier.delete(current);
    result.set(current, settled);
  }

  return result;
}

/** Vertices on a shortest path from `start` to `destination`, or `[]` when unreachable. */
export function shortestPath(graph: Digraph, start: VertexId, destination: VertexId): VertexId[] {
  const entry = dijkstra(graph, start, destination).get(destination);
  return entry ? [...entry.path] : [];
}
