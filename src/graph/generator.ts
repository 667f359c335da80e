import { z } from "zod";

import { loadSettings } from "../config/settings.js";
import type { StructuredLogger } from "../logger.js";
import { GraphInvalidArgumentError } from "./errors.js";
import { createSeededRandom, mathRandomSource, randomInt, type RandomSource } from "./random.js";
import type { Digraph, VertexId } from "./types.js";

/** Options accepted by {@link makeGraph}. */
export interface MakeGraphOptions {
  /** Exclusive upper bound for edge weights. Defaults to `DIGRAPH_MAX_WEIGHT` (100). */
  readonly maxWeight?: number;
  /**
   * Uniform source driving vertex selection, shuffling and weights. Defaults to
   * a source seeded from `DIGRAPH_RANDOM_SEED` when set, `Math.random` otherwise.
   */
  readonly random?: RandomSource;
  /** Receives a `graph_generated` debug entry. */
  readonly logger?: StructuredLogger;
}

const MakeGraphArgsSchema = z.object({
  vertexCount: z.number().int().positive(),
  edgeCount: z.number().int().nonnegative(),
  maxWeight: z.number().int().positive(),
});

type MutableDigraph = Map<VertexId, Map<VertexId, number>>;

/** Dense vertex label for index `index`. */
function vertexLabel(index: number): VertexId {
  return String(index);
}

function emptyGraph(vertexCount: number): MutableDigraph {
  const graph: MutableDigraph = new Map();
  for (let index = 0; index < vertexCount; index += 1) {
    graph.set(vertexLabel(index), new Map());
  }
  return graph;
}

/** Every ordered pair `(i, j)` with `i !== j`, row by row. */
function allOrderedPairs(vertexCount: number): Array<[VertexId, VertexId]> {
  const pairs: Array<[VertexId, VertexId]> = [];
  for (let from = 0; from < vertexCount; from += 1) {
    for (let to = 0; to < vertexCount; to += 1) {
      if (from !== to) {
        pairs.push([vertexLabel(from), vertexLabel(to)]);
      }
    }
  }
  return pairs;
}

/**
 * Yields the items in random order, drawing one at a time: the picked slot is
 * refilled with the last item so each draw costs O(1).
 */
function* lazyShuffle<T>(items: readonly T[], random: RandomSource): Generator<T> {
  const pool = items.slice();
  while (pool.length > 0) {
    const index = randomInt(random, pool.length);
    const picked = pool[index];
    const last = pool.pop();
    if (last !== undefined && index < pool.length) {
      pool[index] = last;
    }
    yield picked;
  }
}

function addEdge(graph: MutableDigraph, from: VertexId, to: VertexId, weight: number): void {
  const adjacency = graph.get(from);
  if (!adjacency) {
    graph.set(from, new Map([[to, weight]]));
    return;
  }
  adjacency.set(to, weight);
}

function hasEdge(graph: MutableDigraph, from: VertexId, to: VertexId): boolean {
  return graph.get(from)?.has(to) ?? false;
}

/**
 * Random walk over the vertices: drawing an unvisited vertex links it from the
 * current one; either way the walk moves to the drawn vertex. Ends once every
 * vertex has been visited, leaving exactly `vertexCount - 1` edges.
 */
function makeSpanningTree(vertexCount: number, maxWeight: number, random: RandomSource): MutableDigraph {
  const graph = emptyGraph(vertexCount);
  let current = vertexLabel(randomInt(random, vertexCount));
  const visited = new Set<VertexId>([current]);

  while (visited.size < vertexCount) {
    const drawn = vertexLabel(randomInt(random, vertexCount));
    if (!visited.has(drawn)) {
      addEdge(graph, current, drawn, randomInt(random, maxWeight));
      visited.add(drawn);
    }
    current = drawn;
  }
  return graph;
}

function resolveRandomSource(option: RandomSource | undefined): RandomSource {
  if (option) {
    return option;
  }
  const seed = loadSettings().randomSeed;
  return seed !== null ? createSeededRandom(seed) : mathRandomSource;
}

/**
 * Generates a random weighted digraph with `vertexCount` vertices labelled
 * `"0"…"V-1"` and exactly `edgeCount` directed edges, weights drawn uniformly
 * in `[0, maxWeight)`.
 *
 * Unless every ordered pair is requested, a random spanning tree is laid down
 * first and the remaining edges are drawn from the shuffled set of free pairs.
 *
 * @throws GraphInvalidArgumentError when `edgeCount` lies outside
 * `[vertexCount - 1, vertexCount * (vertexCount - 1)]` or an argument is not a
 * positive integer.
 */
export function makeGraph(vertexCount: number, edgeCount: number, options: MakeGraphOptions = {}): Digraph {
  const maxWeight = options.maxWeight ?? loadSettings().maxWeight;
  const parsed = MakeGraphArgsSchema.safeParse({ vertexCount, edgeCount, maxWeight });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new GraphInvalidArgumentError(`${issue?.path.join(".") ?? "arguments"}: ${issue?.message ?? "invalid"}`, {
      hint: "use_positive_integers",
      details: { vertexCount, edgeCount, maxWeight },
    });
  }

  const maxEdges = vertexCount * (vertexCount - 1);
  if (edgeCount < vertexCount - 1 || edgeCount > maxEdges) {
    throw new GraphInvalidArgumentError(
      `count of edges must be in range [${vertexCount - 1}..${maxEdges}] (received ${edgeCount})`,
      { hint: "adjust_edge_count", details: { vertexCount, edgeCount, min: vertexCount - 1, max: maxEdges } },
    );
  }

  const random = resolveRandomSource(options.random);
  const complete = edgeCount === maxEdges;
  let graph: MutableDigraph;

  if (complete) {
    graph = emptyGraph(vertexCount);
    for (const [from, to] of allOrderedPairs(vertexCount)) {
      addEdge(graph, from, to, randomInt(random, maxWeight));
    }
  } else {
    graph = makeSpanningTree(vertexCount, maxWeight, random);
    // The spanning tree accounts for `vertexCount - 1` edges.
    let remaining = edgeCount - (vertexCount - 1);
    if (remaining > 0) {
      for (const [from, to] of lazyShuffle(allOrderedPairs(vertexCount), random)) {
        if (hasEdge(graph, from, to)) {
          continue;
        }
        addEdge(graph, from, to, randomInt(random, maxWeight));
        remaining -= 1;
        if (remaining === 0) {
          break;
        }
      }
    }
  }

  options.logger?.debug("graph_generated", {
    vertex_count: vertexCount,
    edge_count: edgeCount,
    max_weight: maxWeight,
    mode: complete ? "complete" : "spanning_tree",
  });
  return graph;
}
