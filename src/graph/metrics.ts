import { loadSettings } from "../config/settings.js";
import type { StructuredLogger } from "../logger.js";
import { EccentricityCache, type WeightFunction } from "./cache.js";
import { dijkstra } from "./dijkstra.js";
import { GraphInvalidArgumentError } from "./errors.js";
import type { Digraph, PathResult, VertexId } from "./types.js";

/** Number of edges on the path. */
export const edgeCountWeight: WeightFunction = (result: PathResult) => result.path.length - 1;

/** Summed edge weights along the path. */
export const distanceWeight: WeightFunction = (result: PathResult) => result.distance;

/** Built-in weight functions addressable by name. */
export const WEIGHT_FUNCTIONS = {
  edges: edgeCountWeight,
  distance: distanceWeight,
} as const satisfies Record<string, WeightFunction>;

export type WeightFunctionName = keyof typeof WEIGHT_FUNCTIONS;

/**
 * Largest `weightFn` value over the shortest paths leaving `vertex`.
 * `Infinity` when no other vertex is reachable from it.
 */
export function eccentricity(graph: Digraph, vertex: VertexId, weightFn: WeightFunction = edgeCountWeight): number {
  let max = Number.NEGATIVE_INFINITY;
  let reached = 0;
  for (const [target, result] of dijkstra(graph, vertex)) {
    if (target === vertex) {
      continue;
    }
    reached += 1;
    max = Math.max(max, weightFn(result));
  }
  return reached === 0 ? Number.POSITIVE_INFINITY : max;
}

export interface GraphMetricsOptions {
  /** Shared cache; a private one is created when omitted. */
  readonly cache?: EccentricityCache;
  /** Capacity of the private cache. Defaults to `DIGRAPH_ECCENTRICITY_CACHE_SIZE` (512). */
  readonly cacheCapacity?: number;
  readonly logger?: StructuredLogger;
}

/**
 * Eccentricity, radius and diameter backed by an owned LRU cache. Results are
 * identical to {@link eccentricity}; the cache only skips recomputation.
 */
export class GraphMetrics {
  readonly cache: EccentricityCache;
  private readonly logger?: StructuredLogger;

  constructor(options: GraphMetricsOptions = {}) {
    this.cache = options.cache ?? new EccentricityCache(options.cacheCapacity ?? loadSettings().cacheCapacity);
    this.logger = options.logger;
  }

  eccentricity(graph: Digraph, vertex: VertexId, weightFn: WeightFunction = edgeCountWeight): number {
    const cached = this.cache.get(graph, vertex, weightFn);
    if (cached !== undefined) {
      this.logger?.debug("eccentricity_cache_hit", { vertex });
      return cached;
    }
    const value = eccentricity(graph, vertex, weightFn);
    const { evicted } = this.cache.set(graph, vertex, weightFn, value);
    this.logger?.debug("eccentricity_cache_miss", { vertex, value });
    if (evicted !== null) {
      this.logger?.debug("eccentricity_cache_evicted", { key: evicted });
    }
    return value;
  }

  /** Eccentricity of every vertex, in graph order. */
  eccentricities(graph: Digraph, weightFn: WeightFunction = edgeCountWeight): Map<VertexId, number> {
    const values = new Map<VertexId, number>();
    for (const vertex of graph.keys()) {
      values.set(vertex, this.eccentricity(graph, vertex, weightFn));
    }
    return values;
  }

  /** Smallest eccentricity over all vertices. */
  radius(graph: Digraph, weightFn: WeightFunction = edgeCountWeight): number {
    return this.collect(graph, weightFn, "radius").reduce((min, value) => Math.min(min, value));
  }

  /** Largest eccentricity over all vertices. */
  diameter(graph: Digraph, weightFn: WeightFunction = edgeCountWeight): number {
    return this.collect(graph, weightFn, "diameter").reduce((max, value) => Math.max(max, value));
  }

  private collect(graph: Digraph, weightFn: WeightFunction, metric: "radius" | "diameter"): number[] {
    if (graph.size === 0) {
      throw new GraphInvalidArgumentError(`${metric} is undefined for a graph without vertices`, {
        hint: "provide_vertices",
      });
    }
    return Array.from(this.eccentricities(graph, weightFn).values());
  }
}
