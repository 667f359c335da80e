import { inspect } from "node:util";

import { GraphInvalidArgumentError } from "./errors.js";
import type { Digraph, PathResult, VertexId } from "./types.js";

/** Maps a shortest-path entry to the scalar used by eccentricity. */
export type WeightFunction = (result: PathResult) => number;

/** Default number of eccentricities retained by {@link EccentricityCache}. */
export const DEFAULT_ECCENTRICITY_CACHE_CAPACITY = 512;

interface CacheEntry {
  readonly graph: Digraph;
  readonly value: number;
}

/** Runtime statistics exposed by the cache for observability/tests. */
export interface EccentricityCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

/** Outcome of {@link EccentricityCache.set}, reporting the evicted key if any. */
export interface EccentricityCacheWrite {
  evicted: string | null;
}

/**
 * Small LRU cache memoising eccentricities. Keys combine the identity of the
 * graph, the vertex and the identity of the weight function: graphs are
 * immutable, so a reference uniquely determines the result.
 */
export class EccentricityCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly graphIds = new WeakMap<Digraph, number>();
  private readonly weightFnIds = new WeakMap<WeightFunction, number>();
  private nextGraphId = 1;
  private nextWeightFnId = 1;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly capacity = DEFAULT_ECCENTRICITY_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new GraphInvalidArgumentError(
        `EccentricityCache capacity must be a positive integer (received ${inspect(capacity)})`,
        { hint: "use_positive_capacity" },
      );
    }
  }

  private graphId(graph: Digraph): number {
    let id = this.graphIds.get(graph);
    if (id === undefined) {
      id = this.nextGraphId;
      this.nextGraphId += 1;
      this.graphIds.set(graph, id);
    }
    return id;
  }

  private weightFnId(weightFn: WeightFunction): number {
    let id = this.weightFnIds.get(weightFn);
    if (id === undefined) {
      id = this.nextWeightFnId;
      this.nextWeightFnId += 1;
      this.weightFnIds.set(weightFn, id);
    }
    return id;
  }

  private composeKey(graph: Digraph, vertex: VertexId, weightFn: WeightFunction): string {
    return `${this.graphId(graph)}::${this.weightFnId(weightFn)}::${JSON.stringify(vertex)}`;
  }

  /** Retrieves a memoised eccentricity and marks it most recently used. */
  get(graph: Digraph, vertex: VertexId, weightFn: WeightFunction): number | undefined {
    const key = this.composeKey(graph, vertex, weightFn);
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.value;
  }

  /** Stores an eccentricity and evicts the least recently used entry if needed. */
  set(graph: Digraph, vertex: VertexId, weightFn: WeightFunction, value: number): EccentricityCacheWrite {
    const key = this.composeKey(graph, vertex, weightFn);
    this.entries.delete(key);
    this.entries.set(key, { graph, value });
    if (this.entries.size <= this.capacity) {
      return { evicted: null };
    }
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return { evicted: null };
    }
    this.entries.delete(oldest.value);
    this.evictions += 1;
    return { evicted: oldest.value };
  }

  /** Removes every entry computed for `graph`. */
  invalidateGraph(graph: Digraph): void {
    for (const [key, entry] of Array.from(this.entries)) {
      if (entry.graph === graph) {
        this.entries.delete(key);
      }
    }
  }

  /** Clears every cached result and resets the counters. */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  stats(): EccentricityCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
