/**
 * Shared type definitions describing the in-memory representation of weighted
 * digraphs. Keeping the types centralised prevents circular dependencies
 * between the generator, the shortest-path engine and the metrics helpers.
 */

/** Opaque vertex label. Generated graphs use the decimal indices `"0"`, `"1"`, … */
export type VertexId = string;

/** Outgoing edges of one vertex: adjacent vertex → non-negative integer weight. */
export type Adjacency = ReadonlyMap<VertexId, number>;

/**
 * Weighted directed graph. Every vertex owns an entry, even when it has no
 * outgoing edge (empty adjacency). Graphs are never mutated once built.
 */
export type Digraph = ReadonlyMap<VertexId, Adjacency>;

/** Plain-object form of a {@link Digraph}: `{ a: { b: 5 }, b: {} }`. */
export type AdjacencyRecord = Record<VertexId, Record<VertexId, number>>;

/** Shortest distance to a vertex and the path realising it (both ends included). */
export interface PathResult {
  readonly distance: number;
  readonly path: readonly VertexId[];
}

/** Entries for every vertex finalised by one Dijkstra run. */
export type DijkstraResult = ReadonlyMap<VertexId, PathResult>;

/** Single weighted edge, as handed to renderers. */
export interface WeightedEdge {
  readonly from: VertexId;
  readonly to: VertexId;
  readonly weight: number;
}
