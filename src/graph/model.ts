import { z } from "zod";

import { ERROR_CODES } from "../types.js";
import { GraphModelError, type GraphModelViolation } from "./errors.js";
import type { AdjacencyRecord, Digraph, VertexId, WeightedEdge } from "./types.js";

/** Structural schema accepted by {@link digraphFromRecord}. */
const AdjacencyRecordSchema = z.record(z.string(), z.record(z.string(), z.number()));

/** Successful validation outcome. */
export interface DigraphValidationSuccess {
  ok: true;
}

/** Validation failure exposing the collected violations. */
export interface DigraphValidationFailure {
  ok: false;
  violations: GraphModelViolation[];
}

/** Result returned by {@link validateDigraph}. */
export type DigraphValidationResult = DigraphValidationSuccess | DigraphValidationFailure;

/** Encodes a vertex identifier as a JSON pointer segment. */
function pointerSegment(vertex: VertexId): string {
  return vertex.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Checks the model invariants: weights are finite non-negative integers and no
 * vertex points to itself. The graph is left untouched.
 */
export function validateDigraph(graph: Digraph): DigraphValidationResult {
  const violations: GraphModelViolation[] = [];

  for (const [vertex, adjacency] of graph) {
    for (const [adjacent, weight] of adjacency) {
      const path = `/${pointerSegment(vertex)}/${pointerSegment(adjacent)}`;
      if (adjacent === vertex) {
        violations.push({
          code: ERROR_CODES.GRAPH_SELF_LOOP,
          message: `self-loop detected on vertex '${vertex}'`,
          path,
          hint: "remove_self_loop",
        });
      }
      if (!Number.isInteger(weight) || weight < 0) {
        violations.push({
          code: ERROR_CODES.GRAPH_INVALID_WEIGHT,
          message: `edge '${vertex}' -> '${adjacent}' has weight ${weight}, expected a non-negative integer`,
          path,
          hint: "use_non_negative_integer_weights",
        });
      }
    }
  }

  if (violations.length > 0) {
    return { ok: false, violations } satisfies DigraphValidationFailure;
  }
  return { ok: true } satisfies DigraphValidationSuccess;
}

/** Throw a {@link GraphModelError} when the graph violates the invariants. */
export function assertValidDigraph(graph: Digraph): void {
  const result = validateDigraph(graph);
  if (!result.ok) {
    throw new GraphModelError(result.violations);
  }
}

/**
 * Builds an immutable {@link Digraph} from a plain adjacency record. Vertices
 * that only appear as edge targets receive an empty adjacency so every vertex
 * owns an entry.
 */
export function digraphFromRecord(record: unknown): Digraph {
  const parsed = AdjacencyRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new GraphModelError(
      parsed.error.issues.map((issue) => ({
        code: ERROR_CODES.GRAPH_INVALID_INPUT,
        message: issue.message,
        path: `/${issue.path.join("/")}`,
        hint: "graph_record_invalid",
      })),
    );
  }

  const graph = new Map<VertexId, Map<VertexId, number>>();
  for (const [vertex, edges] of Object.entries(parsed.data)) {
    graph.set(vertex, new Map(Object.entries(edges)));
  }
  for (const adjacency of Array.from(graph.values())) {
    for (const adjacent of adjacency.keys()) {
      if (!graph.has(adjacent)) {
        graph.set(adjacent, new Map());
      }
    }
  }

  assertValidDigraph(graph);
  return graph;
}

/** Converts a graph back into its plain-object form. */
export function toAdjacencyRecord(graph: Digraph): AdjacencyRecord {
  const record: AdjacencyRecord = {};
  for (const [vertex, adjacency] of graph) {
    record[vertex] = Object.fromEntries(adjacency);
  }
  return record;
}

/** Vertex identifiers in graph order. */
export function listVertices(graph: Digraph): VertexId[] {
  return Array.from(graph.keys());
}

/** Flattens every adjacency entry into a labelled weighted edge. */
export function listEdges(graph: Digraph): WeightedEdge[] {
  const edges: WeightedEdge[] = [];
  for (const [from, adjacency] of graph) {
    for (const [to, weight] of adjacency) {
      edges.push({ from, to, weight });
    }
  }
  return edges;
}

/** Number of directed edges. */
export function countEdges(graph: Digraph): number {
  let total = 0;
  for (const adjacency of graph.values()) {
    total += adjacency.size;
  }
  return total;
}
