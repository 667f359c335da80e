import * as fc from "fast-check";

import { makeGraph } from "../../src/graph/generator.js";
import { createSeededRandom } from "../../src/graph/random.js";
import type { Digraph } from "../../src/graph/types.js";

/** Generation request valid for {@link makeGraph}. */
export interface GraphRequest {
  vertexCount: number;
  edgeCount: number;
  maxWeight: number;
  seed: number;
}

/** Arbitrary producing valid `(V, E, maxWeight, seed)` tuples with `V <= maxVertices`. */
export function graphRequestArb(maxVertices = 8): fc.Arbitrary<GraphRequest> {
  return fc
    .integer({ min: 1, max: maxVertices })
    .chain((vertexCount) =>
      fc.record({
        vertexCount: fc.constant(vertexCount),
        edgeCount: fc.integer({ min: vertexCount - 1, max: vertexCount * (vertexCount - 1) }),
        maxWeight: fc.integer({ min: 1, max: 50 }),
        seed: fc.integer({ min: 1, max: 2_000_000_000 }),
      }),
    );
}

/** Builds the graph described by a {@link GraphRequest}. */
export function graphFromRequest(request: GraphRequest): Digraph {
  return makeGraph(request.vertexCount, request.edgeCount, {
    maxWeight: request.maxWeight,
    random: createSeededRandom(request.seed),
  });
}

/** Arbitrary random digraph built through the generator. */
export function digraphArb(maxVertices = 8): fc.Arbitrary<Digraph> {
  return graphRequestArb(maxVertices).map(graphFromRequest);
}
