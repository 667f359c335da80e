import { expect } from "chai";
import * as fc from "fast-check";

import { dijkstra, shortestPath } from "../src/graph/dijkstra.js";
import { GraphModelError } from "../src/graph/errors.js";
import { digraphFromRecord } from "../src/graph/model.js";
import type { Digraph, VertexId } from "../src/graph/types.js";
import { digraphArb } from "./helpers/graphs.js";

/** All-pairs reference distances (Floyd–Warshall). */
function allPairsDistances(graph: Digraph): Map<VertexId, Map<VertexId, number>> {
  const vertices = Array.from(graph.keys());
  const distances = new Map<VertexId, Map<VertexId, number>>();
  for (const from of vertices) {
    const row = new Map<VertexId, number>();
    for (const to of vertices) {
      row.set(to, from === to ? 0 : graph.get(from)?.get(to) ?? Number.POSITIVE_INFINITY);
    }
    distances.set(from, row);
  }
  for (const via of vertices) {
    for (const from of vertices) {
      for (const to of vertices) {
        const row = distances.get(from);
        const direct = row?.get(to) ?? Number.POSITIVE_INFINITY;
        const detour = (row?.get(via) ?? Number.POSITIVE_INFINITY) + (distances.get(via)?.get(to) ?? Number.POSITIVE_INFINITY);
        if (detour < direct) {
          row?.set(to, detour);
        }
      }
    }
  }
  return distances;
}

function pathWeight(graph: Digraph, path: readonly VertexId[]): number {
  let total = 0;
  for (let index = 1; index < path.length; index += 1) {
    total += graph.get(path[index - 1])?.get(path[index]) ?? Number.NaN;
  }
  return total;
}

describe("dijkstra", () => {
  it("returns distance and path for every finalised vertex", () => {
    const graph = digraphFromRecord({ "1": { "2": 10 } });

    expect(dijkstra(graph, "1", "2")).to.deep.equal(
      new Map([
        ["1", { distance: 0, path: ["1"] }],
        ["2", { distance: 10, path: ["1", "2"] }],
      ]),
    );
  });

  it("prefers the lighter multi-hop route", () => {
    const graph = digraphFromRecord({
      start: { middle: 2, end: 10 },
      middle: { end: 3 },
    });

    expect(dijkstra(graph, "start").get("end")).to.deep.equal({ distance: 5, path: ["start", "middle", "end"] });
    expect(shortestPath(graph, "start", "end")).to.deep.equal(["start", "middle", "end"]);
  });

  it("stops as soon as the destination is final", () => {
    const graph = digraphFromRecord({ a: { b: 1, c: 5 }, c: { d: 1 } });

    expect(Array.from(dijkstra(graph, "a", "b").keys())).to.deep.equal(["a", "b"]);
    expect(Array.from(dijkstra(graph, "a").keys())).to.deep.equal(["a", "b", "c", "d"]);
  });

  it("leaves unreachable vertices out and returns an empty path for them", () => {
    const graph = digraphFromRecord({ a: { b: 1 }, c: { a: 1 } });

    const result = dijkstra(graph, "a", "c");

    expect(Array.from(result.keys())).to.deep.equal(["a", "b"]);
    expect(shortestPath(graph, "a", "c")).to.deep.equal([]);
  });

  it("finalises the start vertex even when the graph does not know it", () => {
    const graph = digraphFromRecord({ a: { b: 1 } });

    expect(dijkstra(graph, "z")).to.deep.equal(new Map([["z", { distance: 0, path: ["z"] }]]));
    expect(shortestPath(graph, "z", "z")).to.deep.equal(["z"]);
  });

  it("handles zero weights", () => {
    const graph = digraphFromRecord({ a: { b: 0 }, b: { c: 0 }, c: {} });

    expect(dijkstra(graph, "a").get("c")).to.deep.equal({ distance: 0, path: ["a", "b", "c"] });
  });

  it("keeps the first discovered path among equal-length candidates", () => {
    const graph = digraphFromRecord({ a: { b: 1, c: 1 }, b: { d: 1 }, c: { d: 1 } });

    expect(shortestPath(graph, "a", "d")).to.deep.equal(["a", "b", "d"]);
  });

  it("refuses negative weights", () => {
    const graph: Digraph = new Map([
      ["a", new Map([["b", -1]])],
      ["b", new Map()],
    ]);

    expect(() => dijkstra(graph, "a")).to.throw(GraphModelError).with.property("code", "E-GRAPH-INVALID-WEIGHT");
  });

  it("maps the start vertex to (0, [start])", () => {
    fc.assert(
      fc.property(digraphArb(), (graph) => {
        for (const vertex of graph.keys()) {
          expect(dijkstra(graph, vertex).get(vertex)).to.deep.equal({ distance: 0, path: [vertex] });
        }
      }),
      { numRuns: 50 },
    );
  });

  it("returns optimal distances that match the weights along each path", () => {
    fc.assert(
      fc.property(digraphArb(), (graph) => {
        const reference = allPairsDistances(graph);
        for (const start of graph.keys()) {
          const result = dijkstra(graph, start);
          for (const target of graph.keys()) {
            const expected = reference.get(start)?.get(target) ?? Number.POSITIVE_INFINITY;
            const entry = result.get(target);
            if (!Number.isFinite(expected)) {
              expect(entry).to.equal(undefined);
              expect(shortestPath(graph, start, target)).to.deep.equal([]);
              continue;
            }
            expect(entry).to.not.equal(undefined);
            if (!entry) {
              continue;
            }
            expect(entry.distance).to.equal(expected);
            expect(entry.path[0]).to.equal(start);
            expect(entry.path[entry.path.length - 1]).to.equal(target);
            expect(pathWeight(graph, entry.path)).to.equal(expected);
            expect(shortestPath(graph, start, target)).to.deep.equal(entry.path);
          }
        }
      }),
      { numRuns: 50 },
    );
  });
});
