import { listEdges } from "../graph/model.js";
import type { Digraph } from "../graph/types.js";

/** Options that tweak the DOT serialisation. */
export interface DotRenderOptions {
  /** Graph identifier written after `digraph` (default `G`). */
  name?: string;
  /** Layout direction hint (default `LR`). */
  rankdir?: "LR" | "TB" | "RL" | "BT";
}

/**
 * Render a digraph as a GraphViz DOT document: one node statement per vertex
 * and one edge statement per adjacency entry, carrying the weight both as the
 * label and as the `weight` attribute. Drawing the document is left to
 * GraphViz.
 */
export function renderDot(graph: Digraph, options: DotRenderOptions = {}): string {
  const lines: string[] = [`digraph ${escapeId(options.name ?? "G")} {`];
  lines.push(`  graph [rankdir=${options.rankdir ?? "LR"}];`);

  for (const vertex of graph.keys()) {
    lines.push(`  ${escapeId(vertex)};`);
  }
  for (const edge of listEdges(graph)) {
    lines.push(`  ${escapeId(edge.from)} -> ${escapeId(edge.to)} [label="${edge.weight}", weight=${edge.weight}];`);
  }

  lines.push("}");
  return lines.join("\n");
}

function escapeId(id: string): string {
  return `"${escapeString(id)}"`;
}

function escapeString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\r\n|\r|\n/g, "\\n")
    .replace(/"/g, '\\"')
    .replace(/[\u0000-\u001f]/g, " ");
}
