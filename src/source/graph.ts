import type { NodeId, SourceEdge, SourceNode } from "../types/source.js";

/** Nodes with no incoming edge within the given edge set. */
export function entryNodes(nodes: SourceNode[], edges: SourceEdge[]): NodeId[] {
  const indeg: Record<string, number> = Object.fromEntries(nodes.map(n => [n.id, 0]));
  for (const e of edges) {
    if (e.toNodeId in indeg) indeg[e.toNodeId] += 1;
  }
  return nodes.filter(n => indeg[n.id] === 0).map(n => n.id);
}

/** Nodes with no outgoing edge within the given edge set. */
export function exitNodes(nodes: SourceNode[], edges: SourceEdge[]): NodeId[] {
  const outdeg: Record<string, number> = Object.fromEntries(nodes.map(n => [n.id, 0]));
  for (const e of edges) {
    if (e.fromNodeId in outdeg) outdeg[e.fromNodeId] += 1;
  }
  return nodes.filter(n => outdeg[n.id] === 0).map(n => n.id);
}

/** Outgoing edges per node, in source order. */
export function outgoingEdges(edges: SourceEdge[]): Map<NodeId, SourceEdge[]> {
  const out = new Map<NodeId, SourceEdge[]>();
  for (const e of edges) {
    const list = out.get(e.fromNodeId) ?? [];
    list.push(e);
    out.set(e.fromNodeId, list);
  }
  return out;
}
