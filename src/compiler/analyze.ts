import type { NodeId, SourceEdge, SourceGraph } from "../types/source.js";
import { outgoingEdges } from "../source/graph.js";

export const DEFAULT_MAX_ROUTING_DEPTH = 1;

export type BranchTier = "near" | "deep";

export interface BranchPoint {
  nodeId: NodeId;
  /** BFS layer from the entry node; null when the entry cannot reach it. */
  depth: number | null;
  tier: BranchTier;
  edges: SourceEdge[];
}

/** BFS from the entry node. Cycles keep the depth of the first visit. */
export function computeDepths(graph: SourceGraph): Map<NodeId, number> {
  const adj = outgoingEdges(graph.edges);
  const depth = new Map<NodeId, number>([[graph.entryNodeId, 0]]);
  const queue: NodeId[] = [graph.entryNodeId];
  for (let i = 0; i < queue.length; i++) {
    const u = queue[i];
    const d = depth.get(u) ?? 0;
    for (const e of adj.get(u) ?? []) {
      if (depth.has(e.toNodeId)) continue;
      depth.set(e.toNodeId, d + 1);
      queue.push(e.toNodeId);
    }
  }
  return depth;
}

/**
 * Nodes with two or more outgoing edges. Those within `maxRoutingDepth` of
 * the entry are `near` and get gate routing; the rest fan out unguarded.
 */
export function findBranchPoints(graph: SourceGraph, maxRoutingDepth = DEFAULT_MAX_ROUTING_DEPTH): BranchPoint[] {
  const depths = computeDepths(graph);
  const adj = outgoingEdges(graph.edges);
  const points: BranchPoint[] = [];
  for (const node of graph.nodes) {
    const edges = adj.get(node.id) ?? [];
    if (edges.length < 2) continue;
    const depth = depths.get(node.id) ?? null;
    const tier: BranchTier = depth !== null && depth <= maxRoutingDepth ? "near" : "deep";
    points.push({ nodeId: node.id, depth, tier, edges });
  }
  return points;
}
