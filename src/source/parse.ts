import type {
  ExtractionField,
  NodeId,
  SideEffectKind,
  SourceEdge,
  SourceGraph,
  SourceNode
} from "../types/source.js";
import type { RawSourceEdge, RawSourceNode } from "./schema.js";
import { workflowSchema } from "./schema.js";
import { describeIssues } from "../palette/schema.js";
import { StructuralError } from "../errors.js";
import type { Diagnostics } from "../diagnostics.js";
import { entryNodes } from "./graph.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accepts `{workflow: {...}}` exports as well as a bare `{nodes, edges}` object. */
function unwrapWorkflow(raw: unknown): { workflow: unknown; fallbackName?: string } {
  if (!isRecord(raw)) throw new StructuralError("source document is not an object");
  if (isRecord(raw.workflow)) {
    return { workflow: raw.workflow, fallbackName: typeof raw.name === "string" ? raw.name : undefined };
  }
  return { workflow: raw };
}

function sideEffectOf(toolType: string): SideEffectKind {
  return toolType === "transferCall" ? "transfer" : "terminate";
}

function toExtractionSchema(raw: RawSourceNode): ExtractionField[] | undefined {
  const output = raw.variableExtractionPlan?.output ?? [];
  if (output.length === 0) return undefined;
  return output.map((v): ExtractionField => {
    if (v.enum && v.enum.length > 0) {
      return { fieldName: v.title, kind: "enum", enumValues: v.enum, description: v.description };
    }
    const kind = v.type === "number" || v.type === "integer" ? "number" : "string";
    return { fieldName: v.title, kind, description: v.description };
  });
}

function toSourceNode(raw: RawSourceNode): SourceNode {
  const isTool = raw.type === "tool";
  const firstMessage = raw.messagePlan?.firstMessage;
  return {
    id: raw.name,
    displayName: raw.name,
    kind: isTool ? "tool" : "conversation",
    instructionText: raw.prompt,
    isStart: raw.isStart,
    firstMessage: firstMessage ? firstMessage : undefined,
    extractionSchema: toExtractionSchema(raw),
    sideEffectKind: isTool ? sideEffectOf(raw.tool?.type ?? "unknown") : "none",
    sideEffectLabel: isTool ? raw.tool?.type ?? "unknown" : undefined,
    position: raw.metadata?.position
  };
}

function toSourceEdge(raw: RawSourceEdge): SourceEdge {
  if (!raw.condition) return { fromNodeId: raw.from, toNodeId: raw.to };
  return {
    fromNodeId: raw.from,
    toNodeId: raw.to,
    condition: {
      kind: raw.condition.type === "ai" ? "classified" : "static",
      description: raw.condition.prompt
    }
  };
}

/**
 * Folds a parallel edge's condition into the edge already kept for the same
 * pair, so the classifier still sees both intents. False when nothing changed.
 */
function mergeCondition(kept: SourceEdge, extra: SourceEdge): boolean {
  const add = extra.condition;
  if (!add || !add.description.trim()) return false;
  const current = kept.condition;
  if (!current || !current.description.trim()) {
    kept.condition = { ...add };
    return true;
  }
  if (current.description.trim().toLowerCase() === add.description.trim().toLowerCase()) return false;
  kept.condition = {
    kind: current.kind === "classified" || add.kind === "classified" ? "classified" : "static",
    description: `${current.description}; or: ${add.description}`
  };
  return true;
}

function pickEntry(nodes: SourceNode[], edges: SourceEdge[]): { entry: NodeId; roots: NodeId[] } {
  const roots = entryNodes(nodes, edges);
  const flagged = nodes.filter(n => n.isStart).map(n => n.id);
  if (flagged.length > 1) {
    throw new StructuralError("more than one node is flagged isStart", flagged.join(", "));
  }
  if (flagged.length === 1) return { entry: flagged[0], roots };
  if (roots.length === 0) {
    throw new StructuralError("no entry node: every node has an incoming edge and none is flagged isStart");
  }
  if (roots.length > 1) {
    throw new StructuralError(
      `ambiguous entry: ${roots.length} nodes have no incoming edge and none is flagged isStart`,
      roots.join(", ")
    );
  }
  return { entry: roots[0], roots };
}

/**
 * Parses and validates a source workflow. Nodes other than the entry that
 * nothing leads into are orphans: they and every edge naming them are
 * dropped, since the runtime would fire them on their own.
 */
export function parseSourceDocument(raw: unknown, diag: Diagnostics): SourceGraph {
  const { workflow, fallbackName } = unwrapWorkflow(raw);
  const parsed = workflowSchema.safeParse(workflow);
  if (!parsed.success) {
    throw new StructuralError(`malformed source document: ${describeIssues(parsed.error)}`);
  }
  const wf = parsed.data;
  if (wf.nodes.length === 0) throw new StructuralError("source workflow has no nodes");

  const nodes: SourceNode[] = [];
  const seen = new Set<NodeId>();
  for (const rawNode of wf.nodes) {
    if (seen.has(rawNode.name)) throw new StructuralError("duplicate node name", rawNode.name);
    seen.add(rawNode.name);
    nodes.push(toSourceNode(rawNode));
  }

  const edges: SourceEdge[] = [];
  const pairs = new Map<string, SourceEdge>();
  for (const rawEdge of wf.edges) {
    const label = `${rawEdge.from} -> ${rawEdge.to}`;
    if (!seen.has(rawEdge.from)) throw new StructuralError(`edge references unknown node '${rawEdge.from}'`, label);
    if (!seen.has(rawEdge.to)) throw new StructuralError(`edge references unknown node '${rawEdge.to}'`, label);
    const key = JSON.stringify([rawEdge.from, rawEdge.to]);
    const edge = toSourceEdge(rawEdge);
    const kept = pairs.get(key);
    if (kept) {
      const text = edge.condition?.description.trim();
      if (text && mergeCondition(kept, edge)) {
        diag.warn("duplicate-edge", label, `parallel edge merged into the existing transition; condition '${text}' kept as an alternative`);
      } else {
        diag.warn("duplicate-edge", label, "parallel edge dropped; its condition adds nothing to the existing transition");
      }
      continue;
    }
    pairs.set(key, edge);
    edges.push(edge);
  }

  const { entry, roots } = pickEntry(nodes, edges);
  const orphans = roots.filter(id => id !== entry);
  for (const id of orphans) {
    diag.warn("orphan-node", id, "node has no incoming edge and is not the entry; excluded from compilation");
  }
  const excluded = new Set(orphans);

  return {
    name: wf.name ?? fallbackName ?? "Converted Workflow",
    nodes: nodes.filter(n => !excluded.has(n.id)),
    edges: edges.filter(e => !excluded.has(e.fromNodeId) && !excluded.has(e.toNodeId)),
    entryNodeId: entry,
    orphans
  };
}
