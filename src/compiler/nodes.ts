import type { ComponentInstance } from "../types/palette.js";
import type { NodeId, Position, SourceGraph, SourceNode } from "../types/source.js";
import type { CompileContext } from "./context.js";
import { augmentInstruction } from "../prompt/augment.js";

export function autoPosition(index: number): Position {
  return { x: -400 + index * 300, y: 100 };
}

function materializeNode(node: SourceNode, index: number, ctx: CompileContext): ComponentInstance {
  const position = node.position ?? autoPosition(index);
  if (node.kind === "tool") {
    // Side effects such as call transfer have no pipeline equivalent.
    const label = node.sideEffectLabel ?? node.sideEffectKind;
    ctx.diag.warn("side-effect-degraded", node.id, `${label} compiled as a terminal placeholder`);
    return ctx.palette.clone("ExitPoint", ctx.ids, {
      position,
      displayName: node.displayName,
      description: `Tool: ${label}`,
      sourceNodeId: node.id
    });
  }
  const agent = ctx.palette.clone("ConversationAgent", ctx.ids, {
    position,
    displayName: node.displayName,
    sourceNodeId: node.id
  });
  ctx.palette.configure(agent, "instruction", augmentInstruction(node));
  return agent;
}

/** One component per surviving source node, keyed by node id. */
export function materializeNodes(graph: SourceGraph, ctx: CompileContext): Map<NodeId, ComponentInstance> {
  const out = new Map<NodeId, ComponentInstance>();
  graph.nodes.forEach((node, i) => {
    const instance = materializeNode(node, i, ctx);
    out.set(node.id, instance);
    ctx.diag.logger.info(`${node.id} (${node.kind}) -> ${instance.id}`);
  });
  return out;
}
