import type { SourceGraph, SourceNode } from "../types/source.js";
import { outgoingEdges } from "../source/graph.js";
import { computeDepths } from "../compiler/analyze.js";

function nodeSection(node: SourceNode, graph: SourceGraph, transitions: string[]): string[] {
  const lines = [`## NODE: ${node.displayName}`];
  if (node.id === graph.entryNodeId && node.firstMessage) {
    lines.push(`**STARTING MESSAGE**: "${node.firstMessage}"`);
  }
  if (node.sideEffectKind !== "none") {
    lines.push(`**ACTION**: ${node.sideEffectLabel ?? node.sideEffectKind} (performed outside this conversation; tell the caller what happens next)`);
  }
  if (node.instructionText) lines.push(`**INSTRUCTION**: ${node.instructionText}`);
  if (node.extractionSchema && node.extractionSchema.length > 0) {
    lines.push("**VARIABLES TO EXTRACT**:");
    for (const f of node.extractionSchema) {
      const options = f.enumValues && f.enumValues.length > 0 ? ` (Options: ${f.enumValues.join(", ")})` : "";
      lines.push(`- ${f.fieldName}: ${f.description}${options}`);
    }
  }
  if (transitions.length > 0) {
    lines.push("**TRANSITIONS**:", ...transitions);
  } else {
    lines.push("**TRANSITIONS**: End of conversation (hang up or wait).");
  }
  return lines;
}

/**
 * Folds the whole workflow into one system prompt: every node the entry
 * reaches becomes a section with its instruction, extraction list and
 * guarded transitions.
 */
export function buildUnifiedPrompt(graph: SourceGraph): string {
  const out = outgoingEdges(graph.edges);
  const names = new Map(graph.nodes.map(n => [n.id, n.displayName]));
  const lines = [
    "You are a voice assistant handling the entire conversation flow defined below.",
    "Follow the state transitions and instructions for each node exactly.",
    `Keep the persona and tone set by the '${names.get(graph.entryNodeId) ?? graph.entryNodeId}' node throughout the conversation.`,
    "",
    "--- GLOBAL INSTRUCTIONS ---",
    "1. State: you are always in exactly one node of the conversation, starting at the entry node.",
    "2. Transitions: after each caller reply, check the transitions of your current node and move as soon as a condition holds.",
    "3. Responses: speak only what the current node instructs.",
    "4. Extraction: when the current node lists variables, end your reply with a JSON object holding them.",
    "",
    "--- CONVERSATION FLOW ---"
  ];
  const reachable = computeDepths(graph);
  for (const node of graph.nodes) {
    if (!reachable.has(node.id)) continue;
    const transitions = (out.get(node.id) ?? []).map(e => {
      const when = e.condition?.description ? e.condition.description : "Default/Always";
      return `- IF ${when} -> GOTO Node: ${names.get(e.toNodeId) ?? e.toNodeId}`;
    });
    lines.push("", ...nodeSection(node, graph, transitions));
  }
  lines.push(
    "",
    "--- RESPONSE FORMAT ---",
    "For every turn, your output must be:",
    "1. Your conversational response (text).",
    "2. (If applicable) A JSON block with extracted variables.",
    "3. (Internal) [State: <Current_Node> -> <Next_Node>]"
  );
  return lines.join("\n");
}
