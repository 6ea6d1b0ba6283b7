import { z } from "zod";
import type { ComponentType } from "../types/palette.js";
import type { EmittedEdge, EmittedNode, TargetDocument } from "../types/target.js";
import type { PaletteRegistry } from "../palette/registry.js";
import { isBlankValue } from "../palette/registry.js";

export interface Verdict {
  pass: boolean;
  issues: string[];
}

const componentTypeSchema = z.enum(["EntryPoint", "ConversationAgent", "Classifier", "BinaryGate", "ExitPoint"]);

const sourceHandleSchema = z.object({
  dataType: z.string(),
  id: z.string(),
  name: z.string(),
  output_types: z.array(z.string()).min(1)
});

const targetHandleSchema = z.object({
  fieldName: z.string(),
  id: z.string(),
  inputTypes: z.array(z.string()).min(1),
  type: z.string()
});

function decode<T>(schema: z.ZodType<T>, text: string): T | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function checkNode(node: EmittedNode, palette: PaletteRegistry, issues: string[]): ComponentType | undefined {
  const type = componentTypeSchema.safeParse(node.data.componentType);
  if (!type.success) {
    issues.push(`${node.id}: unknown componentType '${node.data.componentType}'`);
    return undefined;
  }
  const bp = palette.getBlueprint(type.data);
  if (node.data.type !== bp.runtimeType) {
    issues.push(`${node.id}: runtime type ${node.data.type} does not match blueprint ${bp.runtimeType}`);
  }
  for (const name of Object.keys(bp.requiredFields)) {
    const spec = node.data.node.template[name];
    if (!spec || isBlankValue(spec.value)) issues.push(`${node.id}: required field '${name}' is blank`);
  }
  return type.data;
}

function checkEdge(
  edge: EmittedEdge,
  types: Map<string, ComponentType>,
  palette: PaletteRegistry,
  fed: Set<string>,
  issues: string[]
): void {
  const sourceType = types.get(edge.source);
  const targetType = types.get(edge.target);
  if (!sourceType || !targetType) {
    issues.push(`${edge.source} -> ${edge.target}: edge references a missing node`);
    return;
  }
  const sh = decode(sourceHandleSchema, edge.sourceHandle);
  const th = decode(targetHandleSchema, edge.targetHandle);
  if (!sh || !th) {
    issues.push(`${edge.source} -> ${edge.target}: undecodable handle`);
    return;
  }
  fed.add(`${edge.target}.${th.fieldName}`);
  if (sh.id !== edge.source || th.id !== edge.target) {
    issues.push(`${edge.source} -> ${edge.target}: handle ids disagree with edge endpoints`);
  }
  const out = palette.getBlueprint(sourceType).outputPorts.find(p => p.name === sh.name);
  const inp = palette.getBlueprint(targetType).inputPorts.find(p => p.name === th.fieldName);
  if (!out) issues.push(`${edge.source}: no output port '${sh.name}' on ${sourceType}`);
  if (!inp) issues.push(`${edge.target}: no input port '${th.fieldName}' on ${targetType}`);
  if (out && inp && !inp.dataKinds.includes(out.dataKind)) {
    issues.push(`${edge.source}.${out.name} -> ${edge.target}.${inp.name}: ${out.dataKind} not accepted`);
  }
}

/** Required fields behind an input port are filled only by an inbound connection. */
function checkFedInputs(doc: TargetDocument, types: Map<string, ComponentType>, palette: PaletteRegistry, fed: Set<string>, issues: string[]): void {
  for (const node of doc.data.nodes) {
    const type = types.get(node.id);
    if (!type) continue;
    const bp = palette.getBlueprint(type);
    for (const port of bp.inputPorts) {
      if (bp.fields[port.name]?.required && !fed.has(`${node.id}.${port.name}`)) {
        issues.push(`${node.id}: required input '${port.name}' has no inbound connection`);
      }
    }
  }
}

function checkReachability(doc: TargetDocument, types: Map<string, ComponentType>, issues: string[]): void {
  const entries = doc.data.nodes.filter(n => types.get(n.id) === "EntryPoint");
  if (entries.length !== 1) {
    issues.push(`expected exactly one EntryPoint, found ${entries.length}`);
    return;
  }
  const adj = new Map<string, string[]>();
  for (const e of doc.data.edges) adj.set(e.source, [...(adj.get(e.source) ?? []), e.target]);
  const seen = new Set([entries[0].id]);
  const queue = [entries[0].id];
  for (let i = 0; i < queue.length; i++) {
    for (const next of adj.get(queue[i]) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  for (const n of doc.data.nodes) {
    if (!seen.has(n.id)) issues.push(`${n.id}: unreachable from the entry`);
  }
}

/**
 * Independent check of an emitted document against the palette: node
 * types, required fields, decoded edge handles, port contracts, fed
 * required inputs and reachability.
 */
export function verifyDocument(doc: TargetDocument, palette: PaletteRegistry): Verdict {
  const issues: string[] = [];
  const types = new Map<string, ComponentType>();
  for (const node of doc.data.nodes) {
    if (types.has(node.id)) issues.push(`${node.id}: duplicate node id`);
    const type = checkNode(node, palette, issues);
    if (type) types.set(node.id, type);
  }
  const fed = new Set<string>();
  for (const edge of doc.data.edges) checkEdge(edge, types, palette, fed, issues);
  checkFedInputs(doc, types, palette, fed, issues);
  checkReachability(doc, types, issues);
  return { pass: issues.length === 0, issues };
}
