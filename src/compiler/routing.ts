import type { ComponentInstance } from "../types/palette.js";
import type { NodeId, SourceEdge } from "../types/source.js";
import type { RoutingLeg, RoutingPlan } from "../types/target.js";
import type { BranchPoint } from "./analyze.js";
import type { CompileContext } from "./context.js";
import { IntegrityError } from "../errors.js";

/** Gates compare single digits, so a classifier can address at most nine successors. */
export const MAX_ROUTED_SUCCESSORS = 9;

/**
 * Substring match rather than equality: classifier replies often carry
 * whitespace or punctuation around the digit.
 */
export const GATE_OPERATOR = "contains";

const GATE_MAX_ITERATIONS = 10;

export interface RoutingResult {
  plans: Map<NodeId, RoutingPlan>;
  instances: ComponentInstance[];
}

function conditionText(edge: SourceEdge, index: number): string {
  const text = edge.condition?.description.trim() ?? "";
  return text || `Condition ${index + 1}`;
}

export function classifierInstruction(conditions: string[]): string {
  const n = conditions.length;
  return [
    "You are a routing classifier for a conversation workflow. Read the latest exchange and decide which condition best describes what the caller wants.",
    "",
    "CONDITIONS:",
    ...conditions.map((c, i) => `${i + 1}. ${c}`),
    "",
    "INSTRUCTIONS:",
    `- Answer with ONLY a single digit from 1 to ${n} identifying the best-matching condition.`,
    "- If more than one condition could apply, choose the most specific one.",
    "- Do not add words, punctuation, quotes or explanations.",
    "",
    "CORRECT:",
    "1",
    "",
    "INCORRECT:",
    "Condition 1",
    "The answer is 1.",
    "\"1\"",
    "",
    "Your response (just the digit):"
  ].join("\n");
}

function checkAmbiguity(point: BranchPoint, ctx: CompileContext): void {
  const seen = new Set<string>();
  for (const edge of point.edges) {
    const text = edge.condition?.description.trim().toLowerCase() ?? "";
    if (!text) {
      ctx.diag.warn(
        "routing-ambiguity",
        `${edge.fromNodeId} -> ${edge.toNodeId}`,
        "transition has no condition text; the classifier only sees a numbered placeholder"
      );
    } else if (seen.has(text)) {
      ctx.diag.warn(
        "routing-ambiguity",
        `${edge.fromNodeId} -> ${edge.toNodeId}`,
        "condition text repeats another transition of the same branch point; unmatched replies take the last gate's default path"
      );
    }
    seen.add(text);
  }
}

function synthesizePlan(point: BranchPoint, source: ComponentInstance, ctx: CompileContext): { plan: RoutingPlan; instances: ComponentInstance[] } {
  const { palette, ids } = ctx;
  const n = point.edges.length;
  const origin = source.position;

  const classifier = palette.clone("Classifier", ids, {
    position: { x: origin.x + 300, y: origin.y },
    displayName: `Router (${source.displayName})`,
    description: `Selects one of ${n} transitions out of ${source.displayName}`
  });
  palette.configure(classifier, "instruction", classifierInstruction(point.edges.map(conditionText)));

  const falsePort = palette.portName("BinaryGate", "falseOutput");
  const truePort = palette.portName("BinaryGate", "trueOutput");
  const gates: ComponentInstance[] = [];
  for (let i = 0; i < n - 1; i++) {
    const target = point.edges[i].toNodeId;
    const gate = palette.clone("BinaryGate", ids, {
      position: { x: origin.x + 600 + i * 300, y: origin.y + i * 150 },
      displayName: `Route Check ${i + 1} (${source.displayName} -> ${target})`
    });
    palette.configure(gate, "matchText", String(i + 1));
    palette.configure(gate, "operator", GATE_OPERATOR);
    palette.configure(gate, "caseSensitive", false, true);
    palette.configure(gate, "defaultRoute", falsePort, true);
    palette.configure(gate, "maxIterations", GATE_MAX_ITERATIONS, true);
    gates.push(gate);
  }

  const last = gates[gates.length - 1];
  const legs: RoutingLeg[] = point.edges.map((edge, k) =>
    k < n - 1
      ? { edge, gateInstanceId: gates[k].id, gatePort: truePort }
      : { edge, gateInstanceId: last.id, gatePort: falsePort }
  );

  return {
    plan: {
      branchNodeId: point.nodeId,
      classifierInstanceId: classifier.id,
      gateInstanceIds: gates.map(g => g.id),
      legs
    },
    instances: [classifier, ...gates]
  };
}

/**
 * Builds a classifier and a chain of N - 1 gates for every near branch
 * point. Deep branch points, and near ones too wide for digit routing, are
 * left to fan out and reported.
 */
export function synthesizeRouting(
  points: BranchPoint[],
  components: Map<NodeId, ComponentInstance>,
  ctx: CompileContext
): RoutingResult {
  const plans = new Map<NodeId, RoutingPlan>();
  const instances: ComponentInstance[] = [];

  for (const point of points) {
    if (plans.has(point.nodeId)) continue;
    if (point.tier === "deep") {
      if (point.depth !== null) {
        ctx.diag.warn(
          "deep-branch-fanout",
          point.nodeId,
          `branch point at depth ${point.depth} fans out to ${point.edges.length} successors without gating; agents on unselected paths may also run`
        );
      }
      continue;
    }
    if (point.edges.length > MAX_ROUTED_SUCCESSORS) {
      ctx.diag.warn(
        "routing-capacity",
        point.nodeId,
        `${point.edges.length} successors exceed the ${MAX_ROUTED_SUCCESSORS} a single-digit classifier can address; left as fan-out`
      );
      continue;
    }
    const source = components.get(point.nodeId);
    if (!source) throw new IntegrityError("branch point has no component", point.nodeId);

    checkAmbiguity(point, ctx);
    const { plan, instances: created } = synthesizePlan(point, source, ctx);
    plans.set(point.nodeId, plan);
    instances.push(...created);
    ctx.diag.logger.info(`routed ${point.nodeId}: 1 classifier, ${plan.gateInstanceIds.length} gate(s) for ${point.edges.length} branches`);
  }
  return { plans, instances };
}
