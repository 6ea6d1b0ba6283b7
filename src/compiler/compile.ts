import type { ComponentInstance } from "../types/palette.js";
import type { NodeId, SourceGraph } from "../types/source.js";
import type { Assembly, RoutingPlan, TargetDocument } from "../types/target.js";
import type { PaletteRegistry } from "../palette/registry.js";
import { createIdGenerator } from "../palette/ids.js";
import { Diagnostics, type CompileWarning } from "../diagnostics.js";
import { consoleLogger, type CompileLogger } from "../log.js";
import { parseSourceDocument } from "../source/parse.js";
import { exitNodes } from "../source/graph.js";
import { DEFAULT_MAX_ROUTING_DEPTH, findBranchPoints, type BranchPoint } from "./analyze.js";
import { synthesizeRouting } from "./routing.js";
import { WireBuilder, requireInstance, wireRoutingPlan } from "./wire.js";
import { materializeNodes } from "./nodes.js";
import { finalizeAssembly } from "./assemble.js";
import type { CompileContext } from "./context.js";

export interface CompileOptions {
  palette: PaletteRegistry;
  maxRoutingDepth?: number;
  /** Fixes generated ids so repeated compilations are identical. */
  idSeed?: string;
  logger?: CompileLogger;
  /** Overrides the workflow name in the output document. */
  name?: string;
}

export interface CompileStats {
  sourceNodes: number;
  orphanNodes: number;
  branchPoints: number;
  routedBranchPoints: number;
  instances: number;
  connections: number;
  prunedInstances: number;
}

export interface CompileResult {
  document: TargetDocument;
  assembly: Assembly;
  graph: SourceGraph;
  branchPoints: BranchPoint[];
  plans: Map<NodeId, RoutingPlan>;
  warnings: CompileWarning[];
  stats: CompileStats;
}

export function createContext(opts: CompileOptions): CompileContext {
  return {
    palette: opts.palette,
    ids: createIdGenerator(opts.idSeed),
    diag: new Diagnostics(opts.logger ?? consoleLogger())
  };
}

/**
 * Source workflow -> pipeline document. Branch points near the entry get a
 * classifier and gate chain so only one successor fires; everything else is
 * wired 1:1 from the source edges.
 */
export function compileWorkflow(raw: unknown, opts: CompileOptions): CompileResult {
  const ctx = createContext(opts);
  const { palette, ids, diag } = ctx;
  const log = diag.logger;

  log.step("parse source workflow");
  const graph = parseSourceDocument(raw, diag);
  log.info(`${graph.name}: ${graph.nodes.length} nodes, ${graph.edges.length} edges, entry '${graph.entryNodeId}'`);

  log.step("clone components");
  const entry = palette.clone("EntryPoint", ids, { position: { x: -800, y: 0 } });
  const components = materializeNodes(graph, ctx);
  const maxX = Math.max(0, ...Array.from(components.values(), c => c.position.x));
  const exit = palette.clone("ExitPoint", ids, { position: { x: maxX + 400, y: 0 } });

  log.step("analyze branch points");
  const branchPoints = findBranchPoints(graph, opts.maxRoutingDepth ?? DEFAULT_MAX_ROUTING_DEPTH);
  const near = branchPoints.filter(b => b.tier === "near").length;
  log.info(`${branchPoints.length} branch point(s), ${near} near`);

  log.step("synthesize routing");
  const { plans, instances: routingInstances } = synthesizeRouting(branchPoints, components, ctx);
  const routing = new Map(routingInstances.map(i => [i.id, i]));

  log.step("wire connections");
  const wires = new WireBuilder(palette);
  for (const edge of graph.edges) {
    if (plans.has(edge.fromNodeId)) continue;
    const from = requireInstance(components, edge.fromNodeId, "source node");
    const to = requireInstance(components, edge.toNodeId, "source node");
    wires.link(from, to, "successor", edge.condition);
  }
  for (const plan of plans.values()) {
    wireRoutingPlan(plan, components, routing, wires, palette);
  }
  wires.link(entry, requireInstance(components, graph.entryNodeId, "entry node"), "sentinel");
  // Tool placeholders are terminals too; their message output feeds the exit.
  for (const id of exitNodes(graph.nodes, graph.edges)) {
    wires.link(requireInstance(components, id, "terminal node"), exit, "sentinel");
  }

  log.step("prune and emit");
  const instances: ComponentInstance[] = [entry, ...components.values(), ...routingInstances, exit];
  const name = opts.name ?? graph.name;
  const finalized = finalizeAssembly(
    { instances, connections: wires.connections, entryInstanceId: entry.id, exitInstanceId: exit.id },
    ctx,
    { id: ids.documentId(), name, description: `Converted from conversational workflow: ${name}` }
  );

  return {
    document: finalized.document,
    assembly: finalized.assembly,
    graph,
    branchPoints,
    plans,
    warnings: diag.warnings,
    stats: {
      sourceNodes: graph.nodes.length + graph.orphans.length,
      orphanNodes: graph.orphans.length,
      branchPoints: branchPoints.length,
      routedBranchPoints: plans.size,
      instances: finalized.assembly.instances.length,
      connections: finalized.assembly.connections.length,
      prunedInstances: finalized.pruned.length
    }
  };
}
