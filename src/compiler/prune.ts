import type { ComponentInstance } from "../types/palette.js";
import type { Assembly } from "../types/target.js";
import type { Diagnostics } from "../diagnostics.js";

export function reachableFrom(start: string, assembly: Assembly): Set<string> {
  const adj = new Map<string, string[]>();
  for (const c of assembly.connections) {
    const list = adj.get(c.sourceInstanceId) ?? [];
    list.push(c.targetInstanceId);
    adj.set(c.sourceInstanceId, list);
  }
  const seen = new Set<string>([start]);
  const queue = [start];
  for (let i = 0; i < queue.length; i++) {
    for (const next of adj.get(queue[i]) ?? []) {
      if (seen.has(next)) continue;
      seen.add(next);
      queue.push(next);
    }
  }
  return seen;
}

/**
 * Removes every instance the entry cannot reach, along with its
 * connections. An exit sentinel no terminal node feeds goes too.
 */
export function pruneOrphans(assembly: Assembly, diag: Diagnostics): { assembly: Assembly; pruned: ComponentInstance[] } {
  const keep = reachableFrom(assembly.entryInstanceId, assembly);

  const pruned = assembly.instances.filter(i => !keep.has(i.id));
  for (const p of pruned) {
    const origin = p.sourceNodeId ? ` (from ${p.sourceNodeId})` : "";
    diag.warn("orphan-instance", p.id, `${p.componentType} '${p.displayName}'${origin} is unreachable from the entry; pruned`);
  }
  return {
    assembly: {
      ...assembly,
      instances: assembly.instances.filter(i => keep.has(i.id)),
      connections: assembly.connections.filter(c => keep.has(c.sourceInstanceId) && keep.has(c.targetInstanceId)),
      exitInstanceId: assembly.exitInstanceId !== undefined && keep.has(assembly.exitInstanceId) ? assembly.exitInstanceId : undefined
    },
    pruned
  };
}
