import type { ComponentInstance } from "../types/palette.js";
import type { Assembly, TargetDocument } from "../types/target.js";
import type { CompileContext } from "./context.js";
import { IntegrityError } from "../errors.js";
import { pruneOrphans } from "./prune.js";
import { emitDocument, type DocumentMeta } from "./emit.js";

/** Duplicate instance ids or connections naming a missing instance are fatal. */
export function assertIntegrity(assembly: Assembly): void {
  const ids = new Set<string>();
  for (const inst of assembly.instances) {
    if (ids.has(inst.id)) throw new IntegrityError("duplicate instance id", inst.id);
    ids.add(inst.id);
  }
  if (!ids.has(assembly.entryInstanceId)) throw new IntegrityError("sentinel instance missing", assembly.entryInstanceId);
  if (assembly.exitInstanceId !== undefined && !ids.has(assembly.exitInstanceId)) {
    throw new IntegrityError("sentinel instance missing", assembly.exitInstanceId);
  }
  for (const c of assembly.connections) {
    for (const end of [c.sourceInstanceId, c.targetInstanceId]) {
      if (!ids.has(end)) {
        throw new IntegrityError(
          "connection references a missing instance",
          `${c.sourceInstanceId}.${c.sourceOutputPort.name} -> ${c.targetInstanceId}.${c.targetInputPort.name}`
        );
      }
    }
  }
}

export interface FinalizedAssembly {
  assembly: Assembly;
  document: TargetDocument;
  pruned: ComponentInstance[];
}

/** prune -> integrity check -> emit */
export function finalizeAssembly(assembly: Assembly, ctx: CompileContext, meta: DocumentMeta): FinalizedAssembly {
  const { assembly: kept, pruned } = pruneOrphans(assembly, ctx.diag);
  assertIntegrity(kept);
  return { assembly: kept, document: emitDocument(kept, ctx.palette, meta), pruned };
}
