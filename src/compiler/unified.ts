import { parseSourceDocument } from "../source/parse.js";
import { buildUnifiedPrompt } from "../prompt/unified.js";
import { WireBuilder } from "./wire.js";
import { finalizeAssembly } from "./assemble.js";
import { createContext, type CompileOptions } from "./compile.js";
import type { CompileWarning } from "../diagnostics.js";
import type { Assembly, TargetDocument } from "../types/target.js";

export interface UnifiedResult {
  document: TargetDocument;
  assembly: Assembly;
  prompt: string;
  warnings: CompileWarning[];
}

/**
 * Single-agent rendition: the workflow's states and transitions live in one
 * system prompt instead of gates, wired EntryPoint -> agent -> ExitPoint.
 */
export function compileUnified(raw: unknown, opts: CompileOptions): UnifiedResult {
  const ctx = createContext(opts);
  const { palette, ids, diag } = ctx;

  diag.logger.step("parse source workflow");
  const graph = parseSourceDocument(raw, diag);
  const prompt = buildUnifiedPrompt(graph);

  diag.logger.step("build unified agent");
  const entry = palette.clone("EntryPoint", ids, { position: { x: 0, y: 0 } });
  const agent = palette.clone("ConversationAgent", ids, {
    position: { x: 400, y: 0 },
    displayName: `${graph.name} (Unified)`
  });
  palette.configure(agent, "instruction", prompt);
  const exit = palette.clone("ExitPoint", ids, { position: { x: 800, y: 0 } });

  const wires = new WireBuilder(palette);
  wires.link(entry, agent, "sentinel");
  wires.link(agent, exit, "sentinel");

  const name = `${opts.name ?? graph.name} (Unified)`;
  const finalized = finalizeAssembly(
    { instances: [entry, agent, exit], connections: wires.connections, entryInstanceId: entry.id, exitInstanceId: exit.id },
    ctx,
    { id: ids.documentId(), name, description: "Unified agent handling the whole workflow through its system prompt" }
  );
  return { document: finalized.document, assembly: finalized.assembly, prompt, warnings: diag.warnings };
}
