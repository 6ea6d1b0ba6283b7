import { readdirSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";
import { PaletteLookupError } from "../errors.js";
import { PaletteRegistry } from "./registry.js";
import entryPoint from "./blueprints/entry-point.json" with { type: "json" };
import conversationAgent from "./blueprints/conversation-agent.json" with { type: "json" };
import binaryGate from "./blueprints/binary-gate.json" with { type: "json" };
import exitPoint from "./blueprints/exit-point.json" with { type: "json" };

/** The blueprints bundled with the compiler. */
export function defaultPalette(): PaletteRegistry {
  return PaletteRegistry.fromDocuments(
    [entryPoint, conversationAgent, binaryGate, exitPoint],
    ["entry-point.json", "conversation-agent.json", "binary-gate.json", "exit-point.json"]
  );
}

/** Loads every `*.json` blueprint document in `dir`. */
export function loadPaletteDir(dir: string): PaletteRegistry {
  let files: string[];
  try {
    files = readdirSync(dir).filter(f => f.endsWith(".json")).sort();
  } catch (e: unknown) {
    throw new PaletteLookupError(`cannot read palette directory: ${e instanceof Error ? e.message : String(e)}`, dir);
  }
  const docs = files.map(f => {
    const path = join(dir, f);
    try {
      const doc: unknown = JSON.parse(readFileSync(path, "utf-8"));
      return doc;
    } catch (e: unknown) {
      throw new PaletteLookupError(`cannot parse blueprint: ${e instanceof Error ? e.message : String(e)}`, basename(path));
    }
  });
  return PaletteRegistry.fromDocuments(docs, files);
}
