import type { PaletteRegistry } from "../palette/registry.js";
import type { IdGenerator } from "../palette/ids.js";
import type { Diagnostics } from "../diagnostics.js";

export interface CompileContext {
  palette: PaletteRegistry;
  ids: IdGenerator;
  diag: Diagnostics;
}
