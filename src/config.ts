import { z } from "zod";
import { describeIssues } from "./palette/schema.js";
import { DEFAULT_MAX_ROUTING_DEPTH } from "./compiler/analyze.js";

const optionalText = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  MAX_ROUTING_DEPTH: z.preprocess(
    v => (v === "" ? undefined : v),
    z.coerce.number().int().min(0).default(DEFAULT_MAX_ROUTING_DEPTH)
  ),
  PALETTE_DIR: optionalText,
  ID_SEED: optionalText,
  QUIET: z.string().optional().transform(v => v === "1"),
  LOG_STEPS: z.string().optional().transform(v => v !== "0")
});

export interface AppConfig {
  maxRoutingDepth: number;
  paletteDir?: string;
  idSeed?: string;
  quiet: boolean;
  logSteps: boolean;
}

/** Reads compiler settings from the environment (.env is loaded by the entry script). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new Error(`invalid configuration: ${describeIssues(parsed.error)}`);
  const c = parsed.data;
  return {
    maxRoutingDepth: c.MAX_ROUTING_DEPTH,
    paletteDir: c.PALETTE_DIR,
    idSeed: c.ID_SEED,
    quiet: c.QUIET,
    logSteps: c.LOG_STEPS
  };
}
