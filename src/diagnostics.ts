import type { CompileLogger } from "./log.js";

export type WarningKind =
  | "orphan-node"
  | "orphan-instance"
  | "duplicate-edge"
  | "deep-branch-fanout"
  | "routing-capacity"
  | "routing-ambiguity"
  | "side-effect-degraded";

export interface CompileWarning {
  kind: WarningKind;
  subject: string;
  message: string;
}

/** Collects non-fatal findings and echoes them to the logger as they arrive. */
export class Diagnostics {
  readonly warnings: CompileWarning[] = [];

  constructor(readonly logger: CompileLogger) {}

  warn(kind: WarningKind, subject: string, message: string): void {
    this.warnings.push({ kind, subject, message });
    this.logger.warn(`${kind}: ${message} [${subject}]`);
  }

  count(kind: WarningKind): number {
    return this.warnings.filter(w => w.kind === kind).length;
  }
}
