export type CompileErrorKind = "structural" | "palette" | "integrity";

/**
 * Fatal compilation failure. `subject` names the node, edge, component type
 * or port that caused it so the CLI can print something actionable.
 */
export class CompileError extends Error {
  constructor(
    readonly kind: CompileErrorKind,
    message: string,
    readonly subject?: string
  ) {
    super(subject ? `${message} [${subject}]` : message);
    this.name = new.target.name;
  }
}

/** Malformed source document, unknown edge endpoint, missing or ambiguous entry node. */
export class StructuralError extends CompileError {
  constructor(message: string, subject?: string) {
    super("structural", message, subject);
  }
}

/** Component type, port or required field absent from the palette. */
export class PaletteLookupError extends CompileError {
  constructor(message: string, subject?: string) {
    super("palette", message, subject);
  }
}

/** Two ports exist but their declared data kinds cannot be wired together. */
export class PortContractError extends PaletteLookupError {}

/** Assembled graph has duplicate instance ids or dangling connections. */
export class IntegrityError extends CompileError {
  constructor(message: string, subject?: string) {
    super("integrity", message, subject);
  }
}

export function isCompileError(err: unknown): err is CompileError {
  return err instanceof CompileError;
}
