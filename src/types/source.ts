export type NodeId = string;

export type SideEffectKind = "none" | "terminate" | "transfer";

export type ExtractionKind = "string" | "enum" | "number";

export interface ExtractionField {
  fieldName: string;
  kind: ExtractionKind;
  enumValues?: string[];
  description: string;
}

export interface Position {
  x: number;
  y: number;
}

export interface SourceNode {
  id: NodeId;
  displayName: string;
  kind: "conversation" | "tool";
  instructionText: string;
  isStart: boolean;
  firstMessage?: string;
  extractionSchema?: ExtractionField[];
  sideEffectKind: SideEffectKind;
  sideEffectLabel?: string; // raw tool type, e.g. "transferCall"
  position?: Position;
}

export interface SourceCondition {
  kind: "static" | "classified";
  description: string;
}

export interface SourceEdge {
  fromNodeId: NodeId;
  toNodeId: NodeId;
  condition?: SourceCondition;
}

export interface SourceGraph {
  name: string;
  nodes: SourceNode[];
  edges: SourceEdge[];
  entryNodeId: NodeId;
  /** Nodes excluded from compilation because nothing leads into them. */
  orphans: NodeId[];
}
