import type { ComponentInstance, InputPort, OutputPort } from "./palette.js";
import type { NodeId, Position, SourceCondition, SourceEdge } from "./source.js";
import type { FieldSpec } from "../palette/schema.js";

export type ConnectionCategory = "successor" | "routing" | "sentinel";

export interface Connection {
  sourceInstanceId: string;
  sourceOutputPort: OutputPort;
  targetInstanceId: string;
  targetInputPort: InputPort;
  category: ConnectionCategory;
  condition?: SourceCondition;
}

export interface RoutingLeg {
  edge: SourceEdge;
  gateInstanceId: string;
  gatePort: string;
}

export interface RoutingPlan {
  branchNodeId: NodeId;
  classifierInstanceId: string;
  gateInstanceIds: string[];
  legs: RoutingLeg[];
}

export interface Assembly {
  instances: ComponentInstance[];
  connections: Connection[];
  entryInstanceId: string;
  /** Absent once pruned: no terminal node reaches the exit. */
  exitInstanceId?: string;
}

// Serialized form understood by the pipeline runtime's importer.

export interface SourceHandle {
  dataType: string;
  id: string;
  name: string;
  output_types: string[];
}

export interface TargetHandle {
  fieldName: string;
  id: string;
  inputTypes: string[];
  type: string;
}

export interface EmittedEdge {
  id: string;
  source: string;
  target: string;
  sourceHandle: string;
  targetHandle: string;
  data: {
    sourceHandle: SourceHandle;
    targetHandle: TargetHandle;
    sourceCondition?: { kind: string; description: string };
  };
  selected: boolean;
  animated: boolean;
  className: string;
}

export interface EmittedOutput {
  name: string;
  types: string[];
  selected: string;
  cache: boolean;
}

export interface EmittedNode {
  id: string;
  type: "genericNode";
  position: Position;
  data: {
    id: string;
    type: string;
    componentType: string;
    node: {
      display_name: string;
      description: string;
      template: Record<string, FieldSpec>;
      outputs: EmittedOutput[];
      base_classes: string[];
    };
  };
}

export interface TargetDocument {
  id: string;
  name: string;
  description: string;
  data: {
    nodes: EmittedNode[];
    edges: EmittedEdge[];
    viewport: { x: number; y: number; zoom: number };
  };
  is_component: boolean;
}
