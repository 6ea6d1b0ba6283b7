import type { FieldSpec, JsonValue } from "../palette/schema.js";
import type { Position } from "./source.js";

export type { FieldSpec, JsonValue };

export type ComponentType = "EntryPoint" | "ConversationAgent" | "Classifier" | "BinaryGate" | "ExitPoint";

/** Component types that have a blueprint document of their own. */
export type BlueprintType = Exclude<ComponentType, "Classifier">;

export type FieldRole =
  | "instruction"
  | "matchText"
  | "operator"
  | "caseSensitive"
  | "defaultRoute"
  | "maxIterations"
  | "implementation";

export type PortRole = "primaryInput" | "primaryOutput" | "trueOutput" | "falseOutput";

export interface InputPort {
  name: string;
  dataKinds: string[];
  fieldType: string;
}

export interface OutputPort {
  name: string;
  dataKind: string;
}

export interface ComponentBlueprint {
  componentType: BlueprintType;
  runtimeType: string;
  displayName: string;
  description: string;
  fields: Record<string, FieldSpec>;
  requiredFields: Record<string, JsonValue>;
  inputPorts: InputPort[];
  outputPorts: OutputPort[];
  fieldRoles: Partial<Record<FieldRole, string>>;
  portRoles: Partial<Record<PortRole, string>>;
  baseClasses: string[];
}

export interface ComponentInstance {
  id: string;
  componentType: ComponentType;
  blueprintType: BlueprintType;
  runtimeType: string;
  displayName: string;
  description: string;
  position: Position;
  fields: Record<string, FieldSpec>;
  sourceNodeId?: string;
}
