import type {
  BlueprintType,
  ComponentBlueprint,
  ComponentInstance,
  ComponentType,
  FieldRole,
  FieldSpec,
  InputPort,
  JsonValue,
  OutputPort,
  PortRole
} from "../types/palette.js";
import type { Position } from "../types/source.js";
import { PaletteLookupError } from "../errors.js";
import { blueprintDocumentSchema, describeIssues, type BlueprintDocument } from "./schema.js";
import type { IdGenerator } from "./ids.js";

export const BLUEPRINT_TYPES: readonly BlueprintType[] = ["EntryPoint", "ConversationAgent", "BinaryGate", "ExitPoint"];

const PLACEHOLDER = /^(YOUR_[A-Z0-9_]+_HERE|__UNDEFINED__|TODO|PLACEHOLDER)$/;

/** A Classifier is a ConversationAgent clone with a routing instruction. */
export function blueprintTypeOf(type: ComponentType): BlueprintType {
  return type === "Classifier" ? "ConversationAgent" : type;
}

export function isBlankValue(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim() === "" || PLACEHOLDER.test(value.trim());
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return false;
}

export interface CloneOptions {
  position: Position;
  displayName?: string;
  description?: string;
  sourceNodeId?: string;
}

function toBlueprint(doc: BlueprintDocument, origin: string): ComponentBlueprint {
  const subject = `${doc.componentType}@${origin}`;
  const inputNames = new Set(doc.inputs.map(p => p.name));
  const outputNames = new Set(doc.outputs.map(p => p.name));

  for (const [role, field] of Object.entries(doc.fieldRoles)) {
    if (field !== undefined && !doc.template[field]) {
      throw new PaletteLookupError(`field role '${role}' names missing field '${field}'`, subject);
    }
  }
  for (const [role, port] of Object.entries(doc.portRoles)) {
    if (port === undefined) continue;
    const known = role === "primaryInput" ? inputNames.has(port) : outputNames.has(port);
    if (!known) throw new PaletteLookupError(`port role '${role}' names undeclared port '${port}'`, subject);
  }

  // Fields fed by a wire are filled at run time; everything else marked
  // required must already carry a usable value in the blueprint.
  const requiredFields: Record<string, JsonValue> = {};
  for (const [name, spec] of Object.entries(doc.template)) {
    if (!spec.required || inputNames.has(name)) continue;
    if (isBlankValue(spec.value)) {
      throw new PaletteLookupError(`required field '${name}' is blank or a placeholder`, subject);
    }
    requiredFields[name] = spec.value ?? null;
  }

  return {
    componentType: doc.componentType,
    runtimeType: doc.runtimeType,
    displayName: doc.displayName,
    description: doc.description,
    fields: doc.template,
    requiredFields,
    inputPorts: doc.inputs,
    outputPorts: doc.outputs,
    fieldRoles: doc.fieldRoles,
    portRoles: doc.portRoles,
    baseClasses: doc.baseClasses
  };
}

export class PaletteRegistry {
  private readonly blueprints = new Map<BlueprintType, ComponentBlueprint>();

  constructor(blueprints: ComponentBlueprint[]) {
    for (const bp of blueprints) {
      if (this.blueprints.has(bp.componentType)) {
        throw new PaletteLookupError("duplicate blueprint document", bp.componentType);
      }
      this.blueprints.set(bp.componentType, Object.freeze(bp));
    }
    for (const type of BLUEPRINT_TYPES) {
      if (!this.blueprints.has(type)) throw new PaletteLookupError("palette has no blueprint", type);
    }
  }

  /** Validates raw blueprint documents; `origins` label them in error messages. */
  static fromDocuments(docs: unknown[], origins: string[] = []): PaletteRegistry {
    const blueprints = docs.map((raw, i) => {
      const origin = origins[i] ?? `document ${i}`;
      const parsed = blueprintDocumentSchema.safeParse(raw);
      if (!parsed.success) {
        throw new PaletteLookupError(`invalid blueprint document: ${describeIssues(parsed.error)}`, origin);
      }
      return toBlueprint(parsed.data, origin);
    });
    return new PaletteRegistry(blueprints);
  }

  types(): BlueprintType[] {
    return Array.from(this.blueprints.keys());
  }

  getBlueprint(type: ComponentType): ComponentBlueprint {
    const bp = this.blueprints.get(blueprintTypeOf(type));
    if (!bp) throw new PaletteLookupError("component type not in palette", type);
    return bp;
  }

  /**
   * Deep copy of the blueprint's configuration. Required fields travel
   * verbatim; callers change only role-mapped fields through `configure`.
   */
  clone(type: ComponentType, ids: IdGenerator, opts: CloneOptions): ComponentInstance {
    const bp = this.getBlueprint(type);
    return {
      id: ids.componentId(bp.runtimeType),
      componentType: type,
      blueprintType: bp.componentType,
      runtimeType: bp.runtimeType,
      displayName: opts.displayName ?? bp.displayName,
      description: opts.description ?? bp.description,
      position: { ...opts.position },
      fields: structuredClone(bp.fields),
      sourceNodeId: opts.sourceNodeId
    };
  }

  fieldName(type: ComponentType, role: FieldRole): string {
    const name = this.getBlueprint(type).fieldRoles[role];
    if (!name) throw new PaletteLookupError(`no field mapped to role '${role}'`, type);
    return name;
  }

  /** Overrides a role-mapped field. Optional roles the blueprint lacks are skipped. */
  configure(instance: ComponentInstance, role: FieldRole, value: JsonValue, optional = false): void {
    const bp = this.getBlueprint(instance.componentType);
    const name = bp.fieldRoles[role];
    if (!name) {
      if (optional) return;
      throw new PaletteLookupError(`no field mapped to role '${role}'`, instance.componentType);
    }
    const spec: FieldSpec | undefined = instance.fields[name];
    if (!spec) throw new PaletteLookupError(`instance lacks field '${name}'`, instance.id);
    spec.value = value;
  }

  inputPort(type: ComponentType, name: string): InputPort {
    const port = this.getBlueprint(type).inputPorts.find(p => p.name === name);
    if (!port) throw new PaletteLookupError(`unknown input port '${name}'`, type);
    return port;
  }

  outputPort(type: ComponentType, name: string): OutputPort {
    const port = this.getBlueprint(type).outputPorts.find(p => p.name === name);
    if (!port) throw new PaletteLookupError(`unknown output port '${name}'`, type);
    return port;
  }

  /** Port name for a role; primary ports fall back to the first declared port. */
  portName(type: ComponentType, role: PortRole): string {
    const bp = this.getBlueprint(type);
    const named = bp.portRoles[role];
    if (named) return named;
    if (role === "primaryInput" && bp.inputPorts.length > 0) return bp.inputPorts[0].name;
    if (role === "primaryOutput" && bp.outputPorts.length > 0) return bp.outputPorts[0].name;
    throw new PaletteLookupError(`no port mapped to role '${role}'`, type);
  }
}
