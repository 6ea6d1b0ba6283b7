import type { ComponentInstance } from "../types/palette.js";
import type {
  Assembly,
  Connection,
  EmittedEdge,
  EmittedNode,
  SourceHandle,
  TargetDocument,
  TargetHandle
} from "../types/target.js";
import type { PaletteRegistry } from "../palette/registry.js";
import { IntegrityError } from "../errors.js";

export interface DocumentMeta {
  id: string;
  name: string;
  description: string;
}

function emitNode(inst: ComponentInstance, palette: PaletteRegistry): EmittedNode {
  const bp = palette.getBlueprint(inst.componentType);
  return {
    id: inst.id,
    type: "genericNode",
    position: { ...inst.position },
    data: {
      id: inst.id,
      type: inst.runtimeType,
      componentType: inst.componentType,
      node: {
        display_name: inst.displayName,
        description: inst.description,
        template: structuredClone(inst.fields),
        outputs: bp.outputPorts.map(p => ({ name: p.name, types: [p.dataKind], selected: p.dataKind, cache: true })),
        base_classes: [...bp.baseClasses]
      }
    }
  };
}

/**
 * The importer keeps handles as JSON strings on the edge and as objects under
 * `data`; the edge id embeds both strings.
 */
export function emitEdge(conn: Connection, byId: Map<string, ComponentInstance>): EmittedEdge {
  const source = byId.get(conn.sourceInstanceId);
  const target = byId.get(conn.targetInstanceId);
  if (!source || !target) {
    throw new IntegrityError("connection references a missing instance", `${conn.sourceInstanceId} -> ${conn.targetInstanceId}`);
  }
  const sourceHandle: SourceHandle = {
    dataType: source.runtimeType,
    id: source.id,
    name: conn.sourceOutputPort.name,
    output_types: [conn.sourceOutputPort.dataKind]
  };
  const targetHandle: TargetHandle = {
    fieldName: conn.targetInputPort.name,
    id: target.id,
    inputTypes: [...conn.targetInputPort.dataKinds],
    type: conn.targetInputPort.fieldType
  };
  const sourceHandleStr = JSON.stringify(sourceHandle);
  const targetHandleStr = JSON.stringify(targetHandle);
  const edge: EmittedEdge = {
    id: `xy-edge__${source.id}${sourceHandleStr}-${target.id}${targetHandleStr}`,
    source: source.id,
    target: target.id,
    sourceHandle: sourceHandleStr,
    targetHandle: targetHandleStr,
    data: { sourceHandle, targetHandle },
    selected: false,
    animated: false,
    className: ""
  };
  if (conn.condition) {
    edge.data.sourceCondition = { kind: conn.condition.kind, description: conn.condition.description };
  }
  return edge;
}

export function emitDocument(assembly: Assembly, palette: PaletteRegistry, meta: DocumentMeta): TargetDocument {
  const byId = new Map(assembly.instances.map(i => [i.id, i]));
  return {
    id: meta.id,
    name: meta.name,
    description: meta.description,
    data: {
      nodes: assembly.instances.map(i => emitNode(i, palette)),
      edges: assembly.connections.map(c => emitEdge(c, byId)),
      viewport: { x: 0, y: 0, zoom: 1 }
    },
    is_component: false
  };
}
