import type { ComponentInstance } from "../types/palette.js";
import type { NodeId, SourceCondition } from "../types/source.js";
import type { Connection, ConnectionCategory, RoutingPlan } from "../types/target.js";
import type { PaletteRegistry } from "../palette/registry.js";
import { IntegrityError, PortContractError } from "../errors.js";

/**
 * Creates typed connections from the ports the palette declares. An unknown
 * port name or an incompatible data kind is a compile error, never a
 * dropped edge.
 */
export class WireBuilder {
  readonly connections: Connection[] = [];

  constructor(private readonly palette: PaletteRegistry) {}

  connect(
    source: ComponentInstance,
    sourcePort: string,
    target: ComponentInstance,
    targetPort: string,
    category: ConnectionCategory,
    condition?: SourceCondition
  ): Connection {
    const out = this.palette.outputPort(source.componentType, sourcePort);
    const inp = this.palette.inputPort(target.componentType, targetPort);
    if (!inp.dataKinds.includes(out.dataKind)) {
      throw new PortContractError(
        `port kind ${out.dataKind} is not accepted by ${inp.dataKinds.join("|")}`,
        `${source.id}.${sourcePort} -> ${target.id}.${targetPort}`
      );
    }
    const conn: Connection = {
      sourceInstanceId: source.id,
      sourceOutputPort: out,
      targetInstanceId: target.id,
      targetInputPort: inp,
      category
    };
    if (condition) conn.condition = condition;
    this.connections.push(conn);
    return conn;
  }

  /** Primary output of `source` to primary input of `target`. */
  link(source: ComponentInstance, target: ComponentInstance, category: ConnectionCategory, condition?: SourceCondition): Connection {
    return this.connect(
      source,
      this.palette.portName(source.componentType, "primaryOutput"),
      target,
      this.palette.portName(target.componentType, "primaryInput"),
      category,
      condition
    );
  }
}

export function requireInstance<K>(map: Map<K, ComponentInstance>, key: K, what: string): ComponentInstance {
  const found = map.get(key);
  if (!found) throw new IntegrityError(`${what} not materialized`, String(key));
  return found;
}

/**
 * branch -> classifier -> gate 1 -(false)-> gate 2 ... with each leg's gate
 * port wired to its successor.
 */
export function wireRoutingPlan(
  plan: RoutingPlan,
  components: Map<NodeId, ComponentInstance>,
  routing: Map<string, ComponentInstance>,
  wires: WireBuilder,
  palette: PaletteRegistry
): void {
  const branch = requireInstance(components, plan.branchNodeId, "branch point");
  const classifier = requireInstance(routing, plan.classifierInstanceId, "classifier");
  const gates = plan.gateInstanceIds.map(id => requireInstance(routing, id, "gate"));
  const gateInput = palette.portName("BinaryGate", "primaryInput");
  const falsePort = palette.portName("BinaryGate", "falseOutput");

  wires.link(branch, classifier, "routing");
  wires.link(classifier, gates[0], "routing");
  for (let i = 0; i < gates.length - 1; i++) {
    wires.connect(gates[i], falsePort, gates[i + 1], gateInput, "routing");
  }
  for (const leg of plan.legs) {
    const gate = requireInstance(routing, leg.gateInstanceId, "gate");
    const successor = requireInstance(components, leg.edge.toNodeId, "successor");
    wires.connect(gate, leg.gatePort, successor, palette.portName(successor.componentType, "primaryInput"), "routing");
  }
}
