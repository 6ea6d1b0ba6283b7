import { createHash, randomUUID } from "node:crypto";

export interface IdGenerator {
  /** `<runtimeType>-<5 hex>`, unique within this generator. */
  componentId(runtimeType: string): string;
  /** UUID-shaped document id. */
  documentId(): string;
}

/**
 * With a seed the sequence is a pure function of the seed and the call order,
 * so compiling the same input twice yields the same ids.
 */
export function createIdGenerator(seed?: string): IdGenerator {
  const issued = new Set<string>();
  let counter = 0;
  const draw = (): string => {
    if (seed === undefined) return randomUUID().replace(/-/g, "");
    return createHash("sha256").update(`${seed}:${counter++}`).digest("hex");
  };
  return {
    componentId(runtimeType) {
      for (;;) {
        const id = `${runtimeType}-${draw().slice(0, 5)}`;
        if (!issued.has(id)) {
          issued.add(id);
          return id;
        }
      }
    },
    documentId() {
      const h = draw();
      return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20, 32)}`;
    }
  };
}
