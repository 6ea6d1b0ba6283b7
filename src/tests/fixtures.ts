import { readFileSync } from 'node:fs';
import { blueprintDocumentSchema, type BlueprintDocument } from '../palette/schema.js';
import { defaultPalette } from '../palette/load.js';
import { compileWorkflow, type CompileOptions } from '../compiler/compile.js';
import { Diagnostics } from '../diagnostics.js';
import type { CompileLogger } from '../log.js';
import { silentLogger } from '../log.js';
import type { Connection } from '../types/target.js';
import type { ComponentInstance } from '../types/palette.js';

export interface RawNode {
  name: string;
  type?: string;
  prompt?: string;
  isStart?: boolean;
  messagePlan?: { firstMessage?: string };
  variableExtractionPlan?: { output: Array<{ title: string; type?: string; enum?: string[]; description?: string }> };
  tool?: { type: string };
  metadata?: { position: { x: number; y: number } };
}

export interface RawEdge {
  from: string;
  to: string;
  condition?: { type: string; prompt: string };
}

export function node(name: string, extra: Partial<RawNode> = {}): RawNode {
  return { name, type: 'conversation', prompt: `You are ${name}.`, ...extra };
}

export function edge(from: string, to: string, prompt?: string): RawEdge {
  return prompt ? { from, to, condition: { type: 'ai', prompt } } : { from, to };
}

export function workflow(nodes: RawNode[], edges: RawEdge[]) {
  return { workflow: { name: 'Test Flow', nodes, edges } };
}

export function loadBlueprintDoc(file: string): BlueprintDocument {
  const raw: unknown = JSON.parse(readFileSync(new URL(`../palette/blueprints/${file}`, import.meta.url), 'utf-8'));
  return blueprintDocumentSchema.parse(raw);
}

export const BLUEPRINT_FILES = ['entry-point.json', 'conversation-agent.json', 'binary-gate.json', 'exit-point.json'];

export function readExample(): unknown {
  const raw: unknown = JSON.parse(readFileSync(new URL('../examples/appointment/workflow.json', import.meta.url), 'utf-8'));
  return raw;
}

export function quietDiagnostics(): Diagnostics {
  return new Diagnostics(silentLogger);
}

export function recordingLogger(): CompileLogger & { warnings: string[] } {
  const warnings: string[] = [];
  return { warnings, step() {}, info() {}, warn(message) { warnings.push(message); } };
}

export function compile(doc: unknown, opts: Partial<CompileOptions> = {}) {
  return compileWorkflow(doc, { palette: defaultPalette(), logger: silentLogger, idSeed: 'test-seed', ...opts });
}

/** Display names of the components wired to `from`'s `port`. */
export function targetsOf(from: ComponentInstance, port: string, connections: Connection[], instances: ComponentInstance[]): string[] {
  const names = new Map(instances.map(i => [i.id, i.displayName]));
  return connections
    .filter(c => c.sourceInstanceId === from.id && c.sourceOutputPort.name === port)
    .map(c => names.get(c.targetInstanceId) ?? c.targetInstanceId);
}

export function byName(instances: ComponentInstance[], displayName: string): ComponentInstance {
  const found = instances.find(i => i.displayName === displayName);
  if (!found) throw new Error(`no instance named ${displayName}`);
  return found;
}

/** Small deterministic PRNG for generated graphs. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
