import { describe, it, expect } from 'vitest';
import { classifierInstruction, synthesizeRouting, GATE_OPERATOR } from '../compiler/routing.js';
import { findBranchPoints } from '../compiler/analyze.js';
import { materializeNodes } from '../compiler/nodes.js';
import { createContext } from '../compiler/compile.js';
import { parseSourceDocument } from '../source/parse.js';
import { defaultPalette } from '../palette/load.js';
import { silentLogger } from '../log.js';
import { byName, compile, edge, node, targetsOf, workflow } from './fixtures.js';

function fanOut(successors: number, withConditions = true) {
  const names = Array.from({ length: successors }, (_, i) => `s${i + 1}`);
  return workflow(
    [node('start', { isStart: true }), ...names.map(n => node(n))],
    names.map((n, i) => edge('start', n, withConditions ? `intent ${i + 1}` : undefined))
  );
}

describe('routing synthesis', () => {
  it('routes a three-way branch through one classifier and two gates', () => {
    const doc = workflow(
      [node('start', { isStart: true }), node('s1'), node('s2'), node('s3')],
      [
        edge('start', 's1', 'wants new appointment'),
        edge('start', 's2', 'wants reschedule'),
        edge('start', 's3', 'wants info')
      ]
    );
    const { assembly, plans } = compile(doc);
    const { instances, connections } = assembly;

    expect(instances.filter(i => i.componentType === 'Classifier')).toHaveLength(1);
    const gates = instances.filter(i => i.componentType === 'BinaryGate');
    expect(gates).toHaveLength(2);
    const plan = plans.get('start');
    expect(plan?.gateInstanceIds).toEqual(gates.map(g => g.id));

    const start = byName(instances, 'start');
    const router = byName(instances, 'Router (start)');
    const [gate1, gate2] = gates;
    expect(targetsOf(start, 'text_output', connections, instances)).toEqual(['Router (start)']);
    expect(targetsOf(router, 'text_output', connections, instances)).toEqual([gate1.displayName]);
    expect(targetsOf(gate1, 'true_result', connections, instances)).toEqual(['s1']);
    expect(targetsOf(gate1, 'false_result', connections, instances)).toEqual([gate2.displayName]);
    expect(targetsOf(gate2, 'true_result', connections, instances)).toEqual(['s2']);
    expect(targetsOf(gate2, 'false_result', connections, instances)).toEqual(['s3']);
    expect(connections.filter(c => c.category === 'successor')).toEqual([]);
    expect(connections).toHaveLength(10);
    expect(instances).toHaveLength(9);
  });

  it('configures gates for digit matching', () => {
    const { assembly } = compile(fanOut(3));
    const gates = assembly.instances.filter(i => i.componentType === 'BinaryGate');
    expect(gates.map(g => g.displayName)).toEqual(['Route Check 1 (start -> s1)', 'Route Check 2 (start -> s2)']);
    expect(gates.map(g => g.fields.match_text.value)).toEqual(['1', '2']);
    for (const g of gates) {
      expect(g.fields.operator.value).toBe(GATE_OPERATOR);
      expect(g.fields.case_sensitive.value).toBe(false);
      expect(g.fields.default_route.value).toBe('false_result');
      expect(g.fields.max_iterations.value).toBe(10);
    }
  });

  it('builds the classifier from the agent blueprint', () => {
    const { assembly } = compile(fanOut(3));
    const router = byName(assembly.instances, 'Router (start)');
    expect(router.runtimeType).toBe('OpenAIModel');
    expect(router.blueprintType).toBe('ConversationAgent');
    expect(router.description).toBe('Selects one of 3 transitions out of start');
    expect(router.fields.system_message.value).toBe(classifierInstruction(['intent 1', 'intent 2', 'intent 3']));
    expect(router.fields.model_name.value).toBe('gpt-4o-mini');
  });

  it('lists conditions and the digit range in the classifier instruction', () => {
    const lines = classifierInstruction(['yes', 'no']).split('\n');
    expect(lines).toContain('1. yes');
    expect(lines).toContain('2. no');
    expect(lines).toContain('- Answer with ONLY a single digit from 1 to 2 identifying the best-matching condition.');
  });

  it('uses a single gate for two successors', () => {
    const { assembly } = compile(fanOut(2));
    const { instances, connections } = assembly;
    const gates = instances.filter(i => i.componentType === 'BinaryGate');
    expect(gates).toHaveLength(1);
    expect(targetsOf(gates[0], 'true_result', connections, instances)).toEqual(['s1']);
    expect(targetsOf(gates[0], 'false_result', connections, instances)).toEqual(['s2']);
  });

  it('every successor of a routed branch is reached by exactly one gate port', () => {
    for (let n = 2; n <= 9; n++) {
      const { assembly, plans } = compile(fanOut(n));
      const plan = plans.get('start');
      expect(plan?.gateInstanceIds).toHaveLength(n - 1);
      const gateIds = new Set(plan?.gateInstanceIds);
      for (let k = 1; k <= n; k++) {
        const target = byName(assembly.instances, `s${k}`);
        const inbound = assembly.connections.filter(c => c.targetInstanceId === target.id);
        expect(inbound).toHaveLength(1);
        expect(gateIds.has(inbound[0].sourceInstanceId)).toBe(true);
      }
    }
  });

  it('falls back to fan-out past nine successors', () => {
    const { assembly, plans, warnings } = compile(fanOut(10));
    expect(plans.size).toBe(0);
    expect(warnings.map(w => [w.kind, w.subject])).toEqual([['routing-capacity', 'start']]);
    const start = byName(assembly.instances, 'start');
    expect(assembly.connections.filter(c => c.sourceInstanceId === start.id && c.category === 'successor')).toHaveLength(10);
  });

  it('fans out deep branch points and reports them', () => {
    const doc = workflow(
      [node('start', { isStart: true }), node('a'), node('b'), node('c'), node('d')],
      [edge('start', 'a'), edge('a', 'b'), edge('b', 'c', 'yes'), edge('b', 'd', 'no')]
    );
    const shallow = compile(doc);
    expect(shallow.plans.size).toBe(0);
    expect(shallow.warnings.map(w => [w.kind, w.subject])).toEqual([['deep-branch-fanout', 'b']]);
    const b = byName(shallow.assembly.instances, 'b');
    expect(shallow.assembly.connections.filter(c => c.sourceInstanceId === b.id).map(c => c.condition)).toEqual([
      { kind: 'classified', description: 'yes' },
      { kind: 'classified', description: 'no' }
    ]);

    const deeper = compile(doc, { maxRoutingDepth: 2 });
    expect(Array.from(deeper.plans.keys())).toEqual(['b']);
    expect(deeper.warnings).toEqual([]);
  });

  it('warns about blank and repeated conditions', () => {
    const doc = workflow(
      [node('start', { isStart: true }), node('x'), node('y'), node('z')],
      [edge('start', 'x', 'Billing'), edge('start', 'y', 'billing '), edge('start', 'z')]
    );
    const { warnings, plans } = compile(doc);
    expect(plans.size).toBe(1);
    expect(warnings.map(w => [w.kind, w.subject])).toEqual([
      ['routing-ambiguity', 'start -> y'],
      ['routing-ambiguity', 'start -> z']
    ]);
  });

  it('keeps every intent of parallel transitions in the classifier instruction', () => {
    const doc = workflow(
      [node('start', { isStart: true }), node('a'), node('b')],
      [edge('start', 'a', 'wants sales'), edge('start', 'a', 'wants billing'), edge('start', 'b', 'wants support')]
    );
    const { assembly, plans, warnings } = compile(doc);
    expect(plans.get('start')?.legs.map(l => l.edge.condition?.description)).toEqual(['wants sales; or: wants billing', 'wants support']);
    const lines = String(byName(assembly.instances, 'Router (start)').fields.system_message.value).split('\n');
    expect(lines).toContain('1. wants sales; or: wants billing');
    expect(lines).toContain('2. wants support');
    expect(warnings.map(w => [w.kind, w.subject])).toEqual([['duplicate-edge', 'start -> a']]);
  });

  it('plans a branch point once even when listed twice', () => {
    const ctx = createContext({ palette: defaultPalette(), idSeed: 'twice', logger: silentLogger });
    const graph = parseSourceDocument(fanOut(3), ctx.diag);
    const components = materializeNodes(graph, ctx);
    const [point] = findBranchPoints(graph);
    const { plans, instances } = synthesizeRouting([point, point], components, ctx);
    expect(plans.size).toBe(1);
    expect(instances).toHaveLength(3);
  });

  it('refuses a branch point without a component', () => {
    const ctx = createContext({ palette: defaultPalette(), idSeed: 'missing', logger: silentLogger });
    const graph = parseSourceDocument(fanOut(2), ctx.diag);
    const points = findBranchPoints(graph);
    expect(() => synthesizeRouting(points, new Map(), ctx)).toThrow('branch point has no component [start]');
  });
});
