import { describe, it, expect } from 'vitest';
import { compileUnified } from '../compiler/unified.js';
import { verifyDocument } from '../compiler/verify.js';
import { defaultPalette } from '../palette/load.js';
import { silentLogger } from '../log.js';
import { edge, node, workflow } from './fixtures.js';

describe('unified mode', () => {
  const palette = defaultPalette();
  const doc = workflow(
    [
      node('start', {
        isStart: true,
        messagePlan: { firstMessage: 'Hello there' },
        variableExtractionPlan: { output: [{ title: 'plan', enum: ['basic', 'pro'], description: 'chosen plan' }] }
      }),
      node('a'),
      node('b'),
      node('handoff', { type: 'tool', tool: { type: 'transferCall' } })
    ],
    [edge('start', 'a', 'caller agrees'), edge('start', 'b'), edge('b', 'handoff')]
  );
  const result = compileUnified(doc, { palette, idSeed: 'unified', logger: silentLogger });
  const lines = result.prompt.split('\n');

  it('describes every node with its transitions', () => {
    expect(lines).toContain('--- CONVERSATION FLOW ---');
    expect(lines).toContain("Keep the persona and tone set by the 'start' node throughout the conversation.");
    expect(lines).toContain('## NODE: start');
    expect(lines).toContain('**STARTING MESSAGE**: "Hello there"');
    expect(lines).toContain('**INSTRUCTION**: You are start.');
    expect(lines).toContain('- plan: chosen plan (Options: basic, pro)');
    expect(lines).toContain('- IF caller agrees -> GOTO Node: a');
    expect(lines).toContain('- IF Default/Always -> GOTO Node: b');
    expect(lines).toContain('**ACTION**: transferCall (performed outside this conversation; tell the caller what happens next)');
    expect(lines.filter(l => l === '**TRANSITIONS**: End of conversation (hang up or wait).')).toHaveLength(2);
    expect(lines[lines.length - 1]).toBe('3. (Internal) [State: <Current_Node> -> <Next_Node>]');
  });

  it('wires a single agent between the sentinels', () => {
    const { document, assembly } = result;
    expect(document.name).toBe('Test Flow (Unified)');
    expect(assembly.instances.map(i => i.componentType)).toEqual(['EntryPoint', 'ConversationAgent', 'ExitPoint']);
    expect(assembly.instances[1].displayName).toBe('Test Flow (Unified)');
    expect(assembly.instances[1].fields.system_message.value).toBe(result.prompt);
    expect(document.data.edges).toHaveLength(2);
    expect(verifyDocument(document, palette)).toEqual({ pass: true, issues: [] });
    expect(result.warnings).toEqual([]);
  });

  it('leaves out nodes only an orphan leads to', () => {
    const orphaned = compileUnified(
      workflow(
        [node('start', { isStart: true }), node('a'), node('lonely'), node('stray')],
        [edge('start', 'a'), edge('lonely', 'stray'), edge('stray', 'a')]
      ),
      { palette, idSeed: 'orphaned', logger: silentLogger }
    );
    const sections = orphaned.prompt.split('\n').filter(l => l.startsWith('## NODE: '));
    expect(sections).toEqual(['## NODE: start', '## NODE: a']);
  });
});
