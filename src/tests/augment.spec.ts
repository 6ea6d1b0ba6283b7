import { describe, it, expect } from 'vitest';
import { augmentInstruction, extractionDirective, firstMessageDirective } from '../prompt/augment.js';
import type { SourceNode } from '../types/source.js';

function sourceNode(extra: Partial<SourceNode> = {}): SourceNode {
  return {
    id: 'greet',
    displayName: 'greet',
    kind: 'conversation',
    instructionText: 'Ask how you can help.',
    isStart: true,
    sideEffectKind: 'none',
    ...extra
  };
}

describe('prompt augmenter', () => {
  it('leaves plain instructions untouched', () => {
    expect(augmentInstruction(sourceNode())).toBe('Ask how you can help.');
  });

  it('prefixes the first-message directive', () => {
    expect(augmentInstruction(sourceNode({ firstMessage: 'Welcome' }))).toBe(
      'FIRST MESSAGE: When this is the first turn of the conversation, open with exactly this text:\n' +
        '"Welcome"\n' +
        '\n' +
        'Then continue with your role:\n' +
        'Ask how you can help.'
    );
    expect(firstMessageDirective('Hi').split('\n')).toHaveLength(4);
  });

  it('appends a JSON sketch of the extraction schema', () => {
    const text = extractionDirective([
      { fieldName: 'topic', kind: 'enum', enumValues: ['billing', 'support'], description: 'why they called' },
      { fieldName: 'count', kind: 'number', description: 'how many' },
      { fieldName: 'name', kind: 'string', description: '' }
    ]);
    expect(text.split('\n')).toEqual([
      'IMPORTANT: After your response, you MUST extract the following information and output it as JSON:',
      '{',
      '  "topic": "billing", // Options: billing, support',
      '  "count": <number>, // how many',
      '  "name": "<string>"',
      '}',
      '',
      'Variables to extract: topic, count, name',
      'Format: First provide your conversational response, then on a new line output ONLY the JSON object with extracted values.'
    ]);
  });

  it('applies both directives around the instruction', () => {
    const schema = [{ fieldName: 'topic', kind: 'string' as const, description: 'd' }];
    const text = augmentInstruction(sourceNode({ firstMessage: 'Welcome', extractionSchema: schema }));
    expect(text.startsWith(firstMessageDirective('Welcome') + '\nAsk how you can help.\n\n')).toBe(true);
    expect(text.endsWith(extractionDirective(schema))).toBe(true);
  });

  it('ignores an empty extraction schema', () => {
    expect(augmentInstruction(sourceNode({ extractionSchema: [] }))).toBe('Ask how you can help.');
  });
});
