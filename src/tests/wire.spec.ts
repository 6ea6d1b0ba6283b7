import { describe, it, expect } from 'vitest';
import { WireBuilder } from '../compiler/wire.js';
import { defaultPalette } from '../palette/load.js';
import { createIdGenerator } from '../palette/ids.js';
import { PaletteLookupError, PortContractError } from '../errors.js';

describe('wire builder', () => {
  const palette = defaultPalette();
  const ids = createIdGenerator('wires');
  const at = { position: { x: 0, y: 0 } };
  const agent = palette.clone('ConversationAgent', ids, at);
  const gate = palette.clone('BinaryGate', ids, at);
  const exit = palette.clone('ExitPoint', ids, at);

  it('records typed connections', () => {
    const wires = new WireBuilder(palette);
    const conn = wires.connect(agent, 'text_output', exit, 'input_value', 'sentinel');
    expect(conn.sourceOutputPort).toEqual({ name: 'text_output', dataKind: 'Message' });
    expect(conn.targetInputPort).toEqual({ name: 'input_value', dataKinds: ['Data', 'DataFrame', 'Message'], fieldType: 'other' });
    expect(conn.condition).toBeUndefined();
    expect(wires.connections).toEqual([conn]);
  });

  it('links primary ports', () => {
    const wires = new WireBuilder(palette);
    const conn = wires.link(agent, gate, 'routing', { kind: 'static', description: 'always' });
    expect([conn.sourceOutputPort.name, conn.targetInputPort.name]).toEqual(['text_output', 'input_text']);
    expect(conn.condition).toEqual({ kind: 'static', description: 'always' });
  });

  it('rejects unknown ports', () => {
    const wires = new WireBuilder(palette);
    expect(() => wires.connect(agent, 'nope', exit, 'input_value', 'successor')).toThrow(PaletteLookupError);
    expect(() => wires.connect(agent, 'text_output', gate, 'nope', 'successor')).toThrow(
      "unknown input port 'nope' [BinaryGate]"
    );
    expect(wires.connections).toEqual([]);
  });

  it('rejects incompatible data kinds', () => {
    const wires = new WireBuilder(palette);
    const attempt = () => wires.connect(agent, 'model_output', gate, 'input_text', 'routing');
    expect(attempt).toThrow(PortContractError);
    expect(attempt).toThrow(PaletteLookupError);
    expect(attempt).toThrow(/port kind LanguageModel is not accepted by Message/);
  });
});
