import { describe, it, expect } from 'vitest';
import { GraphBuilder } from '../src/graph/builder.js';
import { createGraph } from '../src/types/netlist.js';
import { getStats, levelize } from '../src/circuit/levelizer.js';
import { Simulator } from '../src/simulator/simulator.js';

function counter(withReset: boolean) {
  const b = new GraphBuilder('counter');
  if (withReset) b.input('reset', 1);
  const r = b.feedback(4);
  b.connect(r, b.plus(r, b.constant(1n, 4)));
  b.output('count', r);
  return b.graph;
}

describe('Simulator', () => {
  it('counts clock edges', () => {
    const sim = new Simulator(counter(false));
    expect(sim.getOutput('count')).toBe(0n);
    sim.run(3);
    expect(sim.getOutput('count')).toBe(3n);
    expect(sim.getCycle()).toBe(3);
    sim.run(13);
    expect(sim.getOutput('count')).toBe(0n);
  });

  it('returns registers to their init values on reset', () => {
    const sim = new Simulator(counter(true));
    sim.run(5);
    sim.setInput('reset', 1n);
    sim.step();
    expect(sim.getOutput('count')).toBe(0n);
    sim.setInput('reset', 0n);
    sim.step();
    expect(sim.getOutput('count')).toBe(1n);
  });

  it('reads memory contents from before the write', () => {
    const b = new GraphBuilder('ram');
    const address = b.input('addr', 2);
    const data = b.input('data', 8);
    const enable = b.input('we', 1);
    const memory = b.memory(2, data, address, enable);
    b.output('q', b.memoryRead(memory, address));
    const sim = new Simulator(b.graph);

    sim.setInput('addr', 1n);
    sim.setInput('data', 42n);
    sim.setInput('we', 1n);
    expect(sim.getOutput('q')).toBe(0n);
    sim.step();
    expect(sim.getOutput('q')).toBe(42n);

    sim.setInput('data', 7n);
    sim.setInput('we', 0n);
    sim.step();
    expect(sim.getOutput('q')).toBe(42n);
    sim.setInput('addr', 2n);
    expect(sim.getOutput('q')).toBe(0n);
  });

  it('evaluates signed fixed-point products', () => {
    const b = new GraphBuilder('mul');
    const x = b.input('x', 8);
    const y = b.input('y', 8);
    b.output('p', b.times(x, y, true, 4));
    const sim = new Simulator(b.graph);
    sim.setInput('x', 0x18n);
    sim.setInput('y', 0x20n);
    expect(sim.getOutput('p')).toBe(0x30n);
    sim.setInput('y', 0xe0n);
    expect(sim.getOutput('p')).toBe(0xd0n);
  });

  it('records output waveforms', () => {
    const sim = new Simulator(counter(false));
    sim.startRecording();
    sim.run(2);
    const samples = sim.stopRecording();
    expect(samples.map((s) => s.cycle)).toEqual([0, 1]);
    expect(samples.map((s) => s.values.get('count'))).toEqual([0n, 1n]);
  });

  it('rejects unknown ports', () => {
    const sim = new Simulator(counter(false));
    expect(() => sim.setInput('nope', 1n)).toThrow('Unknown input: nope');
    expect(() => sim.getOutput('nope')).toThrow('Unknown output: nope');
    expect(sim.listOutputs()).toEqual(['count']);
    expect(sim.listInputs()).toEqual([]);
  });
});

describe('levelize', () => {
  it('places every node above its operands', () => {
    const levelized = levelize(counter(false));
    expect(getStats(levelized)).toEqual({
      totalNodes: 4,
      registers: 1,
      memories: 0,
      maxLevel: 2,
      nodesPerLevel: [2, 1, 1],
    });
  });

  it('detects combinational loops', () => {
    const graph = createGraph('loop');
    graph.nodes.push(
      { kind: 'input', id: 0, width: 1, name: 'x' },
      { kind: 'and', id: 1, width: 1, terms: [0, 2] },
      { kind: 'not', id: 2, width: 1, input: 1 },
    );
    graph.inputs.push(0);
    expect(() => levelize(graph)).toThrow('Levelization failed: possible combinational loop detected');
  });

  it('rejects unconnected feedback registers', () => {
    const b = new GraphBuilder('open');
    const r = b.feedback(1);
    b.output('q', r);
    expect(() => levelize(b.graph)).toThrow(`Unconnected feedback register: ${r}`);
  });
});
