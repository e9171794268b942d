// Main simulator controller: cycle-accurate two-phase evaluation of a signal graph

import { levelize } from '../circuit/levelizer.js';
import type { LevelizedGraph } from '../circuit/levelizer.js';
import { mask, timesValue } from '../graph/builder.js';
import type { NodeId, SignalGraph, SignalNode } from '../types/netlist.js';

export interface SimulatorOptions {
  resetPort: string;    // Input that returns registers to their init values at the clock edge
}

const DEFAULT_OPTIONS: SimulatorOptions = {
  resetPort: 'reset',
};

export interface WaveformSample {
  cycle: number;
  values: Map<string, bigint>;
}

/**
 * Each cycle first settles the combinational logic from the inputs and the
 * current state, then commits register and memory updates at the clock edge.
 * Memory reads see the contents before the write of the same cycle.
 */
export class Simulator {
  private levelized: LevelizedGraph;
  private options: SimulatorOptions;
  private values: bigint[];
  private registers = new Map<NodeId, bigint>();
  private memories = new Map<NodeId, bigint[]>();
  private inputs = new Map<string, NodeId>();
  private outputs = new Map<string, NodeId>();
  private inputValues = new Map<NodeId, bigint>();
  private settled = false;
  private cycle = 0;

  // Waveform recording
  private recording = false;
  private waveform: WaveformSample[] = [];

  constructor(graph: SignalGraph, options: Partial<SimulatorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.levelized = levelize(graph);
    this.values = new Array<bigint>(graph.nodes.length).fill(0n);
    for (const id of graph.inputs) {
      const node = graph.nodes[id];
      if (node.kind === 'input') this.inputs.set(node.name, id);
    }
    for (const id of graph.outputs) {
      const node = graph.nodes[id];
      if (node.kind === 'output') this.outputs.set(node.name, id);
    }
    this.reset();
  }

  /**
   * Return every register to its init value and clear the memories
   */
  reset(): void {
    for (const node of this.levelized.graph.nodes) {
      if (node.kind === 'register') this.registers.set(node.id, node.init);
      if (node.kind === 'memory') this.memories.set(node.id, new Array<bigint>(2 ** node.addressWidth).fill(0n));
    }
    this.cycle = 0;
    this.waveform = [];
    this.settled = false;
  }

  /**
   * Set a primary input value; it holds until set again
   */
  setInput(name: string, value: bigint): void {
    const id = this.inputs.get(name);
    if (id === undefined) {
      throw new Error(`Unknown input: ${name}`);
    }
    this.inputValues.set(id, value & mask(this.levelized.graph.nodes[id].width));
    this.settled = false;
  }

  /**
   * Get a primary output value in the current cycle
   */
  getOutput(name: string): bigint {
    const id = this.outputs.get(name);
    if (id === undefined) {
      throw new Error(`Unknown output: ${name}`);
    }
    return this.peek(id);
  }

  /** Value of any node in the current cycle. */
  peek(id: NodeId): bigint {
    const value = this.settle()[id];
    if (value === undefined) throw new Error(`Unknown node: ${id}`);
    return value;
  }

  /**
   * Run a single simulation cycle
   */
  step(): void {
    const values = this.settle();
    if (this.recording) this.recordWaveform();
    const reset = this.inputs.get(this.options.resetPort);
    const resetting = reset !== undefined && values[reset] === 1n;

    const nextRegisters = new Map<NodeId, bigint>();
    for (const node of this.levelized.graph.nodes) {
      if (node.kind === 'register') {
        nextRegisters.set(node.id, resetting || node.input === null ? node.init : values[node.input]);
      } else if (node.kind === 'memory' && values[node.writeEnable] === 1n) {
        this.memoryOf(node.id)[Number(values[node.writeAddress])] = values[node.data];
      }
    }
    this.registers = nextRegisters;
    this.cycle++;
    this.settled = false;
  }

  /**
   * Run multiple simulation cycles
   */
  run(cycles: number): void {
    for (let i = 0; i < cycles; i++) {
      this.step();
    }
  }

  getCycle(): number {
    return this.cycle;
  }

  listInputs(): string[] {
    return [...this.inputs.keys()];
  }

  listOutputs(): string[] {
    return [...this.outputs.keys()];
  }

  // Waveform recording

  /**
   * Record the primary outputs at every step from now on
   */
  startRecording(): void {
    this.waveform = [];
    this.recording = true;
  }

  stopRecording(): WaveformSample[] {
    this.recording = false;
    return this.waveform;
  }

  private recordWaveform(): void {
    const values = new Map<string, bigint>();
    for (const [name, id] of this.outputs) values.set(name, this.values[id]);
    this.waveform.push({ cycle: this.cycle, values });
  }

  private settle(): bigint[] {
    if (!this.settled) {
      for (const id of this.levelized.order) {
        this.values[id] = this.evaluate(this.levelized.graph.nodes[id]);
      }
      this.settled = true;
    }
    return this.values;
  }

  private memoryOf(id: NodeId): bigint[] {
    const memory = this.memories.get(id);
    if (memory === undefined) throw new Error(`Node ${id} is not a memory`);
    return memory;
  }

  private evaluate(node: SignalNode): bigint {
    const v = this.values;
    const m = mask(node.width);
    switch (node.kind) {
      case 'input':
        return this.inputValues.get(node.id) ?? 0n;
      case 'output':
        return v[node.input];
      case 'const':
        return node.value;
      case 'and':
        return node.terms.reduce((acc, term) => acc & v[term], m);
      case 'or':
        return node.terms.reduce((acc, term) => acc | v[term], 0n);
      case 'xor':
        return node.terms.reduce((acc, term) => acc ^ v[term], 0n);
      case 'not':
        return ~v[node.input] & m;
      case 'plus':
        return (v[node.lhs] + v[node.rhs]) & m;
      case 'minus':
        return (v[node.lhs] - v[node.rhs]) & m;
      case 'times':
        return timesValue(v[node.lhs], v[node.rhs], node.width, node.signed, node.fractionalBits);
      case 'concat': {
        let acc = 0n;
        for (const term of node.terms) {
          acc = (acc << BigInt(this.levelized.graph.nodes[term].width)) | v[term];
        }
        return acc;
      }
      case 'tap':
        return (v[node.input] >> BigInt(node.start)) & m;
      case 'register':
        return this.registers.get(node.id) ?? node.init;
      case 'mux': {
        const index = Number(v[node.address]);
        if (index < node.inputs.length) return v[node.inputs[index]];
        if (node.fallback === null) throw new Error(`Mux ${node.id} address ${index} out of range`);
        return v[node.fallback];
      }
      case 'memory':
        return 0n;
      case 'memoryRead':
        return this.memoryOf(node.memory)[Number(v[node.address])];
      case 'extern':
        return node.operator.evaluate(node.inputs.map((input) => v[input])) & m;
    }
  }
}
