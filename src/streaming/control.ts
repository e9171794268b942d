// Control unit: counters, delay lines and address maps shared by the stages of a design

import type { GraphBuilder } from '../graph/builder.js';
import type { Matrix } from '../linalg/matrix.js';
import type { NodeId } from '../types/netlist.js';

/**
 * Control signals a module receives: `next` pulses one cycle before the
 * first word of a dataset, `first` (sampled with `next`) restarts the
 * per-dataset index at 0.
 */
export interface Control {
  next: NodeId;
  first: NodeId;
}

export function bitsFor(count: number): number {
  return Math.max(1, Math.ceil(Math.log2(count)));
}

/**
 * Builds control logic on top of a GraphBuilder. Counters are feedback
 * registers, which the builder never merges, so they are cached here by the
 * signals that drive them.
 */
export class ControlUnit {
  private counters = new Map<string, NodeId>();

  constructor(readonly b: GraphBuilder) {}

  delay(signal: NodeId, cycles: number): NodeId {
    let result = signal;
    for (let i = 0; i < cycles; i++) result = this.b.register(result);
    return result;
  }

  delayControl(control: Control, cycles: number): Control {
    return { next: this.delay(control.next, cycles), first: this.delay(control.first, cycles) };
  }

  /** t-bit cycle index within the current dataset; restarts at 0 after `next`. */
  counter(next: NodeId, t: number): NodeId {
    return this.cached(`counter:${next}:${t}`, () => {
      const b = this.b;
      const count = b.feedback(t);
      b.connect(count, b.mux(next, [b.plus(count, b.constant(1n, t)), b.zeros(t)]));
      return count;
    });
  }

  /**
   * (t+1)-bit counter whose top bit selects one of two buffers. The low bits
   * count cycles and restart after `next`; the top bit flips on `next` and,
   * when `flipOnWrap` is set, whenever the low bits wrap.
   */
  pingPong(next: NodeId, t: number, flipOnWrap: boolean): NodeId {
    return this.cached(`pingpong:${next}:${t}:${flipOnWrap}`, () => {
      const b = this.b;
      const count = b.feedback(t + 1);
      const parity = b.tap(count, t, 1);
      const restart = b.concat([b.not(parity), b.zeros(t)]);
      const advance = flipOnWrap
        ? b.plus(count, b.constant(1n, t + 1))
        : b.concat([parity, b.plus(b.tap(count, 0, t), b.constant(1n, t))]);
      b.connect(count, b.mux(next, [advance, restart]));
      return count;
    });
  }

  /** 1 for the cycles in which a dataset is on the inputs, given its cycle counter. */
  window(next: NodeId, cycle: NodeId): NodeId {
    return this.cached(`window:${next}:${cycle}`, () => {
      const b = this.b;
      const active = b.feedback(1);
      b.connect(active, b.or(next, b.and(active, b.not(b.allOnes(cycle)))));
      return active;
    });
  }

  /** Dataset index modulo `count`: restarts at 0 on `next` with `first`, advances on `next` otherwise. */
  setCounter(control: Control, count: number): NodeId {
    return this.cached(`set:${control.next}:${control.first}:${count}`, () => {
      const b = this.b;
      const width = bitsFor(count);
      const set = b.feedback(width, BigInt(count - 1));
      const advanced = this.successor(set, count);
      b.connect(set, b.mux(control.next, [set, b.mux(control.first, [advanced, b.zeros(width)])]));
      return set;
    });
  }

  /** Index modulo `count` advancing whenever `step` is set. */
  modCounter(step: NodeId, count: number): NodeId {
    return this.cached(`mod:${step}:${count}`, () => {
      const b = this.b;
      const index = b.feedback(bitsFor(count));
      b.connect(index, b.mux(step, [index, this.successor(index, count)]));
      return index;
    });
  }

  /** Picks one of `options` by the dataset index, or the only one when there is no index. */
  select(set: NodeId | null, options: NodeId[]): NodeId {
    if (set === null || options.length === 1) return options[0];
    return this.b.mux(set, options, options[0]);
  }

  /** matrix * input over GF(2); bit vectors are read most significant bit first. */
  linearMap(matrix: Matrix, input: NodeId): NodeId {
    const b = this.b;
    const width = b.widthOf(input);
    const bits: NodeId[] = [];
    for (let i = 0; i < matrix.rows; i++) {
      const terms: NodeId[] = [];
      for (let j = 0; j < matrix.cols; j++) {
        if (matrix.get(i, j) === 1) terms.push(b.tap(input, width - 1 - j, 1));
      }
      bits.push(terms.length === 0 ? b.zeros(1) : b.xor(...terms));
    }
    return b.concat(bits);
  }

  /** matrix * input + offset, with the offset given as an integer. */
  affineMap(matrix: Matrix, offset: number, input: NodeId): NodeId {
    return this.b.xor(this.linearMap(matrix, input), this.b.constant(BigInt(offset), matrix.rows));
  }

  private successor(value: NodeId, count: number): NodeId {
    const b = this.b;
    const width = b.widthOf(value);
    if (count === 2 ** width) return b.plus(value, b.constant(1n, width));
    const table = Array.from({ length: count }, (_, i) => b.constant(BigInt((i + 1) % count), width));
    return b.mux(value, table, b.zeros(width));
  }

  private cached(key: string, make: () => NodeId): NodeId {
    const existing = this.counters.get(key);
    if (existing !== undefined) return existing;
    const id = make();
    this.counters.set(key, id);
    return id;
  }
}
