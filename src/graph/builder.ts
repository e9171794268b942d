// Graph builder: smart constructors with constant folding, local rewrites and CSE

import { SignalWidthError } from '../errors.js';
import { createGraph } from '../types/netlist.js';
import type {
  ExternalOperator,
  NodeId,
  SignalGraph,
  SignalNode,
} from '../types/netlist.js';

export function mask(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

/** Reinterprets a width-bit pattern as a two's complement integer. */
export function toSigned(value: bigint, width: number): bigint {
  return value >> BigInt(width - 1) ? value - (1n << BigInt(width)) : value;
}

export function timesValue(lhs: bigint, rhs: bigint, width: number, signed: boolean, fractionalBits: number): bigint {
  const a = signed ? toSigned(lhs, width) : lhs;
  const b = signed ? toSigned(rhs, width) : rhs;
  return ((a * b) >> BigInt(fractionalBits)) & mask(width);
}

// A contiguous bit range of some node, used while normalising concatenations
interface Slice {
  base: NodeId;
  start: number;
  width: number;
}

/**
 * Builds a signal graph. Every constructor first tries to simplify its
 * result, then looks the canonical node up in the structural cache, so two
 * requests over identical operands return the same id.
 */
export class GraphBuilder {
  readonly graph: SignalGraph;
  private cache = new Map<string, NodeId>();
  private inputNames = new Set<string>();

  constructor(name: string) {
    this.graph = createGraph(name);
  }

  node(id: NodeId): SignalNode {
    const node = this.graph.nodes[id];
    if (node === undefined) throw new Error(`Unknown node: ${id}`);
    return node;
  }

  widthOf(id: NodeId): number {
    return this.node(id).width;
  }

  /** Constant value of a node, or null when it is not a constant. */
  constValue(id: NodeId): bigint | null {
    const node = this.node(id);
    return node.kind === 'const' ? node.value : null;
  }

  get size(): number {
    return this.graph.nodes.length;
  }

  // ---------------------------------------------------------------------------
  // Ports
  // ---------------------------------------------------------------------------

  input(name: string, width: number): NodeId {
    this.checkPositive(width, `input ${name}`);
    if (this.inputNames.has(name)) throw new Error(`Duplicate input: ${name}`);
    this.inputNames.add(name);
    const id = this.allocate(null, (id) => ({ kind: 'input', id, width, name }));
    this.graph.inputs.push(id);
    return id;
  }

  output(name: string, input: NodeId): NodeId {
    const id = this.allocate(null, (id) => ({ kind: 'output', id, width: this.widthOf(input), name, input }));
    this.graph.outputs.push(id);
    return id;
  }

  // ---------------------------------------------------------------------------
  // Constants and bitwise logic
  // ---------------------------------------------------------------------------

  constant(value: bigint, width: number): NodeId {
    this.checkPositive(width, 'constant');
    const masked = value & mask(width);
    return this.allocate(`const:${width}:${masked}`, (id) => ({ kind: 'const', id, width, value: masked }));
  }

  zeros(width: number): NodeId {
    return this.constant(0n, width);
  }

  and(...terms: NodeId[]): NodeId {
    const width = this.checkSameWidth('and', terms);
    const all = mask(width);
    let folded = all;
    const others = new Set<NodeId>();
    for (const term of terms) {
      const value = this.constValue(term);
      if (value === null) others.add(term);
      else folded &= value;
    }
    if (others.size === 0 || folded === 0n) return this.constant(folded, width);
    const combined = this.logic('and', [...others], width);
    if (folded === all) return combined;
    return this.perBit(combined, width, (bit, set) => (set ? bit : this.zeros(1)), folded);
  }

  or(...terms: NodeId[]): NodeId {
    const width = this.checkSameWidth('or', terms);
    const all = mask(width);
    let folded = 0n;
    const others = new Set<NodeId>();
    for (const term of terms) {
      const value = this.constValue(term);
      if (value === null) others.add(term);
      else folded |= value;
    }
    if (others.size === 0 || folded === all) return this.constant(folded, width);
    const combined = this.logic('or', [...others], width);
    if (folded === 0n) return combined;
    return this.perBit(combined, width, (bit, set) => (set ? this.constant(1n, 1) : bit), folded);
  }

  xor(...terms: NodeId[]): NodeId {
    const width = this.checkSameWidth('xor', terms);
    let folded = 0n;
    const odd = new Set<NodeId>();
    for (const term of terms) {
      const value = this.constValue(term);
      if (value !== null) folded ^= value;
      else if (odd.has(term)) odd.delete(term);
      else odd.add(term);
    }
    if (odd.size === 0) return this.constant(folded, width);
    const combined = this.logic('xor', [...odd], width);
    if (folded === 0n) return combined;
    return this.perBit(combined, width, (bit, set) => (set ? this.not(bit) : bit), folded);
  }

  not(input: NodeId): NodeId {
    const node = this.node(input);
    if (node.kind === 'const') return this.constant(~node.value, node.width);
    if (node.kind === 'not') return node.input;
    return this.allocate(`not:${input}`, (id) => ({ kind: 'not', id, width: node.width, input }));
  }

  /** 1 when every bit of `input` is set. */
  allOnes(input: NodeId): NodeId {
    const width = this.widthOf(input);
    const bits: NodeId[] = [];
    for (let i = 0; i < width; i++) bits.push(this.tap(input, i, 1));
    return bits.length === 1 ? bits[0] : this.and(...bits);
  }

  /** 1 when `input` equals the constant `value`. */
  equalsConst(input: NodeId, value: bigint): NodeId {
    return this.allOnes(this.xor(input, this.constant(~value, this.widthOf(input))));
  }

  // ---------------------------------------------------------------------------
  // Arithmetic
  // ---------------------------------------------------------------------------

  plus(lhs: NodeId, rhs: NodeId): NodeId {
    const width = this.checkSameWidth('plus', [lhs, rhs]);
    const a = this.constValue(lhs);
    const b = this.constValue(rhs);
    if (a !== null && b !== null) return this.constant(a + b, width);
    if (a === 0n) return rhs;
    if (b === 0n) return lhs;
    const [x, y] = lhs <= rhs ? [lhs, rhs] : [rhs, lhs];
    return this.allocate(`plus:${x}:${y}`, (id) => ({ kind: 'plus', id, width, lhs: x, rhs: y }));
  }

  minus(lhs: NodeId, rhs: NodeId): NodeId {
    const width = this.checkSameWidth('minus', [lhs, rhs]);
    const a = this.constValue(lhs);
    const b = this.constValue(rhs);
    if (a !== null && b !== null) return this.constant(a - b, width);
    if (b === 0n) return lhs;
    if (lhs === rhs) return this.zeros(width);
    return this.allocate(`minus:${lhs}:${rhs}`, (id) => ({ kind: 'minus', id, width, lhs, rhs }));
  }

  /** Product of two width-bit numbers shifted right by `fractionalBits`, truncated to width. */
  times(lhs: NodeId, rhs: NodeId, signed: boolean, fractionalBits: number): NodeId {
    const width = this.checkSameWidth('times', [lhs, rhs]);
    const a = this.constValue(lhs);
    const b = this.constValue(rhs);
    if (a !== null && b !== null) return this.constant(timesValue(a, b, width, signed, fractionalBits), width);
    // With fractionalBits at the sign position the pattern reads as -1, not 1
    const representsOne = signed ? fractionalBits < width - 1 : fractionalBits < width;
    const one = representsOne ? 1n << BigInt(fractionalBits) : null;
    const minusOne = signed && one !== null ? (-one) & mask(width) : null;
    for (const [value, other] of [[a, rhs], [b, lhs]] as const) {
      if (value === null) continue;
      if (value === 0n) return this.zeros(width);
      if (value === one) return other;
      if (value === minusOne) return this.minus(this.zeros(width), other);
    }
    const [x, y] = lhs <= rhs ? [lhs, rhs] : [rhs, lhs];
    return this.allocate(`times:${signed}:${fractionalBits}:${x}:${y}`, (id) => ({
      kind: 'times', id, width, lhs: x, rhs: y, signed, fractionalBits,
    }));
  }

  // ---------------------------------------------------------------------------
  // Wiring
  // ---------------------------------------------------------------------------

  /** Concatenation with `terms[0]` as the most significant part. */
  concat(terms: NodeId[]): NodeId {
    if (terms.length === 0) throw new SignalWidthError('concat needs at least one operand');
    const slices: Slice[] = [];
    const push = (slice: Slice) => {
      const last = slices[slices.length - 1];
      if (last === undefined) {
        slices.push(slice);
        return;
      }
      const lastValue = this.constValue(last.base);
      const value = this.constValue(slice.base);
      if (lastValue !== null && value !== null) {
        const merged = (this.sliceValue(lastValue, last) << BigInt(slice.width)) | this.sliceValue(value, slice);
        const width = last.width + slice.width;
        slices[slices.length - 1] = { base: this.constant(merged, width), start: 0, width };
      } else if (last.base === slice.base && slice.start + slice.width === last.start) {
        slices[slices.length - 1] = { base: last.base, start: slice.start, width: last.width + slice.width };
      } else {
        slices.push(slice);
      }
    };
    const visit = (term: NodeId) => {
      const node = this.node(term);
      if (node.kind === 'concat') node.terms.forEach(visit);
      else if (node.kind === 'tap') push({ base: node.input, start: node.start, width: node.width });
      else push({ base: term, start: 0, width: node.width });
    };
    terms.forEach(visit);

    const parts = slices.map((s) => this.tap(s.base, s.start, s.width));
    if (parts.length === 1) return parts[0];
    const width = parts.reduce((sum, part) => sum + this.widthOf(part), 0);
    return this.allocate(`concat:${parts.join(',')}`, (id) => ({ kind: 'concat', id, width, terms: parts }));
  }

  /** Bits [start, start + width) of `input`. */
  tap(input: NodeId, start: number, width: number): NodeId {
    const node = this.node(input);
    if (!Number.isInteger(start) || !Number.isInteger(width) || start < 0 || width < 1 || start + width > node.width) {
      throw new SignalWidthError(`tap [${start}, ${start + width}) outside ${node.width}-bit signal ${input}`);
    }
    if (start === 0 && width === node.width) return input;
    switch (node.kind) {
      case 'const':
        return this.constant(node.value >> BigInt(start), width);
      case 'tap':
        return this.tap(node.input, node.start + start, width);
      case 'concat': {
        const parts: NodeId[] = [];
        let low = 0;
        for (let i = node.terms.length - 1; i >= 0; i--) {
          const term = node.terms[i];
          const termWidth = this.widthOf(term);
          const from = Math.max(start, low);
          const to = Math.min(start + width, low + termWidth);
          if (from < to) parts.unshift(this.tap(term, from - low, to - from));
          low += termWidth;
        }
        return this.concat(parts);
      }
      default:
        return this.allocate(`tap:${input}:${start}:${width}`, (id) => ({ kind: 'tap', id, width, input, start }));
    }
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  /** One-cycle delay; `init` is the value after reset. */
  register(input: NodeId, init = 0n): NodeId {
    const width = this.widthOf(input);
    const value = init & mask(width);
    if (this.constValue(input) === value) return input;
    return this.allocate(`reg:${input}:${value}`, (id) => ({ kind: 'register', id, width, input, init: value }));
  }

  /** Register whose input is supplied later through `connect`, closing a loop. */
  feedback(width: number, init = 0n): NodeId {
    this.checkPositive(width, 'feedback register');
    return this.allocate(null, (id) => ({ kind: 'register', id, width, input: null, init: init & mask(width) }));
  }

  connect(register: NodeId, input: NodeId): void {
    const node = this.node(register);
    if (node.kind !== 'register' || node.input !== null) {
      throw new Error(`Node ${register} is not an unconnected feedback register`);
    }
    if (this.widthOf(input) !== node.width) {
      throw new SignalWidthError(`feedback register ${register} has width ${node.width}, input has ${this.widthOf(input)}`);
    }
    node.input = input;
  }

  mux(address: NodeId, inputs: NodeId[], fallback?: NodeId): NodeId {
    const addressWidth = this.widthOf(address);
    const capacity = 2 ** addressWidth;
    if (inputs.length === 0 || inputs.length > capacity) {
      throw new SignalWidthError(`mux with ${addressWidth}-bit address cannot select from ${inputs.length} inputs`);
    }
    const complete = inputs.length === capacity;
    if (!complete && fallback === undefined) {
      throw new SignalWidthError(`mux has ${inputs.length} of ${capacity} inputs and no default`);
    }
    const defaultInput = complete || fallback === undefined ? null : fallback;
    const width = this.checkSameWidth('mux', defaultInput === null ? inputs : [...inputs, defaultInput]);

    const selected = this.constValue(address);
    if (selected !== null) {
      const index = Number(selected);
      return index < inputs.length || defaultInput === null ? inputs[index] : defaultInput;
    }
    if (inputs.every((input) => input === inputs[0]) && (defaultInput === null || defaultInput === inputs[0])) {
      return inputs[0];
    }
    return this.allocate(`mux:${address}:${inputs.join(',')}:${defaultInput ?? ''}`, (id) => ({
      kind: 'mux', id, width, address, inputs: [...inputs], fallback: defaultInput,
    }));
  }

  /** Memory of 2^addressWidth words written with `data` at the clock edge when `writeEnable` is set. */
  memory(addressWidth: number, data: NodeId, writeAddress: NodeId, writeEnable: NodeId): NodeId {
    if (this.widthOf(writeAddress) !== addressWidth) {
      throw new SignalWidthError(`write address has width ${this.widthOf(writeAddress)}, memory needs ${addressWidth}`);
    }
    if (this.widthOf(writeEnable) !== 1) {
      throw new SignalWidthError('write enable must be a single bit');
    }
    return this.allocate(null, (id) => ({
      kind: 'memory', id, width: this.widthOf(data), addressWidth, data, writeAddress, writeEnable,
    }));
  }

  /** Asynchronous read of the memory contents before this cycle's write. */
  memoryRead(memory: NodeId, address: NodeId): NodeId {
    const node = this.node(memory);
    if (node.kind !== 'memory') throw new Error(`Node ${memory} is not a memory`);
    if (this.widthOf(address) !== node.addressWidth) {
      throw new SignalWidthError(`read address has width ${this.widthOf(address)}, memory needs ${node.addressWidth}`);
    }
    return this.allocate(`read:${memory}:${address}`, (id) => ({
      kind: 'memoryRead', id, width: node.width, memory, address,
    }));
  }

  extern(operator: ExternalOperator, inputs: NodeId[]): NodeId {
    const values = inputs.map((input) => this.constValue(input));
    if (values.every((value): value is bigint => value !== null)) {
      return this.constant(operator.evaluate(values), operator.width);
    }
    return this.allocate(`extern:${operator.name}:${inputs.join(',')}`, (id) => ({
      kind: 'extern', id, width: operator.width, operator, inputs: [...inputs],
    }));
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private allocate(key: string | null, make: (id: NodeId) => SignalNode): NodeId {
    if (key !== null) {
      const existing = this.cache.get(key);
      if (existing !== undefined) return existing;
    }
    const id = this.graph.nodes.length;
    this.graph.nodes.push(make(id));
    if (key !== null) this.cache.set(key, id);
    return id;
  }

  private logic(kind: 'and' | 'or' | 'xor', terms: NodeId[], width: number): NodeId {
    if (terms.length === 1) return terms[0];
    const sorted = [...terms].sort((a, b) => a - b);
    return this.allocate(`${kind}:${sorted.join(',')}`, (id) => ({ kind, id, width, terms: sorted }));
  }

  // Rebuilds `input` bit by bit; `f` gets each bit and whether the constant has it set
  private perBit(input: NodeId, width: number, f: (bit: NodeId, set: boolean) => NodeId, constant: bigint): NodeId {
    const bits: NodeId[] = [];
    for (let i = width - 1; i >= 0; i--) {
      bits.push(f(this.tap(input, i, 1), ((constant >> BigInt(i)) & 1n) === 1n));
    }
    return this.concat(bits);
  }

  private sliceValue(value: bigint, slice: Slice): bigint {
    return (value >> BigInt(slice.start)) & mask(slice.width);
  }

  private checkSameWidth(operator: string, terms: NodeId[]): number {
    if (terms.length === 0) throw new SignalWidthError(`${operator} needs at least one operand`);
    const width = this.widthOf(terms[0]);
    for (const term of terms) {
      if (this.widthOf(term) !== width) {
        throw new SignalWidthError(`${operator}: operand widths differ (${width} and ${this.widthOf(term)})`);
      }
    }
    return width;
  }

  private checkPositive(width: number, what: string): void {
    if (!Number.isInteger(width) || width < 1) {
      throw new SignalWidthError(`${what} must have a positive width, got ${width}`);
    }
  }
}
