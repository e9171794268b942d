// Hardware types: numeric representations of a data lane and their arithmetic as graph nodes

import { DomainError } from '../errors.js';
import { mask, toSigned } from '../graph/builder.js';
import type { GraphBuilder } from '../graph/builder.js';
import { Complex } from '../linalg/complex.js';
import { complexRing, realRing } from '../spl/ring.js';
import type { Ring } from '../spl/ring.js';
import type { ExternalOperator, NodeId } from '../types/netlist.js';

/**
 * A numeric representation of width `size`. `bitsOf` and `valueOf` convert
 * between software values and raw bit patterns; the remaining methods build
 * the corresponding operators in a signal graph.
 */
export abstract class HW<T> {
  abstract readonly size: number;
  /** Arithmetic on software values of this type, used by the evaluation oracle. */
  abstract readonly software: Ring<T>;

  abstract bitsOf(value: T): bigint;
  abstract valueOf(bits: bigint): T;
  abstract plus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId;
  abstract minus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId;
  abstract times(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId;
  abstract constant(b: GraphBuilder, value: Complex): NodeId;
  abstract toComplex(value: T): Complex;
  /** A representable value of moderate magnitude, for test stimuli. */
  abstract sample(random: () => number): T;
  abstract toString(): string;

  /** The same arithmetic over signals of this type. */
  ring(b: GraphBuilder): Ring<NodeId> {
    return {
      plus: (lhs, rhs) => this.plus(b, lhs, rhs),
      minus: (lhs, rhs) => this.minus(b, lhs, rhs),
      scale: (value, coefficient) => this.times(b, value, this.constant(b, coefficient)),
    };
  }
}

abstract class RealHW extends HW<number> {
  readonly software = realRing;

  constant(b: GraphBuilder, value: Complex): NodeId {
    if (value.im !== 0) {
      throw new DomainError(`${this.toString()} cannot represent ${value.toString()}`);
    }
    return b.constant(this.bitsOf(value.re), this.size);
  }

  toComplex(value: number): Complex {
    return new Complex(value, 0);
  }
}

export class Unsigned extends RealHW {
  constructor(readonly size: number) {
    super();
    if (!Number.isInteger(size) || size < 1) throw new DomainError(`invalid unsigned width ${size}`);
  }

  bitsOf(value: number): bigint {
    return BigInt(Math.round(value)) & mask(this.size);
  }

  valueOf(bits: bigint): number {
    return Number(bits & mask(this.size));
  }

  plus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return b.plus(lhs, rhs);
  }

  minus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return b.minus(lhs, rhs);
  }

  times(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return b.times(lhs, rhs, false, 0);
  }

  sample(random: () => number): number {
    return Math.floor(random() * 2 ** Math.min(this.size, 8));
  }

  toString(): string {
    return `Unsigned(${this.size})`;
  }
}

/** Two's complement fixed point: `magnitude` integer bits (sign included) and `fractional` bits. */
export class FixedPoint extends RealHW {
  readonly size: number;

  constructor(readonly magnitude: number, readonly fractional: number) {
    super();
    if (!Number.isInteger(magnitude) || !Number.isInteger(fractional) || magnitude < 1 || fractional < 0) {
      throw new DomainError(`invalid fixed point format (${magnitude}, ${fractional})`);
    }
    this.size = magnitude + fractional;
  }

  bitsOf(value: number): bigint {
    return BigInt(Math.round(value * 2 ** this.fractional)) & mask(this.size);
  }

  valueOf(bits: bigint): number {
    return Number(toSigned(bits & mask(this.size), this.size)) / 2 ** this.fractional;
  }

  plus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return b.plus(lhs, rhs);
  }

  minus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return b.minus(lhs, rhs);
  }

  times(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return b.times(lhs, rhs, true, this.fractional);
  }

  sample(random: () => number): number {
    return this.valueOf(this.bitsOf(random() * 2 - 1));
  }

  toString(): string {
    return `FixedPoint(${this.magnitude}, ${this.fractional})`;
  }
}

function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** IEEE 754 binary format with `exponent` exponent bits and `mantissa` stored mantissa bits. */
export class IEEE754 extends RealHW {
  readonly size: number;
  private readonly bias: number;
  private readonly operators: { add: ExternalOperator; sub: ExternalOperator; mul: ExternalOperator };

  constructor(readonly exponent: number, readonly mantissa: number) {
    super();
    if (!Number.isInteger(exponent) || !Number.isInteger(mantissa) || exponent < 2 || exponent > 11 ||
        mantissa < 1 || mantissa > 52) {
      throw new DomainError(`invalid floating point format (${exponent}, ${mantissa})`);
    }
    this.size = 1 + exponent + mantissa;
    this.bias = 2 ** (exponent - 1) - 1;
    const operator = (name: string, f: (a: number, b: number) => number): ExternalOperator => ({
      name: `fp_${name}_${exponent}_${mantissa}`,
      width: this.size,
      evaluate: ([a, b]) => this.bitsOf(f(this.valueOf(a), this.valueOf(b))),
    });
    this.operators = {
      add: operator('add', (a, b) => a + b),
      sub: operator('sub', (a, b) => a - b),
      mul: operator('mul', (a, b) => a * b),
    };
  }

  bitsOf(value: number): bigint {
    const e = this.exponent;
    const m = this.mantissa;
    const maxExponent = 2 ** e - 1;
    let sign = value < 0 || Object.is(value, -0) ? 1 : 0;
    let biased: number;
    let fraction: number;
    const a = Math.abs(value);
    if (Number.isNaN(value)) {
      sign = 0;
      biased = maxExponent;
      fraction = 2 ** (m - 1);
    } else if (a === 0) {
      biased = 0;
      fraction = 0;
    } else {
      let exp = Math.floor(Math.log2(a));
      if (2 ** exp > a) exp--;
      if (2 ** (exp + 1) <= a) exp++;
      biased = exp + this.bias;
      if (biased <= 0) {
        biased = 0;
        fraction = roundHalfEven(a / 2 ** (1 - this.bias - m));
        if (fraction >= 2 ** m) {
          biased = 1;
          fraction -= 2 ** m;
        }
      } else {
        fraction = roundHalfEven((a / 2 ** exp - 1) * 2 ** m);
        if (fraction >= 2 ** m) {
          fraction = 0;
          biased++;
        }
      }
      if (biased >= maxExponent || !Number.isFinite(a)) {
        biased = maxExponent;
        fraction = 0;
      }
    }
    return (BigInt(sign) << BigInt(e + m)) | (BigInt(biased) << BigInt(m)) | BigInt(fraction);
  }

  valueOf(bits: bigint): number {
    const e = this.exponent;
    const m = this.mantissa;
    const sign = Number((bits >> BigInt(e + m)) & 1n) === 1 ? -1 : 1;
    const biased = Number((bits >> BigInt(m)) & mask(e));
    const fraction = Number(bits & mask(m));
    if (biased === 2 ** e - 1) return fraction === 0 ? sign * Infinity : NaN;
    if (biased === 0) return sign * (fraction / 2 ** m) * 2 ** (1 - this.bias);
    return sign * (1 + fraction / 2 ** m) * 2 ** (biased - this.bias);
  }

  plus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    if (b.constValue(lhs) === 0n) return rhs;
    if (b.constValue(rhs) === 0n) return lhs;
    return b.extern(this.operators.add, [lhs, rhs]);
  }

  minus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    if (b.constValue(rhs) === 0n) return lhs;
    return b.extern(this.operators.sub, [lhs, rhs]);
  }

  times(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    const one = this.bitsOf(1);
    for (const [value, other] of [[b.constValue(lhs), rhs], [b.constValue(rhs), lhs]] as const) {
      if (value === one) return other;
      if (value === 0n) return b.zeros(this.size);
    }
    return b.extern(this.operators.mul, [lhs, rhs]);
  }

  sample(random: () => number): number {
    return this.valueOf(this.bitsOf(random() * 2 - 1));
  }

  toString(): string {
    return `IEEE754(${this.exponent}, ${this.mantissa})`;
  }
}

/** Complex numbers as two lanes of `inner`: the real part in the low bits. */
export class ComplexHW extends HW<Complex> {
  readonly size: number;
  readonly software = complexRing;

  constructor(readonly inner: HW<number>) {
    super();
    this.size = 2 * inner.size;
  }

  re(b: GraphBuilder, value: NodeId): NodeId {
    return b.tap(value, 0, this.inner.size);
  }

  im(b: GraphBuilder, value: NodeId): NodeId {
    return b.tap(value, this.inner.size, this.inner.size);
  }

  make(b: GraphBuilder, re: NodeId, im: NodeId): NodeId {
    return b.concat([im, re]);
  }

  bitsOf(value: Complex): bigint {
    return (this.inner.bitsOf(value.im) << BigInt(this.inner.size)) | this.inner.bitsOf(value.re);
  }

  valueOf(bits: bigint): Complex {
    const width = BigInt(this.inner.size);
    return new Complex(this.inner.valueOf(bits & mask(this.inner.size)), this.inner.valueOf(bits >> width));
  }

  plus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return this.make(b,
      this.inner.plus(b, this.re(b, lhs), this.re(b, rhs)),
      this.inner.plus(b, this.im(b, lhs), this.im(b, rhs)));
  }

  minus(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    return this.make(b,
      this.inner.minus(b, this.re(b, lhs), this.re(b, rhs)),
      this.inner.minus(b, this.im(b, lhs), this.im(b, rhs)));
  }

  times(b: GraphBuilder, lhs: NodeId, rhs: NodeId): NodeId {
    const inner = this.inner;
    const [ar, ai, br, bi] = [this.re(b, lhs), this.im(b, lhs), this.re(b, rhs), this.im(b, rhs)];
    return this.make(b,
      inner.minus(b, inner.times(b, ar, br), inner.times(b, ai, bi)),
      inner.plus(b, inner.times(b, ar, bi), inner.times(b, ai, br)));
  }

  constant(b: GraphBuilder, value: Complex): NodeId {
    return this.make(b,
      this.inner.constant(b, new Complex(value.re, 0)),
      this.inner.constant(b, new Complex(value.im, 0)));
  }

  toComplex(value: Complex): Complex {
    return value;
  }

  sample(random: () => number): Complex {
    return new Complex(this.inner.sample(random), this.inner.sample(random));
  }

  toString(): string {
    return `Complex(${this.inner.toString()})`;
  }
}
