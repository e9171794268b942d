// Field: GF(2) and the small binary extension fields GF(4), GF(8), GF(16)

import { DomainError } from '../errors.js';

export interface Field {
  readonly name: string;
  /** Number of elements; elements are the integers 0 .. order-1. */
  readonly order: number;
  plus(lhs: number, rhs: number): number;
  minus(lhs: number, rhs: number): number;
  negate(value: number): number;
  times(lhs: number, rhs: number): number;
  inverse(value: number): number;
  contains(value: number): boolean;
}

/**
 * GF(2^m) with elements encoded as polynomials over GF(2) (bit i is the
 * coefficient of x^i). Multiplication is carry-less and reduced modulo a
 * primitive polynomial of degree m.
 */
class BinaryExtensionField implements Field {
  readonly order: number;
  private readonly inverses: number[];

  constructor(
    readonly name: string,
    private readonly degree: number,
    private readonly modulus: number
  ) {
    this.order = 1 << degree;
    this.inverses = new Array<number>(this.order).fill(0);
    for (let a = 1; a < this.order; a++) {
      for (let b = 1; b < this.order; b++) {
        if (this.times(a, b) === 1) {
          this.inverses[a] = b;
          break;
        }
      }
    }
  }

  plus(lhs: number, rhs: number): number {
    this.check(lhs);
    this.check(rhs);
    return lhs ^ rhs;
  }

  // Characteristic 2: subtraction and addition coincide
  minus(lhs: number, rhs: number): number {
    return this.plus(lhs, rhs);
  }

  negate(value: number): number {
    this.check(value);
    return value;
  }

  times(lhs: number, rhs: number): number {
    this.check(lhs);
    this.check(rhs);
    let product = 0;
    for (let bit = 0; bit < this.degree; bit++) {
      if ((rhs >> bit) & 1) product ^= lhs << bit;
    }
    for (let bit = 2 * this.degree - 2; bit >= this.degree; bit--) {
      if ((product >> bit) & 1) product ^= this.modulus << (bit - this.degree);
    }
    return product;
  }

  inverse(value: number): number {
    this.check(value);
    if (value === 0) {
      throw new DomainError(`${this.name}: zero has no multiplicative inverse`);
    }
    return this.inverses[value];
  }

  contains(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < this.order;
  }

  toString(): string {
    return this.name;
  }

  private check(value: number): void {
    if (!this.contains(value)) {
      throw new DomainError(`${value} is not an element of ${this.name}`);
    }
  }
}

export const GF2: Field = new BinaryExtensionField('GF(2)', 1, 0b11);
export const GF4: Field = new BinaryExtensionField('GF(4)', 2, 0b111);
export const GF8: Field = new BinaryExtensionField('GF(8)', 3, 0b1011);
export const GF16: Field = new BinaryExtensionField('GF(16)', 4, 0b10011);
