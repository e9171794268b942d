// Shared fixtures: seeded random matrices and reference transforms

import { createRandom, randomInt } from '../src/simulator/random.js';
import type { Random } from '../src/simulator/random.js';
import { GF2 } from '../src/linalg/field.js';
import { Matrix } from '../src/linalg/matrix.js';
import { Complex } from '../src/linalg/complex.js';

export { createRandom };

export function randomMatrix(random: Random, rows: number, cols: number): Matrix {
  return Matrix.tabulate(GF2, rows, cols, () => randomInt(random, 2));
}

/** Uniformly drawn invertible GF(2) matrix (rejection sampling). */
export function randomInvertible(random: Random, n: number): Matrix {
  for (;;) {
    const candidate = randomMatrix(random, n, n);
    if (candidate.isInvertible()) return candidate;
  }
}

export function basis(size: number, index: number): number[] {
  return Array.from({ length: size }, (_, i) => (i === index ? 1 : 0));
}

export function popcount(value: number): number {
  let count = 0;
  for (let v = value; v !== 0; v &= v - 1) count++;
  return count;
}

/** Walsh-Hadamard matrix entry (-1)^popcount(i & j). */
export function hadamard(i: number, j: number): number {
  return popcount(i & j) % 2 === 0 ? 1 : -1;
}

/** Direct O(N^2) DFT. */
export function dft(values: readonly Complex[]): Complex[] {
  const size = values.length;
  return values.map((_, k) => values.reduce((acc, x, q) => {
    const angle = (-2 * Math.PI * q * k) / size;
    return acc.plus(x.times(new Complex(Math.cos(angle), Math.sin(angle))));
  }, Complex.ZERO));
}

export function randomComplex(random: Random, size: number): Complex[] {
  return Array.from({ length: size }, () => new Complex(random() * 2 - 1, random() * 2 - 1));
}

export function maxDistance(lhs: readonly Complex[], rhs: readonly Complex[]): number {
  return lhs.reduce((max, v, i) => Math.max(max, v.minus(rhs[i]).abs()), 0);
}
