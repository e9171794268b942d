// DFT factorizations: Cooley-Tukey, Pease and the iterative (looped) Pease variants

import { DomainError } from '../errors.js';
import { omega } from '../linalg/complex.js';
import type { Complex } from '../linalg/complex.js';
import { GF2 } from '../linalg/field.js';
import { Matrix } from '../linalg/matrix.js';
import { Lmat, Rmat } from '../linalg/permutation.js';
import { butterfly, diagonal, itProduct, linearPerm, product, tensor } from '../spl/terms.js';
import type { SPL, Transform } from '../spl/terms.js';

/** Number of radix-2^r digits of an n-bit index. */
export function radixDigits(n: number, r: number, transform: Transform = 'dft'): number {
  butterfly(transform, r);
  if (!Number.isInteger(n) || n < r || n % r !== 0) {
    throw new DomainError(`${transform.toUpperCase()} of size 2^${n} cannot be split into radix-${2 ** r} digits`);
  }
  return n / r;
}

/** Swaps radix-2^r digit `l` (counted from the least significant end) with digit 0. */
export function digitSwap(n: number, r: number, l: number): Matrix {
  const source = (bit: number): number => {
    if (bit < r) return bit + r * l;
    if (bit >= r * l && bit < r * (l + 1)) return bit - r * l;
    return bit;
  };
  return Matrix.tabulate(GF2, n, n, (i, j) => (n - 1 - j === source(n - 1 - i) ? 1 : 0));
}

function rotateLeft(value: number, amount: number, n: number): number {
  const a = amount % n;
  if (a === 0) return value;
  return ((value << a) | (value >>> (n - a))) & (2 ** n - 1);
}

/** Twiddles applied before the butterflies along digit l of the Cooley-Tukey factorization. */
export function twiddles(n: number, r: number, l: number): Complex[] {
  const s = n / r;
  const radix = 2 ** r;
  return Array.from({ length: 2 ** n }, (_, x) => {
    const q = Math.floor(x / radix ** l) % radix;
    const p = x % radix ** l;
    return omega(n, q * p * radix ** (s - l - 1));
  });
}

/** Twiddles of stage l in the constant-geometry layout, where digit l sits at position 0. */
export function peaseTwiddles(n: number, r: number, l: number): Complex[] {
  const logical = twiddles(n, r, l);
  return logical.map((_, y) => logical[rotateLeft(y, r * l, n)]);
}

export function CTDFT(n: number, r: number): SPL {
  const s = radixDigits(n, r);
  const base = butterfly('dft', r);
  if (s === 1) return base;
  const stage = tensor(n - r, base);
  const factors: SPL[] = [];
  for (let l = s - 1; l >= 0; l--) {
    const swap = linearPerm([digitSwap(n, r, l)]);
    factors.push(swap, stage, swap, diagonal([twiddles(n, r, l)]));
  }
  factors.push(linearPerm([Rmat(r, n)]));
  return product(factors);
}

export function Pease(n: number, r: number): SPL {
  const s = radixDigits(n, r);
  const base = butterfly('dft', r);
  if (s === 1) return base;
  const stride = linearPerm([Lmat(r, n)]);
  const stage = tensor(n - r, base);
  const factors: SPL[] = [];
  for (let l = s - 1; l >= 0; l--) {
    factors.push(stride, stage, diagonal([peaseTwiddles(n, r, l)]));
  }
  factors.push(linearPerm([Rmat(r, n)]));
  return product(factors);
}

/** Pease with the s identical stages folded into one loop; the twiddles vary per iteration. */
export function ItPease(n: number, r: number): SPL {
  const s = radixDigits(n, r);
  const base = butterfly('dft', r);
  if (s === 1) return base;
  const twiddlesPerStage = Array.from({ length: s }, (_, l) => peaseTwiddles(n, r, l));
  const body = product([linearPerm([Lmat(r, n)]), tensor(n - r, base), diagonal(twiddlesPerStage)]);
  return product([itProduct(s, body), linearPerm([Rmat(r, n)])]);
}

/**
 * ItPease with the digit reversal moved into the loop: iteration 0 applies
 * the reversal, the following ones the stride permutation.
 */
export function ItPeaseFused(n: number, r: number): SPL {
  const s = radixDigits(n, r);
  const base = butterfly('dft', r);
  if (s === 1) return base;
  const permutations = [Rmat(r, n), ...Array.from({ length: s }, () => Lmat(r, n))];
  const twiddlesPerStage = Array.from({ length: s }, (_, l) => peaseTwiddles(n, r, l));
  return itProduct(s + 1, linearPerm(permutations), product([tensor(n - r, base), diagonal(twiddlesPerStage)]));
}
