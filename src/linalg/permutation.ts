// Permutation matrices: generator matrices and bit-linear index permutations over GF(2)

import { DomainError } from '../errors.js';
import { GF2 } from './field.js';
import { Matrix, Vec } from './matrix.js';

/** Rotation of an n-bit index by one bit to the left. */
export function Cmat(n: number): Matrix {
  return Matrix.tabulate(GF2, n, n, (i, j) => ((i + 1) % n === j ? 1 : 0));
}

/** Rotation of an n-bit index by m bits to the right (stride permutation). */
export function Lmat(m: number, n: number): Matrix {
  return Cmat(n).power(((n - m) % n + n) % n);
}

/** Reversal of the radix-2^r digits of an n-bit index (n must be a multiple of r). */
export function Rmat(r: number, n: number): Matrix {
  if (r < 1 || n % r !== 0) {
    throw new DomainError(`cannot reverse radix-2^${r} digits of a ${n}-bit index`);
  }
  const digits = n / r;
  return Matrix.tabulate(GF2, n, n, (i, j) => {
    const digit = Math.floor(i / r);
    return j === r * (digits - 1 - digit) + (i % r) ? 1 : 0;
  });
}

/** Index an element at `index` is moved to by the permutation `matrix`. */
export function applyToIndex(matrix: Matrix, index: number): number {
  return matrix.apply(Vec.fromInt(matrix.cols, index)).toInt();
}

/** Returns `w` with `w[i] = values[P^-1 i]`, i.e. the element at `x` moves to `P x`. */
export function permute<T>(matrix: Matrix, values: readonly T[]): T[] {
  if (values.length !== 2 ** matrix.rows) {
    throw new DomainError(`${matrix.rows}x${matrix.cols} matrix does not permute ${values.length} elements`);
  }
  const inverse = matrix.inverse();
  const result: T[] = [];
  for (let i = 0; i < values.length; i++) {
    const source = applyToIndex(inverse, i);
    if (source < 0 || source >= values.length) {
      throw new DomainError(`index ${source} outside vector of size ${values.length}`);
    }
    result.push(values[source]);
  }
  return result;
}
