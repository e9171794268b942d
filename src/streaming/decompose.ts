// Permutation decomposition: splits a bit-linear permutation into lane and cycle stages

import { DomainError } from '../errors.js';
import { GF2 } from '../linalg/field.js';
import { Matrix } from '../linalg/matrix.js';

/**
 * P = Spatial(L1, L2) * Temporal(C3, C4) * Spatial(I, R2) for a split of the
 * index into t cycle bits (most significant) and k lane bits.
 */
export interface PermutationStages {
  L1: Matrix; // k x k
  L2: Matrix; // k x t
  C3: Matrix; // t x k
  C4: Matrix; // t x t
  R2: Matrix; // k x t
}

/** [[I, 0], [P2, P1]]: the lane index becomes P2 c + P1 j. */
export function spatialMatrix(P1: Matrix, P2: Matrix): Matrix {
  return Matrix.identity(GF2, P2.cols).beside(Matrix.zeros(GF2, P2.cols, P1.cols)).stack(P2.beside(P1));
}

/** [[P4, P3], [0, I]]: the cycle index becomes P4 c + P3 j. */
export function temporalMatrix(P3: Matrix, P4: Matrix): Matrix {
  return P4.beside(P3).stack(Matrix.zeros(GF2, P3.cols, P4.cols).beside(Matrix.identity(GF2, P3.cols)));
}

// Independent set of GF(2) row vectors encoded as bit masks, kept in echelon form
class RowBasis {
  private rows = new Map<number, number>(); // Leading bit -> row

  reduce(row: number): number {
    let value = row;
    for (let bit = 31 - Math.clz32(value); value !== 0 && bit >= 0; bit--) {
      const pivot = this.rows.get(bit);
      if ((value >>> bit) & 1 && pivot !== undefined) value ^= pivot;
    }
    return value;
  }

  add(row: number): boolean {
    const reduced = this.reduce(row);
    if (reduced === 0) return false;
    this.rows.set(31 - Math.clz32(reduced), reduced);
    return true;
  }
}

/**
 * Chooses L2 (k x t) such that P1 + L2 P3 is invertible. Rows are fixed one
 * at a time: a row of P1 independent of those chosen so far is kept, any
 * other is coupled with one row of P3 that restores independence. Such a row
 * exists whenever P is invertible.
 */
export function couplingMatrix(P1: Matrix, P3: Matrix): Matrix {
  const k = P1.rows;
  const t = P3.rows;
  const coupling = Array.from({ length: k }, () => new Array<number>(t).fill(0));
  const basis = new RowBasis();
  const p3Rows = Array.from({ length: t }, (_, l) => P3.row(l).toInt());
  for (let j = 0; j < k; j++) {
    const row = P1.row(j).toInt();
    if (basis.add(row)) continue;
    const l = p3Rows.findIndex((candidate) => basis.reduce(row ^ candidate) !== 0);
    if (l < 0) throw new DomainError('permutation matrix is singular');
    basis.add(row ^ p3Rows[l]);
    coupling[j][l] = 1;
  }
  return Matrix.tabulate(GF2, k, t, (i, l) => coupling[i][l]);
}

export function decompose(P: Matrix, t: number): PermutationStages {
  const n = P.rows;
  if (!P.isSquare || t < 0 || t > n) {
    throw new DomainError(`cannot split ${P.rows}x${P.cols} permutation at ${t} cycle bits`);
  }
  const P4 = P.slice(0, t, 0, t);
  const P3 = P.slice(0, t, t, n);
  const P2 = P.slice(t, n, 0, t);
  const P1 = P.slice(t, n, t, n);
  const L2 = couplingMatrix(P1, P3);
  const L1 = P1.plus(L2.multiply(P3));
  const R2 = L1.inverse().multiply(P2.plus(L2.multiply(P4)));
  const C4 = P4.plus(P3.multiply(R2));
  return { L1, L2, C3: P3, C4, R2 };
}

export function recompose(stages: PermutationStages): Matrix {
  const { L1, L2, C3, C4, R2 } = stages;
  return spatialMatrix(L1, L2)
    .multiply(temporalMatrix(C3, C4))
    .multiply(spatialMatrix(Matrix.identity(GF2, L1.rows), R2));
}

export function isSpatialIdentity(P1: Matrix, P2: Matrix): boolean {
  return P1.isIdentity() && P2.isZero();
}

export function isTemporalIdentity(P3: Matrix, P4: Matrix): boolean {
  return P4.isIdentity() && P3.isZero();
}
