import { describe, it, expect } from 'vitest';
import { GF2 } from '../src/linalg/field.js';
import { Matrix } from '../src/linalg/matrix.js';
import { Lmat, Rmat } from '../src/linalg/permutation.js';
import { DomainError } from '../src/errors.js';
import { couplingMatrix, decompose, recompose } from '../src/streaming/decompose.js';
import { createRandom, randomInvertible } from './helpers.js';

describe('decompose', () => {
  it('reassembles random permutations for every split', () => {
    const random = createRandom(11);
    for (let trial = 0; trial < 10; trial++) {
      const P = randomInvertible(random, 5);
      for (let t = 0; t <= 5; t++) {
        const stages = decompose(P, t);
        expect(recompose(stages).equals(P)).toBe(true);
        expect(stages.L1.isInvertible()).toBe(true);
        expect(stages.C4.isInvertible()).toBe(true);
      }
    }
  });

  it('splits the stride and digit reversal permutations', () => {
    for (const P of [Lmat(1, 4), Lmat(2, 4), Rmat(1, 4), Rmat(2, 4)]) {
      for (let t = 1; t < 4; t++) {
        expect(recompose(decompose(P, t)).equals(P)).toBe(true);
      }
    }
  });

  it('needs no coupling when the lane block is invertible', () => {
    const stages = decompose(Matrix.identity(GF2, 4), 2);
    expect(stages.L2.isZero()).toBe(true);
    expect(stages.R2.isZero()).toBe(true);
    expect(stages.C4.isIdentity()).toBe(true);
  });

  it('couples rows that depend on earlier ones', () => {
    // P1 has two equal rows; the second is fixed with the only row of P3
    const P1 = Matrix.fromRows(GF2, [[1, 0], [1, 0]]);
    const P3 = Matrix.fromRows(GF2, [[0, 1]]);
    const L2 = couplingMatrix(P1, P3);
    expect(L2.toString()).toBe('0\n1');
    expect(P1.plus(L2.multiply(P3)).isInvertible()).toBe(true);
  });

  it('rejects splits outside the index', () => {
    expect(() => decompose(Matrix.identity(GF2, 3), 4)).toThrow(DomainError);
  });
});
