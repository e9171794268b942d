import { describe, it, expect } from 'vitest';
import { GF2, GF4 } from '../src/linalg/field.js';
import { Matrix, Vec } from '../src/linalg/matrix.js';
import { Cmat, Lmat, Rmat, applyToIndex, permute } from '../src/linalg/permutation.js';
import { DomainError } from '../src/errors.js';
import { createRandom, randomInvertible } from './helpers.js';

describe('Vec', () => {
  it('converts integers most significant bit first', () => {
    const v = Vec.fromInt(3, 6);
    expect(v.toArray()).toEqual([1, 1, 0]);
    expect(v.toInt()).toBe(6);
  });

  it('rejects out of range indices', () => {
    expect(() => Vec.fromInt(3, 1).get(3)).toThrow(DomainError);
  });
});

describe('Matrix', () => {
  it('inverts over GF(2)', () => {
    const m = Matrix.fromRows(GF2, [[1, 1], [0, 1]]);
    expect(m.inverse().equals(m)).toBe(true);
    expect(m.multiply(m.inverse()).isIdentity()).toBe(true);
  });

  it('inverts over GF(4)', () => {
    const m = Matrix.fromRows(GF4, [[2, 0], [0, 3]]);
    expect(m.inverse().equals(Matrix.fromRows(GF4, [[3, 0], [0, 2]]))).toBe(true);
  });

  it('throws on singular matrices', () => {
    const m = Matrix.fromRows(GF2, [[1, 1], [1, 1]]);
    expect(m.rank()).toBe(1);
    expect(m.isInvertible()).toBe(false);
    expect(() => m.inverse()).toThrow(DomainError);
  });

  it('builds block matrices', () => {
    const a = Matrix.identity(GF2, 1);
    const b = Matrix.fromRows(GF2, [[0, 1], [1, 0]]);
    const sum = a.directSum(b);
    expect(sum.rows).toBe(3);
    expect(sum.toString()).toBe('1 0 0\n0 0 1\n0 1 0');
    expect(sum.slice(1, 3, 1, 3).equals(b)).toBe(true);
    expect(a.beside(Matrix.zeros(GF2, 1, 2)).stack(Matrix.zeros(GF2, 2, 1).beside(b)).equals(sum)).toBe(true);
  });

  it('rejects mismatched shapes', () => {
    expect(() => Matrix.identity(GF2, 2).multiply(Matrix.identity(GF2, 3))).toThrow(DomainError);
    expect(() => Matrix.identity(GF2, 2).plus(Matrix.zeros(GF2, 2, 1))).toThrow(DomainError);
  });

  it('inverts random invertible matrices', () => {
    const random = createRandom(7);
    for (let i = 0; i < 20; i++) {
      const m = randomInvertible(random, 5);
      expect(m.multiply(m.inverse()).isIdentity()).toBe(true);
      expect(m.transpose().transpose().equals(m)).toBe(true);
    }
  });
});

describe('Permutation matrices', () => {
  it('rotates indices', () => {
    expect(applyToIndex(Cmat(3), 0b100)).toBe(0b001);
    expect(applyToIndex(Lmat(1, 3), 0b100)).toBe(0b010);
    expect(applyToIndex(Lmat(1, 3), 0b001)).toBe(0b100);
    expect(Cmat(4).power(4).isIdentity()).toBe(true);
  });

  it('reverses digits', () => {
    expect(applyToIndex(Rmat(1, 3), 0b110)).toBe(0b011);
    expect(applyToIndex(Rmat(2, 4), 0b0111)).toBe(0b1101);
    expect(() => Rmat(2, 3)).toThrow(DomainError);
  });

  it('moves the element at x to P x', () => {
    expect(permute(Lmat(1, 3), [0, 1, 2, 3, 4, 5, 6, 7])).toEqual([0, 2, 4, 6, 1, 3, 5, 7]);
  });

  it('rejects vectors of the wrong size', () => {
    expect(() => permute(Lmat(1, 3), [0, 1, 2, 3])).toThrow(DomainError);
  });
});
