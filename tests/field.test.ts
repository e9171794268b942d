import { describe, it, expect } from 'vitest';
import { GF2, GF4, GF8, GF16 } from '../src/linalg/field.js';
import { DomainError } from '../src/errors.js';

describe('GF(2)', () => {
  it('adds with xor and multiplies with and', () => {
    expect(GF2.plus(1, 1)).toBe(0);
    expect(GF2.plus(1, 0)).toBe(1);
    expect(GF2.times(1, 1)).toBe(1);
    expect(GF2.times(1, 0)).toBe(0);
    expect(GF2.inverse(1)).toBe(1);
  });

  it('rejects values outside the field', () => {
    expect(() => GF2.plus(2, 0)).toThrow(DomainError);
  });
});

describe('Extension fields', () => {
  it('reduces products modulo the field polynomial', () => {
    expect(GF4.times(2, 2)).toBe(3);   // x * x = x + 1
    expect(GF4.times(2, 3)).toBe(1);
    expect(GF8.times(2, 4)).toBe(3);   // x^3 = x + 1
    expect(GF16.times(8, 2)).toBe(3);  // x^4 = x + 1
  });

  it('has no inverse of zero', () => {
    expect(() => GF8.inverse(0)).toThrow(DomainError);
  });

  for (const field of [GF4, GF8, GF16]) {
    describe(field.name, () => {
      const elements = Array.from({ length: field.order }, (_, i) => i);

      it('has characteristic 2', () => {
        for (const x of elements) expect(field.plus(x, x)).toBe(0);
      });

      it('inverts every nonzero element', () => {
        for (const x of elements.slice(1)) expect(field.times(x, field.inverse(x))).toBe(1);
      });

      it('distributes multiplication over addition', () => {
        for (const a of elements) {
          for (const b of elements) {
            for (const c of elements) {
              expect(field.times(a, field.plus(b, c))).toBe(field.plus(field.times(a, b), field.times(a, c)));
            }
          }
        }
      });

      it('multiplies commutatively', () => {
        for (const a of elements) {
          for (const b of elements) expect(field.times(a, b)).toBe(field.times(b, a));
        }
      });
    });
  }
});
