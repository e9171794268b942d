// Rings: the arithmetic an SPL term needs to be evaluated over some value type

import { DomainError } from '../errors.js';
import type { Complex } from '../linalg/complex.js';

export interface Ring<T> {
  plus(lhs: T, rhs: T): T;
  minus(lhs: T, rhs: T): T;
  /** Multiplication by a constant coefficient. */
  scale(value: T, coefficient: Complex): T;
}

export const realRing: Ring<number> = {
  plus: (lhs, rhs) => lhs + rhs,
  minus: (lhs, rhs) => lhs - rhs,
  scale: (value, coefficient) => {
    if (coefficient.im !== 0) {
      throw new DomainError(`real values cannot be scaled by ${coefficient.toString()}`);
    }
    return value * coefficient.re;
  },
};

export const complexRing: Ring<Complex> = {
  plus: (lhs, rhs) => lhs.plus(rhs),
  minus: (lhs, rhs) => lhs.minus(rhs),
  scale: (value, coefficient) => value.times(coefficient),
};
