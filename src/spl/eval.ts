// Evaluation: the reference semantics of SPL terms over any ring

import { DomainError } from '../errors.js';
import { Complex, omega } from '../linalg/complex.js';
import { permute } from '../linalg/permutation.js';
import type { Ring } from './ring.js';
import type { Butterfly, SPL } from './terms.js';

const MINUS_ONE = new Complex(-1, 0);

function popcount(value: number): number {
  let count = 0;
  for (let v = value; v !== 0; v &= v - 1) count++;
  return count;
}

/**
 * Closed form of a base transform: y[k] = sum_q w^(qk) x[q] for the DFT and
 * y[k] = sum_q (-1)^popcount(q & k) x[q] for the WHT. Coefficients of +1
 * and -1 become additions and subtractions.
 */
export function evaluateButterfly<T>(term: Butterfly, ring: Ring<T>, inputs: readonly T[]): T[] {
  const size = 2 ** term.n;
  const outputs: T[] = [];
  for (let k = 0; k < size; k++) {
    let acc = inputs[0];
    for (let q = 1; q < size; q++) {
      const w = term.transform === 'dft'
        ? omega(term.n, q * k)
        : popcount(q & k) % 2 === 0 ? Complex.ONE : MINUS_ONE;
      if (w.equals(Complex.ONE)) acc = ring.plus(acc, inputs[q]);
      else if (w.equals(MINUS_ONE)) acc = ring.minus(acc, inputs[q]);
      else acc = ring.plus(acc, ring.scale(inputs[q], w));
    }
    outputs.push(acc);
  }
  return outputs;
}

/**
 * Applies `term` to `inputs` (2^n values) as dataset number `set`. The
 * term is walked recursively; SPL terms are shallow next to the compiled
 * hardware.
 */
export function evaluate<T>(term: SPL, ring: Ring<T>, inputs: readonly T[], set = 0): T[] {
  if (inputs.length !== 2 ** term.n) {
    throw new DomainError(`term of size 2^${term.n} applied to ${inputs.length} values`);
  }
  switch (term.kind) {
    case 'identity':
      return [...inputs];
    case 'butterfly':
      return evaluateButterfly(term, ring, inputs);
    case 'product':
      return term.factors.reduceRight<T[]>((values, factor) => evaluate(factor, ring, values, set), [...inputs]);
    case 'itensor': {
      const block = 2 ** term.factor.n;
      const outputs: T[] = [];
      for (let start = 0; start < inputs.length; start += block) {
        outputs.push(...evaluate(term.factor, ring, inputs.slice(start, start + block), set));
      }
      return outputs;
    }
    case 'linearPerm':
      return permute(term.matrices[set % term.matrices.length], inputs);
    case 'diagonal': {
      const coefficients = term.coefficients[set % term.coefficients.length];
      return inputs.map((value, i) => ring.scale(value, coefficients[i]));
    }
    case 'itProduct': {
      let values = [...inputs];
      for (let i = 0; i < term.r - 1; i++) {
        values = evaluate(term.factor, ring, values, i);
        if (term.endLoop !== null) values = evaluate(term.endLoop, ring, values, i);
      }
      return evaluate(term.factor, ring, values, term.r - 1);
    }
  }
}
