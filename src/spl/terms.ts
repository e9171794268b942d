// SPL terms: the combinator algebra describing a linear transform independent of streaming width

import { ConfigurationError, DomainError } from '../errors.js';
import { Complex } from '../linalg/complex.js';
import { GF2 } from '../linalg/field.js';
import { Matrix } from '../linalg/matrix.js';

export type Transform = 'dft' | 'wht';

/** Base transform on 2^n points (n in 1..4), realised as a closed-form network. */
export interface Butterfly {
  kind: 'butterfly';
  n: number;
  transform: Transform;
}

/** Sequential composition; the last factor is applied first. */
export interface Product {
  kind: 'product';
  n: number;
  factors: readonly SPL[];
}

/** `factor` applied independently to 2^r consecutive blocks. */
export interface ITensor {
  kind: 'itensor';
  n: number;
  r: number;
  factor: Repeatable;
}

/** Bit-linear permutation; dataset d uses matrices[d % matrices.length]. */
export interface LinearPerm {
  kind: 'linearPerm';
  n: number;
  matrices: readonly Matrix[];
}

/** Elementwise scaling; dataset d uses coefficients[d % coefficients.length]. */
export interface Diagonal {
  kind: 'diagonal';
  n: number;
  coefficients: readonly (readonly Complex[])[];
}

/**
 * `factor` applied r times; between consecutive applications `endLoop` is
 * applied. Iteration i sees dataset index i.
 */
export interface ItProduct {
  kind: 'itProduct';
  n: number;
  r: number;
  factor: SPL;
  endLoop: SPL | null;
}

export interface Identity {
  kind: 'identity';
  n: number;
}

export type SPL = Butterfly | Product | ITensor | LinearPerm | Diagonal | ItProduct | Identity;

// Terms that may be repeated by ITensor and folded in time
export type Repeatable = Butterfly;

export const MAX_BUTTERFLY_SIZE = 4;

export function isRepeatable(term: SPL): term is Repeatable {
  return term.kind === 'butterfly';
}

export function butterfly(transform: Transform, n: number): Butterfly {
  if (!Number.isInteger(n) || n < 1 || n > MAX_BUTTERFLY_SIZE) {
    throw new DomainError(`unsupported radix: ${2 ** n} (${transform.toUpperCase()} base cases cover 2 to 16 points)`);
  }
  return { kind: 'butterfly', n, transform };
}

export function identity(n: number): Identity {
  if (!Number.isInteger(n) || n < 0) throw new DomainError(`invalid identity size ${n}`);
  return { kind: 'identity', n };
}

export function itensor(r: number, factor: Repeatable): SPL {
  if (!Number.isInteger(r) || r < 0) throw new DomainError(`invalid repeat count 2^${r}`);
  if (r === 0) return factor;
  return { kind: 'itensor', n: factor.n + r, r, factor };
}

export function linearPerm(matrices: readonly Matrix[]): LinearPerm {
  if (matrices.length === 0) throw new DomainError('a linear permutation needs at least one matrix');
  const n = matrices[0].rows;
  for (const matrix of matrices) {
    if (matrix.field !== GF2) {
      throw new DomainError(`permutation matrices must be over GF(2), got ${matrix.field.name}`);
    }
    if (!matrix.isSquare) {
      throw new DomainError(`permutation matrix is not square (${matrix.rows}x${matrix.cols})`);
    }
    if (matrix.rows !== n) {
      throw new DomainError(`permutation matrices have different sizes (${n} and ${matrix.rows})`);
    }
    if (!matrix.isInvertible()) {
      throw new DomainError(`permutation matrix is singular:\n${matrix.toString()}`);
    }
  }
  return { kind: 'linearPerm', n, matrices: [...matrices] };
}

export function diagonal(coefficients: readonly (readonly Complex[])[]): Diagonal {
  if (coefficients.length === 0) throw new DomainError('a diagonal needs at least one coefficient vector');
  const size = coefficients[0].length;
  const n = Math.log2(size);
  if (!Number.isInteger(n)) throw new DomainError(`diagonal size ${size} is not a power of two`);
  for (const vector of coefficients) {
    if (vector.length !== size) {
      throw new DomainError(`diagonal coefficient vectors have different sizes (${size} and ${vector.length})`);
    }
  }
  return { kind: 'diagonal', n, coefficients: coefficients.map((v) => [...v]) };
}

export function itProduct(r: number, factor: SPL, endLoop?: SPL): ItProduct {
  if (!Number.isInteger(r) || r < 1) throw new DomainError(`invalid iteration count ${r}`);
  if (endLoop !== undefined && endLoop.n !== factor.n) {
    throw new DomainError(`loop body sizes differ (${factor.n} and ${endLoop.n})`);
  }
  return { kind: 'itProduct', n: factor.n, r, factor, endLoop: endLoop ?? null };
}

/** True when the term is the identity on every dataset. */
export function isIdentity(term: SPL): boolean {
  switch (term.kind) {
    case 'identity':
      return true;
    case 'linearPerm':
      return term.matrices.every((m) => m.isIdentity());
    case 'diagonal':
      return term.coefficients.every((v) => v.every((c) => c.equals(Complex.ONE)));
    case 'product':
      return term.factors.every(isIdentity);
    default:
      return false;
  }
}

// Pairs entries of two per-dataset lists when one length divides the other trivially
function zipPerDataset<T>(lhs: readonly T[], rhs: readonly T[], f: (a: T, b: T) => T): T[] | null {
  if (lhs.length !== rhs.length && lhs.length !== 1 && rhs.length !== 1) return null;
  const count = Math.max(lhs.length, rhs.length);
  return Array.from({ length: count }, (_, i) => f(lhs[i % lhs.length], rhs[i % rhs.length]));
}

function merge(lhs: SPL, rhs: SPL): SPL | null {
  if (lhs.kind === 'linearPerm' && rhs.kind === 'linearPerm') {
    const matrices = zipPerDataset(lhs.matrices, rhs.matrices, (a, b) => a.multiply(b));
    return matrices === null ? null : linearPerm(matrices);
  }
  if (lhs.kind === 'diagonal' && rhs.kind === 'diagonal') {
    const coefficients = zipPerDataset(lhs.coefficients, rhs.coefficients,
      (a, b) => a.map((c, i) => c.times(b[i])));
    return coefficients === null ? null : diagonal(coefficients);
  }
  return null;
}

/**
 * Product of `factors` (applied right to left). Nested products are
 * flattened, identities dropped and adjacent permutations or diagonals
 * multiplied out.
 */
export function product(factors: readonly SPL[]): SPL {
  if (factors.length === 0) throw new DomainError('a product needs at least one factor');
  const n = factors[0].n;
  const flat: SPL[] = [];
  for (const factor of factors) {
    if (factor.n !== n) throw new DomainError(`product factors have different sizes (${n} and ${factor.n})`);
    if (factor.kind === 'product') flat.push(...factor.factors);
    else flat.push(factor);
  }

  const result: SPL[] = [];
  for (const factor of flat) {
    if (isIdentity(factor)) continue;
    const last = result[result.length - 1];
    const merged = last === undefined ? null : merge(last, factor);
    if (merged === null) {
      result.push(factor);
    } else {
      result.pop();
      if (!isIdentity(merged)) result.push(merged);
    }
  }
  if (result.length === 0) return identity(n);
  if (result.length === 1) return result[0];
  return { kind: 'product', n, factors: result };
}

/** I_{2^r} ⊗ term, distributed down to the repeatable leaves. */
export function tensor(r: number, term: SPL): SPL {
  if (!Number.isInteger(r) || r < 0) throw new DomainError(`invalid repeat count 2^${r}`);
  if (r === 0) return term;
  switch (term.kind) {
    case 'butterfly':
      return itensor(r, term);
    case 'itensor':
      return itensor(r + term.r, term.factor);
    case 'product':
      return product(term.factors.map((f) => tensor(r, f)));
    case 'linearPerm':
      return linearPerm(term.matrices.map((m) => Matrix.identity(GF2, r).directSum(m)));
    case 'diagonal':
      return diagonal(term.coefficients.map((v) => Array.from({ length: v.length << r }, (_, i) => v[i % v.length])));
    case 'identity':
      return identity(term.n + r);
    case 'itProduct':
      throw new ConfigurationError('non-repeatable factor: an iterative product cannot be tensored');
  }
}

export function describe(term: SPL): string {
  switch (term.kind) {
    case 'butterfly':
      return `${term.transform.toUpperCase()}${2 ** term.n}`;
    case 'product':
      return term.factors.map(describe).join(' * ');
    case 'itensor':
      return `(I${2 ** term.r} x ${describe(term.factor)})`;
    case 'linearPerm':
      return `LinearPerm(n=${term.n}, ${term.matrices.length} matrices)`;
    case 'diagonal':
      return `Diagonal(n=${term.n}, ${term.coefficients.length} vectors)`;
    case 'itProduct':
      return `ItProduct(${term.r}, ${describe(term.factor)}${term.endLoop ? `, ${describe(term.endLoop)}` : ''})`;
    case 'identity':
      return `I${2 ** term.n}`;
  }
}
