// WHT factorizations: the Walsh-Hadamard transform as a tensor product of per-digit butterflies

import { Lmat } from '../linalg/permutation.js';
import { butterfly, itProduct, linearPerm, product, tensor } from '../spl/terms.js';
import type { SPL } from '../spl/terms.js';
import { digitSwap, radixDigits } from './dft.js';

export function WHT(n: number, r: number): SPL {
  const s = radixDigits(n, r, 'wht');
  const base = butterfly('wht', r);
  if (s === 1) return base;
  const stage = tensor(n - r, base);
  const factors: SPL[] = [];
  for (let l = s - 1; l >= 0; l--) {
    const swap = linearPerm([digitSwap(n, r, l)]);
    factors.push(swap, stage, swap);
  }
  return product(factors);
}

export function WHTPease(n: number, r: number): SPL {
  const s = radixDigits(n, r, 'wht');
  const base = butterfly('wht', r);
  if (s === 1) return base;
  const stride = linearPerm([Lmat(r, n)]);
  const stage = tensor(n - r, base);
  const factors: SPL[] = [];
  for (let l = 0; l < s; l++) factors.push(stride, stage);
  return product(factors);
}

export function WHTItPease(n: number, r: number): SPL {
  const s = radixDigits(n, r, 'wht');
  const base = butterfly('wht', r);
  if (s === 1) return base;
  return itProduct(s, product([linearPerm([Lmat(r, n)]), tensor(n - r, base)]));
}
