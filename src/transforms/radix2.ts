// Radix-2 decomposition of the base butterflies

import { DomainError } from '../errors.js';
import type { Butterfly, SPL } from '../spl/terms.js';
import { CTDFT } from './dft.js';
import { WHT } from './wht.js';

/** The butterfly as a network of 2-point butterflies, permutations and twiddles. */
export function radix2(term: Butterfly): SPL {
  if (term.n === 1) {
    throw new DomainError('a 2-point butterfly has no smaller decomposition');
  }
  return term.transform === 'dft' ? CTDFT(term.n, 1) : WHT(term.n, 1);
}
