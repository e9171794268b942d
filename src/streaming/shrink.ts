// Shrinking: structurally smaller variants of a module, used to minimise failing cases

import {
  acyclicModule,
  chain,
  diagonalModule,
  itProductModule,
  spatialModule,
  temporalModule,
} from './compiler.js';
import { moduleSize } from './module.js';
import type { StreamingModule } from './module.js';

/**
 * Candidates with fewer product factors, fewer loop iterations, a smaller
 * tensor repeat count or a single dataset variant, largest first. Every
 * candidate is a valid module and strictly smaller by `moduleSize`.
 */
export function shrink<T>(module: StreamingModule<T>): StreamingModule<T>[] {
  const candidates: StreamingModule<T>[] = [];
  switch (module.kind) {
    case 'product': {
      const { factors } = module;
      factors.forEach((_, i) => {
        candidates.push(chain(factors.filter((__, j) => j !== i)));
      });
      factors.forEach((factor, i) => {
        for (const smaller of shrink(factor)) {
          // Smaller tensors change the dataset size and no longer fit the chain
          if (smaller.n !== module.n || smaller.k !== module.k) continue;
          candidates.push(chain(factors.map((f, j) => (j === i ? smaller : f))));
        }
      });
      candidates.push(...factors);
      break;
    }
    case 'itProduct':
      if (module.r > 1) candidates.push(itProductModule(module.r - 1, module.factor, module.endLoop));
      candidates.push(module.factor);
      if (module.endLoop !== null) candidates.push(module.endLoop);
      break;
    case 'acyclic':
      if (module.n > module.base.n) {
        const n = module.n - 1;
        candidates.push(acyclicModule(module.base, n, Math.min(module.k, n), module.hw));
      }
      break;
    case 'spatial':
      if (module.P1.length > 1) {
        candidates.push(spatialModule([module.P1[0]], [module.P2[0]], module.n, module.k, module.hw));
      }
      break;
    case 'temporal':
      if (module.P3.length > 1) {
        candidates.push(temporalModule([module.P3[0]], [module.P4[0]], module.n, module.k, module.control, module.hw));
      }
      break;
    case 'diagonal':
      if (module.coefficients.length > 1) {
        candidates.push(diagonalModule([module.coefficients[0]], module.k, module.hw));
      }
      break;
    case 'wire':
      break;
  }
  const size = moduleSize(module);
  return candidates.filter((candidate) => moduleSize(candidate) < size);
}

/**
 * Greedy minimisation: follows the first shrink candidate on which `fails`
 * still holds until none does.
 */
export function minimize<T>(module: StreamingModule<T>, fails: (candidate: StreamingModule<T>) => boolean): StreamingModule<T> {
  let current = module;
  for (;;) {
    const smaller = shrink(current).find(fails);
    if (smaller === undefined) return current;
    current = smaller;
  }
}
