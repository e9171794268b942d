import { describe, it, expect } from 'vitest';
import { FixedPoint } from '../src/hardware/types.js';
import { butterfly } from '../src/spl/terms.js';
import { acyclicModule, compile, itProductModule, wireModule } from '../src/streaming/compiler.js';
import { moduleSize } from '../src/streaming/module.js';
import { minimize, shrink } from '../src/streaming/shrink.js';
import { testModule } from '../src/simulator/stream-tester.js';
import { WHT } from '../src/transforms/wht.js';

const hw = new FixedPoint(16, 0);

describe('shrink', () => {
  it('reduces the tensor repeat count', () => {
    const candidates = shrink(acyclicModule(butterfly('wht', 1), 3, 1, hw));
    expect(candidates).toHaveLength(1);
    expect(candidates[0].n).toBe(2);
    expect(candidates[0].k).toBe(1);
  });

  it('reduces the loop count or drops the loop', () => {
    const factor = acyclicModule(butterfly('wht', 1), 2, 1, hw);
    const candidates = shrink(itProductModule(3, factor, null));
    expect(candidates.map((c) => c.kind)).toEqual(['itProduct', 'acyclic']);
  });

  it('has nothing smaller than a wire', () => {
    expect(shrink(wireModule(butterfly('wht', 1), 1, hw))).toEqual([]);
  });

  it('only yields smaller modules that still stream correctly', () => {
    const module = compile(WHT(3, 1), 1, 'dual', hw);
    expect(module.kind).toBe('product');
    const candidates = shrink(module);
    expect(candidates.length).toBeGreaterThan(0);
    for (const candidate of candidates) {
      expect(moduleSize(candidate)).toBeLessThan(moduleSize(module));
      expect(testModule(candidate, { datasets: 2 })).toBe(0);
    }
  });
});

describe('minimize', () => {
  it('follows failing candidates to a local minimum', () => {
    const factor = acyclicModule(butterfly('wht', 1), 2, 1, hw);
    const result = minimize(itProductModule(3, factor, null), (m) => m.kind === 'itProduct');
    expect(result.kind).toBe('itProduct');
    expect(result.kind === 'itProduct' ? result.r : 0).toBe(1);
  });
});
