import { describe, it, expect } from 'vitest';
import { ConfigurationError, DomainError } from '../src/errors.js';
import { ComplexHW, FixedPoint, IEEE754, Unsigned } from '../src/hardware/types.js';
import { Complex } from '../src/linalg/complex.js';
import { Cmat, Lmat } from '../src/linalg/permutation.js';
import { butterfly, linearPerm } from '../src/spl/terms.js';
import { acyclicModule, compile, diagonalModule, itProductModule } from '../src/streaming/compiler.js';
import { elaborate } from '../src/streaming/design.js';
import { RAM_CONTROLS, cyclesPerDataset } from '../src/streaming/module.js';
import { simulate, testModule } from '../src/simulator/stream-tester.js';
import { CTDFT, ItPease, ItPeaseFused } from '../src/transforms/dft.js';
import { WHT, WHTItPease } from '../src/transforms/wht.js';
import { basis, createRandom, hadamard, randomInvertible } from './helpers.js';

const INTEGER = new FixedPoint(16, 0);
const Q8 = new ComplexHW(new FixedPoint(8, 8));

function hadamardColumns(size: number): number[][] {
  return Array.from({ length: size }, (_, j) => Array.from({ length: size }, (_, i) => hadamard(i, j)));
}

function basisDatasets(size: number): number[][] {
  return Array.from({ length: size }, (_, j) => basis(size, j));
}

describe('compiled transforms', () => {
  it('computes the WHT exactly when fully unfolded', () => {
    const module = compile(WHT(3, 3), 3, 'dual', INTEGER);
    expect(module.kind).toBe('acyclic');
    const result = simulate(elaborate(module), basisDatasets(8));
    expect(result.outputs).toEqual(hadamardColumns(8));
  });

  for (const control of RAM_CONTROLS) {
    it(`computes the WHT folded to two lanes (${control})`, () => {
      const module = compile(WHT(3, 1), 1, control, INTEGER);
      const result = simulate(elaborate(module), basisDatasets(8));
      expect(result.outputs).toEqual(hadamardColumns(8));
    });
  }

  it('maps an impulse to the all-ones vector', () => {
    const module = compile(CTDFT(4, 2), 2, 'dual', Q8);
    const impulse = Array.from({ length: 16 }, (_, i) => (i === 0 ? Complex.ONE : Complex.ZERO));
    const result = simulate(elaborate(module), [impulse]);
    expect(result.outputs[0]).toEqual(Array.from({ length: 16 }, () => new Complex(1, 0)));
  });

  it('streams the iterative Pease FFT', () => {
    const module = compile(ItPease(4, 1), 2, 'dual', Q8);
    expect(testModule(module, { datasets: 4 })).toBeLessThan(0.01);
  });

  it('streams the iterative Pease FFT with idle cycles between datasets', () => {
    const module = compile(ItPease(4, 1), 2, 'dual', Q8);
    expect(testModule(module, { datasets: 3, gap: module.minGap + 3 })).toBeLessThan(0.01);
  });

  it('streams the fused Pease loop with per-iteration permutations', () => {
    const module = compile(ItPeaseFused(4, 1), 2, 'dual', Q8);
    expect(module.kind).toBe('itProduct');
    expect(testModule(module, { datasets: 4 })).toBeLessThan(0.01);
  });

  it('streams the FFT on single-precision floating-point lanes', () => {
    const module = compile(CTDFT(3, 1), 1, 'dual', new ComplexHW(new IEEE754(8, 23)));
    expect(testModule(module, { datasets: 3 })).toBeLessThan(0.01);
  });

  it('streams an unfolded radix-16 butterfly', () => {
    const module = compile(CTDFT(4, 4), 4, 'dual', Q8);
    expect(module.kind).toBe('acyclic');
    expect(testModule(module, { datasets: 3 })).toBeLessThan(0.01);
  });

  it('streams the iterative WHT exactly', () => {
    expect(testModule(compile(WHTItPease(4, 2), 2, 'dual', INTEGER))).toBe(0);
  });

  it('requires dual RAM control for loops', () => {
    expect(() => compile(ItPease(4, 1), 2, 'single', Q8))
      .toThrow('ItProduct requires dual RAM control, got single');
    expect(() => compile(ItPease(4, 1), 2, 'singlePorted', Q8)).toThrow(ConfigurationError);
  });

  it('rejects streaming widths outside the transform', () => {
    expect(() => compile(WHT(3, 1), 4, 'dual', INTEGER)).toThrow(DomainError);
  });

  it('needs at least two lanes for butterflies', () => {
    expect(() => compile(WHT(2, 1), 0, 'dual', INTEGER))
      .toThrow('butterflies need a streaming width of at least 2^1, got 2^0');
    expect(() => compile(CTDFT(3, 1), 0, 'single', Q8)).toThrow(DomainError);
  });
});

describe('linear permutations', () => {
  const hw = new Unsigned(8);

  for (const control of RAM_CONTROLS) {
    for (const k of [1, 2, 3]) {
      it(`permutes datasets back to back (${control}, k=${k})`, () => {
        const random = createRandom(100 + k);
        for (let trial = 0; trial < 3; trial++) {
          const module = compile(linearPerm([randomInvertible(random, 5)]), k, control, hw);
          expect(testModule(module, { datasets: 4, seed: trial })).toBe(0);
        }
      });
    }

    it(`accepts a gap of one dataset (${control})`, () => {
      const random = createRandom(7);
      const module = compile(linearPerm([randomInvertible(random, 4)]), 1, control, hw);
      expect(testModule(module, { gap: cyclesPerDataset(module) })).toBe(0);
    });
  }

  for (const control of ['dual', 'single'] as const) {
    it(`switches matrices per dataset (${control})`, () => {
      const random = createRandom(21);
      const term = linearPerm([randomInvertible(random, 4), randomInvertible(random, 4)]);
      expect(testModule(compile(term, 2, control, hw), { datasets: 5 })).toBe(0);
    });
  }

  it('accepts any gap under dual control', () => {
    const random = createRandom(5);
    const module = compile(linearPerm([randomInvertible(random, 4)]), 1, 'dual', hw);
    expect(testModule(module, { gap: 3 })).toBe(0);
  });

  it('cannot switch matrices per dataset in place', () => {
    const random = createRandom(21);
    const term = linearPerm([randomInvertible(random, 4), randomInvertible(random, 4)]);
    expect(() => compile(term, 2, 'singlePorted', hw)).toThrow(ConfigurationError);
  });
});

describe('diagonals', () => {
  it('scales a single lane by the coefficient of each dataset', () => {
    const module = diagonalModule([[new Complex(2, 0)], [new Complex(3, 0)]], 0, INTEGER);
    expect(module.latency).toBe(1);
    const result = simulate(elaborate(module), [[5], [7]]);
    expect(result.outputs).toEqual([[10], [21]]);
  });
});

describe('module latency', () => {
  const hw = new Unsigned(8);

  it('holds a purely temporal permutation for one dataset', () => {
    const module = compile(linearPerm([Cmat(3)]), 0, 'dual', hw);
    expect(module.kind).toBe('temporal');
    expect(module.latency).toBe(9);
    expect(module.minGap).toBe(0);
  });

  it('delays neither lanes nor cycles for fixed lane permutations', () => {
    const module = compile(linearPerm([Lmat(1, 2)]), 2, 'dual', hw);
    expect(module.kind).toBe('spatial');
    expect(module.latency).toBe(0);
    expect(testModule(module)).toBe(0);
  });

  it('needs one dataset between datasets under single control', () => {
    const module = compile(linearPerm([Cmat(3)]), 1, 'single', hw);
    expect(module.minGap).toBe(4);
    expect(module.acceptsBackToBack).toBe(true);
  });

  it('schedules loop passes one dataset apart', () => {
    const factor = acyclicModule(butterfly('wht', 1), 2, 1, INTEGER);
    const loop = itProductModule(3, factor, null);
    expect(loop.period).toBe(2);
    expect(loop.latency).toBe(5);
    expect(loop.minGap).toBe(4);
    expect(loop.acceptsBackToBack).toBe(false);
    expect(testModule(loop)).toBe(0);
  });

  it('announces every dataset on next_out', () => {
    const module = compile(WHT(3, 1), 1, 'dual', INTEGER);
    const design = elaborate(module);
    const result = simulate(design, basisDatasets(8).slice(0, 3));
    expect(result.starts).toEqual([1, 5, 9]);
    expect(result.nextOut).toEqual(result.starts.map((s) => s + design.latency - 1));
  });
});
