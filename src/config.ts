// Generator configuration: typed settings for building a design from a transform description

import { ConfigurationError } from './errors.js';
import { ComplexHW, FixedPoint, IEEE754, Unsigned } from './hardware/types.js';
import type { HW } from './hardware/types.js';
import type { Complex } from './linalg/complex.js';
import type { SPL, Transform } from './spl/terms.js';
import { compile } from './streaming/compiler.js';
import { elaborate } from './streaming/design.js';
import type { Design } from './streaming/design.js';
import type { RAMControl } from './streaming/module.js';
import type { TraceOptions } from './trace.js';
import { CTDFT, ItPease, ItPeaseFused, Pease } from './transforms/dft.js';
import { WHT, WHTItPease, WHTPease } from './transforms/wht.js';

export type Algorithm = 'ct' | 'pease' | 'itpease' | 'itpeasefused';

export const ALGORITHMS: readonly Algorithm[] = ['ct', 'pease', 'itpease', 'itpeasefused'];

export type HardwareDescriptor =
  | { kind: 'unsigned'; width: number; complex?: boolean }
  | { kind: 'fixed'; magnitude: number; fractional: number; complex?: boolean }
  | { kind: 'ieee754'; exponent: number; mantissa: number; complex?: boolean };

export interface GeneratorConfig extends TraceOptions {
  name: string;
  transform: Transform;
  algorithm: Algorithm;
  n: number;            // log2 of the transform size
  k: number;            // log2 of the streaming width
  r: number;            // log2 of the radix
  hardware: HardwareDescriptor;
  control: RAMControl;
}

export const DEFAULT_CONFIG: GeneratorConfig = {
  name: 'stream',
  transform: 'dft',
  algorithm: 'ct',
  n: 3,
  k: 1,
  r: 1,
  hardware: { kind: 'fixed', magnitude: 8, fractional: 8, complex: true },
  control: 'dual',
  verbose: false,
};

/** The SPL term of a transform as factorised by `algorithm`. */
export function buildTerm(transform: Transform, algorithm: Algorithm, n: number, r: number): SPL {
  if (transform === 'wht') {
    switch (algorithm) {
      case 'ct':
        return WHT(n, r);
      case 'pease':
        return WHTPease(n, r);
      case 'itpease':
        return WHTItPease(n, r);
      case 'itpeasefused':
        throw new ConfigurationError('the fused iterative Pease factorization exists for the DFT only');
    }
  }
  switch (algorithm) {
    case 'ct':
      return CTDFT(n, r);
    case 'pease':
      return Pease(n, r);
    case 'itpease':
      return ItPease(n, r);
    case 'itpeasefused':
      return ItPeaseFused(n, r);
  }
}

export function realHardware(descriptor: HardwareDescriptor): HW<number> {
  switch (descriptor.kind) {
    case 'unsigned':
      return new Unsigned(descriptor.width);
    case 'fixed':
      return new FixedPoint(descriptor.magnitude, descriptor.fractional);
    case 'ieee754':
      return new IEEE754(descriptor.exponent, descriptor.mantissa);
  }
}

export function complexHardware(descriptor: HardwareDescriptor): HW<Complex> {
  return new ComplexHW(realHardware(descriptor));
}

/**
 * Builds, compiles and elaborates the configured transform. The DFT needs
 * complex hardware; the WHT runs on the real representation unless
 * `complex` is set.
 */
export function generate(config: Partial<GeneratorConfig> = {}): Design<number> | Design<Complex> {
  const opts: GeneratorConfig = { ...DEFAULT_CONFIG, ...config };
  const term = buildTerm(opts.transform, opts.algorithm, opts.n, opts.r);
  const compileOptions = { verbose: opts.verbose, trace: opts.trace };
  if (opts.transform === 'dft' && opts.hardware.complex === false) {
    throw new ConfigurationError('the DFT needs complex hardware');
  }
  if (opts.transform === 'dft' || opts.hardware.complex === true) {
    const module = compile(term, opts.k, opts.control, complexHardware(opts.hardware), compileOptions);
    return elaborate(module, { ...compileOptions, name: opts.name });
  }
  const module = compile(term, opts.k, opts.control, realHardware(opts.hardware), compileOptions);
  return elaborate(module, { ...compileOptions, name: opts.name });
}
