// Streaming modules: compiled hardware realisations of SPL terms at a fixed streaming width

import type { HW } from '../hardware/types.js';
import type { Complex } from '../linalg/complex.js';
import type { Matrix } from '../linalg/matrix.js';
import type { Butterfly, SPL } from '../spl/terms.js';

/**
 * How folding memories are addressed.
 * - single: one shared counter drives both ports; datasets back to back or T apart
 * - dual: independent read and write counters; any gap
 * - singlePorted: one address per cycle, read before write in place
 */
export type RAMControl = 'single' | 'dual' | 'singlePorted';

export const RAM_CONTROLS: readonly RAMControl[] = ['single', 'dual', 'singlePorted'];

interface ModuleBase<T> {
  n: number;                 // log2 of the dataset size
  k: number;                 // log2 of the number of lanes
  latency: number;           // Cycles from the first input word to the first output word
  minGap: number;            // Idle cycles required between datasets
  acceptsBackToBack: boolean; // Whether a gap of zero is also allowed
  spl: SPL;                  // Reference semantics
  hw: HW<T>;
}

export interface WireModule<T> extends ModuleBase<T> {
  kind: 'wire';
}

/** 2^(k - base.n) copies of a butterfly network per cycle, outputs registered. */
export interface AcyclicModule<T> extends ModuleBase<T> {
  kind: 'acyclic';
  base: Butterfly;
}

export interface ProductModule<T> extends ModuleBase<T> {
  kind: 'product';
  factors: StreamingModule<T>[]; // The last factor sees the input first
}

/** Lane permutation (c, j) -> (c, P2 c + P1 j), one matrix pair per dataset. */
export interface SpatialModule<T> extends ModuleBase<T> {
  kind: 'spatial';
  P1: Matrix[];
  P2: Matrix[];
  registered: boolean;
}

/** Cycle permutation (c, j) -> (P4 c + P3 j, j) through one memory per lane. */
export interface TemporalModule<T> extends ModuleBase<T> {
  kind: 'temporal';
  P3: Matrix[];
  P4: Matrix[];
  control: RAMControl;
}

export interface DiagonalModule<T> extends ModuleBase<T> {
  kind: 'diagonal';
  coefficients: (readonly Complex[])[];
}

export interface ItProductModule<T> extends ModuleBase<T> {
  kind: 'itProduct';
  r: number;
  factor: StreamingModule<T>;
  endLoop: StreamingModule<T> | null;
  period: number;            // Cycles between consecutive passes through the loop
}

export type StreamingModule<T> =
  | WireModule<T>
  | AcyclicModule<T>
  | ProductModule<T>
  | SpatialModule<T>
  | TemporalModule<T>
  | DiagonalModule<T>
  | ItProductModule<T>;

/** Cycles a dataset occupies the input lanes. */
export function cyclesPerDataset(module: { n: number; k: number }): number {
  return 2 ** (module.n - module.k);
}

/** Smallest number of idle cycles between datasets the module accepts. */
export function defaultGap(module: StreamingModule<unknown>): number {
  return module.acceptsBackToBack ? 0 : module.minGap;
}

/** Number of graph-independent building blocks, used to order shrink candidates. */
export function moduleSize(module: StreamingModule<unknown>): number {
  switch (module.kind) {
    case 'product':
      return 1 + module.factors.reduce((sum, f) => sum + moduleSize(f), 0);
    case 'itProduct':
      return module.r + moduleSize(module.factor) + (module.endLoop === null ? 0 : moduleSize(module.endLoop));
    case 'acyclic':
      return module.n;
    case 'spatial':
      return module.P1.length;
    case 'temporal':
      return module.P3.length;
    case 'diagonal':
      return module.coefficients.length;
    case 'wire':
      return 1;
  }
}
